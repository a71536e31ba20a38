// pipeline/cast-queue.ts — Per-caster cast buffering between ticks

import type { CastIntent, EntityId, Position, RawCast, Tick } from '../types/index.js';

export interface QueuedCast extends CastIntent {
  enqueuedTick: Tick;
}

export class CastQueue {
  private queues: Map<EntityId, QueuedCast> = new Map();

  /** Returns false when the request is malformed and was dropped. */
  enqueue(casterId: EntityId, raw: RawCast, tick: Tick): boolean {
    const parsed = this.parseCast(casterId, raw, tick);
    if (!parsed) return false;

    // 1 cast per caster per tick, last-write-wins
    this.queues.set(casterId, parsed);
    return true;
  }

  get size(): number {
    return this.queues.size;
  }

  drainAll(): QueuedCast[] {
    const all = [...this.queues.values()];
    this.queues.clear();
    return all;
  }

  private parseCast(casterId: EntityId, raw: RawCast, tick: Tick): QueuedCast | null {
    if (typeof raw.spellId !== 'string' || raw.spellId === '') return null;

    let target: Position | null = null;
    if (raw.target !== undefined && raw.target !== null) {
      target = this.parsePosition(raw.target);
      if (!target) return null;
    }

    let targetId: EntityId | null = null;
    if (raw.targetId !== undefined && raw.targetId !== null) {
      if (typeof raw.targetId !== 'string' || raw.targetId === '') return null;
      targetId = raw.targetId;
    }

    return { casterId, spellId: raw.spellId, target, targetId, enqueuedTick: tick };
  }

  private parsePosition(raw: unknown): Position | null {
    if (typeof raw !== 'object' || raw === null) return null;
    const x = 'x' in raw ? Number(raw.x) : NaN;
    const y = 'y' in raw ? Number(raw.y) : NaN;
    if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
    return { x, y };
  }
}
