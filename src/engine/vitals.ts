// engine/vitals.ts — Clamped Health and Energy pools
// current is only reachable through mutators, so the clamp holds after every call.

import type { EntityId, CombatEvent } from '../types/index.js';
import type { EventBus } from './event-bus.js';
import { clamp } from '../shared/utils.js';

export interface PoolInit {
  max: number;
  current?: number;
  canExceed?: boolean;
  godMode?: boolean;
}

function assertPoolInit(init: PoolInit, label: string): void {
  if (!Number.isFinite(init.max) || init.max <= 0) {
    throw new RangeError(`${label} max must be a positive number, got ${init.max}`);
  }
  if (init.current !== undefined && !Number.isFinite(init.current)) {
    throw new RangeError(`${label} current must be finite, got ${init.current}`);
  }
}

export class HealthPool {
  private _current: number;
  private _max: number;
  private _defeated = false;

  canExceed: boolean;
  godMode: boolean;

  constructor(
    private readonly ownerId: EntityId,
    private readonly bus: EventBus<CombatEvent>,
    init: PoolInit,
  ) {
    assertPoolInit(init, 'Health');
    this._max = init.max;
    this.canExceed = init.canExceed ?? false;
    this.godMode = init.godMode ?? false;
    const start = init.current ?? init.max;
    this._current = this.canExceed ? start : clamp(start, 0, init.max);
  }

  get current(): number {
    return this._current;
  }

  get max(): number {
    return this._max;
  }

  get isDefeated(): boolean {
    return this._defeated;
  }

  /** Returns the amount of health actually removed. */
  applyDamage(amount: number, sourceId: EntityId | null = null): number {
    if (this.godMode || this._defeated || !(amount > 0)) return 0;

    const before = this._current;
    const next = before - amount;
    this._current = this.canExceed ? next : clamp(next, 0, this._max);

    const delta = this._current - before;
    this.bus.emit({
      type: 'health_changed',
      entityId: this.ownerId,
      current: this._current,
      max: this._max,
      delta,
      sourceId,
    });

    if (this._current <= 0) {
      this._defeated = true;
      this.bus.emit({
        type: 'defeated',
        entityId: this.ownerId,
        overkill: Math.max(0, amount - before),
        sourceId,
      });
    }

    return -delta;
  }

  /** Returns the amount of health actually restored. */
  applyHeal(amount: number, sourceId: EntityId | null = null): number {
    if (this._defeated || !(amount > 0)) return 0;

    const before = this._current;
    const next = before + amount;
    this._current = this.canExceed ? next : clamp(next, 0, this._max);

    const delta = this._current - before;
    if (delta === 0) return 0;
    this.bus.emit({
      type: 'health_changed',
      entityId: this.ownerId,
      current: this._current,
      max: this._max,
      delta,
      sourceId,
    });
    return delta;
  }

  setMax(max: number): void {
    if (!Number.isFinite(max) || max <= 0) {
      throw new RangeError(`Health max must be a positive number, got ${max}`);
    }
    this._max = max;
    if (!this.canExceed) this._current = clamp(this._current, 0, max);
  }
}

export class EnergyPool {
  private _current: number;
  private _max: number;
  private _noEnergy = false;

  canExceed: boolean;
  /** Blocks exhaustion only. Boosts still apply. */
  godMode: boolean;

  constructor(
    private readonly ownerId: EntityId,
    private readonly bus: EventBus<CombatEvent>,
    init: PoolInit,
  ) {
    assertPoolInit(init, 'Energy');
    this._max = init.max;
    this.canExceed = init.canExceed ?? false;
    this.godMode = init.godMode ?? false;
    const start = init.current ?? init.max;
    this._current = this.canExceed ? start : clamp(start, 0, init.max);
  }

  get current(): number {
    return this._current;
  }

  get max(): number {
    return this._max;
  }

  get noEnergy(): boolean {
    return this._noEnergy;
  }

  canAfford(cost: number): boolean {
    if (cost <= 0 || this.godMode) return true;
    return !this._noEnergy && this._current >= cost;
  }

  /** Returns the amount of energy actually drained. */
  applyExhaustion(amount: number): number {
    if (this.godMode || !(amount > 0)) return 0;

    const before = this._current;
    const next = before - amount;
    this._current = this.canExceed ? next : clamp(next, 0, this._max);
    this.emitChanged();

    if (this._current <= 0 && !this._noEnergy) {
      this._noEnergy = true;
      this.bus.emit({
        type: 'exhausted',
        entityId: this.ownerId,
        overkill: Math.max(0, amount - before),
      });
    }

    return before - this._current;
  }

  /** Ignored while no-energy is set; only fullRestore clears that state. */
  applyBoost(amount: number): number {
    if (this._noEnergy || !(amount > 0)) return 0;

    const before = this._current;
    const next = before + amount;
    this._current = this.canExceed ? next : clamp(next, 0, this._max);

    const delta = this._current - before;
    if (delta !== 0) this.emitChanged();
    return delta;
  }

  fullRestore(): number {
    const restored = Math.max(0, this._max - this._current);
    this._current = Math.max(this._current, this._max);
    this._noEnergy = false;
    this.emitChanged();
    this.bus.emit({ type: 'energy_restored', entityId: this.ownerId, amount: restored });
    return restored;
  }

  private emitChanged(): void {
    this.bus.emit({
      type: 'energy_changed',
      entityId: this.ownerId,
      current: this._current,
      max: this._max,
    });
  }
}
