// engine/status-set.ts — Active status effects on one combatant
// Refresh policy: one instance per kind, reapplication keeps the stronger values.

import type {
  EntityId,
  CombatEvent,
  DamageType,
  EffectPayload,
  StatusApplyOutcome,
  StatusEffectInstance,
  StatusKind,
} from '../types/index.js';
import type { EventBus } from './event-bus.js';
import { clamp } from '../shared/utils.js';

export class StatusSet {
  private instances: Map<StatusKind, StatusEffectInstance> = new Map();

  constructor(
    private readonly ownerId: EntityId,
    private readonly bus: EventBus<CombatEvent>,
  ) {}

  apply(payload: EffectPayload, damageType: DamageType, sourceId: EntityId | null): StatusApplyOutcome {
    const existing = this.instances.get(payload.kind);

    if (existing) {
      existing.level = Math.max(existing.level, payload.level);
      existing.remaining = Math.max(existing.remaining, payload.duration);
      existing.slowAmount = Math.max(existing.slowAmount, payload.slowAmount);
      existing.damageType = damageType;
      existing.sourceId = sourceId;
      this.bus.emit({
        type: 'status_refreshed',
        entityId: this.ownerId,
        kind: existing.kind,
        level: existing.level,
        remaining: existing.remaining,
        slowAmount: existing.slowAmount,
        sourceId,
      });
      return 'refreshed';
    }

    const instance: StatusEffectInstance = {
      kind: payload.kind,
      level: payload.level,
      remaining: payload.duration,
      damageType,
      slowAmount: payload.slowAmount,
      sourceId,
      ticksApplied: 0,
    };
    this.instances.set(payload.kind, instance);
    this.bus.emit({
      type: 'status_applied',
      entityId: this.ownerId,
      kind: instance.kind,
      level: instance.level,
      remaining: instance.remaining,
      slowAmount: instance.slowAmount,
      sourceId,
    });
    return 'applied';
  }

  get(kind: StatusKind): StatusEffectInstance | undefined {
    return this.instances.get(kind);
  }

  has(kind: StatusKind): boolean {
    return this.instances.has(kind);
  }

  list(): StatusEffectInstance[] {
    return [...this.instances.values()];
  }

  get size(): number {
    return this.instances.size;
  }

  /** Removes an instance. Emits status_expired only when one was present. */
  remove(kind: StatusKind): boolean {
    if (!this.instances.delete(kind)) return false;
    this.bus.emit({ type: 'status_expired', entityId: this.ownerId, kind });
    return true;
  }

  clear(): void {
    this.instances.clear();
  }

  /** Action-speed multiplier from chill, 1 when unslowed. Scales cooldown recovery. */
  speedMultiplier(): number {
    const chill = this.instances.get('chill');
    if (!chill) return 1;
    return clamp(1 - chill.slowAmount, 0, 1);
  }
}
