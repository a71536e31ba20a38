// types/events.ts — Combat notifications, delivered through the event bus and recorded per tick

import type { EntityId, Position } from './core.js';
import type { ExpireReason, HitDelivery, Archetype } from './projectile.js';
import type { DamageType, StatusKind } from './status.js';
import type { CastRejectReason } from './spell.js';

export type CombatEvent =
  | { type: 'health_changed'; entityId: EntityId; current: number; max: number; delta: number; sourceId: EntityId | null }
  | { type: 'defeated'; entityId: EntityId; overkill: number; sourceId: EntityId | null }
  | { type: 'energy_changed'; entityId: EntityId; current: number; max: number }
  | { type: 'exhausted'; entityId: EntityId; overkill: number }
  | { type: 'energy_restored'; entityId: EntityId; amount: number }
  | { type: 'status_applied'; entityId: EntityId; kind: StatusKind; level: number; remaining: number; slowAmount: number; sourceId: EntityId | null }
  | { type: 'status_refreshed'; entityId: EntityId; kind: StatusKind; level: number; remaining: number; slowAmount: number; sourceId: EntityId | null }
  | { type: 'status_tick'; entityId: EntityId; kind: StatusKind; iterations: number; totalDamage: number }
  | { type: 'status_expired'; entityId: EntityId; kind: StatusKind }
  | { type: 'projectile_spawned'; projectileId: EntityId; spellId: string; ownerId: EntityId; archetype: Archetype; position: Position }
  | { type: 'projectile_hit'; projectileId: EntityId; ownerId: EntityId; targetId: EntityId; damage: number; damageType: DamageType; delivery: HitDelivery }
  | { type: 'projectile_expired'; projectileId: EntityId; ownerId: EntityId; reason: ExpireReason }
  | { type: 'hit_ignored'; projectileId: EntityId; targetId: EntityId; reason: 'missing' | 'inert' }
  | { type: 'cast_rejected'; casterId: EntityId; spellId: string; reason: CastRejectReason };

export type CombatEventType = CombatEvent['type'];

export type CombatEventOf<T extends CombatEventType> = Extract<CombatEvent, { type: T }>;
