// types/status.ts — Damage types and status effects

import type { EntityId } from './core.js';

export type DamageType = 'physical' | 'fire' | 'ice' | 'magic';

export type StatusKind = 'corroding' | 'burned' | 'chill';

/** Effect carried by a projectile and handed to the target on hit. */
export interface EffectPayload {
  kind: StatusKind;
  /** Number of status ticks the effect lasts. */
  duration: number;
  level: number;
  slowAmount: number;
}

export interface StatusEffectInstance {
  kind: StatusKind;
  level: number;
  remaining: number;
  damageType: DamageType;
  slowAmount: number;
  sourceId: EntityId | null;
  ticksApplied: number;
}

export type StatusApplyOutcome = 'applied' | 'refreshed';
