// types/tick.ts — Tick output

import type { EntityId, Tick } from './core.js';
import type { CastResult } from './spell.js';
import type { CombatEvent } from './events.js';
import type { ProjectileExpiry } from './projectile.js';

export interface ResolvedHit {
  projectileId: EntityId;
  targetId: EntityId;
  rawDamage: number;
  /** Health actually removed after resist mitigation; 0 for ignored hits. */
  damage: number;
  ignored: boolean;
  defeated: boolean;
}

export interface TickResult {
  tick: Tick;
  casts: CastResult[];
  hits: ResolvedHit[];
  expired: ProjectileExpiry[];
  defeated: EntityId[];
  statusTick: boolean;
  events: CombatEvent[];
}
