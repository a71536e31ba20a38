// types/projectile.ts — In-flight projectiles and per-step trajectory output

import type { EntityId, Faction, Position } from './core.js';
import type { DamageType, EffectPayload } from './status.js';

export type Archetype =
  | 'straight'
  | 'homing'
  | 'orbiting'
  | 'sine'
  | 'boomerang'
  | 'chain'
  | 'piercing'
  | 'ground_area'
  | 'spiral'
  | 'forking'
  | 'growing_orb';

export type ForkCondition = 'distance' | 'timer' | 'on_first_hit';

export type GroundAreaPhase = 'traveling' | 'arrived';

// Archetype-specific state. Angles are radians, times are seconds.
export type ArchetypeState =
  | { archetype: 'straight' }
  | { archetype: 'homing'; homingStrength: number; targetId: EntityId | null }
  | { archetype: 'orbiting'; orbitRadius: number; angularSpeed: number; angle: number }
  | { archetype: 'sine'; amplitude: number; frequency: number; base: Position }
  | { archetype: 'boomerang'; returning: boolean; returnDistance: number }
  | {
      archetype: 'chain';
      maxChains: number;
      chainsRemaining: number;
      chainRadius: number;
      targetId: EntityId | null;
    }
  | { archetype: 'piercing'; pierceCount: number; pierceRemaining: number }
  | {
      archetype: 'ground_area';
      targetPosition: Position;
      travelSpeed: number;
      aoeRadius: number;
      aoeDamage: number;
      delayAfterArrival: number;
      phase: GroundAreaPhase;
      arrivedFor: number;
    }
  | {
      archetype: 'spiral';
      center: Position;
      baseTravelSpeed: number;
      expansionSpeed: number;
      rotationSpeed: number;
      radius: number;
      angle: number;
    }
  | {
      archetype: 'forking';
      condition: ForkCondition;
      forkDistance: number;
      forkTime: number;
      forkCount: number;
      forkAngleSpread: number;
      childSpellId: string;
    }
  | { archetype: 'growing_orb'; maxRadius: number; growthRate: number; growthDuration: number };

export interface Projectile {
  id: EntityId;
  spellId: string;
  ownerId: EntityId;
  faction: Faction;
  position: Position;
  velocity: Position;
  speed: number;
  /** Unit vector of the launch direction. */
  heading: Position;
  damage: number;
  damageType: DamageType;
  effect: EffectPayload | null;
  /** Hit circle radius. */
  radius: number;
  range: number;
  /** Seconds until the projectile expires on its own, null for range-bound flight. */
  lifetime: number | null;
  distanceTraveled: number;
  elapsed: number;
  /** Splash radius around a contact hit, 0 for none. */
  aoeRadius: number;
  hitIds: Set<EntityId>;
  overlapping: Set<EntityId>;
  state: ArchetypeState;
}

export type ExpireReason =
  | 'range'
  | 'lifetime'
  | 'terrain'
  | 'owner_lost'
  | 'target_lost'
  | 'spent'
  | 'forked'
  | 'detonated'
  | 'returned'
  | 'cancelled';

export type HitDelivery = 'contact' | 'splash' | 'detonation';

export interface ProjectileHit {
  projectileId: EntityId;
  spellId: string;
  ownerId: EntityId;
  targetId: EntityId;
  damage: number;
  damageType: DamageType;
  effect: EffectPayload | null;
  position: Position;
  delivery: HitDelivery;
}

export interface ProjectileExpiry {
  projectileId: EntityId;
  ownerId: EntityId;
  spellId: string;
  reason: ExpireReason;
  position: Position;
}

export interface TrajectoryStep {
  hits: ProjectileHit[];
  expired: ProjectileExpiry[];
  spawned: Projectile[];
}
