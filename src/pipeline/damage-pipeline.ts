// pipeline/damage-pipeline.ts — Applies trajectory hits to Health and Status

import type {
  EntityId,
  ProjectileExpiry,
  ProjectileHit,
  ResolvedHit,
  TrajectoryStep,
} from '../types/index.js';
import type { WorldState } from '../engine/world.js';
import type { Combatant } from '../engine/combatant.js';
import { isDamageable } from '../engine/combatant.js';
import type { TrajectoryEngine } from './trajectory-engine.js';
import { RESIST_CAP, RESIST_K } from '../shared/constants.js';

export interface StepResolution {
  hits: ResolvedHit[];
  expired: ProjectileExpiry[];
  defeated: EntityId[];
}

/** Resist rating → damage. Raw damage is floored before mitigation. */
export function mitigate(damage: number, resist: number): number {
  const raw = Math.floor(damage);
  const rating = Math.max(0, resist);
  const reduction = Math.min(RESIST_CAP, rating / (rating + RESIST_K));
  return Math.max(0, Math.floor(raw * (1 - reduction)));
}

export class DamagePipeline {
  constructor(private readonly engine: TrajectoryEngine) {}

  /** Applies every hit in the step in order, then reports expiries and spawns. */
  resolveStep(step: TrajectoryStep, world: WorldState): StepResolution {
    const resolution: StepResolution = { hits: [], expired: [...step.expired], defeated: [] };

    for (const child of step.spawned) {
      world.bus.emit({
        type: 'projectile_spawned',
        projectileId: child.id,
        spellId: child.spellId,
        ownerId: child.ownerId,
        archetype: child.state.archetype,
        position: { ...child.position },
      });
    }

    for (const hit of step.hits) {
      const resolved = this.resolve(hit, world);
      resolution.hits.push(resolved);
      if (resolved.defeated) {
        resolution.defeated.push(resolved.targetId);
        resolution.expired.push(...this.retire(resolved.targetId, world));
      }
    }

    for (const expiry of step.expired) {
      this.emitExpired(expiry, world);
    }

    return resolution;
  }

  resolve(hit: ProjectileHit, world: WorldState): ResolvedHit {
    const body = world.getBody(hit.targetId);
    if (!isDamageable(body)) {
      world.bus.emit({
        type: 'hit_ignored',
        projectileId: hit.projectileId,
        targetId: hit.targetId,
        reason: body ? 'inert' : 'missing',
      });
      return {
        projectileId: hit.projectileId,
        targetId: hit.targetId,
        rawDamage: hit.damage,
        damage: 0,
        ignored: true,
        defeated: false,
      };
    }

    const damage = this.damageFor(hit, body);
    const outcome = body.takeDamageAndEffect({
      damage,
      damageType: hit.damageType,
      effect: hit.effect,
      sourceId: hit.ownerId,
    });

    world.bus.emit({
      type: 'projectile_hit',
      projectileId: hit.projectileId,
      ownerId: hit.ownerId,
      targetId: hit.targetId,
      damage: outcome.applied,
      damageType: hit.damageType,
      delivery: hit.delivery,
    });

    return {
      projectileId: hit.projectileId,
      targetId: hit.targetId,
      rawDamage: hit.damage,
      damage: outcome.applied,
      ignored: false,
      defeated: outcome.defeated,
    };
  }

  /**
   * Removes a defeated combatant and everything it has in flight.
   * Safe to call for an id that is already gone.
   */
  retire(entityId: EntityId, world: WorldState): ProjectileExpiry[] {
    world.removeCombatant(entityId);
    const cancelled = this.engine.cancelOwnedBy(entityId);
    for (const expiry of cancelled) {
      this.emitExpired(expiry, world);
    }
    return cancelled;
  }

  private damageFor(hit: ProjectileHit, target: Combatant): number {
    return mitigate(hit.damage, target.resistTo(hit.damageType));
  }

  private emitExpired(expiry: ProjectileExpiry, world: WorldState): void {
    world.bus.emit({
      type: 'projectile_expired',
      projectileId: expiry.projectileId,
      ownerId: expiry.ownerId,
      reason: expiry.reason,
    });
  }
}
