// pipeline/trajectory-engine.ts — Per-tick projectile motion and collision detection
// All projectiles move first, then collisions are detected against the moved
// positions, so no projectile can hit twice within one step.

import type {
  ArchetypeState,
  EntityId,
  ExpireReason,
  HitDelivery,
  Projectile,
  ProjectileExpiry,
  TrajectoryStep,
} from '../types/index.js';
import { distance } from '../types/index.js';
import type { CombatField } from '../engine/world.js';
import type { Body, Combatant } from '../engine/combatant.js';
import { findTerrainOverlap } from '../engine/terrain.js';
import type { ProjectileFactory } from './projectile-factory.js';
import { EPSILON, TERRAIN_EXEMPT } from '../shared/constants.js';
import { InvalidProjectileConfigError } from '../shared/errors.js';
import {
  add,
  fromAngle,
  length,
  lerp,
  normalize,
  perpendicular,
  scale,
  sub,
} from '../shared/vector.js';

type StateOf<A extends ArchetypeState['archetype']> = Extract<ArchetypeState, { archetype: A }>;

interface Contact {
  body: Body;
  dist: number;
}

// Expire once distance traveled passes range
const RANGE_LIMITED = new Set<ArchetypeState['archetype']>([
  'straight',
  'homing',
  'sine',
  'chain',
  'piercing',
  'forking',
  'growing_orb',
]);

// Only count each distinct target once
const DISTINCT_TARGETS = new Set<ArchetypeState['archetype']>(['piercing', 'chain', 'growing_orb']);

export class TrajectoryEngine {
  private projectiles: Map<EntityId, Projectile> = new Map();

  constructor(private readonly factory: ProjectileFactory) {}

  spawn(projectile: Projectile): void {
    this.projectiles.set(projectile.id, projectile);
  }

  get(id: EntityId): Projectile | undefined {
    return this.projectiles.get(id);
  }

  list(): Projectile[] {
    return [...this.projectiles.values()];
  }

  get size(): number {
    return this.projectiles.size;
  }

  /** Removes every projectile owned by `ownerId`. */
  cancelOwnedBy(ownerId: EntityId): ProjectileExpiry[] {
    const cancelled: ProjectileExpiry[] = [];
    for (const projectile of this.projectiles.values()) {
      if (projectile.ownerId !== ownerId) continue;
      cancelled.push(this.expiry(projectile, 'cancelled'));
    }
    for (const expiry of cancelled) {
      this.projectiles.delete(expiry.projectileId);
    }
    return cancelled;
  }

  clear(): void {
    this.projectiles.clear();
  }

  step(dt: number, field: CombatField): TrajectoryStep {
    const result: TrajectoryStep = { hits: [], expired: [], spawned: [] };
    const ended = new Map<EntityId, ExpireReason>();

    // 1. Movement
    for (const projectile of this.projectiles.values()) {
      projectile.elapsed += dt;
      const reason = this.advance(projectile, dt, field, result);
      if (reason) ended.set(projectile.id, reason);
    }

    // 2. Collisions against post-movement positions
    for (const projectile of this.projectiles.values()) {
      if (ended.has(projectile.id)) continue;
      const reason = this.collide(projectile, field, result);
      if (reason) ended.set(projectile.id, reason);
    }

    // 3. Removals, then children join for the next step
    for (const [id, reason] of ended) {
      const projectile = this.projectiles.get(id);
      if (!projectile) continue;
      result.expired.push(this.expiry(projectile, reason));
      this.projectiles.delete(id);
    }
    for (const child of result.spawned) {
      this.projectiles.set(child.id, child);
    }

    return result;
  }

  // --- Movement ---

  private advance(p: Projectile, dt: number, field: CombatField, result: TrajectoryStep): ExpireReason | null {
    const state = p.state;

    switch (state.archetype) {
      case 'straight':
      case 'piercing':
      case 'forking':
        this.integrate(p, dt);
        break;

      case 'homing': {
        const target = this.lockHomingTarget(p, state, field);
        if (target) this.steer(p, target.position, state.homingStrength);
        this.integrate(p, dt);
        break;
      }

      case 'orbiting': {
        const owner = field.getBody(p.ownerId);
        if (!owner) return 'owner_lost';
        state.angle += state.angularSpeed * dt;
        p.position = add(owner.position, scale(fromAngle(state.angle), state.orbitRadius));
        break;
      }

      case 'sine': {
        state.base = add(state.base, scale(p.heading, p.speed * dt));
        p.distanceTraveled += p.speed * dt;
        const offset = state.amplitude * Math.sin(state.frequency * p.elapsed);
        p.position = add(state.base, scale(perpendicular(p.heading), offset));
        break;
      }

      case 'boomerang': {
        const reason = this.advanceBoomerang(p, state, dt, field);
        if (reason) return reason;
        break;
      }

      case 'chain': {
        if (state.targetId !== null) {
          const target = field.getCombatant(state.targetId);
          if (!target || target.isDefeated) return 'target_lost';
          this.steer(p, target.position, 1);
        }
        this.integrate(p, dt);
        break;
      }

      case 'ground_area':
        this.advanceGroundArea(p, state, dt);
        break;

      case 'spiral': {
        state.center = add(state.center, scale(p.heading, state.baseTravelSpeed * dt));
        state.radius += state.expansionSpeed * dt;
        state.angle += state.rotationSpeed * dt;
        p.position = add(state.center, scale(fromAngle(state.angle), state.radius));
        p.distanceTraveled += state.baseTravelSpeed * dt;
        break;
      }

      case 'growing_orb': {
        this.integrate(p, dt);
        const grownBefore = p.elapsed - dt;
        const growFor = Math.min(dt, state.growthDuration - grownBefore);
        if (growFor > 0) {
          p.radius = Math.min(state.maxRadius, p.radius + state.growthRate * growFor);
        }
        break;
      }
    }

    if (state.archetype === 'forking' && state.condition !== 'on_first_hit') {
      const due = state.condition === 'distance'
        ? p.distanceTraveled >= state.forkDistance - EPSILON
        : p.elapsed >= state.forkTime - EPSILON;
      if (due) return this.fork(p, result);
    }

    if (p.lifetime !== null && p.elapsed >= p.lifetime - EPSILON) return 'lifetime';
    if (RANGE_LIMITED.has(state.archetype) && p.distanceTraveled > p.range + EPSILON) return 'range';

    return null;
  }

  // The child definition can change after spawn (upgrade, divergence); a bad
  // one ends the parent instead of the step.
  private fork(p: Projectile, result: TrajectoryStep): ExpireReason {
    try {
      result.spawned.push(...this.factory.buildChildren(p));
      return 'forked';
    } catch (err) {
      if (!(err instanceof InvalidProjectileConfigError)) throw err;
      console.warn(`[combat] Fork of ${p.id} (${p.spellId}) failed: ${err.message}`);
      return 'spent';
    }
  }

  private integrate(p: Projectile, dt: number): void {
    p.position = add(p.position, scale(p.velocity, dt));
    p.distanceTraveled += length(p.velocity) * dt;
  }

  // Blend velocity toward the target, then restore full speed
  private steer(p: Projectile, target: { x: number; y: number }, strength: number): void {
    const toTarget = normalize(sub(target, p.position));
    if (length(toTarget) === 0) return;
    const desired = scale(toTarget, p.speed);
    const blended = lerp(p.velocity, desired, strength);
    p.velocity = length(blended) === 0 ? desired : scale(normalize(blended), p.speed);
  }

  private lockHomingTarget(p: Projectile, state: StateOf<'homing'>, field: CombatField): Combatant | undefined {
    if (state.targetId !== null) {
      const locked = field.getCombatant(state.targetId);
      if (locked && !locked.isDefeated) return locked;
    }
    const acquired = field.nearestOpponent(p.position, p.faction);
    state.targetId = acquired?.id ?? null;
    return acquired;
  }

  private advanceBoomerang(
    p: Projectile,
    state: StateOf<'boomerang'>,
    dt: number,
    field: CombatField,
  ): ExpireReason | null {
    if (!state.returning) {
      this.integrate(p, dt);
      if (p.distanceTraveled >= p.range / 2 - EPSILON) state.returning = true;
      return null;
    }

    const owner = field.getBody(p.ownerId);
    if (!owner) return 'owner_lost';

    const toOwner = normalize(sub(owner.position, p.position));
    p.velocity = scale(toOwner, p.speed);
    this.integrate(p, dt);
    state.returnDistance += p.speed * dt;

    if (distance(p.position, owner.position) <= owner.hitRadius + p.radius) return 'returned';
    if (state.returnDistance > p.range + EPSILON) return 'range';
    return null;
  }

  private advanceGroundArea(p: Projectile, state: StateOf<'ground_area'>, dt: number): void {
    if (state.phase === 'arrived') {
      state.arrivedFor += dt;
      return;
    }

    const remaining = distance(p.position, state.targetPosition);
    const stepLength = state.travelSpeed * dt;

    if (remaining <= stepLength + EPSILON) {
      p.position = { ...state.targetPosition };
      p.velocity = { x: 0, y: 0 };
      p.distanceTraveled += remaining;
      state.phase = 'arrived';
      state.arrivedFor = 0;
      return;
    }

    const direction = normalize(sub(state.targetPosition, p.position));
    p.velocity = scale(direction, state.travelSpeed);
    p.position = add(p.position, scale(direction, stepLength));
    p.distanceTraveled += stepLength;
  }

  // --- Collision ---

  private collide(p: Projectile, field: CombatField, result: TrajectoryStep): ExpireReason | null {
    const state = p.state;

    if (!TERRAIN_EXEMPT.has(state.archetype) && findTerrainOverlap(p.position, p.radius, field.terrain)) {
      return 'terrain';
    }

    if (state.archetype === 'ground_area') {
      if (state.phase === 'arrived' && state.arrivedFor >= state.delayAfterArrival - EPSILON) {
        this.detonate(p, state, field, result);
        return 'detonated';
      }
      return null;
    }

    const contacts: Contact[] = [];
    for (const body of field.bodies()) {
      if (body.faction === p.faction) continue;
      const dist = distance(p.position, body.position);
      if (dist <= p.radius + body.hitRadius) contacts.push({ body, dist });
    }
    contacts.sort((a, b) => a.dist - b.dist);

    const previous = p.overlapping;
    p.overlapping = new Set(contacts.map((c) => c.body.id));

    for (const { body } of contacts) {
      // Still inside from last step; not a new collision
      if (previous.has(body.id)) continue;
      const reason = this.handleContact(p, body, field, result);
      if (reason) return reason;
    }

    return null;
  }

  private handleContact(p: Projectile, body: Body, field: CombatField, result: TrajectoryStep): ExpireReason | null {
    const state = p.state;
    if (DISTINCT_TARGETS.has(state.archetype) && p.hitIds.has(body.id)) return null;

    this.recordHit(p, body.id, p.damage, 'contact', result);
    p.hitIds.add(body.id);
    if (p.aoeRadius > 0) this.splash(p, body.id, field, result);

    switch (state.archetype) {
      case 'orbiting':
      case 'growing_orb':
        return null;

      case 'piercing':
        state.pierceRemaining -= 1;
        return state.pierceRemaining <= 0 ? 'spent' : null;

      case 'chain':
        return this.chainOnward(p, state, field);

      case 'forking':
        return state.condition === 'on_first_hit' ? this.fork(p, result) : 'spent';

      default:
        return 'spent';
    }
  }

  private chainOnward(p: Projectile, state: StateOf<'chain'>, field: CombatField): ExpireReason | null {
    if (state.chainsRemaining <= 0) return 'spent';

    const next = field.nearestOpponent(p.position, p.faction, {
      exclude: p.hitIds,
      maxRange: state.chainRadius,
    });
    if (!next) return 'spent';

    state.chainsRemaining -= 1;
    state.targetId = next.id;
    p.distanceTraveled = 0;
    this.steer(p, next.position, 1);
    return null;
  }

  private splash(p: Projectile, primaryId: EntityId, field: CombatField, result: TrajectoryStep): void {
    for (const body of field.bodies()) {
      if (body.faction === p.faction || body.id === primaryId) continue;
      if (distance(p.position, body.position) <= p.aoeRadius) {
        this.recordHit(p, body.id, p.damage, 'splash', result);
      }
    }
  }

  private detonate(p: Projectile, state: StateOf<'ground_area'>, field: CombatField, result: TrajectoryStep): void {
    for (const body of field.bodies()) {
      if (body.faction === p.faction) continue;
      if (distance(state.targetPosition, body.position) <= state.aoeRadius) {
        this.recordHit(p, body.id, state.aoeDamage, 'detonation', result);
        p.hitIds.add(body.id);
      }
    }
  }

  private recordHit(
    p: Projectile,
    targetId: EntityId,
    damage: number,
    delivery: HitDelivery,
    result: TrajectoryStep,
  ): void {
    result.hits.push({
      projectileId: p.id,
      spellId: p.spellId,
      ownerId: p.ownerId,
      targetId,
      damage,
      damageType: p.damageType,
      effect: p.effect ? { ...p.effect } : null,
      position: { ...p.position },
      delivery,
    });
  }

  private expiry(p: Projectile, reason: ExpireReason): ProjectileExpiry {
    return {
      projectileId: p.id,
      ownerId: p.ownerId,
      spellId: p.spellId,
      reason,
      position: { ...p.position },
    };
  }
}
