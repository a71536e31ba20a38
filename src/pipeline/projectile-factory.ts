// pipeline/projectile-factory.ts — Spell definition → validated projectile
// Parameter problems surface here as InvalidProjectileConfigError at spawn, fork children included.

import type {
  Archetype,
  ArchetypeState,
  EntityId,
  Faction,
  ForkCondition,
  Position,
  Projectile,
  SpellDefinition,
} from '../types/index.js';
import { distance } from '../types/index.js';
import type { SpellSource } from '../data/spell-book.js';
import { archetypeOf } from '../data/spell-book.js';
import { InvalidProjectileConfigError } from '../shared/errors.js';
import { DEFAULT_PROJECTILE_RADIUS } from '../shared/constants.js';
import { applyPercent, degToRad } from '../shared/utils.js';
import { add, angleOf, fromAngle, length, normalize, rotate, scale } from '../shared/vector.js';

export interface SpawnParams {
  spell: SpellDefinition;
  ownerId: EntityId;
  faction: Faction;
  origin: Position;
  /** Launch direction; normalized by the factory. */
  heading: Position;
  bonusDamage?: number;
  /** Percent applied to spell damage after the bonus, e.g. from relics. */
  damagePercent?: number;
  targetPosition?: Position | null;
  targetId?: EntityId | null;
}

interface NumberRule {
  fallback?: number;
  min?: number;
  max?: number;
  /** Strictly greater than min. */
  exclusiveMin?: boolean;
  integer?: boolean;
}

const FORK_CONDITIONS: Readonly<Record<string, ForkCondition>> = {
  DISTANCE: 'distance',
  TIMER: 'timer',
  ON_FIRST_HIT: 'on_first_hit',
};

// Archetypes whose flight is bounded by spell range
const RANGE_BOUND: ReadonlySet<Archetype> = new Set<Archetype>([
  'straight',
  'homing',
  'sine',
  'boomerang',
  'chain',
  'piercing',
  'forking',
  'growing_orb',
]);

function describeRule(rule: NumberRule): string {
  const parts: string[] = [rule.integer ? 'an integer' : 'a number'];
  if (rule.min !== undefined) parts.push(`${rule.exclusiveMin ? '>' : '>='} ${rule.min}`);
  if (rule.max !== undefined) parts.push(`<= ${rule.max}`);
  return parts.join(' ');
}

function checkNumber(spellId: string, field: string, value: unknown, rule: NumberRule): number {
  const ok =
    typeof value === 'number' &&
    Number.isFinite(value) &&
    (!rule.integer || Number.isInteger(value)) &&
    (rule.min === undefined || (rule.exclusiveMin ? value > rule.min : value >= rule.min)) &&
    (rule.max === undefined || value <= rule.max);

  if (!ok || typeof value !== 'number') {
    throw new InvalidProjectileConfigError(
      `Spell ${spellId}: ${field} must be ${describeRule(rule)}, got ${String(value)}`,
      spellId,
      field,
    );
  }
  return value;
}

function prop(spell: SpellDefinition, key: string, rule: NumberRule): number {
  const value = spell.trajectoryProperties[key] ?? rule.fallback;
  return checkNumber(spell.id, `trajectory_properties.${key}`, value, rule);
}

export class ProjectileFactory {
  private nextId = 1;

  constructor(private readonly spells: SpellSource) {}

  build(params: SpawnParams): Projectile {
    return { id: `proj_${this.nextId++}`, ...this.assemble(params) };
  }

  private assemble(params: SpawnParams): Omit<Projectile, 'id'> {
    const { spell } = params;
    const archetype = archetypeOf(spell);
    if (!archetype) {
      throw new InvalidProjectileConfigError(
        `Spell ${spell.id}: unknown trajectory type ${String(spell.trajectoryProperties.type)}`,
        spell.id,
        'trajectory_properties.type',
      );
    }

    const bonus = params.bonusDamage ?? 0;
    const damagePercent = params.damagePercent ?? 0;
    const damage = applyPercent(checkNumber(spell.id, 'damage', spell.damage, { min: 0 }) + bonus, damagePercent);
    const aoeRadius = spell.type === 'PROJECTILE_AOE'
      ? checkNumber(spell.id, 'aoe_radius', spell.aoeRadius, { min: 0, exclusiveMin: true })
      : 0;

    const rangeBound = RANGE_BOUND.has(archetype);
    const speed = rangeBound
      ? checkNumber(spell.id, 'speed', spell.speed, { min: 0, exclusiveMin: true })
      : checkNumber(spell.id, 'speed', spell.speed, { min: 0 });
    const range = rangeBound
      ? checkNumber(spell.id, 'range', spell.range, { min: 0, exclusiveMin: true })
      : checkNumber(spell.id, 'range', spell.range, { min: 0 });

    const radius = prop(spell, 'radius', { fallback: DEFAULT_PROJECTILE_RADIUS, min: 0, exclusiveMin: true });
    const rawDuration = spell.trajectoryProperties.duration;
    let lifetime = rawDuration === undefined
      ? null
      : checkNumber(spell.id, 'trajectory_properties.duration', rawDuration, { min: 0, exclusiveMin: true });

    if (spell.effect) {
      checkNumber(spell.id, 'effect.duration', spell.effect.duration, { min: 0 });
      checkNumber(spell.id, 'effect.level', spell.effect.level, { min: 0 });
      checkNumber(spell.id, 'effect.slow_amount', spell.effect.slowAmount, { min: 0, max: 1 });
    }

    const heading = normalize(params.heading);
    if (length(heading) === 0) {
      throw new InvalidProjectileConfigError(`Spell ${spell.id}: heading has no direction`, spell.id, 'heading');
    }

    const origin = { ...params.origin };
    let position = { ...origin };
    let hitRadius = radius;
    let state: ArchetypeState;

    switch (archetype) {
      case 'straight':
        state = { archetype };
        break;

      case 'homing':
        state = {
          archetype,
          homingStrength: prop(spell, 'homing_strength', { fallback: 0.1, min: 0, max: 1 }),
          targetId: params.targetId ?? null,
        };
        break;

      case 'orbiting': {
        const orbitRadius = prop(spell, 'orbit_radius', { fallback: 80, min: 0, exclusiveMin: true });
        const angle = angleOf(heading);
        lifetime = prop(spell, 'duration', { fallback: 10, min: 0, exclusiveMin: true });
        state = {
          archetype,
          orbitRadius,
          angularSpeed: prop(spell, 'angular_speed', { fallback: 3 }),
          angle,
        };
        position = add(origin, scale(fromAngle(angle), orbitRadius));
        break;
      }

      case 'sine':
        state = {
          archetype,
          amplitude: prop(spell, 'amplitude', { fallback: 30, min: 0 }),
          frequency: prop(spell, 'frequency', { fallback: 5, min: 0 }),
          base: { ...origin },
        };
        break;

      case 'boomerang':
        state = { archetype, returning: false, returnDistance: 0 };
        break;

      case 'chain': {
        const maxChains = prop(spell, 'max_chains', { fallback: 3, min: 0, integer: true });
        state = {
          archetype,
          maxChains,
          chainsRemaining: maxChains,
          chainRadius: prop(spell, 'chain_radius', { fallback: 150, min: 0, exclusiveMin: true }),
          targetId: null,
        };
        break;
      }

      case 'piercing': {
        const pierceCount = prop(spell, 'pierce_count', { fallback: 3, min: 1, integer: true });
        state = { archetype, pierceCount, pierceRemaining: pierceCount };
        break;
      }

      case 'ground_area': {
        const aimed = params.targetPosition ?? add(origin, scale(heading, range));
        const reach = distance(origin, aimed);
        const targetPosition = range > 0 && reach > range
          ? add(origin, scale(normalize({ x: aimed.x - origin.x, y: aimed.y - origin.y }), range))
          : { ...aimed };
        state = {
          archetype,
          targetPosition,
          travelSpeed: prop(spell, 'travel_speed', { fallback: 500, min: 0, exclusiveMin: true }),
          aoeRadius: prop(spell, 'aoe_radius', { fallback: 80, min: 0, exclusiveMin: true }),
          aoeDamage: applyPercent(prop(spell, 'aoe_damage', { fallback: spell.damage, min: 0 }) + bonus, damagePercent),
          delayAfterArrival: prop(spell, 'delay_after_arrival', { fallback: 0.3, min: 0 }),
          phase: 'traveling',
          arrivedFor: 0,
        };
        break;
      }

      case 'spiral': {
        const angle = angleOf(heading);
        const initialRadius = prop(spell, 'initial_radius', { fallback: 5, min: 0 });
        lifetime = prop(spell, 'duration', { fallback: 1.5, min: 0, exclusiveMin: true });
        state = {
          archetype,
          center: { ...origin },
          baseTravelSpeed: prop(spell, 'base_travel_speed', { fallback: 150, min: 0 }),
          expansionSpeed: prop(spell, 'expansion_speed', { fallback: 40, min: 0 }),
          rotationSpeed: degToRad(prop(spell, 'rotation_speed', { fallback: 720 })),
          radius: initialRadius,
          angle,
        };
        position = add(origin, scale(fromAngle(angle), initialRadius));
        break;
      }

      case 'forking': {
        const rawCondition = spell.trajectoryProperties.fork_condition_type ?? 'DISTANCE';
        const condition = typeof rawCondition === 'string' ? FORK_CONDITIONS[rawCondition.toUpperCase()] : undefined;
        if (!condition) {
          throw new InvalidProjectileConfigError(
            `Spell ${spell.id}: fork_condition_type must be DISTANCE, TIMER or ON_FIRST_HIT`,
            spell.id,
            'trajectory_properties.fork_condition_type',
          );
        }
        const threshold = condition === 'on_first_hit'
          ? 0
          : prop(spell, 'fork_condition_value', { fallback: range, min: 0, exclusiveMin: true });
        // Dry-build one child so its parameters fail here rather than at the fork
        this.assemble({
          spell: this.validateChildChain(spell),
          ownerId: params.ownerId,
          faction: params.faction,
          origin,
          heading,
        });
        state = {
          archetype,
          condition,
          forkDistance: condition === 'distance' ? threshold : 0,
          forkTime: condition === 'timer' ? threshold : 0,
          forkCount: prop(spell, 'fork_count', { fallback: 3, min: 1, integer: true }),
          forkAngleSpread: prop(spell, 'fork_angle_spread', { fallback: 45, min: 0, max: 360 }),
          childSpellId: String(spell.trajectoryProperties.child_spell_id),
        };
        break;
      }

      case 'growing_orb': {
        const initialRadius = prop(spell, 'initial_radius', { fallback: radius, min: 0, exclusiveMin: true });
        hitRadius = initialRadius;
        state = {
          archetype,
          maxRadius: prop(spell, 'max_radius', { fallback: 50, min: initialRadius }),
          growthRate: prop(spell, 'growth_rate', { fallback: 20, min: 0 }),
          growthDuration: prop(spell, 'growth_duration', { fallback: 2.5, min: 0 }),
        };
        break;
      }

      default: {
        const unhandled: never = archetype;
        throw new InvalidProjectileConfigError(`Spell ${spell.id}: unsupported archetype ${String(unhandled)}`, spell.id, 'trajectory_properties.type');
      }
    }

    return {
      spellId: spell.id,
      ownerId: params.ownerId,
      faction: params.faction,
      position,
      velocity: scale(heading, speed),
      speed,
      heading,
      damage,
      damageType: spell.damageType,
      effect: spell.effect ? { ...spell.effect } : null,
      radius: hitRadius,
      range,
      lifetime,
      distanceTraveled: 0,
      elapsed: 0,
      aoeRadius,
      hitIds: new Set(),
      overlapping: new Set(),
      state,
    };
  }

  /**
   * Children spread evenly across the fork angle around the parent's current
   * direction of travel; a single child keeps that direction.
   */
  buildChildren(parent: Projectile): Projectile[] {
    const state = parent.state;
    if (state.archetype !== 'forking') return [];

    const child = this.spells.getSpell(state.childSpellId);
    if (!child) {
      throw new InvalidProjectileConfigError(
        `Spell ${parent.spellId}: child spell ${state.childSpellId} not found`,
        parent.spellId,
        'trajectory_properties.child_spell_id',
      );
    }

    const travel = normalize(parent.velocity);
    const base = length(travel) > 0 ? travel : parent.heading;
    const count = state.forkCount;
    const spread = degToRad(state.forkAngleSpread);

    const children: Projectile[] = [];
    for (let i = 0; i < count; i++) {
      const offset = count === 1 ? 0 : -spread / 2 + (i * spread) / (count - 1);
      children.push(
        this.build({
          spell: child,
          ownerId: parent.ownerId,
          faction: parent.faction,
          origin: parent.position,
          heading: rotate(base, offset),
        }),
      );
    }
    return children;
  }

  // Follows child_spell_id links until a non-forking spell, rejecting gaps and
  // loops. Returns the direct child.
  private validateChildChain(spell: SpellDefinition): SpellDefinition {
    const seen = new Set<string>([spell.id]);
    let current = spell;
    let direct: SpellDefinition | null = null;

    while (archetypeOf(current) === 'forking') {
      const childId = current.trajectoryProperties.child_spell_id;
      if (typeof childId !== 'string' || childId === '') {
        throw new InvalidProjectileConfigError(
          `Spell ${current.id}: child_spell_id is required for forking projectiles`,
          spell.id,
          'trajectory_properties.child_spell_id',
        );
      }
      if (seen.has(childId)) {
        throw new InvalidProjectileConfigError(
          `Spell ${spell.id}: fork chain loops back to ${childId}`,
          spell.id,
          'trajectory_properties.child_spell_id',
        );
      }
      const child = this.spells.getSpell(childId);
      if (!child) {
        throw new InvalidProjectileConfigError(
          `Spell ${current.id}: child spell ${childId} not found`,
          spell.id,
          'trajectory_properties.child_spell_id',
        );
      }
      seen.add(childId);
      direct ??= child;
      current = child;
    }

    if (!direct) {
      throw new InvalidProjectileConfigError(
        `Spell ${spell.id}: child_spell_id is required for forking projectiles`,
        spell.id,
        'trajectory_properties.child_spell_id',
      );
    }
    return direct;
  }
}
