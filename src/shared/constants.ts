// shared/constants.ts — All combat constants

import type { AttributeName, Archetype, DamageType, StatusKind } from '../types/index.js';

export const PHYSICS_TICK_MS = 50;
export const STATUS_TICK_MS = 1000;
export const DEFAULT_SEED = 42;

// Float tolerance for timer and distance thresholds
export const EPSILON = 1e-9;

// Warn when a tick uses more than this share of its budget
export const SLOW_TICK_BUDGET_RATIO = 0.5;

export const ATTRIBUTE_NAMES: readonly AttributeName[] = [
  'strength',
  'vitality',
  'agility',
  'intelligence',
  'luck',
];

// Tie-break order when two attributes share the highest raw value
export const DOMINANT_TIE_ORDER: readonly AttributeName[] = [
  'strength',
  'agility',
  'intelligence',
  'vitality',
  'luck',
];

export const PHYSICAL_BUILD_MULTIPLIER = 1.25;
export const DEFAULT_INTELLIGENCE_MULTIPLIER = 1.2;
export const CHANCE_CAP = 100;

// Resist rating mitigation: reduction = resist / (resist + K), capped
export const RESIST_K = 200;
export const RESIST_CAP = 0.75;

export const DAMAGE_TYPES: readonly DamageType[] = ['physical', 'fire', 'ice', 'magic'];

export const STATUS_KINDS: readonly StatusKind[] = ['corroding', 'burned', 'chill'];

export const DOT_ROLLS = {
  corroding: { iterationsPerLevel: 4, iterationJitter: 5, damagePerLevel: 2, damageJitter: 5 },
  burned: { iterationsPerLevel: 3, iterationJitter: 2, damagePerLevel: 2, damageJitter: 3 },
} as const;

export const DEFAULT_PROJECTILE_RADIUS = 5;
export const DEFAULT_HIT_RADIUS = 16;

// trajectory_properties.type → archetype
export const TRAJECTORY_TYPES: Readonly<Record<string, Archetype>> = {
  STRAIGHT: 'straight',
  HOMING: 'homing',
  ORBITING: 'orbiting',
  SINE_WAVE: 'sine',
  BOOMERANG: 'boomerang',
  CHAIN: 'chain',
  PIERCING: 'piercing',
  GROUND_AOE: 'ground_area',
  SPIRAL: 'spiral',
  FORKING: 'forking',
  GROWING_ORB: 'growing_orb',
};

// Archetypes that fly through terrain
export const TERRAIN_EXEMPT: ReadonlySet<Archetype> = new Set<Archetype>([
  'piercing',
  'growing_orb',
  'orbiting',
  'ground_area',
]);

export const BASE_VITALS = {
  player: { health: 100, energy: 100, hitRadius: 16 },
  enemy: { health: 60, energy: 50, hitRadius: 14 },
} as const;
