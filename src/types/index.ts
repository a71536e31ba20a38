// types/index.ts — Barrel export

export type { EntityId, Tick, Faction, Position } from './core.js';
export { distance } from './core.js';

export type {
  AttributeName,
  WeightedAttribute,
  AttributeSet,
  WeaponProfile,
  CharacterStats,
  DominantAttribute,
  DerivedCombatStats,
} from './stats.js';

export type {
  DamageType,
  StatusKind,
  EffectPayload,
  StatusEffectInstance,
  StatusApplyOutcome,
} from './status.js';

export type {
  Archetype,
  ForkCondition,
  GroundAreaPhase,
  ArchetypeState,
  Projectile,
  ExpireReason,
  HitDelivery,
  ProjectileHit,
  ProjectileExpiry,
  TrajectoryStep,
} from './projectile.js';

export type {
  SpellType,
  DivergenceOption,
  TrajectoryProperties,
  SpellDefinition,
  SpellOverrides,
  SpellUpgrade,
  KnownSpell,
  RawCast,
  CastIntent,
  CastRejectReason,
  CastResult,
  FusionRules,
  FusionRejectReason,
  FusionResult,
} from './spell.js';

export type {
  RelicStat,
  RelicModifiers,
  RelicDefinition,
} from './relic.js';

export type {
  CombatEvent,
  CombatEventType,
  CombatEventOf,
} from './events.js';

export type {
  ResolvedHit,
  TickResult,
} from './tick.js';
