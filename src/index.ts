// index.ts — Public API of the combat core

export * from './types/index.js';

export { deriveCombatStats, parseCharacterStats, spawnDamageBonus, critProbability } from './pipeline/stat-derivation.js';
export type { DerivationOptions } from './pipeline/stat-derivation.js';
export { ProjectileFactory } from './pipeline/projectile-factory.js';
export type { SpawnParams } from './pipeline/projectile-factory.js';
export { TrajectoryEngine } from './pipeline/trajectory-engine.js';
export { DamagePipeline, mitigate } from './pipeline/damage-pipeline.js';
export type { StepResolution } from './pipeline/damage-pipeline.js';
export { StatusEffectTickProcessor } from './pipeline/status-processor.js';
export type { StatusTickReport } from './pipeline/status-processor.js';
export { SpellCaster } from './pipeline/spell-caster.js';
export type { SpellCasterOptions } from './pipeline/spell-caster.js';
export { CastQueue } from './pipeline/cast-queue.js';
export type { QueuedCast } from './pipeline/cast-queue.js';

export {
  SpellBook,
  loadSpellBook,
  parseSpellDefinition,
  applyOverrides,
  archetypeOf,
  parseFusionRules,
  loadFusionRules,
} from './data/spell-book.js';
export type { SpellSource, UpgradeCheck } from './data/spell-book.js';
export { RelicCatalog, loadRelicCatalog, parseRelicDefinition, combineRelics } from './data/relics.js';

export { EventBus } from './engine/event-bus.js';
export type { Unsubscribe } from './engine/event-bus.js';
export { SeededRng } from './engine/rng.js';
export { HealthPool, EnergyPool } from './engine/vitals.js';
export type { PoolInit } from './engine/vitals.js';
export { StatusSet } from './engine/status-set.js';
export { Combatant, createInertBody, isDamageable } from './engine/combatant.js';
export type { Body, InertBody, Damageable, DamagePacket, DamageOutcome, CombatantInit, Resists } from './engine/combatant.js';
export { WorldState } from './engine/world.js';
export type { CombatField, NearestOptions } from './engine/world.js';
export type { TerrainObstacle } from './engine/terrain.js';
export { TickLoop } from './engine/tick-loop.js';
export type { TickLoopOptions, TickListener } from './engine/tick-loop.js';
export { CombatLog } from './engine/combat-log.js';
export type { CombatRunRecord, StoredEvent } from './engine/combat-log.js';
export { loadConfig } from './engine/config.js';
export type { CombatConfig } from './engine/config.js';
export { createCombatSession, seedDuel, DEFAULT_PLAYER_STATS } from './engine/session.js';
export type { CombatSession, SessionOptions, DuelOptions, DuelRoster } from './engine/session.js';

export { InvalidStatsError, InvalidProjectileConfigError, InvalidRelicError } from './shared/errors.js';
