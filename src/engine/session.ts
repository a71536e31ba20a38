// engine/session.ts — Wires the combat core together
// Wire: config → spell book + relics → world → pipeline → tick loop → optional combat log

import type { CharacterStats, EntityId, Faction, FusionRules, Position } from '../types/index.js';
import { loadConfig, type CombatConfig } from './config.js';
import { WorldState } from './world.js';
import { SeededRng } from './rng.js';
import { TickLoop } from './tick-loop.js';
import { CombatLog } from './combat-log.js';
import type { Combatant } from './combatant.js';
import { loadFusionRules, loadSpellBook, type SpellBook } from '../data/spell-book.js';
import { loadRelicCatalog, type RelicCatalog } from '../data/relics.js';
import { ProjectileFactory } from '../pipeline/projectile-factory.js';
import { TrajectoryEngine } from '../pipeline/trajectory-engine.js';
import { DamagePipeline } from '../pipeline/damage-pipeline.js';
import { StatusEffectTickProcessor } from '../pipeline/status-processor.js';
import { SpellCaster } from '../pipeline/spell-caster.js';
import { CastQueue } from '../pipeline/cast-queue.js';
import { BASE_VITALS } from '../shared/constants.js';
import { findProjectPath } from '../shared/paths.js';

export interface CombatSession {
  config: CombatConfig;
  rng: SeededRng;
  world: WorldState;
  book: SpellBook;
  relics: RelicCatalog;
  fusionRules: FusionRules;
  factory: ProjectileFactory;
  engine: TrajectoryEngine;
  pipeline: DamagePipeline;
  statusProcessor: StatusEffectTickProcessor;
  caster: SpellCaster;
  castQueue: CastQueue;
  tickLoop: TickLoop;
  combatLog: CombatLog | null;
  close(): void;
}

export interface SessionOptions {
  book?: SpellBook;
  relics?: RelicCatalog;
  fusionRules?: FusionRules;
  runLabel?: string;
}

export function createCombatSession(
  overrides: Partial<CombatConfig> = {},
  options: SessionOptions = {},
): CombatSession {
  const config = loadConfig(overrides);

  // 1. Spell data
  const book = options.book ?? loadSpellBook();
  const relics = options.relics ?? loadRelicCatalog();
  const fusionRules = options.fusionRules ?? loadFusionRules();

  // 2. World + one RNG stream for every roll
  const world = new WorldState(config.seed);
  const rng = new SeededRng(config.seed);

  // 3. Pipeline
  const factory = new ProjectileFactory(book);
  const engine = new TrajectoryEngine(factory);
  const pipeline = new DamagePipeline(engine);
  const statusProcessor = new StatusEffectTickProcessor(rng, pipeline);
  const caster = new SpellCaster(book, factory, engine, rng, {
    intelligenceMultiplier: config.intelligenceMultiplier,
  });
  const castQueue = new CastQueue();

  // 4. Tick loop
  const tickLoop = new TickLoop(world, castQueue, caster, engine, pipeline, statusProcessor, {
    physicsTickMs: config.physicsTickMs,
    statusTickMs: config.statusTickMs,
  });

  // 5. Combat log
  let combatLog: CombatLog | null = null;
  if (config.logDbPath) {
    combatLog = new CombatLog(config.logDbPath);
    combatLog.runMigrations(config.migrationsDir ?? findProjectPath('db/migrations'));
    combatLog.startRun(config.seed, options.runLabel ?? 'combat');
    tickLoop.setCombatLog(combatLog);
  }

  return {
    config,
    rng,
    world,
    book,
    relics,
    fusionRules,
    factory,
    engine,
    pipeline,
    statusProcessor,
    caster,
    castQueue,
    tickLoop,
    combatLog,
    close(): void {
      tickLoop.endCombatPhase();
      if (combatLog) {
        combatLog.endRun(world.tick);
        combatLog.close();
      }
    },
  };
}

// --- Scenario seeding ---

export interface DuelOptions {
  spellId: string;
  enemyCount?: number;
  stats?: CharacterStats | null;
  /** Relics equipped on the player before the first tick. */
  relicIds?: string[];
}

export interface DuelRoster {
  player: Combatant;
  enemies: Combatant[];
}

export const DEFAULT_PLAYER_STATS: CharacterStats = {
  attributes: {
    strength: { value: 4, weight: 1 },
    vitality: { value: 5, weight: 1 },
    agility: { value: 3, weight: 1 },
    intelligence: { value: 8, weight: 1.5 },
    luck: { value: 2, weight: 1 },
  },
  level: 1,
  weapon: { mainStat: 'intelligence', damageBonus: 2 },
};

function spawnBase(world: WorldState, faction: Exclude<Faction, 'neutral'>, id: EntityId, position: Position): Combatant {
  const vitals = BASE_VITALS[faction];
  return world.spawnCombatant({
    id,
    faction,
    position,
    hitRadius: vitals.hitRadius,
    health: { max: vitals.health },
    energy: { max: vitals.energy },
  });
}

/** One player at the origin facing a loose line of enemies along +x. */
export function seedDuel(session: CombatSession, options: DuelOptions): DuelRoster {
  const { world, caster, relics } = session;
  const enemyCount = options.enemyCount ?? 3;
  const equipped = (options.relicIds ?? []).map((id) => {
    const relic = relics.get(id);
    if (!relic) throw new Error(`Unknown relic ${id}`);
    return relic;
  });

  const player = spawnBase(world, 'player', 'player_1', { x: 0, y: 0 });
  player.stats = options.stats === undefined ? DEFAULT_PLAYER_STATS : options.stats;
  caster.learn(player.id, options.spellId);
  for (const relic of equipped) player.equipRelic(relic);

  const enemies: Combatant[] = [];
  for (let i = 0; i < enemyCount; i++) {
    const y = i % 2 === 0 ? i * 15 : -i * 15;
    enemies.push(spawnBase(world, 'enemy', `enemy_${i + 1}`, { x: 120 + i * 60, y }));
  }

  return { player, enemies };
}
