// engine/config.ts — CombatConfig interface + defaults + env var loading

import { DEFAULT_INTELLIGENCE_MULTIPLIER, DEFAULT_SEED, PHYSICS_TICK_MS, STATUS_TICK_MS } from '../shared/constants.js';

export interface CombatConfig {
  seed: number;
  physicsTickMs: number;    // fixed timestep of the trajectory step
  statusTickMs: number;     // interval between damage-over-time ticks
  intelligenceMultiplier: number;
  logDbPath: string | null; // null disables the combat log
  migrationsDir: string | null;
}

const DEFAULTS = {
  seed: DEFAULT_SEED,
  physicsTickMs: PHYSICS_TICK_MS,
  statusTickMs: STATUS_TICK_MS,
  intelligenceMultiplier: DEFAULT_INTELLIGENCE_MULTIPLIER,
  logDbPath: null,
  migrationsDir: null,
} as const;

function readNumber(name: string, env: NodeJS.ProcessEnv, check: (n: number) => boolean): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new Error(`${name} has an invalid value: ${raw}`);
  }
  return value;
}

export function loadConfig(
  overrides: Partial<CombatConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): CombatConfig {
  const config: CombatConfig = {
    seed: overrides.seed ?? readNumber('COMBAT_SEED', env, Number.isInteger) ?? DEFAULTS.seed,
    physicsTickMs:
      overrides.physicsTickMs ?? readNumber('COMBAT_PHYSICS_TICK_MS', env, (n) => n > 0) ?? DEFAULTS.physicsTickMs,
    statusTickMs:
      overrides.statusTickMs ?? readNumber('COMBAT_STATUS_TICK_MS', env, (n) => n > 0) ?? DEFAULTS.statusTickMs,
    intelligenceMultiplier:
      overrides.intelligenceMultiplier ??
      readNumber('COMBAT_INT_MULTIPLIER', env, (n) => n >= 0) ??
      DEFAULTS.intelligenceMultiplier,
    logDbPath: overrides.logDbPath !== undefined ? overrides.logDbPath : env.COMBAT_LOG_DB || DEFAULTS.logDbPath,
    migrationsDir: overrides.migrationsDir ?? DEFAULTS.migrationsDir,
  };

  if (config.statusTickMs < config.physicsTickMs) {
    throw new Error(
      `Status tick (${config.statusTickMs}ms) must not be shorter than the physics tick (${config.physicsTickMs}ms)`,
    );
  }

  return config;
}
