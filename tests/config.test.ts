// tests/config.test.ts — Defaults, overrides and environment variables

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/engine/config.js';

describe('loadConfig', () => {
  it('returns the defaults with an empty environment', () => {
    expect(loadConfig({}, {})).toEqual({
      seed: 42,
      physicsTickMs: 50,
      statusTickMs: 1000,
      intelligenceMultiplier: 1.2,
      logDbPath: null,
      migrationsDir: null,
    });
  });

  it('reads COMBAT_* variables', () => {
    const config = loadConfig(
      {},
      {
        COMBAT_SEED: '7',
        COMBAT_PHYSICS_TICK_MS: '20',
        COMBAT_STATUS_TICK_MS: '500',
        COMBAT_INT_MULTIPLIER: '1.5',
        COMBAT_LOG_DB: '/tmp/combat.db',
      },
    );

    expect(config).toMatchObject({
      seed: 7,
      physicsTickMs: 20,
      statusTickMs: 500,
      intelligenceMultiplier: 1.5,
      logDbPath: '/tmp/combat.db',
    });
  });

  it('overrides win over the environment', () => {
    const config = loadConfig({ seed: 3, logDbPath: null }, { COMBAT_SEED: '7', COMBAT_LOG_DB: '/tmp/combat.db' });

    expect(config.seed).toBe(3);
    expect(config.logDbPath).toBeNull();
  });

  it('ignores blank variables', () => {
    expect(loadConfig({}, { COMBAT_SEED: '  ', COMBAT_LOG_DB: '' })).toMatchObject({ seed: 42, logDbPath: null });
  });

  it('rejects malformed values with the variable name', () => {
    expect(() => loadConfig({}, { COMBAT_SEED: '1.5' })).toThrow('COMBAT_SEED has an invalid value: 1.5');
    expect(() => loadConfig({}, { COMBAT_PHYSICS_TICK_MS: '0' })).toThrow(
      'COMBAT_PHYSICS_TICK_MS has an invalid value: 0',
    );
    expect(() => loadConfig({}, { COMBAT_INT_MULTIPLIER: 'fast' })).toThrow(
      'COMBAT_INT_MULTIPLIER has an invalid value: fast',
    );
  });

  it('rejects a status tick shorter than the physics tick', () => {
    expect(() => loadConfig({ physicsTickMs: 100, statusTickMs: 50 }, {})).toThrow(
      'Status tick (50ms) must not be shorter than the physics tick (100ms)',
    );
  });
});
