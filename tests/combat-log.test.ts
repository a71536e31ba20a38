// tests/combat-log.test.ts — SQLite combat log

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { unlinkSync, existsSync } from 'node:fs';
import { CombatLog, subjectOf } from '../src/engine/combat-log.js';
import type { CombatEvent, TickResult } from '../src/types/index.js';

const TEST_DB_PATH = join(import.meta.dirname, 'test-combat-log.db');
const MIGRATIONS_DIR = join(import.meta.dirname, '..', 'db', 'migrations');

function cleanup(): void {
  for (const suffix of ['', '-wal', '-shm']) {
    const path = TEST_DB_PATH + suffix;
    if (existsSync(path)) unlinkSync(path);
  }
}

function tickResult(tick: number, events: CombatEvent[]): TickResult {
  return { tick, casts: [], hits: [], expired: [], defeated: [], statusTick: false, events };
}

const hit: CombatEvent = {
  type: 'projectile_hit',
  projectileId: 'proj_1',
  ownerId: 'player_1',
  targetId: 'enemy_1',
  damage: 18,
  damageType: 'ice',
  delivery: 'contact',
};
const changed: CombatEvent = {
  type: 'health_changed',
  entityId: 'enemy_1',
  current: 82,
  max: 100,
  delta: -18,
  sourceId: 'player_1',
};
const rejected: CombatEvent = { type: 'cast_rejected', casterId: 'player_1', spellId: 'fireball', reason: 'cooldown' };

describe('CombatLog', () => {
  let log: CombatLog;

  beforeEach(() => {
    cleanup();
    log = new CombatLog(TEST_DB_PATH);
    log.runMigrations(MIGRATIONS_DIR);
  });

  afterEach(() => {
    log.close();
    cleanup();
  });

  // --- Migration Tests ---

  describe('migrations', () => {
    it('records each migration once', () => {
      log.runMigrations(MIGRATIONS_DIR);
      expect(log.appliedMigrations()).toEqual(['001_combat_log.sql']);
    });
  });

  // --- Run Tests ---

  describe('runs', () => {
    it('startRun opens a run with a uuid', () => {
      const runId = log.startRun(42, 'duel');

      expect(runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(log.runId).toBe(runId);
      expect(log.getRun(runId)).toMatchObject({ id: runId, label: 'duel', seed: 42, endedAt: null, finalTick: null });
    });

    it('endRun stamps the final tick and closes the run', () => {
      const runId = log.startRun(7, 'duel');

      log.endRun(120);

      const run = log.getRun(runId);
      expect(run?.finalTick).toBe(120);
      expect(typeof run?.endedAt).toBe('string');
      expect(log.runId).toBeNull();
    });

    it('endRun without a run is a no-op', () => {
      expect(() => log.endRun(5)).not.toThrow();
    });

    it('getRun returns undefined for an unknown id', () => {
      expect(log.getRun('missing')).toBeUndefined();
    });
  });

  // --- Event Tests ---

  describe('events', () => {
    it('persistTick requires an open run', () => {
      expect(() => log.persistTick(tickResult(1, [hit]))).toThrow(
        'Combat log has no active run; call startRun first',
      );
    });

    it('stores events in tick and emission order with their subject', () => {
      const runId = log.startRun(42, 'duel');
      log.persistTick(tickResult(1, [rejected]));
      log.persistTick(tickResult(2, [changed, hit]));

      const stored = log.loadRunEvents(runId);

      expect(stored.map((e) => [e.tick, e.seq, e.type, e.subjectId])).toEqual([
        [1, 0, 'cast_rejected', 'player_1'],
        [2, 0, 'health_changed', 'enemy_1'],
        [2, 1, 'projectile_hit', 'enemy_1'],
      ]);
      expect(stored[2].payload).toEqual(hit);
    });

    it('filters by event type', () => {
      const runId = log.startRun(42, 'duel');
      log.persistTick(tickResult(1, [changed, hit, rejected]));

      expect(log.loadRunEvents(runId, 'projectile_hit').map((e) => e.payload)).toEqual([hit]);
    });

    it('keeps runs apart', () => {
      const first = log.startRun(1, 'first');
      log.persistTick(tickResult(1, [hit]));
      log.endRun(1);
      const second = log.startRun(2, 'second');
      log.persistTick(tickResult(1, [changed]));

      expect(log.loadRunEvents(first).map((e) => e.type)).toEqual(['projectile_hit']);
      expect(log.loadRunEvents(second).map((e) => e.type)).toEqual(['health_changed']);
    });
  });
});

describe('subjectOf', () => {
  it('picks the entity, then target, then caster, then projectile', () => {
    expect(subjectOf(changed)).toBe('enemy_1');
    expect(subjectOf(hit)).toBe('enemy_1');
    expect(subjectOf(rejected)).toBe('player_1');
    expect(
      subjectOf({ type: 'projectile_expired', projectileId: 'proj_4', ownerId: 'player_1', reason: 'range' }),
    ).toBe('proj_4');
  });
});
