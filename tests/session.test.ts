// tests/session.test.ts — Session wiring and duel seeding

import { describe, it, expect } from 'vitest';
import { createCombatSession, seedDuel, DEFAULT_PLAYER_STATS } from '../src/engine/session.js';

describe('createCombatSession', () => {
  it('wires the core from config without a combat log', () => {
    const session = createCombatSession({ seed: 5, logDbPath: null, physicsTickMs: 20, statusTickMs: 100 });

    expect(session.config.seed).toBe(5);
    expect(session.world.seed).toBe(5);
    expect(session.combatLog).toBeNull();
    expect(session.tickLoop.physicsTickMs).toBe(20);
    expect(session.tickLoop.statusTickInterval).toBe(5);
    expect(session.book.has('fireball')).toBe(true);
    expect(session.relics.has('heart_of_oak')).toBe(true);
    expect(session.fusionRules.fireball_ice_lance).toBe('meteor_shard');

    session.close();
  });

  it('opens a combat log run when a database path is set', () => {
    const session = createCombatSession({ logDbPath: ':memory:' }, { runLabel: 'session-test' });

    const runId = session.combatLog?.runId;
    expect(typeof runId).toBe('string');
    expect(runId ? session.combatLog?.getRun(runId)?.label : undefined).toBe('session-test');

    session.close();
  });
});

describe('seedDuel', () => {
  it('places the player at the origin and enemies along +x', () => {
    const session = createCombatSession({ logDbPath: null });

    const { player, enemies } = seedDuel(session, { spellId: 'chain_spark', enemyCount: 4 });

    expect(player.position).toEqual({ x: 0, y: 0 });
    expect(player.health.max).toBe(100);
    expect(player.hitRadius).toBe(16);
    expect(player.stats).toBe(DEFAULT_PLAYER_STATS);
    expect(session.caster.getKnown('player_1', 'chain_spark')?.level).toBe(1);
    expect(enemies.map((e) => [e.id, e.position.x, e.position.y])).toEqual([
      ['enemy_1', 120, 0],
      ['enemy_2', 180, -15],
      ['enemy_3', 240, 30],
      ['enemy_4', 300, -45],
    ]);
    expect(enemies[0].health.max).toBe(60);

    session.close();
  });

  it('accepts explicit null stats', () => {
    const session = createCombatSession({ logDbPath: null });

    const { player } = seedDuel(session, { spellId: 'fireball', enemyCount: 1, stats: null });

    expect(player.stats).toBeNull();
    session.close();
  });

  it('equips relics on the player after the duel spell is learned', () => {
    const session = createCombatSession({ logDbPath: null });

    const { player, enemies } = seedDuel(session, {
      spellId: 'fireball',
      enemyCount: 1,
      relicIds: ['heart_of_oak', 'hourglass_charm'],
    });

    expect(player.relicIds).toEqual(['heart_of_oak', 'hourglass_charm']);
    expect(player.health.max).toBe(120);
    expect(player.modifiers.spellCooldownPercent).toBe(-15);
    expect(enemies[0].relicIds).toEqual([]);
    session.close();
  });

  it('rejects an unknown relic before placing anyone', () => {
    const session = createCombatSession({ logDbPath: null });

    expect(() => seedDuel(session, { spellId: 'fireball', relicIds: ['nope'] })).toThrow('Unknown relic nope');
    expect(session.world.getCombatant('player_1')).toBeUndefined();
    session.close();
  });

  it('rejects a spell the book does not have', () => {
    const session = createCombatSession({ logDbPath: null });
    expect(() => seedDuel(session, { spellId: 'nope' })).toThrow('Unknown spell nope');
    session.close();
  });
});
