// tests/cast-queue.test.ts — CastQueue tests

import { describe, it, expect, beforeEach } from 'vitest';
import { CastQueue } from '../src/pipeline/cast-queue.js';

describe('CastQueue', () => {
  let queue: CastQueue;

  beforeEach(() => {
    queue = new CastQueue();
  });

  it('enqueues and drains a single cast', () => {
    expect(queue.enqueue('player_1', { spellId: 'fireball', target: { x: 100, y: 200 } }, 5)).toBe(true);

    const casts = queue.drainAll();

    expect(casts).toEqual([
      { casterId: 'player_1', spellId: 'fireball', target: { x: 100, y: 200 }, targetId: null, enqueuedTick: 5 },
    ]);
  });

  it('last-write-wins: only the final cast of a caster survives', () => {
    queue.enqueue('player_1', { spellId: 'fireball' }, 5);
    queue.enqueue('player_1', { spellId: 'ice_lance', targetId: 'enemy_2' }, 5);
    queue.enqueue('player_1', { spellId: 'chain_spark', targetId: 'enemy_3' }, 6);

    const casts = queue.drainAll();
    expect(casts).toHaveLength(1);
    expect(casts[0]).toMatchObject({ spellId: 'chain_spark', targetId: 'enemy_3', enqueuedTick: 6 });
  });

  it('keeps one cast per caster', () => {
    for (let i = 1; i <= 4; i++) {
      queue.enqueue(`enemy_${i}`, { spellId: 'corrosive_spit' }, 1);
    }

    expect(queue.size).toBe(4);
    expect(queue.drainAll().map((c) => c.casterId)).toEqual(['enemy_1', 'enemy_2', 'enemy_3', 'enemy_4']);
  });

  it('drainAll clears the queue', () => {
    queue.enqueue('player_1', { spellId: 'fireball' }, 1);
    expect(queue.drainAll()).toHaveLength(1);
    expect(queue.drainAll()).toHaveLength(0);
    expect(queue.size).toBe(0);
  });

  it('drops a cast without a spell id', () => {
    expect(queue.enqueue('player_1', { spellId: '' }, 1)).toBe(false);
    expect(queue.enqueue('player_1', { spellId: 42 }, 1)).toBe(false);
    expect(queue.size).toBe(0);
  });

  it('drops a cast with a malformed target point', () => {
    expect(queue.enqueue('player_1', { spellId: 'fireball', target: { x: 'left', y: 3 } }, 1)).toBe(false);
    expect(queue.enqueue('player_1', { spellId: 'fireball', target: { x: 3 } }, 1)).toBe(false);
    expect(queue.enqueue('player_1', { spellId: 'fireball', target: 'enemy_1' }, 1)).toBe(false);
    expect(queue.size).toBe(0);
  });

  it('drops a cast with a malformed target id', () => {
    expect(queue.enqueue('player_1', { spellId: 'fireball', targetId: 7 }, 1)).toBe(false);
    expect(queue.enqueue('player_1', { spellId: 'fireball', targetId: '' }, 1)).toBe(false);
  });

  it('a malformed cast does not replace a queued one', () => {
    queue.enqueue('player_1', { spellId: 'fireball' }, 1);
    queue.enqueue('player_1', { spellId: 'ice_lance', target: { x: Number.NaN, y: 0 } }, 1);

    expect(queue.drainAll().map((c) => c.spellId)).toEqual(['fireball']);
  });

  it('accepts numeric strings as coordinates', () => {
    queue.enqueue('player_1', { spellId: 'meteor_shard', target: { x: '40', y: '-12.5' } }, 2);
    expect(queue.drainAll()[0].target).toEqual({ x: 40, y: -12.5 });
  });
});
