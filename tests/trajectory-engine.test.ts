// tests/trajectory-engine.test.ts — Movement, collision and expiry per archetype

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProjectileFactory, type SpawnParams } from '../src/pipeline/projectile-factory.js';
import { TrajectoryEngine } from '../src/pipeline/trajectory-engine.js';
import type { WorldState } from '../src/engine/world.js';
import type { SpellSource } from '../src/data/spell-book.js';
import type { Projectile, SpellDefinition, TrajectoryStep } from '../src/types/index.js';
import { bookOf, createWorld, spawnAt } from './helpers.js';

const book = bookOf({
  bolt: { damage: 10, range: 50, speed: 100, trajectory_properties: { type: 'STRAIGHT', radius: 5 } },
  lance: { damage: 8, range: 1000, speed: 100, trajectory_properties: { type: 'PIERCING', radius: 5, pierce_count: 2 } },
  splitter: {
    range: 1000,
    speed: 100,
    trajectory_properties: {
      type: 'FORKING',
      fork_condition_type: 'DISTANCE',
      fork_condition_value: 30,
      fork_count: 3,
      fork_angle_spread: 90,
      child_spell_id: 'shard',
    },
  },
  shard: { damage: 3, range: 100, speed: 150, trajectory_properties: { type: 'STRAIGHT', radius: 2 } },
  meteor: {
    damage: 12,
    range: 400,
    trajectory_properties: {
      type: 'GROUND_AOE',
      travel_speed: 500,
      aoe_radius: 60,
      aoe_damage: 25,
      delay_after_arrival: 0.3,
    },
  },
  blades: {
    damage: 4,
    trajectory_properties: { type: 'ORBITING', orbit_radius: 50, angular_speed: Math.PI, duration: 100, radius: 5 },
  },
  arc: {
    damage: 6,
    range: 1000,
    speed: 200,
    trajectory_properties: { type: 'CHAIN', radius: 5, max_chains: 2, chain_radius: 200 },
  },
  rang: { damage: 9, range: 100, speed: 100, trajectory_properties: { type: 'BOOMERANG', radius: 5 } },
  seeker: {
    damage: 7,
    range: 1000,
    speed: 100,
    trajectory_properties: { type: 'HOMING', radius: 5, homing_strength: 1 },
  },
  orb: {
    damage: 5,
    range: 1000,
    speed: 10,
    trajectory_properties: {
      type: 'GROWING_ORB',
      initial_radius: 5,
      max_radius: 50,
      growth_rate: 20,
      growth_duration: 0.25,
    },
  },
  swirl: { damage: 2, trajectory_properties: { type: 'SPIRAL', duration: 0.3 } },
  wave: {
    damage: 3,
    range: 100,
    speed: 100,
    trajectory_properties: { type: 'SINE_WAVE', radius: 5, amplitude: 10, frequency: 5 * Math.PI },
  },
});

function setup(): {
  world: WorldState;
  factory: ProjectileFactory;
  engine: TrajectoryEngine;
  launch: (spellId: string, overrides?: Partial<SpawnParams>) => Projectile;
  run: (steps: number, dt: number) => TrajectoryStep[];
} {
  const world = createWorld();
  const factory = new ProjectileFactory(book);
  const engine = new TrajectoryEngine(factory);

  const launch = (spellId: string, overrides: Partial<SpawnParams> = {}): Projectile => {
    const spell = book.getSpell(spellId);
    if (!spell) throw new Error(`fixture spell ${spellId} missing`);
    const projectile = factory.build({
      spell,
      ownerId: 'player_1',
      faction: 'player',
      origin: { x: 0, y: 0 },
      heading: { x: 1, y: 0 },
      ...overrides,
    });
    engine.spawn(projectile);
    return projectile;
  };

  const run = (steps: number, dt: number): TrajectoryStep[] => {
    const results: TrajectoryStep[] = [];
    for (let i = 0; i < steps; i++) results.push(engine.step(dt, world));
    return results;
  };

  return { world, factory, engine, launch, run };
}

// 1-based step numbers on which a hit landed
function hitSteps(steps: TrajectoryStep[]): number[] {
  const found: number[] = [];
  steps.forEach((step, i) => {
    for (let n = 0; n < step.hits.length; n++) found.push(i + 1);
  });
  return found;
}

describe('TrajectoryEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('a straight projectile expires once it passes its range', () => {
    const { launch, run, engine } = setup();
    launch('bolt');

    const steps = run(6, 0.1);

    expect(steps.slice(0, 5).every((s) => s.expired.length === 0)).toBe(true);
    expect(steps[5].expired).toEqual([
      { projectileId: 'proj_1', ownerId: 'player_1', spellId: 'bolt', reason: 'range', position: { x: 60, y: 0 } },
    ]);
    expect(engine.size).toBe(0);
  });

  it('a straight projectile is spent on its first contact', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'enemy_1', 'enemy', { x: 40, y: 0 });
    launch('bolt');

    const steps = run(3, 0.1);

    expect(hitSteps(steps)).toEqual([3]);
    expect(steps[2].hits[0]).toMatchObject({
      projectileId: 'proj_1',
      spellId: 'bolt',
      ownerId: 'player_1',
      targetId: 'enemy_1',
      damage: 10,
      damageType: 'physical',
      delivery: 'contact',
    });
    expect(steps[2].expired[0].reason).toBe('spent');
  });

  it('a piercing projectile hits N distinct targets then stops', () => {
    const { world, launch, run, engine } = setup();
    spawnAt(world, 'enemy_1', 'enemy', { x: 50, y: 0 });
    spawnAt(world, 'enemy_2', 'enemy', { x: 100, y: 0 });
    spawnAt(world, 'enemy_3', 'enemy', { x: 150, y: 0 });
    launch('lance');

    const steps = run(20, 0.1);
    const hits = steps.flatMap((s) => s.hits);

    expect(hits.map((h) => h.targetId)).toEqual(['enemy_1', 'enemy_2']);
    expect(hitSteps(steps)).toEqual([4, 9]);
    expect(steps[8].expired[0].reason).toBe('spent');
    expect(engine.size).toBe(0);
  });

  it('a fork replaces the parent with children at its position', () => {
    const { launch, run, engine } = setup();
    launch('splitter');

    const steps = run(3, 0.1);

    expect(steps[2].expired.map((e) => e.reason)).toEqual(['forked']);
    expect(steps[2].spawned).toHaveLength(3);
    expect(engine.get('proj_1')).toBeUndefined();
    expect(engine.size).toBe(3);
    for (const child of engine.list()) {
      expect(child.spellId).toBe('shard');
      expect(child.position.x).toBeCloseTo(30);
      expect(child.position.y).toBeCloseTo(0);
    }

    // Children start moving on the following step
    run(1, 0.1);
    const middle = engine.list()[1];
    expect(middle.position.x).toBeCloseTo(45);
  });

  it('a ground area detonates once after its delay and hits everything in radius', () => {
    const { world, launch, run, engine } = setup();
    spawnAt(world, 'enemy_1', 'enemy', { x: 100, y: 40 });
    spawnAt(world, 'enemy_2', 'enemy', { x: 130, y: 0 });
    spawnAt(world, 'enemy_3', 'enemy', { x: 200, y: 0 });
    spawnAt(world, 'enemy_4', 'enemy', { x: 30, y: 5 });
    launch('meteor', { targetPosition: { x: 100, y: 0 } });

    const steps = run(6, 0.1);

    expect(steps.slice(0, 4).every((s) => s.hits.length === 0)).toBe(true);
    expect(steps[4].hits.map((h) => [h.targetId, h.damage, h.delivery])).toEqual([
      ['enemy_1', 25, 'detonation'],
      ['enemy_2', 25, 'detonation'],
    ]);
    expect(steps[4].expired[0]).toMatchObject({ reason: 'detonated', position: { x: 100, y: 0 } });
    expect(steps[5].hits).toEqual([]);
    expect(engine.size).toBe(0);
  });

  it('an orbiting projectile hits again only after leaving and re-entering', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'player_1', 'player', { x: 0, y: 0 });
    spawnAt(world, 'enemy_1', 'enemy', { x: 0, y: 50 });
    launch('blades');

    const steps = run(50, 0.05);

    expect(hitSteps(steps)).toEqual([9, 49]);
    expect(steps.every((s) => s.expired.length === 0)).toBe(true);
  });

  it('an orbiting projectile expires when its owner is gone', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'player_1', 'player', { x: 0, y: 0 });
    launch('blades');
    run(1, 0.05);

    world.removeCombatant('player_1');
    const [step] = run(1, 0.05);

    expect(step.expired.map((e) => e.reason)).toEqual(['owner_lost']);
  });

  it('a chain hits at most max_chains + 1 distinct targets', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'enemy_a', 'enemy', { x: 50, y: 0 });
    spawnAt(world, 'enemy_b', 'enemy', { x: 40, y: 100 });
    spawnAt(world, 'enemy_c', 'enemy', { x: 140, y: 100 });
    spawnAt(world, 'enemy_d', 'enemy', { x: 240, y: 100 });
    launch('arc');

    const steps = run(40, 0.05);
    const hits = steps.flatMap((s) => s.hits);
    const expired = steps.flatMap((s) => s.expired);

    expect(hits.map((h) => h.targetId)).toEqual(['enemy_a', 'enemy_b', 'enemy_c']);
    expect(expired.map((e) => e.reason)).toEqual(['spent']);
  });

  it('a chain loses its lock when the next target is defeated', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'enemy_a', 'enemy', { x: 50, y: 0 });
    const second = spawnAt(world, 'enemy_b', 'enemy', { x: 40, y: 100 });
    launch('arc');

    run(4, 0.05);
    second.health.applyDamage(500);
    const [step] = run(1, 0.05);

    expect(step.expired.map((e) => e.reason)).toEqual(['target_lost']);
  });

  it('terrain stops a straight projectile but not a piercing one', () => {
    const { world, launch, run } = setup();
    world.addTerrain({ id: 'rock', center: { x: 50, y: 0 }, radius: 10 });
    launch('bolt');
    launch('lance');

    const steps = run(4, 0.1);
    const expired = steps.flatMap((s) => s.expired);

    expect(expired).toHaveLength(1);
    expect(expired[0]).toMatchObject({ projectileId: 'proj_1', reason: 'terrain' });
  });

  it('a boomerang turns at half range and is caught by its owner', () => {
    const { world, launch, run, engine } = setup();
    spawnAt(world, 'player_1', 'player', { x: 0, y: 0 });
    const projectile = launch('rang');

    const steps = run(9, 0.1);

    expect(projectile.state).toMatchObject({ archetype: 'boomerang', returning: true });
    expect(steps.slice(0, 8).every((s) => s.expired.length === 0)).toBe(true);
    expect(steps[8].expired[0].reason).toBe('returned');
    expect(steps[8].expired[0].position.x).toBeCloseTo(10);
    expect(engine.size).toBe(0);
  });

  it('a homing projectile steers fully onto its target at strength 1', () => {
    const { world, launch, run } = setup();
    spawnAt(world, 'enemy_1', 'enemy', { x: 0, y: 100 });
    const projectile = launch('seeker');

    run(1, 0.1);

    expect(projectile.state).toMatchObject({ archetype: 'homing', targetId: 'enemy_1' });
    expect(projectile.velocity.x).toBeCloseTo(0);
    expect(projectile.velocity.y).toBeCloseTo(100);
    expect(projectile.position.x).toBeCloseTo(0);
    expect(projectile.position.y).toBeCloseTo(10);
  });

  it('a growing orb grows only for its growth duration', () => {
    const { launch, run } = setup();
    const projectile = launch('orb');

    run(2, 0.1);
    expect(projectile.radius).toBeCloseTo(9);

    run(2, 0.1);
    expect(projectile.radius).toBeCloseTo(10);
  });

  it('a sine wave oscillates across its heading and measures range along the base path', () => {
    const { launch, run } = setup();
    const wave = launch('wave', { heading: { x: 0, y: 1 } });

    const first = run(1, 0.1);
    expect(wave.position.x).toBeCloseTo(-10);
    expect(wave.position.y).toBeCloseTo(10);
    expect(first[0].expired).toEqual([]);

    run(2, 0.1);
    expect(wave.position.x).toBeCloseTo(10);
    expect(wave.position.y).toBeCloseTo(30);
    expect(wave.distanceTraveled).toBeCloseTo(30);

    const rest = run(8, 0.1);
    expect(rest.slice(0, 7).every((s) => s.expired.length === 0)).toBe(true);
    expect(rest[7].expired[0].reason).toBe('range');
    expect(rest[7].expired[0].position.x).toBeCloseTo(10);
    expect(rest[7].expired[0].position.y).toBeCloseTo(110);
  });

  it('a spiral expires at the end of its lifetime', () => {
    const { launch, run } = setup();
    launch('swirl');

    const steps = run(3, 0.1);

    expect(steps[1].expired).toEqual([]);
    expect(steps[2].expired.map((e) => e.reason)).toEqual(['lifetime']);
  });

  it('cancelOwnedBy removes only the projectiles of that owner', () => {
    const { launch, engine } = setup();
    launch('lance');
    launch('lance', { ownerId: 'enemy_1', faction: 'enemy' });

    const cancelled = engine.cancelOwnedBy('player_1');

    expect(cancelled.map((c) => [c.projectileId, c.reason])).toEqual([['proj_1', 'cancelled']]);
    expect(engine.list().map((p) => p.id)).toEqual(['proj_2']);
  });

  it('a fork whose child turned invalid after launch is spent without stopping the step', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken = bookOf({
      shard: { range: 100, speed: 150, trajectory_properties: { type: 'PIERCING', pierce_count: -1 } },
    }).getSpell('shard');
    let shard: SpellDefinition | undefined = book.getSpell('shard');
    const source: SpellSource = { getSpell: (id) => (id === 'shard' ? shard : book.getSpell(id)) };
    const factory = new ProjectileFactory(source);
    const engine = new TrajectoryEngine(factory);
    const world = createWorld();
    const launchFrom = (spellId: string): Projectile => {
      const spell = book.getSpell(spellId);
      if (!spell) throw new Error(`fixture spell ${spellId} missing`);
      const projectile = factory.build({
        spell,
        ownerId: 'player_1',
        faction: 'player',
        origin: { x: 0, y: 0 },
        heading: { x: 1, y: 0 },
      });
      engine.spawn(projectile);
      return projectile;
    };
    launchFrom('splitter');
    const bolt = launchFrom('bolt');
    shard = broken;

    const steps = [engine.step(0.1, world), engine.step(0.1, world), engine.step(0.1, world)];

    expect(steps[2].expired.map((e) => [e.projectileId, e.reason])).toEqual([['proj_1', 'spent']]);
    expect(steps[2].spawned).toEqual([]);
    expect(engine.list().map((p) => p.id)).toEqual(['proj_2']);
    expect(bolt.position.x).toBeCloseTo(30);
    expect(warn).toHaveBeenCalledWith(
      '[combat] Fork of proj_1 (splitter) failed: Spell shard: trajectory_properties.pierce_count must be an integer >= 1, got -1',
    );
  });
});
