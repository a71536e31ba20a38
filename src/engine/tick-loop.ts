// engine/tick-loop.ts — The heartbeat: fixed physics step, slower status step

import type { CastResult, TickResult } from '../types/index.js';
import type { WorldState } from './world.js';
import type { CombatLog } from './combat-log.js';
import type { CastQueue } from '../pipeline/cast-queue.js';
import type { SpellCaster } from '../pipeline/spell-caster.js';
import type { TrajectoryEngine } from '../pipeline/trajectory-engine.js';
import type { DamagePipeline } from '../pipeline/damage-pipeline.js';
import type { StatusEffectTickProcessor } from '../pipeline/status-processor.js';
import { PHYSICS_TICK_MS, SLOW_TICK_BUDGET_RATIO, STATUS_TICK_MS } from '../shared/constants.js';

export type TickListener = (result: TickResult) => void;

export interface TickLoopOptions {
  physicsTickMs?: number;
  statusTickMs?: number;
}

export class TickLoop {
  private world: WorldState;
  private castQueue: CastQueue;
  private caster: SpellCaster;
  private engine: TrajectoryEngine;
  private pipeline: DamagePipeline;
  private statusProcessor: StatusEffectTickProcessor;
  private combatLog: CombatLog | null = null;
  private tickListener: TickListener | null = null;

  readonly physicsTickMs: number;
  readonly statusTickInterval: number;

  private active = false;
  private tickInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    world: WorldState,
    castQueue: CastQueue,
    caster: SpellCaster,
    engine: TrajectoryEngine,
    pipeline: DamagePipeline,
    statusProcessor: StatusEffectTickProcessor,
    options: TickLoopOptions = {},
  ) {
    this.world = world;
    this.castQueue = castQueue;
    this.caster = caster;
    this.engine = engine;
    this.pipeline = pipeline;
    this.statusProcessor = statusProcessor;
    this.physicsTickMs = options.physicsTickMs ?? PHYSICS_TICK_MS;
    // Status ticks run every N physics ticks
    this.statusTickInterval = Math.max(1, Math.round((options.statusTickMs ?? STATUS_TICK_MS) / this.physicsTickMs));
  }

  setCombatLog(combatLog: CombatLog): void {
    this.combatLog = combatLog;
  }

  /** Called after every tick once it is persisted. */
  setTickListener(listener: TickListener | null): void {
    this.tickListener = listener;
  }

  get isCombatPhase(): boolean {
    return this.active;
  }

  /** Opens the combat phase. With `realtime`, ticks run on a timer until the phase ends. */
  beginCombatPhase(realtime = true): void {
    this.active = true;
    if (realtime && !this.tickInterval) {
      this.tickInterval = setInterval(() => this.processTick(), this.physicsTickMs);
    }
  }

  endCombatPhase(): void {
    this.active = false;
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
  }

  /** Runs up to `count` ticks back to back; stops early once the phase ends. */
  runTicks(count: number): TickResult[] {
    const results: TickResult[] = [];
    for (let i = 0; i < count; i++) {
      const result = this.processTick();
      if (!result) break;
      results.push(result);
    }
    return results;
  }

  processTick(): TickResult | null {
    if (!this.active) return null;
    const startTime = performance.now();
    const dt = this.physicsTickMs / 1000;

    // 1. Increment tick
    const tick = ++this.world.tick;

    // 2. Drain cast queue and resolve casts
    const casts: CastResult[] = [];
    for (const intent of this.castQueue.drainAll()) {
      casts.push(this.caster.cast(intent, this.world));
    }

    // 3. Automatic spells
    casts.push(...this.caster.autocast(this.world));

    // 4. Cooldowns
    this.caster.advanceCooldowns(dt, this.world);

    // 5. Move, then collide
    const step = this.engine.step(dt, this.world);

    // 6. Resolve hits in order; fork children already joined the engine
    const resolution = this.pipeline.resolveStep(step, this.world);
    const defeated = [...resolution.defeated];
    const expired = [...resolution.expired];

    // 7. Damage over time on its own cadence
    const statusTick = tick % this.statusTickInterval === 0;
    if (statusTick) {
      const report = this.statusProcessor.tick(this.world);
      defeated.push(...report.defeated);
      expired.push(...report.cancelled);
    }

    // 8. Build tick result
    const tickResult: TickResult = {
      tick,
      casts,
      hits: resolution.hits,
      expired,
      defeated,
      statusTick,
      events: [...this.world.tickEvents],
    };

    // 9. Persist
    if (this.combatLog) {
      this.combatLog.persistTick(tickResult);
    }

    // 10. Clear tick-scoped data
    this.world.tickEvents = [];

    // 11. Notify the driver; it may queue casts or end the phase
    if (this.tickListener) {
      try {
        this.tickListener(tickResult);
      } catch (error) {
        console.error(`[combat] Tick listener failed on tick ${tick}`, error);
      }
    }

    // 12. Log tick performance
    const elapsed = performance.now() - startTime;
    if (elapsed > this.physicsTickMs * SLOW_TICK_BUDGET_RATIO) {
      console.warn(`[combat] Tick ${tick} took ${elapsed.toFixed(1)}ms of a ${this.physicsTickMs}ms budget`);
    }

    return tickResult;
  }
}
