// cli/simulate.ts — Headless duel: one caster against a line of enemies

import type { CharacterStats, EntityId, StatusKind, TickResult } from '../src/types/index.js';
import { createCombatSession, seedDuel, type CombatSession } from '../src/engine/session.js';
import type { Combatant } from '../src/engine/combatant.js';

export interface SimulationOptions {
  spellId: string;
  ticks: number;
  seed?: number;
  dbPath?: string | null;
  enemies?: number;
  stats?: CharacterStats | null;
  relics?: string[];
  /** Run on the physics timer instead of back to back. */
  realtime?: boolean;
}

export interface CombatantSummary {
  id: EntityId;
  health: number;
  maxHealth: number;
  energy: number;
  defeated: boolean;
  statuses: StatusKind[];
  relics: string[];
}

export interface SimulationSummary {
  runId: string | null;
  seed: number;
  spellId: string;
  ticksRun: number;
  casts: number;
  rejectedCasts: number;
  hits: number;
  damageDealt: number;
  defeated: EntityId[];
  player: CombatantSummary;
  enemies: CombatantSummary[];
}

function summarize(combatant: Combatant): CombatantSummary {
  return {
    id: combatant.id,
    health: combatant.health.current,
    maxHealth: combatant.health.max,
    energy: combatant.energy.current,
    defeated: combatant.isDefeated,
    statuses: combatant.status.list().map((s) => s.kind),
    relics: combatant.relicIds,
  };
}

// Queues the duel spell whenever the player can cast it
function queueReadyCast(session: CombatSession, playerId: EntityId, spellId: string): void {
  const player = session.world.getCombatant(playerId);
  const known = session.caster.getKnown(playerId, spellId);
  const spell = known ? session.book.resolve(spellId, known.level, known.divergence) : undefined;
  if (!player || !known || !spell || spell.automatic) return;
  if (known.cooldownRemaining > 0 || !player.energy.canAfford(spell.energyCost)) return;
  session.castQueue.enqueue(playerId, { spellId }, session.world.tick);
}

function driveRealtime(session: CombatSession, ticks: number, onTick: (result: TickResult) => boolean): Promise<void> {
  return new Promise((resolve) => {
    let ran = 0;
    session.tickLoop.setTickListener((result) => {
      ran++;
      const keepGoing = onTick(result);
      if (!keepGoing || ran >= ticks) {
        session.tickLoop.endCombatPhase();
        resolve();
      }
    });
    session.tickLoop.beginCombatPhase(true);
  });
}

export async function runSimulation(options: SimulationOptions): Promise<SimulationSummary> {
  if (!Number.isInteger(options.ticks) || options.ticks <= 0) {
    throw new Error(`Tick count must be a positive integer, got ${options.ticks}`);
  }

  const session = createCombatSession(
    {
      ...(options.seed !== undefined ? { seed: options.seed } : {}),
      ...(options.dbPath !== undefined ? { logDbPath: options.dbPath } : {}),
    },
    { runLabel: `simulate:${options.spellId}` },
  );

  try {
    if (!session.book.has(options.spellId)) {
      throw new Error(`Unknown spell: ${options.spellId}`);
    }

    const { player, enemies } = seedDuel(session, {
      spellId: options.spellId,
      enemyCount: options.enemies,
      stats: options.stats,
      relicIds: options.relics,
    });

    let ticksRun = 0;
    let casts = 0;
    let rejectedCasts = 0;
    let hits = 0;
    let damageDealt = 0;
    const defeated: EntityId[] = [];

    // Returns false once nothing is left to fight
    const onTick = (result: TickResult): boolean => {
      ticksRun++;
      for (const cast of result.casts) {
        if (cast.status === 'cast') casts++;
        else rejectedCasts++;
      }
      for (const hit of result.hits) {
        if (hit.ignored) continue;
        hits++;
        damageDealt += hit.damage;
      }
      defeated.push(...result.defeated);

      if (session.world.opponentsOf(player.faction).length === 0 || player.isDefeated) return false;
      queueReadyCast(session, player.id, options.spellId);
      return true;
    };

    queueReadyCast(session, player.id, options.spellId);

    if (options.realtime) {
      await driveRealtime(session, options.ticks, onTick);
    } else {
      session.tickLoop.beginCombatPhase(false);
      for (let i = 0; i < options.ticks; i++) {
        const result = session.tickLoop.processTick();
        if (!result || !onTick(result)) break;
      }
      session.tickLoop.endCombatPhase();
    }

    return {
      runId: session.combatLog?.runId ?? null,
      seed: session.config.seed,
      spellId: options.spellId,
      ticksRun,
      casts,
      rejectedCasts,
      hits,
      damageDealt,
      defeated,
      player: summarize(player),
      enemies: enemies.map(summarize),
    };
  } finally {
    session.close();
  }
}
