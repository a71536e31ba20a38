// cli/program.ts — Command definitions

import { Command, InvalidArgumentError } from 'commander';
import { deriveCombatStats, parseCharacterStats } from '../src/pipeline/stat-derivation.js';
import { archetypeOf, loadSpellBook } from '../src/data/spell-book.js';
import { loadConfig } from '../src/engine/config.js';
import { InvalidStatsError } from '../src/shared/errors.js';
import { runSimulation } from './simulate.js';
import { type CliOutput, processOutput, writeJson } from './output.js';

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseJson(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    throw new InvalidArgumentError('Not valid JSON.');
  }
}

export interface ProgramOptions {
  /** Throw a CommanderError instead of exiting the process. */
  exitOverride?: boolean;
}

export function createProgram(output: CliOutput = processOutput, options: ProgramOptions = {}): Command {
  const program = new Command();
  if (options.exitOverride) program.exitOverride();

  program
    .name('combat-core')
    .description('Stat derivation, projectiles, damage and status effects for real-time combat')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => output.out(text),
      writeErr: (text) => output.err(text),
    });

  const derive = program
    .command('derive')
    .description('Print derived combat stats for a character')
    .requiredOption('--stats <json>', 'Character stats as JSON', parseJson)
    .option('--int-multiplier <n>', 'Build multiplier for an intelligence-dominant character', parseNumber)
    .action((opts: { stats: unknown; intMultiplier?: number }) => {
      try {
        const stats = parseCharacterStats(opts.stats);
        const intelligenceMultiplier = opts.intMultiplier ?? loadConfig().intelligenceMultiplier;
        writeJson(output, deriveCombatStats(stats, { intelligenceMultiplier }));
      } catch (err) {
        if (err instanceof InvalidStatsError) {
          derive.error(`Invalid stats (${err.field}): ${err.message}`, { code: 'combat.invalidStats' });
        }
        throw err;
      }
    });

  program
    .command('spells')
    .description('List the spell book')
    .option('--json', 'Print full definitions as JSON')
    .action((opts: { json?: boolean }) => {
      const spells = loadSpellBook().list();
      if (opts.json) {
        writeJson(output, spells);
        return;
      }
      for (const spell of spells) {
        const archetype = archetypeOf(spell) ?? 'unknown';
        output.out(`${spell.id.padEnd(20)} ${archetype.padEnd(12)} ${spell.damageType.padEnd(9)} dmg=${spell.damage} cd=${spell.cooldown}s\n`);
      }
    });

  const simulate = program
    .command('simulate')
    .description('Run a headless duel and print a JSON summary')
    .requiredOption('--spell <id>', 'Spell the player casts')
    .option('--ticks <n>', 'Physics ticks to run', parseInteger, 200)
    .option('--seed <n>', 'RNG seed', parseInteger)
    .option('--enemies <n>', 'Number of enemies', parseInteger, 3)
    .option('--db <path>', 'Record the run in a SQLite combat log')
    .option('--relic <id>', 'Equip a relic on the player (repeatable)', collect, [])
    .option('--realtime', 'Tick on the physics timer instead of back to back')
    .action(async (opts: {
      spell: string;
      ticks: number;
      seed?: number;
      enemies: number;
      db?: string;
      relic: string[];
      realtime?: boolean;
    }) => {
      try {
        const summary = await runSimulation({
          spellId: opts.spell,
          ticks: opts.ticks,
          seed: opts.seed,
          enemies: opts.enemies,
          dbPath: opts.db,
          relics: opts.relic,
          realtime: opts.realtime ?? false,
        });
        writeJson(output, summary);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        simulate.error(`Simulation failed: ${msg}`, { code: 'combat.simulationFailed' });
      }
    });

  return program;
}
