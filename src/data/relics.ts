// data/relics.ts — Relic definitions loaded from data/relics.json

import { readFileSync } from 'node:fs';
import type { RelicDefinition, RelicModifiers, RelicStat } from '../types/index.js';
import { InvalidRelicError } from '../shared/errors.js';
import { findProjectPath } from '../shared/paths.js';
import { isFiniteNumber } from '../shared/utils.js';

// Effect keys with no combat meaning (movement, xp) are skipped
const EFFECT_KEYS: ReadonlyArray<[string, RelicStat]> = [
  ['spell_damage_percent', 'spellDamagePercent'],
  ['spell_cooldown_percent', 'spellCooldownPercent'],
  ['max_health_percent', 'maxHealthPercent'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(relicId: string, field: string, problem: string): never {
  throw new InvalidRelicError(`Relic ${relicId}: ${field} ${problem}`, relicId, field);
}

function optionalString(relicId: string, field: string, value: unknown, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== 'string') fail(relicId, field, 'must be a string');
  return value;
}

export function parseRelicDefinition(id: string, raw: unknown): RelicDefinition {
  if (!isRecord(raw)) fail(id, '(root)', 'must be an object');

  const rawEffects = raw.effects ?? {};
  if (!isRecord(rawEffects)) fail(id, 'effects', 'must be an object');

  const effects: Partial<RelicModifiers> = {};
  for (const [key, stat] of EFFECT_KEYS) {
    const value = rawEffects[key];
    if (value === undefined) continue;
    if (!isFiniteNumber(value)) fail(id, `effects.${key}`, 'must be a finite number');
    effects[stat] = value;
  }

  return {
    id,
    name: optionalString(id, 'name', raw.name, id),
    description: optionalString(id, 'description', raw.description, ''),
    rarity: optionalString(id, 'rarity', raw.rarity, 'common'),
    effects,
  };
}

export function emptyModifiers(): RelicModifiers {
  return { spellDamagePercent: 0, spellCooldownPercent: 0, maxHealthPercent: 0 };
}

/** Sums every relic's effects; stats a relic leaves out count as 0. */
export function combineRelics(relics: readonly RelicDefinition[]): RelicModifiers {
  const combined = emptyModifiers();
  for (const relic of relics) {
    for (const [, stat] of EFFECT_KEYS) {
      combined[stat] += relic.effects[stat] ?? 0;
    }
  }
  return combined;
}

export class RelicCatalog {
  private relics: Map<string, RelicDefinition> = new Map();

  constructor(definitions: RelicDefinition[] = []) {
    for (const def of definitions) {
      this.relics.set(def.id, def);
    }
  }

  static fromJson(raw: unknown): RelicCatalog {
    if (!isRecord(raw)) {
      throw new Error('Relic data must be an object keyed by relic id');
    }
    return new RelicCatalog(Object.entries(raw).map(([id, def]) => parseRelicDefinition(id, def)));
  }

  get(id: string): RelicDefinition | undefined {
    return this.relics.get(id);
  }

  has(id: string): boolean {
    return this.relics.has(id);
  }

  list(): RelicDefinition[] {
    return [...this.relics.values()];
  }
}

export function loadRelicCatalog(path: string = findProjectPath('data/relics.json')): RelicCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return RelicCatalog.fromJson(raw);
}
