// data/spell-book.ts — Spell definitions loaded from data/spells.json

import { readFileSync } from 'node:fs';
import type {
  Archetype,
  DamageType,
  DivergenceOption,
  EffectPayload,
  FusionRules,
  SpellDefinition,
  SpellOverrides,
  SpellType,
  SpellUpgrade,
  StatusKind,
} from '../types/index.js';
import { DAMAGE_TYPES, STATUS_KINDS, TRAJECTORY_TYPES } from '../shared/constants.js';
import { InvalidProjectileConfigError } from '../shared/errors.js';
import { findProjectPath } from '../shared/paths.js';
import { isFiniteNumber } from '../shared/utils.js';

export interface SpellSource {
  getSpell(id: string): SpellDefinition | undefined;
}

export type UpgradeCheck = 'ok' | 'max_level' | 'divergence_required';

const SPELL_TYPES: ReadonlySet<string> = new Set<SpellType>(['PROJECTILE', 'PROJECTILE_AOE', 'GROUND_AOE']);
const DIVERGENCE_OPTIONS: readonly DivergenceOption[] = ['option_1', 'option_2'];

type NumericOverrideKey =
  | 'damage'
  | 'cooldown'
  | 'range'
  | 'speed'
  | 'energyCost'
  | 'projectileCount'
  | 'angleSpread'
  | 'aoeRadius';

const NUMERIC_FIELDS: ReadonlyArray<[string, NumericOverrideKey]> = [
  ['damage', 'damage'],
  ['cooldown', 'cooldown'],
  ['range', 'range'],
  ['speed', 'speed'],
  ['energy_cost', 'energyCost'],
  ['projectile_count', 'projectileCount'],
  ['angle_spread', 'angleSpread'],
  ['aoe_radius', 'aoeRadius'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDamageType(value: unknown): value is DamageType {
  return typeof value === 'string' && DAMAGE_TYPES.some((t) => t === value);
}

function isStatusKind(value: unknown): value is StatusKind {
  return typeof value === 'string' && STATUS_KINDS.some((k) => k === value);
}

function isSpellType(value: unknown): value is SpellType {
  return typeof value === 'string' && SPELL_TYPES.has(value);
}

function fail(spellId: string, field: string, problem: string): never {
  throw new InvalidProjectileConfigError(`Spell ${spellId}: ${field} ${problem}`, spellId, field);
}

function parseEffect(spellId: string, raw: unknown): EffectPayload | null {
  if (raw === undefined || raw === null) return null;
  if (!isRecord(raw)) fail(spellId, 'effect', 'must be an object');
  if (!isStatusKind(raw.kind)) fail(spellId, 'effect.kind', `must be one of ${STATUS_KINDS.join(', ')}`);

  const duration = raw.duration ?? 1;
  const level = raw.level ?? 1;
  const slowAmount = raw.slow_amount ?? 0;
  if (!isFiniteNumber(duration)) fail(spellId, 'effect.duration', 'must be a number');
  if (!isFiniteNumber(level)) fail(spellId, 'effect.level', 'must be a number');
  if (!isFiniteNumber(slowAmount)) fail(spellId, 'effect.slow_amount', 'must be a number');

  return { kind: raw.kind, duration, level, slowAmount };
}

function parseOverrides(spellId: string, path: string, raw: Record<string, unknown>): SpellOverrides {
  const overrides: SpellOverrides = {};
  const at = (key: string): string => (path ? `${path}.${key}` : key);

  for (const [jsonKey, key] of NUMERIC_FIELDS) {
    const value = raw[jsonKey];
    if (value === undefined) continue;
    if (!isFiniteNumber(value)) fail(spellId, at(jsonKey), 'must be a number');
    overrides[key] = value;
  }

  if (raw.name !== undefined) {
    if (typeof raw.name !== 'string') fail(spellId, at('name'), 'must be a string');
    overrides.name = raw.name;
  }
  if (raw.description !== undefined) {
    if (typeof raw.description !== 'string') fail(spellId, at('description'), 'must be a string');
    overrides.description = raw.description;
  }
  if (raw.damage_type !== undefined) {
    if (!isDamageType(raw.damage_type)) fail(spellId, at('damage_type'), `must be one of ${DAMAGE_TYPES.join(', ')}`);
    overrides.damageType = raw.damage_type;
  }
  if (raw.effect !== undefined) {
    overrides.effect = parseEffect(spellId, raw.effect);
  }
  if (raw.trajectory_properties !== undefined) {
    if (!isRecord(raw.trajectory_properties)) fail(spellId, at('trajectory_properties'), 'must be an object');
    overrides.trajectoryProperties = { ...raw.trajectory_properties };
  }

  return overrides;
}

/** Shape check only. Archetype parameters are validated when a projectile is built. */
export function parseSpellDefinition(id: string, raw: unknown): SpellDefinition {
  if (!isRecord(raw)) fail(id, '(root)', 'must be an object');

  const type = raw.type ?? 'PROJECTILE';
  if (!isSpellType(type)) fail(id, 'type', 'must be PROJECTILE, PROJECTILE_AOE or GROUND_AOE');

  const base = parseOverrides(id, '', raw);

  const damageType = raw.damage_type ?? 'physical';
  if (!isDamageType(damageType)) fail(id, 'damage_type', `must be one of ${DAMAGE_TYPES.join(', ')}`);

  const automatic = raw.automatic ?? false;
  if (typeof automatic !== 'boolean') fail(id, 'automatic', 'must be a boolean');

  const trajectoryProperties = raw.trajectory_properties ?? {};
  if (!isRecord(trajectoryProperties)) fail(id, 'trajectory_properties', 'must be an object');

  const upgrades: Record<string, SpellUpgrade> = {};
  const rawUpgrades = raw.upgrades ?? {};
  if (!isRecord(rawUpgrades)) fail(id, 'upgrades', 'must be an object');
  for (const [key, rawUpgrade] of Object.entries(rawUpgrades)) {
    if (!/^level_\d+$/.test(key)) fail(id, `upgrades.${key}`, 'must be named level_N');
    if (!isRecord(rawUpgrade)) fail(id, `upgrades.${key}`, 'must be an object');
    const divergence = rawUpgrade.divergence ?? false;
    if (typeof divergence !== 'boolean') fail(id, `upgrades.${key}.divergence`, 'must be a boolean');
    upgrades[key] = { ...parseOverrides(id, `upgrades.${key}`, rawUpgrade), divergence };
  }

  const divergenceOptions: Partial<Record<DivergenceOption, SpellOverrides>> = {};
  const rawDivergence = raw.divergence_options ?? {};
  if (!isRecord(rawDivergence)) fail(id, 'divergence_options', 'must be an object');
  for (const option of DIVERGENCE_OPTIONS) {
    const rawOption = rawDivergence[option];
    if (rawOption === undefined) continue;
    if (!isRecord(rawOption)) fail(id, `divergence_options.${option}`, 'must be an object');
    divergenceOptions[option] = parseOverrides(id, `divergence_options.${option}`, rawOption);
  }

  return {
    id,
    name: base.name ?? id,
    description: base.description ?? '',
    type,
    damage: base.damage ?? 10,
    cooldown: base.cooldown ?? 1,
    range: base.range ?? 0,
    speed: base.speed ?? 0,
    energyCost: base.energyCost ?? 0,
    projectileCount: base.projectileCount ?? 1,
    angleSpread: base.angleSpread ?? 30,
    aoeRadius: base.aoeRadius ?? 0,
    damageType,
    automatic,
    effect: base.effect ?? null,
    trajectoryProperties: { ...trajectoryProperties },
    upgrades,
    divergenceOptions,
  };
}

export function applyOverrides(spell: SpellDefinition, overrides: SpellOverrides): SpellDefinition {
  return {
    ...spell,
    name: overrides.name ?? spell.name,
    description: overrides.description ?? spell.description,
    damage: overrides.damage ?? spell.damage,
    cooldown: overrides.cooldown ?? spell.cooldown,
    range: overrides.range ?? spell.range,
    speed: overrides.speed ?? spell.speed,
    energyCost: overrides.energyCost ?? spell.energyCost,
    projectileCount: overrides.projectileCount ?? spell.projectileCount,
    angleSpread: overrides.angleSpread ?? spell.angleSpread,
    aoeRadius: overrides.aoeRadius ?? spell.aoeRadius,
    damageType: overrides.damageType ?? spell.damageType,
    effect: overrides.effect !== undefined ? overrides.effect : spell.effect,
    trajectoryProperties: { ...spell.trajectoryProperties, ...overrides.trajectoryProperties },
  };
}

/**
 * The archetype named by trajectory_properties.type, or null when unknown.
 * Without one, a GROUND_AOE spell lands as a ground area and anything else flies straight.
 */
export function archetypeOf(spell: SpellDefinition): Archetype | null {
  const type = spell.trajectoryProperties.type ?? (spell.type === 'GROUND_AOE' ? 'GROUND_AOE' : 'STRAIGHT');
  if (typeof type !== 'string') return null;
  return TRAJECTORY_TYPES[type.toUpperCase()] ?? null;
}

export function levelKey(level: number): string {
  return `level_${level}`;
}

export class SpellBook implements SpellSource {
  private spells: Map<string, SpellDefinition> = new Map();

  constructor(definitions: SpellDefinition[] = []) {
    for (const def of definitions) {
      this.spells.set(def.id, def);
    }
  }

  static fromJson(raw: unknown): SpellBook {
    if (!isRecord(raw)) {
      throw new Error('Spell data must be an object keyed by spell id');
    }
    return new SpellBook(Object.entries(raw).map(([id, def]) => parseSpellDefinition(id, def)));
  }

  add(definition: SpellDefinition): void {
    this.spells.set(definition.id, definition);
  }

  getSpell(id: string): SpellDefinition | undefined {
    return this.spells.get(id);
  }

  has(id: string): boolean {
    return this.spells.has(id);
  }

  list(): SpellDefinition[] {
    return [...this.spells.values()];
  }

  /**
   * Effective definition at `level`: upgrades level_2..level_N applied in order,
   * then the chosen divergence option.
   */
  resolve(id: string, level: number, divergence: DivergenceOption | null): SpellDefinition | undefined {
    const base = this.spells.get(id);
    if (!base) return undefined;

    let spell = base;
    for (let n = 2; n <= level; n++) {
      const upgrade = base.upgrades[levelKey(n)];
      if (upgrade) spell = applyOverrides(spell, upgrade);
    }

    if (divergence) {
      const option = base.divergenceOptions[divergence];
      if (option) spell = applyOverrides(spell, option);
    }

    return spell;
  }

  checkUpgrade(id: string, currentLevel: number, divergence: DivergenceOption | null): UpgradeCheck {
    const upgrade = this.spells.get(id)?.upgrades[levelKey(currentLevel + 1)];
    if (!upgrade) return 'max_level';
    if (upgrade.divergence && divergence === null) return 'divergence_required';
    return 'ok';
  }

  canDiverge(id: string, currentLevel: number, divergence: DivergenceOption | null): boolean {
    if (divergence !== null) return false;
    return this.checkUpgrade(id, currentLevel, divergence) === 'divergence_required';
  }
}

export function loadSpellBook(path: string = findProjectPath('data/spells.json')): SpellBook {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return SpellBook.fromJson(raw);
}

export function parseFusionRules(raw: unknown): FusionRules {
  if (!isRecord(raw)) {
    throw new Error('Fusion rules must be an object keyed by spell pair');
  }
  const rules: Record<string, string> = {};
  for (const [pair, result] of Object.entries(raw)) {
    if (typeof result !== 'string' || result === '') {
      throw new Error(`Fusion rule ${pair} must name a result spell`);
    }
    rules[pair] = result;
  }
  return rules;
}

export function loadFusionRules(path: string = findProjectPath('data/fusions.json')): FusionRules {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseFusionRules(raw);
}
