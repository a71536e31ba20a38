// pipeline/stat-derivation.ts — Raw attributes → derived combat stats

import type {
  AttributeName,
  AttributeSet,
  CharacterStats,
  DerivedCombatStats,
  DominantAttribute,
  WeightedAttribute,
} from '../types/index.js';
import {
  ATTRIBUTE_NAMES,
  DOMINANT_TIE_ORDER,
  PHYSICAL_BUILD_MULTIPLIER,
  DEFAULT_INTELLIGENCE_MULTIPLIER,
  CHANCE_CAP,
} from '../shared/constants.js';
import { InvalidStatsError } from '../shared/errors.js';

export interface DerivationOptions {
  intelligenceMultiplier?: number;
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function validateStats(stats: CharacterStats): void {
  if (!stats || typeof stats !== 'object' || !stats.attributes || typeof stats.attributes !== 'object') {
    throw new InvalidStatsError('Character stats must include an attribute map', 'missing');
  }

  for (const name of ATTRIBUTE_NAMES) {
    const attr = stats.attributes[name];
    if (!attr || typeof attr !== 'object') {
      throw new InvalidStatsError(`Missing attribute: ${name}`, 'missing', name);
    }
    if (!isNonNegativeNumber(attr.value)) {
      throw new InvalidStatsError(`Attribute ${name} has invalid value ${String(attr.value)}`, 'value', name);
    }
    if (!isNonNegativeNumber(attr.weight)) {
      throw new InvalidStatsError(`Attribute ${name} has invalid weight ${String(attr.weight)}`, 'weight', name);
    }
  }

  if (!isNonNegativeNumber(stats.level)) {
    throw new InvalidStatsError(`Invalid level ${String(stats.level)}`, 'level');
  }

  const weapon = stats.weapon;
  if (!weapon || !ATTRIBUTE_NAMES.includes(weapon.mainStat) || !isNonNegativeNumber(weapon.damageBonus)) {
    throw new InvalidStatsError('Weapon must name a main stat and a non-negative damage bonus', 'weapon');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttributeName(value: unknown): value is AttributeName {
  return typeof value === 'string' && ATTRIBUTE_NAMES.some((name) => name === value);
}

function parseAttribute(name: AttributeName, raw: unknown): WeightedAttribute {
  // A bare number is a value with weight 1
  if (typeof raw === 'number') return { value: raw, weight: 1 };
  if (!isRecord(raw)) {
    throw new InvalidStatsError(`Missing attribute: ${name}`, 'missing', name);
  }
  const value = raw.value;
  const weight = raw.weight ?? 1;
  if (typeof value !== 'number') {
    throw new InvalidStatsError(`Attribute ${name} has invalid value ${String(value)}`, 'value', name);
  }
  if (typeof weight !== 'number') {
    throw new InvalidStatsError(`Attribute ${name} has invalid weight ${String(weight)}`, 'weight', name);
  }
  return { value, weight };
}

/** Builds CharacterStats from untrusted JSON, such as a CLI argument. */
export function parseCharacterStats(raw: unknown): CharacterStats {
  if (!isRecord(raw) || !isRecord(raw.attributes)) {
    throw new InvalidStatsError('Character stats must include an attribute map', 'missing');
  }

  const source = raw.attributes;
  const attributes: AttributeSet = {
    strength: parseAttribute('strength', source.strength),
    vitality: parseAttribute('vitality', source.vitality),
    agility: parseAttribute('agility', source.agility),
    intelligence: parseAttribute('intelligence', source.intelligence),
    luck: parseAttribute('luck', source.luck),
  };

  const level = raw.level ?? 1;
  if (typeof level !== 'number') {
    throw new InvalidStatsError(`Invalid level ${String(level)}`, 'level');
  }

  const weapon = raw.weapon ?? {};
  if (!isRecord(weapon)) {
    throw new InvalidStatsError('Weapon must be an object', 'weapon');
  }
  const mainStat = weapon.mainStat ?? 'strength';
  const damageBonus = weapon.damageBonus ?? 0;
  if (!isAttributeName(mainStat) || typeof damageBonus !== 'number') {
    throw new InvalidStatsError('Weapon must name a main stat and a non-negative damage bonus', 'weapon');
  }

  const stats: CharacterStats = { attributes, level, weapon: { mainStat, damageBonus } };
  validateStats(stats);
  return stats;
}

function pickDominant(attributes: AttributeSet, weaponStat: AttributeName): AttributeName {
  let top = -Infinity;
  for (const name of ATTRIBUTE_NAMES) {
    top = Math.max(top, attributes[name].value);
  }

  const tied = ATTRIBUTE_NAMES.filter((name) => attributes[name].value === top);
  if (tied.length === 1) return tied[0];
  if (tied.includes(weaponStat)) return weaponStat;
  return DOMINANT_TIE_ORDER.find((name) => tied.includes(name)) ?? tied[0];
}

function buildMultiplier(attribute: AttributeName, intelligenceMultiplier: number): number {
  switch (attribute) {
    case 'strength':
    case 'agility':
      return PHYSICAL_BUILD_MULTIPLIER;
    case 'intelligence':
      return intelligenceMultiplier;
    default:
      return 1;
  }
}

/**
 * Pure and deterministic. Crit and hit chance are reported uncapped; the part
 * above 100 is also split out as overflow for the caller to turn into damage.
 */
export function deriveCombatStats(
  stats: CharacterStats,
  options: DerivationOptions = {},
): DerivedCombatStats {
  validateStats(stats);

  const intelligenceMultiplier = options.intelligenceMultiplier ?? DEFAULT_INTELLIGENCE_MULTIPLIER;
  if (!isNonNegativeNumber(intelligenceMultiplier)) {
    throw new InvalidStatsError(`Invalid intelligence multiplier ${intelligenceMultiplier}`, 'value', 'intelligence');
  }

  const { attributes, level, weapon } = stats;

  let sumStat = 0;
  for (const name of ATTRIBUTE_NAMES) {
    sumStat += attributes[name].value;
  }

  const dominantName = pickDominant(attributes, weapon.mainStat);
  const dominantAttr = attributes[dominantName];
  const buildAverage = (sumStat - dominantAttr.value) / (ATTRIBUTE_NAMES.length - 1);

  const dominant: DominantAttribute = {
    attribute: dominantName,
    raw: dominantAttr.value,
    value: dominantAttr.value * buildMultiplier(dominantName, intelligenceMultiplier),
    weight: dominantAttr.weight,
  };

  const luck = attributes.luck.value;

  const critChance = luck + dominant.value * dominant.weight;
  const critOverflow = Math.max(0, critChance - CHANCE_CAP);
  const critDamage = luck * (dominant.value + level);

  const hitChance = (dominant.value + level) * luck;
  const hitOverflow = Math.max(0, hitChance - CHANCE_CAP);

  const attackDamageBonus = dominant.value * level + weapon.damageBonus + hitOverflow;

  return {
    critChance,
    critOverflow,
    critDamage,
    hitChance,
    hitOverflow,
    attackDamageBonus,
    dominant,
    buildAverage,
  };
}

/** Flat damage added to every projectile at spawn. */
export function spawnDamageBonus(derived: DerivedCombatStats): number {
  return derived.attackDamageBonus + derived.critOverflow;
}

/** Crit probability in [0, 1]. */
export function critProbability(derived: DerivedCombatStats): number {
  return Math.min(CHANCE_CAP, derived.critChance) / CHANCE_CAP;
}
