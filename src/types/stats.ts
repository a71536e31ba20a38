// types/stats.ts — Raw character attributes and derived combat stats

export type AttributeName = 'strength' | 'vitality' | 'agility' | 'intelligence' | 'luck';

export interface WeightedAttribute {
  value: number;
  weight: number;
}

export type AttributeSet = Record<AttributeName, WeightedAttribute>;

export interface WeaponProfile {
  mainStat: AttributeName;
  damageBonus: number;
}

export interface CharacterStats {
  attributes: AttributeSet;
  level: number;
  weapon: WeaponProfile;
}

export interface DominantAttribute {
  attribute: AttributeName;
  /** Raw value before the build modifier. */
  raw: number;
  /** Value after the build modifier. */
  value: number;
  weight: number;
}

export interface DerivedCombatStats {
  critChance: number;
  critOverflow: number;
  critDamage: number;
  hitChance: number;
  hitOverflow: number;
  attackDamageBonus: number;
  dominant: DominantAttribute;
  buildAverage: number;
}
