// types/relic.ts — Passive relics and the combat modifiers they grant

export type RelicStat = 'spellDamagePercent' | 'spellCooldownPercent' | 'maxHealthPercent';

/** Percent adjustments; 10 means +10%, -15 means -15%. */
export type RelicModifiers = Record<RelicStat, number>;

export interface RelicDefinition {
  id: string;
  name: string;
  description: string;
  rarity: string;
  effects: Partial<RelicModifiers>;
}
