// types/spell.ts — Spell definitions, upgrades and per-caster spell state

import type { EntityId, Position } from './core.js';
import type { DamageType, EffectPayload } from './status.js';

export type SpellType = 'PROJECTILE' | 'PROJECTILE_AOE' | 'GROUND_AOE';

export type DivergenceOption = 'option_1' | 'option_2';

/** Archetype parameters stay loosely typed until a projectile is built from them. */
export type TrajectoryProperties = Readonly<Record<string, unknown>>;

export interface SpellDefinition {
  id: string;
  name: string;
  description: string;
  type: SpellType;
  damage: number;
  cooldown: number;
  range: number;
  speed: number;
  energyCost: number;
  projectileCount: number;
  /** Degrees between the outermost projectiles of a multi-projectile cast. */
  angleSpread: number;
  aoeRadius: number;
  damageType: DamageType;
  automatic: boolean;
  effect: EffectPayload | null;
  trajectoryProperties: TrajectoryProperties;
  upgrades: Record<string, SpellUpgrade>;
  divergenceOptions: Partial<Record<DivergenceOption, SpellOverrides>>;
}

export interface SpellOverrides {
  name?: string;
  description?: string;
  damage?: number;
  cooldown?: number;
  range?: number;
  speed?: number;
  energyCost?: number;
  projectileCount?: number;
  angleSpread?: number;
  aoeRadius?: number;
  damageType?: DamageType;
  effect?: EffectPayload | null;
  /** Merged key by key over the base properties. */
  trajectoryProperties?: TrajectoryProperties;
}

export interface SpellUpgrade extends SpellOverrides {
  /** When set, reaching this level requires choosing a divergence option first. */
  divergence: boolean;
}

export interface KnownSpell {
  spellId: string;
  level: number;
  divergence: DivergenceOption | null;
  cooldownRemaining: number;
}

export interface RawCast {
  spellId: unknown;
  target?: unknown;
  targetId?: unknown;
}

export interface CastIntent {
  casterId: EntityId;
  spellId: string;
  target: Position | null;
  targetId: EntityId | null;
}

export type CastRejectReason =
  | 'unknown_caster'
  | 'unknown_spell'
  | 'cooldown'
  | 'no_energy'
  | 'invalid_config';

export type CastResult =
  | {
      status: 'cast';
      casterId: EntityId;
      spellId: string;
      projectileIds: EntityId[];
      damage: number;
      crit: boolean;
    }
  | {
      status: 'rejected';
      casterId: EntityId;
      spellId: string;
      reason: CastRejectReason;
      detail: string | null;
    };

/** `${first}_${second}` → resulting spell id. Either order of the pair matches. */
export type FusionRules = Readonly<Record<string, string>>;

export type FusionRejectReason = 'not_known' | 'no_rule' | 'unknown_result';

export type FusionResult =
  | { status: 'fused'; casterId: EntityId; consumed: [string, string]; spellId: string }
  | { status: 'rejected'; casterId: EntityId; reason: FusionRejectReason };
