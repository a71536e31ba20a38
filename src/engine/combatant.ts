// engine/combatant.ts — Bodies on the combat field and the Damageable capability

import type {
  EntityId,
  Faction,
  Position,
  CharacterStats,
  CombatEvent,
  DamageType,
  EffectPayload,
  RelicDefinition,
  RelicModifiers,
  StatusApplyOutcome,
} from '../types/index.js';
import type { EventBus } from './event-bus.js';
import { HealthPool, EnergyPool, type PoolInit } from './vitals.js';
import { StatusSet } from './status-set.js';
import { combineRelics, emptyModifiers } from '../data/relics.js';
import { DEFAULT_HIT_RADIUS } from '../shared/constants.js';
import { applyPercent, generateCombatantId, generateBodyId } from '../shared/utils.js';

export interface DamagePacket {
  damage: number;
  damageType: DamageType;
  effect: EffectPayload | null;
  sourceId: EntityId | null;
}

export interface DamageOutcome {
  applied: number;
  defeated: boolean;
  status: StatusApplyOutcome | null;
}

/** The surface a collision needs in order to hurt something. */
export interface Damageable {
  takeDamageAndEffect(packet: DamagePacket): DamageOutcome;
}

export type Resists = Partial<Record<DamageType, number>>;

export interface CombatantInit {
  id?: EntityId;
  name?: string;
  faction: Faction;
  position: Position;
  hitRadius?: number;
  health: PoolInit;
  energy: PoolInit;
  resists?: Resists;
  stats?: CharacterStats | null;
}

export class Combatant implements Damageable {
  readonly kind = 'combatant' as const;
  readonly id: EntityId;
  readonly name: string;
  readonly faction: Faction;
  position: Position;
  hitRadius: number;
  readonly health: HealthPool;
  readonly energy: EnergyPool;
  readonly status: StatusSet;
  resists: Resists;
  stats: CharacterStats | null;
  private readonly baseMaxHealth: number;
  private relics: RelicDefinition[] = [];
  private _modifiers: RelicModifiers = emptyModifiers();

  constructor(init: CombatantInit, bus: EventBus<CombatEvent>) {
    this.id = init.id ?? generateCombatantId();
    this.name = init.name ?? this.id;
    this.faction = init.faction;
    this.position = { ...init.position };
    this.hitRadius = init.hitRadius ?? DEFAULT_HIT_RADIUS;
    this.health = new HealthPool(this.id, bus, init.health);
    this.energy = new EnergyPool(this.id, bus, init.energy);
    this.status = new StatusSet(this.id, bus);
    this.resists = { ...init.resists };
    this.stats = init.stats ?? null;
    this.baseMaxHealth = init.health.max;
  }

  get isDefeated(): boolean {
    return this.health.isDefeated;
  }

  get modifiers(): Readonly<RelicModifiers> {
    return this._modifiers;
  }

  get relicIds(): string[] {
    return this.relics.map((r) => r.id);
  }

  /**
   * Adds a relic and recomputes the combined modifiers. Max health follows
   * maxHealthPercent; current health is only clamped, never topped up.
   * Returns false when the relic is already equipped.
   */
  equipRelic(relic: RelicDefinition): boolean {
    if (this.relics.some((r) => r.id === relic.id)) return false;
    this.relics.push(relic);
    this._modifiers = combineRelics(this.relics);
    this.health.setMax(Math.max(1, applyPercent(this.baseMaxHealth, this._modifiers.maxHealthPercent)));
    return true;
  }

  resistTo(damageType: DamageType): number {
    return this.resists[damageType] ?? 0;
  }

  takeDamageAndEffect(packet: DamagePacket): DamageOutcome {
    const applied = this.health.applyDamage(packet.damage, packet.sourceId);
    if (this.health.isDefeated) {
      return { applied, defeated: true, status: null };
    }

    const status = packet.effect
      ? this.status.apply(packet.effect, packet.damageType, packet.sourceId)
      : null;
    return { applied, defeated: false, status };
  }
}

/** Something a projectile can strike that has no health, such as scenery or a training post. */
export interface InertBody {
  kind: 'inert';
  id: EntityId;
  label: string;
  faction: Faction;
  position: Position;
  hitRadius: number;
}

export type Body = Combatant | InertBody;

export function createInertBody(init: Omit<InertBody, 'kind' | 'id'> & { id?: EntityId }): InertBody {
  return {
    kind: 'inert',
    id: init.id ?? generateBodyId(),
    label: init.label,
    faction: init.faction,
    position: { ...init.position },
    hitRadius: init.hitRadius,
  };
}

export function isDamageable(body: Body | undefined): body is Combatant {
  return body !== undefined && body.kind === 'combatant';
}
