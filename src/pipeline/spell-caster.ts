// pipeline/spell-caster.ts — Casts spells into projectiles; owns per-caster spell state

import type {
  CastIntent,
  CastRejectReason,
  CastResult,
  DivergenceOption,
  EntityId,
  FusionResult,
  FusionRules,
  KnownSpell,
  Position,
  Projectile,
} from '../types/index.js';
import type { WorldState } from '../engine/world.js';
import type { Combatant } from '../engine/combatant.js';
import type { SeededRng } from '../engine/rng.js';
import type { SpellBook, UpgradeCheck } from '../data/spell-book.js';
import type { ProjectileFactory } from './projectile-factory.js';
import type { TrajectoryEngine } from './trajectory-engine.js';
import { critProbability, deriveCombatStats, spawnDamageBonus } from './stat-derivation.js';
import { InvalidProjectileConfigError } from '../shared/errors.js';
import { EPSILON } from '../shared/constants.js';
import { applyPercent, degToRad } from '../shared/utils.js';
import { fromAngle, length, rotate, sub } from '../shared/vector.js';

export interface SpellCasterOptions {
  intelligenceMultiplier?: number;
}

function fusionResultOf(rules: FusionRules, firstId: string, secondId: string): string | undefined {
  for (const key of [`${firstId}_${secondId}`, `${secondId}_${firstId}`]) {
    if (Object.prototype.hasOwnProperty.call(rules, key)) return rules[key];
  }
  return undefined;
}

interface Aim {
  heading: Position;
  targetPosition: Position | null;
  targetId: EntityId | null;
}

export class SpellCaster {
  private known: Map<EntityId, Map<string, KnownSpell>> = new Map();

  constructor(
    private readonly book: SpellBook,
    private readonly factory: ProjectileFactory,
    private readonly engine: TrajectoryEngine,
    private readonly rng: SeededRng,
    private readonly options: SpellCasterOptions = {},
  ) {}

  // --- Spell knowledge ---

  learn(casterId: EntityId, spellId: string): KnownSpell {
    if (!this.book.has(spellId)) {
      throw new Error(`Unknown spell ${spellId}`);
    }
    const spells = this.spellsOf(casterId);
    const existing = spells.get(spellId);
    if (existing) return existing;

    const entry: KnownSpell = { spellId, level: 1, divergence: null, cooldownRemaining: 0 };
    spells.set(spellId, entry);
    return entry;
  }

  forget(casterId: EntityId, spellId?: string): void {
    if (spellId === undefined) {
      this.known.delete(casterId);
      return;
    }
    this.known.get(casterId)?.delete(spellId);
  }

  getKnown(casterId: EntityId, spellId: string): KnownSpell | undefined {
    return this.known.get(casterId)?.get(spellId);
  }

  knownSpells(casterId: EntityId): KnownSpell[] {
    return [...(this.known.get(casterId)?.values() ?? [])];
  }

  /** Raises a known spell one level unless a divergence choice is pending. */
  upgrade(casterId: EntityId, spellId: string): UpgradeCheck {
    const entry = this.getKnown(casterId, spellId);
    if (!entry) return 'max_level';

    const check = this.book.checkUpgrade(spellId, entry.level, entry.divergence);
    if (check === 'ok') entry.level += 1;
    return check;
  }

  /** Picks a divergence option. Allowed once, and only when the next level asks for it. */
  diverge(casterId: EntityId, spellId: string, option: DivergenceOption): boolean {
    const entry = this.getKnown(casterId, spellId);
    if (!entry) return false;
    if (!this.book.canDiverge(spellId, entry.level, entry.divergence)) return false;
    if (!this.book.getSpell(spellId)?.divergenceOptions[option]) return false;

    entry.divergence = option;
    entry.level += 1;
    return true;
  }

  /**
   * Merges two known spells into the spell `rules` names for the pair, in
   * either order. Both are consumed and the result starts fresh at level 1,
   * replacing any copy the caster already knew.
   */
  fuse(casterId: EntityId, firstId: string, secondId: string, rules: FusionRules): FusionResult {
    const spells = this.known.get(casterId);
    if (!spells || !spells.has(firstId) || !spells.has(secondId)) {
      return { status: 'rejected', casterId, reason: 'not_known' };
    }

    const resultId = fusionResultOf(rules, firstId, secondId);
    if (resultId === undefined) {
      return { status: 'rejected', casterId, reason: 'no_rule' };
    }
    if (!this.book.has(resultId)) {
      return { status: 'rejected', casterId, reason: 'unknown_result' };
    }

    spells.delete(firstId);
    spells.delete(secondId);
    spells.set(resultId, { spellId: resultId, level: 1, divergence: null, cooldownRemaining: 0 });
    console.log(`[combat] ${casterId} fused ${firstId} + ${secondId} into ${resultId}`);
    return { status: 'fused', casterId, consumed: [firstId, secondId], spellId: resultId };
  }

  // --- Casting ---

  cast(intent: CastIntent, world: WorldState): CastResult {
    const caster = world.getCombatant(intent.casterId);
    if (!caster || caster.isDefeated) {
      return this.reject(intent, 'unknown_caster', null, world);
    }

    const entry = this.getKnown(caster.id, intent.spellId);
    const spell = entry ? this.book.resolve(intent.spellId, entry.level, entry.divergence) : undefined;
    if (!entry || !spell) {
      return this.reject(intent, 'unknown_spell', null, world);
    }

    if (entry.cooldownRemaining > EPSILON) {
      return this.reject(intent, 'cooldown', `${entry.cooldownRemaining.toFixed(2)}s remaining`, world);
    }

    if (!caster.energy.canAfford(spell.energyCost)) {
      return this.reject(intent, 'no_energy', null, world);
    }

    const aim = this.aim(caster, intent, world);
    let bonusDamage = 0;
    let crit = false;
    if (caster.stats) {
      const derived = deriveCombatStats(caster.stats, { intelligenceMultiplier: this.options.intelligenceMultiplier });
      bonusDamage = spawnDamageBonus(derived);
      crit = this.rng.chance(critProbability(derived));
      if (crit) bonusDamage += derived.critDamage;
    }

    // Build everything first so a bad definition costs nothing
    const count = Math.max(1, Math.floor(spell.projectileCount));
    const spread = degToRad(spell.angleSpread);
    const projectiles: Projectile[] = [];
    try {
      for (let i = 0; i < count; i++) {
        const offset = count === 1 ? 0 : (i / (count - 1) - 0.5) * spread;
        projectiles.push(
          this.factory.build({
            spell,
            ownerId: caster.id,
            faction: caster.faction,
            origin: caster.position,
            heading: rotate(aim.heading, offset),
            bonusDamage,
            damagePercent: caster.modifiers.spellDamagePercent,
            targetPosition: aim.targetPosition,
            targetId: aim.targetId,
          }),
        );
      }
    } catch (err) {
      if (err instanceof InvalidProjectileConfigError) {
        console.warn(`[combat] Cast of ${spell.id} by ${caster.id} rejected: ${err.message}`);
        return this.reject(intent, 'invalid_config', err.message, world);
      }
      throw err;
    }

    for (const projectile of projectiles) {
      this.engine.spawn(projectile);
      world.bus.emit({
        type: 'projectile_spawned',
        projectileId: projectile.id,
        spellId: projectile.spellId,
        ownerId: projectile.ownerId,
        archetype: projectile.state.archetype,
        position: { ...projectile.position },
      });
    }

    entry.cooldownRemaining = Math.max(0, applyPercent(spell.cooldown, caster.modifiers.spellCooldownPercent));
    caster.energy.applyExhaustion(spell.energyCost);

    return {
      status: 'cast',
      casterId: caster.id,
      spellId: spell.id,
      projectileIds: projectiles.map((p) => p.id),
      damage: projectiles[0]?.damage ?? 0,
      crit,
    };
  }

  /**
   * Counts every cooldown down by `dt` seconds. With a world, a chilled
   * caster recovers at its status speed multiplier.
   */
  advanceCooldowns(dt: number, world?: WorldState): void {
    for (const [casterId, spells] of this.known) {
      const rate = world?.getCombatant(casterId)?.status.speedMultiplier() ?? 1;
      for (const entry of spells.values()) {
        if (entry.cooldownRemaining > 0) {
          entry.cooldownRemaining = Math.max(0, entry.cooldownRemaining - dt * rate);
        }
      }
    }
  }

  /** Casts every ready automatic spell of every living caster. */
  autocast(world: WorldState): CastResult[] {
    const results: CastResult[] = [];
    for (const [casterId, spells] of this.known) {
      const caster = world.getCombatant(casterId);
      if (!caster || caster.isDefeated) continue;

      for (const entry of spells.values()) {
        if (entry.cooldownRemaining > EPSILON) continue;
        const spell = this.book.resolve(entry.spellId, entry.level, entry.divergence);
        if (!spell?.automatic) continue;
        if (!caster.energy.canAfford(spell.energyCost)) continue;
        if (world.opponentsOf(caster.faction).length === 0) continue;

        results.push(this.cast({ casterId, spellId: entry.spellId, target: null, targetId: null }, world));
      }
    }
    return results;
  }

  private spellsOf(casterId: EntityId): Map<string, KnownSpell> {
    let spells = this.known.get(casterId);
    if (!spells) {
      spells = new Map();
      this.known.set(casterId, spells);
    }
    return spells;
  }

  // Explicit point, then explicit target, then nearest opponent, then a random direction
  private aim(caster: Combatant, intent: CastIntent, world: WorldState): Aim {
    let targetPosition: Position | null = intent.target ? { ...intent.target } : null;
    let targetId: EntityId | null = null;

    if (intent.targetId !== null) {
      const target = world.getBody(intent.targetId);
      if (target) {
        targetId = target.id;
        targetPosition ??= { ...target.position };
      }
    }

    if (!targetPosition) {
      const nearest = world.nearestOpponent(caster.position, caster.faction);
      if (nearest) {
        targetId ??= nearest.id;
        targetPosition = { ...nearest.position };
      }
    }

    const toTarget = targetPosition ? sub(targetPosition, caster.position) : null;
    const heading = toTarget && length(toTarget) > 0
      ? toTarget
      : fromAngle(this.rng.nextFloat(0, Math.PI * 2));

    return { heading, targetPosition, targetId };
  }

  private reject(
    intent: CastIntent,
    reason: CastRejectReason,
    detail: string | null,
    world: WorldState,
  ): CastResult {
    world.bus.emit({ type: 'cast_rejected', casterId: intent.casterId, spellId: intent.spellId, reason });
    return { status: 'rejected', casterId: intent.casterId, spellId: intent.spellId, reason, detail };
  }
}
