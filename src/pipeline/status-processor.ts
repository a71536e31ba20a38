// pipeline/status-processor.ts — Damage over time on the status interval

import type {
  EntityId,
  ProjectileExpiry,
  StatusEffectInstance,
  StatusKind,
} from '../types/index.js';
import type { WorldState } from '../engine/world.js';
import type { Combatant } from '../engine/combatant.js';
import type { SeededRng } from '../engine/rng.js';
import type { DamagePipeline } from './damage-pipeline.js';
import { DOT_ROLLS } from '../shared/constants.js';

export interface StatusTickReport {
  /** Total DoT damage per combatant this tick. */
  damage: Map<EntityId, number>;
  expired: { entityId: EntityId; kind: StatusKind }[];
  defeated: EntityId[];
  cancelled: ProjectileExpiry[];
}

type DotKind = keyof typeof DOT_ROLLS;

function isDotKind(kind: StatusKind): kind is DotKind {
  return kind in DOT_ROLLS;
}

export class StatusEffectTickProcessor {
  constructor(
    private readonly rng: SeededRng,
    private readonly pipeline: DamagePipeline,
  ) {}

  tick(world: WorldState): StatusTickReport {
    const report: StatusTickReport = { damage: new Map(), expired: [], defeated: [], cancelled: [] };

    // Snapshot: defeated combatants leave the map mid-iteration
    const combatants = Array.from(world.combatants.values());
    for (const combatant of combatants) {
      if (combatant.isDefeated) continue;
      this.tickCombatant(combatant, world, report);
      if (combatant.isDefeated) {
        report.defeated.push(combatant.id);
        report.cancelled.push(...this.pipeline.retire(combatant.id, world));
      }
    }

    return report;
  }

  /** Removes one status instance before it runs out. */
  dispel(world: WorldState, entityId: EntityId, kind: StatusKind): boolean {
    const combatant = world.getCombatant(entityId);
    if (!combatant) return false;
    return combatant.status.remove(kind);
  }

  private tickCombatant(combatant: Combatant, world: WorldState, report: StatusTickReport): void {
    for (const instance of combatant.status.list()) {
      if (isDotKind(instance.kind) && !combatant.isDefeated) {
        const dealt = this.applyDot(combatant, instance, instance.kind, world);
        if (dealt > 0) {
          report.damage.set(combatant.id, (report.damage.get(combatant.id) ?? 0) + dealt);
        }
      }

      instance.ticksApplied += 1;
      instance.remaining -= 1;
      if (instance.remaining <= 0 && combatant.status.remove(instance.kind)) {
        report.expired.push({ entityId: combatant.id, kind: instance.kind });
      }
    }
  }

  private applyDot(
    combatant: Combatant,
    instance: StatusEffectInstance,
    kind: DotKind,
    world: WorldState,
  ): number {
    const roll = DOT_ROLLS[kind];
    const iterations = roll.iterationsPerLevel * instance.level + this.rng.nextInt(0, roll.iterationJitter);

    let total = 0;
    let ran = 0;
    for (let i = 0; i < iterations; i++) {
      if (combatant.isDefeated) break;
      const amount = roll.damagePerLevel * instance.level + this.rng.nextInt(0, roll.damageJitter);
      total += combatant.health.applyDamage(amount, instance.sourceId);
      ran++;
    }

    world.bus.emit({
      type: 'status_tick',
      entityId: combatant.id,
      kind,
      iterations: ran,
      totalDamage: total,
    });

    return total;
  }
}
