// engine/world.ts — In-memory combat field state

import type {
  EntityId,
  Faction,
  Position,
  Tick,
  CombatEvent,
} from '../types/index.js';
import { distance } from '../types/index.js';
import { EventBus } from './event-bus.js';
import {
  Combatant,
  createInertBody,
  type Body,
  type CombatantInit,
  type InertBody,
} from './combatant.js';
import type { TerrainObstacle } from './terrain.js';

/** Read-only view of the field used by the trajectory engine. */
export interface CombatField {
  getBody(id: EntityId): Body | undefined;
  getCombatant(id: EntityId): Combatant | undefined;
  bodies(): Body[];
  nearestOpponent(from: Position, faction: Faction, options?: NearestOptions): Combatant | undefined;
  readonly terrain: readonly TerrainObstacle[];
}

export interface NearestOptions {
  exclude?: ReadonlySet<EntityId>;
  maxRange?: number;
}

export class WorldState implements CombatField {
  tick: Tick = 0;
  seed: number;

  readonly bus = new EventBus<CombatEvent>();

  combatants: Map<EntityId, Combatant> = new Map();
  inertBodies: Map<EntityId, InertBody> = new Map();
  terrain: TerrainObstacle[] = [];

  tickEvents: CombatEvent[] = [];

  constructor(seed: number) {
    this.seed = seed;
    this.bus.onAny((event) => {
      this.tickEvents.push(event);
    });
  }

  // --- Combatant methods ---

  spawnCombatant(init: CombatantInit): Combatant {
    const combatant = new Combatant(init, this.bus);
    if (this.combatants.has(combatant.id) || this.inertBodies.has(combatant.id)) {
      throw new Error(`Body ${combatant.id} already exists`);
    }
    this.combatants.set(combatant.id, combatant);
    return combatant;
  }

  removeCombatant(id: EntityId): boolean {
    return this.combatants.delete(id);
  }

  getCombatant(id: EntityId): Combatant | undefined {
    return this.combatants.get(id);
  }

  moveCombatant(id: EntityId, newPos: Position): void {
    const combatant = this.combatants.get(id);
    if (!combatant) return;
    combatant.position = { ...newPos };
  }

  opponentsOf(faction: Faction): Combatant[] {
    const result: Combatant[] = [];
    for (const combatant of this.combatants.values()) {
      if (combatant.faction !== faction && !combatant.isDefeated) result.push(combatant);
    }
    return result;
  }

  nearestOpponent(from: Position, faction: Faction, options: NearestOptions = {}): Combatant | undefined {
    const limit = options.maxRange ?? Infinity;
    let best: Combatant | undefined;
    let bestDist = Infinity;

    for (const combatant of this.opponentsOf(faction)) {
      if (options.exclude?.has(combatant.id)) continue;
      const d = distance(from, combatant.position);
      if (d > limit) continue;
      if (!best || d < bestDist) {
        best = combatant;
        bestDist = d;
      }
    }

    return best;
  }

  // --- Inert bodies and terrain ---

  addInertBody(init: Omit<InertBody, 'kind' | 'id'> & { id?: EntityId }): InertBody {
    const body = createInertBody(init);
    if (this.combatants.has(body.id) || this.inertBodies.has(body.id)) {
      throw new Error(`Body ${body.id} already exists`);
    }
    this.inertBodies.set(body.id, body);
    return body;
  }

  removeInertBody(id: EntityId): boolean {
    return this.inertBodies.delete(id);
  }

  addTerrain(obstacle: TerrainObstacle): void {
    this.terrain.push(obstacle);
  }

  // --- Field queries ---

  getBody(id: EntityId): Body | undefined {
    return this.combatants.get(id) ?? this.inertBodies.get(id);
  }

  bodies(): Body[] {
    return [...this.combatants.values(), ...this.inertBodies.values()];
  }
}
