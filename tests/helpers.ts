// tests/helpers.ts — Shared factories for combat tests

import { WorldState } from '../src/engine/world.js';
import type { Combatant, CombatantInit } from '../src/engine/combatant.js';
import { SpellBook } from '../src/data/spell-book.js';
import type { CombatEvent, EntityId, Faction, Position } from '../src/types/index.js';

export function createWorld(seed = 42): WorldState {
  return new WorldState(seed);
}

export function spawnAt(
  world: WorldState,
  id: EntityId,
  faction: Faction,
  position: Position,
  overrides: Partial<CombatantInit> = {},
): Combatant {
  return world.spawnCombatant({
    id,
    faction,
    position,
    hitRadius: 10,
    health: { max: 100 },
    energy: { max: 100 },
    ...overrides,
  });
}

/** Builds a book from snake_case JSON, the same shape as data/spells.json. */
export function bookOf(spells: Record<string, Record<string, unknown>>): SpellBook {
  return SpellBook.fromJson(spells);
}

function isType<T extends CombatEvent['type']>(
  event: CombatEvent,
  type: T,
): event is Extract<CombatEvent, { type: T }> {
  return event.type === type;
}

export function eventsOfType<T extends CombatEvent['type']>(
  events: CombatEvent[],
  type: T,
): Extract<CombatEvent, { type: T }>[] {
  const matched: Extract<CombatEvent, { type: T }>[] = [];
  for (const event of events) {
    if (isType(event, type)) matched.push(event);
  }
  return matched;
}
