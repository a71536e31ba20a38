// types/core.ts — Fundamental types

export type EntityId = string;
export type Tick = number;

/** Which side a body fights for. Projectiles only collide with other factions. */
export type Faction = 'player' | 'enemy' | 'neutral';

export interface Position {
  x: number;
  y: number;
}

export function distance(a: Position, b: Position): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}
