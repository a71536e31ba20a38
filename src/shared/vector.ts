// shared/vector.ts — 2-D vector helpers, all pure

import type { Position } from '../types/index.js';

export const ZERO: Readonly<Position> = { x: 0, y: 0 };

export function add(a: Position, b: Position): Position {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Position, b: Position): Position {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Position, s: number): Position {
  return { x: v.x * s, y: v.y * s };
}

export function length(v: Position): number {
  return Math.hypot(v.x, v.y);
}

/** Unit vector in the direction of v, or the zero vector when v has no length. */
export function normalize(v: Position): Position {
  const len = length(v);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

export function lerp(a: Position, b: Position, t: number): Position {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}

export function fromAngle(radians: number): Position {
  return { x: Math.cos(radians), y: Math.sin(radians) };
}

export function angleOf(v: Position): number {
  return Math.atan2(v.y, v.x);
}

export function rotate(v: Position, radians: number): Position {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return { x: v.x * cos - v.y * sin, y: v.x * sin + v.y * cos };
}

// Rotated +90°
export function perpendicular(v: Position): Position {
  return { x: -v.y, y: v.x };
}
