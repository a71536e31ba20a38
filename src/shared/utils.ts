// shared/utils.ts — ID generation, numeric helpers

import { randomBytes } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function nanoid(size: number): string {
  const bytes = randomBytes(size);
  let id = '';
  for (const byte of bytes) {
    id += ALPHABET[byte % ALPHABET.length];
  }
  return id;
}

export function generateCombatantId(): string {
  return `cmb_${nanoid(8)}`;
}

export function generateBodyId(): string {
  return `body_${nanoid(8)}`;
}

export function nowISO(): string {
  return new Date().toISOString();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** `value` adjusted by `percent` (10 → +10%), never below 0. */
export function applyPercent(value: number, percent: number): number {
  if (percent === 0) return value;
  return (value * Math.max(0, 100 + percent)) / 100;
}
