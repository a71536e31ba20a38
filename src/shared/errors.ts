// shared/errors.ts — Error taxonomy

import type { AttributeName } from '../types/index.js';

export type StatsField = 'value' | 'weight' | 'missing' | 'level' | 'weapon';

/** Raw character attributes failed validation. Never clamped away. */
export class InvalidStatsError extends Error {
  constructor(
    message: string,
    public readonly field: StatsField,
    public readonly attribute: AttributeName | null = null,
  ) {
    super(message);
    this.name = 'InvalidStatsError';
  }
}

/** A relic definition in data/relics.json is malformed. Raised at load. */
export class InvalidRelicError extends Error {
  constructor(
    message: string,
    public readonly relicId: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'InvalidRelicError';
  }
}

/** A spell's projectile parameters cannot produce a valid projectile. Raised at spawn. */
export class InvalidProjectileConfigError extends Error {
  constructor(
    message: string,
    public readonly spellId: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'InvalidProjectileConfigError';
  }
}
