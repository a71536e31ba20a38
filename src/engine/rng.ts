// engine/rng.ts — Deterministic random source (mulberry32)

export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = SeededRng.normalize(seed);
  }

  private static normalize(seed: number): number {
    if (!Number.isFinite(seed)) return 1;
    // Non-zero 32-bit unsigned state
    return (Math.floor(Math.abs(seed)) >>> 0) || 1;
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    this.state = SeededRng.normalize(state);
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /** Uniform float in [min, max). */
  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }
}
