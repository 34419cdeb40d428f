/**
 * Seeded random source
 * Every stochastic step takes an `Rng` instead of calling Math.random so that a
 * fixed seed reproduces a run exactly.
 */

export type Rng = () => number;

/**
 * mulberry32: 32-bit state, uniform floats in [0, 1)
 */
export function createRng(seed: number): Rng {
  let state = (Math.floor(seed) >>> 0) || 0x9e3779b9;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomRange(rng: Rng, lo: number, hi: number): number {
  return lo + rng() * (hi - lo);
}

export function randomInt(rng: Rng, n: number): number {
  if (n <= 0) {
    throw new Error(`randomInt needs a positive bound, got ${n}`);
  }
  return Math.min(n - 1, Math.floor(rng() * n));
}

export function pick<T>(rng: Rng, values: readonly T[]): T {
  if (values.length === 0) {
    throw new Error("Cannot pick from empty array");
  }
  return values[randomInt(rng, values.length)];
}

export function chance(rng: Rng, probability: number): boolean {
  return rng() < probability;
}
