/**
 * Seeded PRNG (mulberry32). Deterministic forests make scores reproducible
 * across restarts and in tests.
 */

export type RandomSource = () => number;

export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in [0, n).
 */
export function randomInt(random: RandomSource, n: number): number {
  return Math.floor(random() * n);
}
