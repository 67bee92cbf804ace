/**
 * Seedable pseudo-random source threaded through the mapper and simulation,
 * so a given seed always replays the same hue jitter, seeding, merges and splits.
 */

export type RandomFn = () => number;

/** mulberry32: 32-bit state, uniform floats in [0, 1). */
export function createRng(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

// Box-Muller
export function gaussian(random: RandomFn, mean: number, stdDev: number): number {
  const u1 = Math.max(random(), Number.EPSILON);
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

export function resolveRandom(seed?: number, random?: RandomFn): RandomFn {
  if (random) return random;
  return seed === undefined ? Math.random : createRng(seed);
}
