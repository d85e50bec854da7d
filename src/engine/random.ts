/**
 * random.ts — Random sampling helpers
 *
 * Every random draw goes through a RandomSource so a game can be replayed
 * with a seeded generator.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Uniform integer in [min, max). */
export function randomInt(min: number, max: number, random: RandomSource = defaultRandom): number {
  return min + Math.floor(random() * (max - min));
}

/**
 * Portion of `total` hit by an event whose rate is drawn uniformly from
 * [0, ratio). Never negative, never more than `total` while ratio <= 1.
 */
export function adaptedRandomNumber(ratio: number, total: number, random: RandomSource = defaultRandom): number {
  if (ratio <= 0 || total <= 0) return 0;
  return Math.floor(random() * ratio * total);
}

/** Small deterministic generator (mulberry32) for replays and tests. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
