/**
 * Seedable randomness
 *
 * Every random draw in the simulation goes through a `Random` passed in by
 * the caller, so a fixed seed replays a show exactly.
 */

/** Returns a float in [0, 1) */
export type Random = () => number;

/**
 * Mulberry32 PRNG. Small, fast, and good enough for visuals.
 */
export function mulberry32(seed: number): Random {
  let t = seed | 0;
  return () => {
    t = (t + 0x6D2B79F5) | 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded generator when a seed is given, Math.random otherwise.
 */
export function createRandom(seed?: number): Random {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/** Float in [min, max) */
export function uniform(random: Random, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Integer in [min, max], both inclusive */
export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('pick() needs at least one item');
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** True with the given probability */
export function chance(random: Random, probability: number): boolean {
  return random() < probability;
}
