/**
 * Random Sources
 *
 * All sampling and policy randomness goes through a RandomSource so that a
 * seeded experiment replays exactly.
 */

/** Returns a pseudo-random number in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Mulberry32 generator. Unseeded calls draw a seed from Math.random.
 */
export function createRandomSource(seed?: number): RandomSource {
  let state = seed ?? Math.floor(Math.random() * 2 ** 32);
  return () => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle, in place. Returns the same array.
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource = defaultRandom): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.min(Math.floor(random() * (i + 1)), i);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Uniform choice from a non-empty list.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  // Guard against a source that returns exactly 1.
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
