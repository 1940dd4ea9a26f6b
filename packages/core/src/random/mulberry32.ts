/**
 * Seedable random source
 */

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

/**
 * mulberry32 generator: the same seed always yields the same sequence
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Generator seeded from the clock and process id
 */
export function createProcessRandom(): RandomSource {
  return createSeededRandom((Date.now() ^ (process.pid << 16)) >>> 0);
}

/**
 * Uniform index into a collection of `length` items
 */
export function randomIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}
