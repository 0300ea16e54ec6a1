/**
 * Random sources for candidate sampling.
 *
 * Every sampling function takes the source explicitly so tests can replay
 * a fixed seed (or a scripted sequence) and get the same variants back.
 */

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * mulberry32: small, fast and good enough for sampling word subsets
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function next() {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function uniform(random: RandomSource, low: number, high: number): number {
  return low + (high - low) * random();
}

export function pick<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(random() * items.length)];
}

/**
 * Draw `count` distinct items (partial Fisher-Yates); order is the draw order
 */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const size = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const current = pool[i];
    const swap = pool[j];
    if (current === undefined || swap === undefined) break;
    pool[i] = swap;
    pool[j] = current;
  }

  return pool.slice(0, size);
}
