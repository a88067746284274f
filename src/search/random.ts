/**
 * Source of uniform floats in [0, 1). The engine never touches Math.random
 * directly so a run can be replayed from a seed.
 */
export interface RandomSource {
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random()
};

/**
 * Mulberry32. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return {
    next(): number {
      state |= 0;
      state = (state + 0x6D2B79F5) | 0;
      let t = Math.imul(state ^ (state >>> 15), 1 | state);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}
