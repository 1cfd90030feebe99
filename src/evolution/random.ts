/** Source of uniform floats in [0, 1). Injected so selection can be made deterministic. */
export interface RandomSource {
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Seeded PRNG (mulberry32). Same seed, same sequence.
 * Not for anything security-sensitive.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Uniform pick from a non-empty list. */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random.next() * items.length), items.length - 1);
  return items[index];
}
