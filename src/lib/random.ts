/** Source of uniform values in [0, 1). Injected everywhere randomness matters. */
export interface Random {
  next(): number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultRandom: Random = { next: () => Math.random() };

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

/**
 * Small deterministic generator (mulberry32) for reproducible runs.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function uniform(random: Random, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: Random, min: number, max: number): number {
  return Math.min(max, Math.floor(uniform(random, min, max + 1)));
}

export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random.next() * items.length))];
}

export function shuffle<T>(random: Random, items: readonly T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}
