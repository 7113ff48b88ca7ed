/** Uniform source in [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

// mulberry32
export function createRng(seedInput: number): RandomSource {
  let seed = seedInput >>> 0;
  return () => {
    seed += 0x6d2b79f5;
    let t = seed;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: RandomSource, size: number) {
  const value = Math.floor(rng() * size);
  return Math.max(0, Math.min(size - 1, value));
}

export function randomIntInclusive(rng: RandomSource, min: number, max: number) {
  return min + randomInt(rng, max - min + 1);
}

export function pickRandom<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(rng, items.length)];
}
