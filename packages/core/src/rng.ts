/**
 * Seeded pseudo-random numbers.
 *
 * Every composition attempt builds its own generator from a seed string, so no
 * random state is shared between calls.
 */

export type Rng = () => number;

export const RNG_SEED = 1337;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a seed string
 */
export function hashSeed(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Linear congruential generator returning values in [0, 1)
 */
export function createRng(seed: string | number | undefined): Rng {
  let state = (typeof seed === "string" ? hashSeed(seed) : (seed ?? RNG_SEED)) >>> 0;
  if (state === 0) {
    state = RNG_SEED;
  }
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function pickWithRng<T>(items: readonly T[], rng: Rng): T {
  if (!items.length) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[Math.floor(rng() * items.length)];
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomInt(min: number, max: number, rng: Rng): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Weighted choice; weights must be non-negative with a positive sum
 */
export function pickWeighted<T>(items: readonly T[], weights: readonly number[], rng: Rng): T {
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (!items.length || total <= 0) {
    throw new Error("Cannot pick from an empty or zero-weight list");
  }
  let threshold = rng() * total;
  for (let i = 0; i < items.length; i++) {
    threshold -= weights[i];
    if (threshold < 0) {
      return items[i];
    }
  }
  return items[items.length - 1];
}

export function shuffleWithRng<T>(items: readonly T[], rng: Rng): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const temp = copy[i];
    copy[i] = copy[j];
    copy[j] = temp;
  }
  return copy;
}
