import type { Rng } from "./types";

/**
 * Create a deterministic RNG from a numeric seed.
 *
 * Note: this is not cryptographically secure; it is meant for gameplay and tests.
 */
export function makeRng(seed: number): Rng {
  // xorshift32 has a fixed point at 0.
  let x = seed >>> 0 || 0x9e3779b9;
  return () => {
    // xorshift32
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 4294967296;
  };
}

/** Seed that differs run to run, for hosts that don't pin one. */
export function freshSeed(): number {
  return ((Date.now() & 0xffffffff) ^ (Math.random() * 0xffffffff)) >>> 0;
}

/** Integer in [lo, hi], both inclusive. Collapses to `lo` when the range is empty. */
export function randInt(rng: Rng, lo: number, hi: number): number {
  const a = Math.ceil(lo);
  const b = Math.floor(hi);
  if (b <= a) return a;
  return a + Math.floor(rng() * (b - a + 1));
}

/** Float in [lo, hi). */
export function randRange(rng: Rng, lo: number, hi: number): number {
  return lo + rng() * (hi - lo);
}

export function pick<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (!items.length) return undefined;
  return items[Math.floor(rng() * items.length)];
}

/** In-place Fisher-Yates shuffle. */
export function shuffle<T>(rng: Rng, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
