// ---------------------------------------------------------------------------
// PRNG (mulberry32)
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/** Create a seedable PRNG using the mulberry32 algorithm. */
export function createPRNG(seed: number): PRNG {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform sample in [min, max]. */
export function uniformSample(rng: PRNG, min: number, max: number): number {
  return min + (max - min) * rng();
}
