/**
 * Seeded pseudo-random numbers for reproducible simulations.
 */

/** mulberry32: 32-bit state, uniform in [0, 1) */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Normal sampler on top of a uniform generator (Box-Muller).
 */
export function createNormalSampler(
  rng: () => number,
  mean: number,
  stdDev: number
): () => number {
  return () => {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - rng();
    const u2 = rng();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + stdDev * z;
  };
}
