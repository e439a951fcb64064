/**
 * lossyLink - Deterministic packet loss for convergence tests
 */

/**
 * Seeded PRNG (mulberry32). Same seed, same sequence.
 */
export function seededRandom(seed: number): () => number {
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
 * Decide per packet whether it survives a link that drops `dropRate` of them.
 *
 * @example
 * const deliver = createDropFilter(0.05, 42);
 * if (deliver()) client.cast('set_track_volume', { volume });
 */
export function createDropFilter(dropRate: number, seed: number): () => boolean {
  const random = seededRandom(seed);
  return () => random() >= dropRate;
}
