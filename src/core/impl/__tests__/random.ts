/** Seeded PRNG (mulberry32) so randomized tests replay identically. */
export function seeded(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInts(rand: () => number, n: number, max = 1000): number[] {
  return Array.from({ length: n }, () => Math.floor(rand() * max));
}
