/**
 * Seeded pseudo-random source (mulberry32). Each instance owns its state, so a
 * fresh generator per seed gives the same sequence regardless of what other
 * generators have drawn.
 */
export function createSeededRandom(seed: number): () => number {
  let a = Math.floor(seed) >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Two independent standard normal draws (Box-Muller) from one generator.
 */
export function standardNormalPair(next: () => number): [number, number] {
  // 1 - u keeps the log argument in (0, 1].
  const u1 = 1 - next();
  const u2 = next();
  const r = Math.sqrt(-2 * Math.log(u1));
  const theta = 2 * Math.PI * u2;
  return [r * Math.cos(theta), r * Math.sin(theta)];
}
