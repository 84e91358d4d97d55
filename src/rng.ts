export type Rng = () => number;

export function normalizeSeed(seed?: number): number {
  if (typeof seed === "number" && Number.isFinite(seed)) {
    return seed | 0;
  }
  return 0x12345678;
}

/** mulberry32, uniform in [0, 1) */
export function createRng(seed: number): Rng {
  let t = seed | 0;
  return () => {
    t |= 0;
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates, returns a new array */
export function shuffle<T>(items: readonly T[], rng: Rng): T[] {
  const result = items.slice();
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
