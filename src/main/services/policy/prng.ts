export interface Prng {
  next(): number;
  randInt(min: number, max: number): number;
}

// mulberry32: deterministico para a mesma semente, suficiente para espalhar horarios
export function createPrng(seed: number): Prng {
  let state = Math.trunc(seed) >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    randInt(min: number, max: number): number {
      const low = Math.ceil(Math.min(min, max));
      const high = Math.floor(Math.max(min, max));
      if (high <= low) {
        return low;
      }
      return low + Math.floor(next() * (high - low + 1));
    }
  };
}

export function fuzzedInterval(prng: Prng, intervalMs: number, fuzzMs: number): number {
  const halfFuzz = Math.trunc(fuzzMs / 2);
  return prng.randInt(Math.max(0, intervalMs - halfFuzz), intervalMs + halfFuzz);
}
