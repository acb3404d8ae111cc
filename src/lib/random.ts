/** Random helpers shared by board generation, refill and obstacle rolls. */

export type RandomSource = () => number;

/** Deterministic 32-bit source; the same seed replays the same sequence. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let result = Math.imul(state ^ (state >>> 15), 1 | state);
    result ^= result + Math.imul(result ^ (result >>> 7), 61 | result);
    return ((result ^ (result >>> 14)) >>> 0) / 0x1_0000_0000;
  };
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.min(0.999999, value);
}

/** Uniform integer in `[0, count)`. */
export function randomIndex(random: RandomSource, count: number): number {
  if (count <= 0) {
    return 0;
  }
  return Math.floor(clampUnit(random()) * count);
}

/**
 * Draws one sample and walks the entries' chances as consecutive bands of
 * the unit interval. Returns the entry whose band holds the sample, or null
 * when it lands past the last band.
 */
export function pickByChance<T extends { readonly chance: number }>(
  random: RandomSource,
  entries: readonly T[]
): T | null {
  const sample = clampUnit(random());
  let upper = 0;
  for (const entry of entries) {
    upper += Math.max(0, entry.chance);
    if (sample < upper) {
      return entry;
    }
  }
  return null;
}
