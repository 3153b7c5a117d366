/**
 * Randomness source for pacing decisions.
 * Injected everywhere a draw happens so tests can script the sequence.
 */

export interface Rng {
  /** Uniform draw in [0, 1). */
  next(): number;
}

export const mathRng: Rng = {
  next: () => Math.random(),
};

export type Range = readonly [number, number];

/** Continuous uniform draw in [min, max]. */
export function uniform(rng: Rng, [min, max]: Range): number {
  if (max <= min) return min;
  return min + rng.next() * (max - min);
}

/** Integer uniform draw in [min, max], both inclusive. */
export function randomInt(rng: Rng, [min, max]: Range): number {
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  if (hi <= lo) return lo;
  return Math.min(hi, lo + Math.floor(rng.next() * (hi - lo + 1)));
}

/** Replays a fixed sequence of draws, cycling when exhausted. */
export function sequenceRng(values: readonly number[]): Rng {
  let i = 0;
  return {
    next: () => {
      if (values.length === 0) return 0;
      const value = values[i % values.length] ?? 0;
      i++;
      return value;
    },
  };
}
