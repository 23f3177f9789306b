import seedrandom from 'seedrandom';

/** A seeded source of uniform floats in `[0, 1)`. */
export type RNG = () => number;

const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/** Create a generator seeded for one row, keyed by the seed and the row index. */
export function createRowRng(seed: number, rowIndex: number): RNG {
  return seedrandom(`${String(seed)}:${String(rowIndex)}`);
}

/**
 * Pick a random integer in [min, max] inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/** Random alphanumeric string of the given length. */
export function randomString(rng: RNG, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC.charAt(Math.floor(rng() * ALPHANUMERIC.length));
  }
  return out;
}
