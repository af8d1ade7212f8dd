/**
 * Random sources for key generation.
 *
 * Key generation never reaches for Math.random() directly; the source is
 * passed in so a seed pins the generated key.
 */

import { ValidationError } from "../errors";

/** Seeds are 32-bit unsigned integers. */
export const MAX_SEED = 0xffffffff;

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
}

/**
 * Mulberry32 PRNG. Same seed, same sequence.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new ValidationError(`seed ${seed} is not an integer in [0, ${MAX_SEED}]`);
    }
    this.state = seed;
  }

  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}
