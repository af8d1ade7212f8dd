import { ValidationError } from "../errors";
import { randomInt, systemRandom, type RandomSource } from "./random";

/** Floored modulo: the result always has the sign of `n`. */
export function floorMod(value: number, n: number): number {
  return ((value % n) + n) % n;
}

function assertInteger(value: number, label: string): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${label} must be an integer, got ${value}`);
  }
}

/**
 * Ordered integer sequence that drives the row permutation.
 *
 * `globalMin`/`globalMax` are the absolute legal range of every term, not
 * the observed extrema (those are `localMin`/`localMax`). Instances are
 * immutable; `shiftToRange` and `extend` return new keys.
 */
export class KeyVector {
  private readonly terms: readonly number[];
  readonly globalMin: number;
  readonly globalMax: number;

  /**
   * A bound left out defaults to the observed extremum of `values`.
   *
   * @throws ValidationError on an empty or non-integer sequence, inverted
   * bounds, or a value outside the bounds
   */
  constructor(values: readonly number[], globalMin?: number, globalMax?: number) {
    if (values.length === 0) {
      throw new ValidationError("key must contain at least one value");
    }
    values.forEach((v, i) => assertInteger(v, `key value at index ${i}`));

    const min = globalMin ?? Math.min(...values);
    const max = globalMax ?? Math.max(...values);
    assertInteger(min, "globalMin");
    assertInteger(max, "globalMax");
    if (min > max) {
      throw new ValidationError(`globalMin ${min} is greater than globalMax ${max}`);
    }

    const outside = values.find((v) => v < min || v > max);
    if (outside !== undefined) {
      throw new ValidationError(`key value ${outside} is outside [${min}, ${max}]`);
    }

    this.terms = Object.freeze([...values]);
    this.globalMin = min;
    this.globalMax = max;
  }

  /**
   * `length` independent uniform draws from [globalMin, globalMax], with
   * replacement. Repeated values are expected.
   */
  static random(
    globalMin: number,
    globalMax: number,
    length: number,
    random: RandomSource = systemRandom
  ): KeyVector {
    assertInteger(globalMin, "globalMin");
    assertInteger(globalMax, "globalMax");
    if (globalMin > globalMax) {
      throw new ValidationError(`globalMin ${globalMin} is greater than globalMax ${globalMax}`);
    }
    if (!Number.isInteger(length) || length < 1) {
      throw new ValidationError(`key length must be a positive integer, got ${length}`);
    }

    const values: number[] = [];
    for (let i = 0; i < length; i++) {
      values.push(randomInt(random, globalMin, globalMax));
    }
    return new KeyVector(values, globalMin, globalMax);
  }

  /**
   * Remap every term into [newMin, newMax], keeping length and order.
   * Terms already in range are left alone; the others wrap modulo the
   * size of the new range.
   */
  shiftToRange(newMin: number, newMax: number): KeyVector {
    assertInteger(newMin, "range minimum");
    assertInteger(newMax, "range maximum");
    if (newMin > newMax) {
      throw new ValidationError(`range minimum ${newMin} is greater than range maximum ${newMax}`);
    }

    const range = newMax - newMin + 1;
    const shifted = this.terms.map((term) => {
      if (term < newMin) return floorMod(term, range) + newMin;
      if (term > newMax) return floorMod(term - newMin, range) + newMin;
      return term;
    });

    return new KeyVector(shifted, newMin, newMax);
  }

  /**
   * Lengthen the key to `newSize` terms. Term `i` past the original length
   * is `values[i mod length] + floor(i / length)`, wrapped back into the
   * global range when it overflows. The original terms come first,
   * unchanged. A `newSize` not above the current length returns a copy.
   */
  extend(newSize: number): KeyVector {
    const length = this.terms.length;
    const next = [...this.terms];
    const range = this.globalMax - this.globalMin + 1;

    for (let i = length; i < newSize; i++) {
      let term = this.terms[i % length] + Math.floor(i / length);
      if (term < this.globalMin || term > this.globalMax) {
        term = floorMod(term - this.globalMin, range) + this.globalMin;
      }
      next.push(term);
    }

    return new KeyVector(next, this.globalMin, this.globalMax);
  }

  get values(): number[] {
    return [...this.terms];
  }

  get length(): number {
    return this.terms.length;
  }

  get localMin(): number {
    return Math.min(...this.terms);
  }

  get localMax(): number {
    return Math.max(...this.terms);
  }

  /** Term at `index`; callers stay within `[0, length)`. */
  at(index: number): number {
    return this.terms[index];
  }

  toString(): string {
    return `Key([${this.terms.join(", ")}])`;
  }
}
