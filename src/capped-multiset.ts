import type {OptionalLogger} from '@rocicorp/logger';
import {parseCap, parseValues, type Cap} from './schema.js';
import {genMap} from './util/iterables.js';
import {prefixSums, upperBound} from './util/search.js';

export type CappedMultisetOptions = {
  /** Initial cap. Defaults to `null` (no cap). */
  cap?: Cap | undefined;
  logger?: OptionalLogger | undefined;
};

const numberComparator = (l: number, r: number) => l - r;

/**
 * A multiset of non-negative integers with a movable cap on the value of each
 * element.
 *
 * Reading an element, or summing them, never returns more than the cap for
 * any single element. The cap only changes what is read: the stored values
 * are kept as given, so lowering the cap to `1` and raising it again is not
 * lossy.
 *
 * The values are sorted once at construction and their running totals kept
 * next to them. With those, the capped sum is the running total of every
 * value at or below the cap plus the cap times the number of values above
 * it, so `sum` costs one binary search no matter how often the cap moves.
 *
 * ```ts
 * const set = new CappedMultiset([1, 2, 3, 4, 5]);
 * set.sum(); // 15
 * set.setCap(1);
 * set.sum(); // 5
 * set.setCap(2);
 * set.sum(); // 9
 * ```
 *
 * Instances are not synchronized; callers sharing one must serialize
 * `setCap` against reads.
 */
export class CappedMultiset implements Iterable<number> {
  readonly #values: readonly number[];
  readonly #prefixSums: readonly number[];
  readonly #logger: OptionalLogger;
  #cap: Cap = null;

  /**
   * @throws {InvalidInput} if a value is not a non-negative safe integer or
   * the values add up to more than `Number.MAX_SAFE_INTEGER`.
   */
  constructor(
    values: Iterable<number>,
    {cap = null, logger = console}: CappedMultisetOptions = {},
  ) {
    const sorted = parseValues(values).sort(numberComparator);
    this.#values = sorted;
    this.#prefixSums = prefixSums(sorted);
    this.#logger = logger;
    if (cap !== null) {
      this.setCap(cap);
    }
  }

  get cap(): Cap {
    return this.#cap;
  }

  /** Number of elements, counting duplicates. */
  get size(): number {
    return this.#values.length;
  }

  isEmpty(): boolean {
    return this.#values.length === 0;
  }

  /**
   * Sets the cap, or removes it when `cap` is `null`. The stored values are
   * untouched.
   *
   * @throws {InvalidInput} if `cap` is not a non-negative integer. The
   * previous cap is kept in that case.
   */
  setCap(cap: Cap): void {
    const parsed = parseCap(cap);
    this.#cap = parsed;
    if (parsed !== null && this.#values.length > 0) {
      const max = this.#values[this.#values.length - 1];
      if (parsed >= max) {
        this.#logger.debug?.(
          `cap ${parsed} is not below the largest value ${max}, sum is uncapped`,
        );
      }
    }
  }

  /** Sum of every element, each clamped to the cap. */
  sum(): number {
    const cap = this.#cap;
    if (cap === null) {
      return this.uncappedSum();
    }
    const k = upperBound(this.#values, cap);
    const below = k > 0 ? this.#prefixSums[k - 1] : 0;
    return below + cap * (this.#values.length - k);
  }

  /** Sum of every element ignoring the cap. */
  uncappedSum(): number {
    const n = this.#prefixSums.length;
    return n > 0 ? this.#prefixSums[n - 1] : 0;
  }

  /** Number of elements greater than the cap, i.e. the ones it clamps. */
  countCapped(): number {
    const cap = this.#cap;
    if (cap === null) {
      return 0;
    }
    return this.#values.length - upperBound(this.#values, cap);
  }

  /**
   * The elements in ascending order, each clamped to the cap in effect when
   * it is pulled. The result is lazy and can be iterated more than once.
   */
  values(): Iterable<number> {
    return genMap(this.#values, v => {
      const cap = this.#cap;
      return cap === null ? v : Math.min(v, cap);
    });
  }

  [Symbol.iterator](): Iterator<number> {
    return this.values()[Symbol.iterator]();
  }

  /** Same stored values, regardless of input order, and the same cap. */
  equals(other: CappedMultiset): boolean {
    if (this === other) {
      return true;
    }
    if (this.#cap !== other.#cap) {
      return false;
    }
    const a = this.#values;
    const b = other.#values;
    if (a.length !== b.length) {
      return false;
    }
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) {
        return false;
      }
    }
    return true;
  }

  toString(): string {
    const elements =
      this.#values.length === 0 ? '∅' : `{${this.#values.join(', ')}}`;
    return this.#cap === null ? elements : `${elements} cap ${this.#cap}`;
  }

  [Symbol.for('nodejs.util.inspect.custom')]() {
    return this.toString();
  }
}

export function cappedMultiset(
  values: Iterable<number>,
  options?: CappedMultisetOptions,
): CappedMultiset {
  return new CappedMultiset(values, options);
}
