/**
 * Talea: a cyclic pattern of signed counts over a power-of-two denominator.
 *
 * ## Layout
 *
 * A talea reads as `preamble ++ counts ++ counts ++ ...`, optionally closed by
 * `endCounts` which the talea maker splices onto the very end of its output.
 * Positive counts are notes and negative counts are rests; the absolute value
 * is the weight in units of `1/denominator`.
 *
 * ## Fill sentinels
 *
 * One count may be `"+"` (or `"-"`), meaning "a note (rest) filling whatever
 * weight the explicit counts leave over". A sentinel talea has no preamble and
 * is expanded per call by the talea maker, so it never carries position across calls.
 *
 * ## Advancing
 *
 * Resumption never mutates a talea. {@link Talea.advance} returns a new talea
 * whose preamble holds the not-yet-read remainder of the stream; `counts`
 * themselves are never rotated.
 */

import { Duration, isPowerOfTwo } from "../duration.js";
import { InvalidArgumentError } from "../errors.js";
import { cumulativeWeights, cyclicAt, splitAtWeight, weight } from "./sequence.js";

export type TaleaSentinel = "+" | "-";
export type TaleaCount = number | TaleaSentinel;

export interface TaleaSpec {
  counts: readonly TaleaCount[];
  denominator?: number;
  preamble?: readonly number[];
  endCounts?: readonly number[];
}

/** One talea entry as a `count / denominator` pair. */
export interface TaleaItem {
  count: number;
  denominator: number;
}

const DEFAULT_DENOMINATOR = 16;

function isSentinel(count: TaleaCount): count is TaleaSentinel {
  return count === "+" || count === "-";
}

function assertNonzeroIntegers(values: readonly number[], label: string): void {
  for (const value of values) {
    if (!Number.isSafeInteger(value) || value === 0) {
      throw new InvalidArgumentError(`${label} must contain nonzero integers, got ${String(value)}`);
    }
  }
}

export class Talea implements Iterable<Duration> {
  readonly counts: readonly TaleaCount[];
  readonly denominator: number;
  readonly preamble: readonly number[];
  readonly endCounts: readonly number[];

  constructor(spec: TaleaSpec) {
    const denominator = spec.denominator ?? DEFAULT_DENOMINATOR;
    if (!isPowerOfTwo(denominator)) {
      throw new InvalidArgumentError(`talea denominator ${denominator} must be an integer power of two`);
    }
    if (!spec.counts.length) {
      throw new InvalidArgumentError("talea counts must not be empty");
    }
    const explicit = spec.counts.filter((count): count is number => !isSentinel(count));
    assertNonzeroIntegers(explicit, "talea counts");
    const sentinels = spec.counts.length - explicit.length;
    if (sentinels > 1) {
      throw new InvalidArgumentError("talea counts may hold at most one fill sentinel");
    }
    const preamble = spec.preamble ?? [];
    const endCounts = spec.endCounts ?? [];
    assertNonzeroIntegers(preamble, "talea preamble");
    assertNonzeroIntegers(endCounts, "talea end counts");
    if (sentinels && preamble.length) {
      throw new InvalidArgumentError("a talea with a fill sentinel cannot have a preamble");
    }

    this.counts = Object.freeze([...spec.counts]);
    this.denominator = denominator;
    this.preamble = Object.freeze([...preamble]);
    this.endCounts = Object.freeze([...endCounts]);
  }

  static from(input: Talea | TaleaSpec): Talea {
    return input instanceof Talea ? input : new Talea(input);
  }

  /** Weight of one pass through `counts`; the preamble does not count. */
  get period(): number {
    return weight(this.explicitCounts());
  }

  get preambleWeight(): number {
    return weight(this.preamble);
  }

  get length(): number {
    return this.counts.length;
  }

  get hasSentinel(): boolean {
    return this.counts.some(isSentinel);
  }

  /**
   * Is true when `position` lands exactly on a count boundary.
   * Positions inside the preamble are checked against the preamble alone.
   */
  contains(position: number): boolean {
    if (!Number.isSafeInteger(position) || position <= 0) {
      throw new InvalidArgumentError(`talea position must be a positive integer, got ${position}`);
    }
    const preambleBoundaries = cumulativeWeights(this.preamble).slice(1);
    if (position <= this.preambleWeight) {
      return preambleBoundaries.includes(position);
    }
    const period = this.period;
    if (period === 0) {
      return false;
    }
    const boundaries = cumulativeWeights(this.explicitCounts()).slice(0, -1);
    const offset = (position - this.preambleWeight) % period;
    return boundaries.includes(offset);
  }

  /** Entry at `index` of the cyclic `preamble ++ counts` stream. */
  itemAt(index: number): TaleaItem {
    const count = cyclicAt(this.stream(), index);
    return { count, denominator: this.denominator };
  }

  /** Entries `start` (inclusive) to `stop` (exclusive) of the cyclic stream. */
  slice(start: number, stop: number): TaleaItem[] {
    const items: TaleaItem[] = [];
    for (let i = start; i < stop; i++) {
      items.push(this.itemAt(i));
    }
    return items;
  }

  /**
   * Advances the talea by `weight`, returning a new talea.
   *
   * Inside the preamble the front is trimmed and the straddling count keeps
   * its remainder. Past the preamble, the new preamble is `counts` repeated
   * far enough to cover the remaining weight and trimmed the same way.
   */
  advance(amount: number): Talea {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new InvalidArgumentError(`advance weight must be a nonnegative integer, got ${amount}`);
    }
    if (amount === 0) {
      return this;
    }
    if (this.hasSentinel) {
      throw new InvalidArgumentError("a talea with a fill sentinel cannot be advanced");
    }
    const preambleWeight = this.preambleWeight;
    let preamble: number[];
    if (amount < preambleWeight) {
      preamble = splitAtWeight(this.preamble, amount).remaining;
    } else if (amount === preambleWeight) {
      preamble = [];
    } else {
      const remainingAmount = amount - preambleWeight;
      const counts = this.explicitCounts();
      const extended: number[] = [...counts];
      while (weight(extended) < remainingAmount) {
        extended.push(...counts);
      }
      preamble = splitAtWeight(extended, remainingAmount).remaining;
    }
    return new Talea({
      counts: this.counts,
      denominator: this.denominator,
      preamble,
      endCounts: this.endCounts
    });
  }

  /** The same talea written over a finer power-of-two denominator. */
  refine(denominator: number): Talea {
    const multiplier = denominator / this.denominator;
    if (!isPowerOfTwo(denominator) || !Number.isSafeInteger(multiplier) || multiplier < 1) {
      throw new InvalidArgumentError(
        `cannot refine a talea over ${this.denominator} to denominator ${denominator}`
      );
    }
    if (multiplier === 1) {
      return this;
    }
    const scale = (values: readonly number[]): number[] => values.map((value) => value * multiplier);
    return new Talea({
      counts: this.counts.map((count) => (isSentinel(count) ? count : count * multiplier)),
      denominator,
      preamble: scale(this.preamble),
      endCounts: scale(this.endCounts)
    });
  }

  *[Symbol.iterator](): Iterator<Duration> {
    for (const count of this.stream()) {
      yield new Duration(count, this.denominator);
    }
  }

  toSpec(): TaleaSpec {
    const spec: TaleaSpec = { counts: [...this.counts], denominator: this.denominator };
    if (this.preamble.length) {
      spec.preamble = [...this.preamble];
    }
    if (this.endCounts.length) {
      spec.endCounts = [...this.endCounts];
    }
    return spec;
  }

  private explicitCounts(): number[] {
    return this.counts.filter((count): count is number => !isSentinel(count));
  }

  private stream(): number[] {
    return [...this.preamble, ...this.explicitCounts()];
  }
}
