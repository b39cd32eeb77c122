/**
 * Integer-sequence helpers shared by the pattern and maker modules.
 *
 * Values are signed counts: the sign marks note (+) or rest (-) and the
 * absolute value is the weight. Splitting an element keeps its sign on both sides.
 */

import { DurationMismatchError, InvalidArgumentError } from "../errors.js";

/**
 * One piece of a split count.
 * `continues` is true when the piece is the tail of a count cut by an earlier boundary.
 */
export interface SplitPiece {
  value: number;
  continues: boolean;
}

export function weight(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + Math.abs(value), 0);
}

/**
 * Cumulative absolute sums, starting at 0 and ending at the total weight.
 */
export function cumulativeWeights(values: readonly number[]): number[] {
  const sums = [0];
  let running = 0;
  for (const value of values) {
    running += Math.abs(value);
    sums.push(running);
  }
  return sums;
}

export function cyclicAt<T>(values: readonly T[], index: number): T {
  if (!values.length) {
    throw new InvalidArgumentError("cannot index an empty cyclic sequence");
  }
  const length = values.length;
  return values[((index % length) + length) % length];
}

/**
 * Rotate so that the element at `offset` comes first.
 */
export function rotateLeft<T>(values: readonly T[], offset: number): T[] {
  if (!values.length) {
    return [];
  }
  return values.map((_, i) => cyclicAt(values, i + offset));
}

/**
 * Split off exactly `amount` of weight from the front.
 * The element straddling the boundary is cut and its remainder kept at the head of `remaining`.
 */
export function splitAtWeight(
  values: readonly number[],
  amount: number
): { consumed: number[]; remaining: number[] } {
  const consumed: number[] = [];
  const remaining: number[] = [];
  let needed = amount;
  for (const value of values) {
    const size = Math.abs(value);
    const sign = Math.sign(value);
    if (needed <= 0) {
      remaining.push(value);
    } else if (size <= needed) {
      consumed.push(value);
      needed -= size;
    } else {
      consumed.push(sign * needed);
      remaining.push(sign * (size - needed));
      needed = 0;
    }
  }
  return { consumed, remaining };
}

/** Keep exactly `amount` of weight from the front; the rest is dropped. */
export function truncateToWeight(values: readonly number[], amount: number): number[] {
  return splitAtWeight(values, amount).consumed;
}

/**
 * Repeat `values` until the total weight reaches `amount` exactly, cutting the last element.
 */
export function repeatToWeight(values: readonly number[], amount: number): number[] {
  const period = weight(values);
  if (amount > 0 && period === 0) {
    throw new InvalidArgumentError("cannot repeat a weightless sequence");
  }
  const result: number[] = [];
  let total = 0;
  while (total < amount) {
    for (const value of values) {
      if (total >= amount) {
        break;
      }
      const size = Math.min(Math.abs(value), amount - total);
      result.push(Math.sign(value) * size);
      total += size;
    }
  }
  return result;
}

/**
 * Split `values` into consecutive parts whose weights are `weights`.
 * Elements are cut across part boundaries; the total weights must agree.
 */
export function splitByWeights(values: readonly number[], weights: readonly number[]): SplitPiece[][] {
  const source = values.filter((value) => value !== 0);
  const sourceWeight = weight(source);
  const targetWeight = weights.reduce((sum, value) => sum + value, 0);
  if (sourceWeight !== targetWeight) {
    throw new DurationMismatchError(
      `cannot split weight ${sourceWeight} into parts of total weight ${targetWeight}`
    );
  }

  const parts: SplitPiece[][] = [];
  let index = 0;
  let remainder = source.length ? Math.abs(source[0]) : 0;
  let continues = false;
  for (const target of weights) {
    if (target < 0 || !Number.isSafeInteger(target)) {
      throw new InvalidArgumentError(`part weight must be a nonnegative integer, got ${target}`);
    }
    const part: SplitPiece[] = [];
    let needed = target;
    while (needed > 0) {
      const sign = Math.sign(source[index]);
      const take = Math.min(needed, remainder);
      part.push({ value: sign * take, continues });
      needed -= take;
      remainder -= take;
      if (remainder === 0) {
        index++;
        remainder = index < source.length ? Math.abs(source[index]) : 0;
        continues = false;
      } else {
        continues = true;
      }
    }
    parts.push(part);
  }
  return parts;
}

/** Integer division rounded half to even; `divisor` must be positive. */
function divideRoundHalfEven(dividend: number, divisor: number): number {
  const quotient = Math.floor(dividend / divisor);
  const remainder = dividend - quotient * divisor;
  const twice = remainder * 2;
  if (twice > divisor) {
    return quotient + 1;
  }
  if (twice < divisor) {
    return quotient;
  }
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/**
 * Divide a positive integer into parts proportional to `ratio`.
 * Cumulative boundaries are rounded, so parts always sum to `value`; ratio signs carry over.
 */
export function divideIntegerByRatio(value: number, ratio: readonly number[]): number[] {
  const ratioWeight = weight(ratio);
  if (ratioWeight === 0) {
    throw new InvalidArgumentError("ratio must have positive weight");
  }
  const parts: number[] = [];
  let runningRatio = 0;
  let previousBoundary = 0;
  for (const term of ratio) {
    runningRatio += Math.abs(term);
    const boundary = divideRoundHalfEven(value * runningRatio, ratioWeight);
    parts.push(Math.sign(term) * (boundary - previousBoundary));
    previousBoundary = boundary;
  }
  return parts;
}
