/**
 * Extra-count (prolation) adjustment.
 *
 * Extra counts stretch or squeeze how many units a division holds. The applied
 * amount is reduced modulo the division size, so any request stays within one
 * extra pass: growth is bounded by `base`, shrinkage by `ceil(base / 2)`. A
 * division can therefore never more than double nor drop to a single event
 * from extra counts alone.
 */

import { InvalidArgumentError } from "../errors.js";
import { cyclicAt } from "../pattern/sequence.js";

export function adjustExtraCount(base: number, extraCount: number): number {
  if (!Number.isSafeInteger(base) || base <= 0) {
    throw new InvalidArgumentError(`extra-count base must be a positive integer, got ${base}`);
  }
  if (!Number.isSafeInteger(extraCount)) {
    throw new InvalidArgumentError(`extra count must be an integer, got ${extraCount}`);
  }
  if (extraCount >= 0) {
    return extraCount % base;
  }
  const modulus = Math.ceil(base / 2);
  const reduced = Math.abs(extraCount) % modulus;
  return reduced === 0 ? 0 : -reduced;
}

/**
 * Prolate each numerator by its (cyclic) extra count.
 * With no extra counts the numerators come back unchanged.
 */
export function prolateNumerators(numerators: readonly number[], extraCounts: readonly number[]): number[] {
  if (!extraCounts.length) {
    return [...numerators];
  }
  return numerators.map((numerator, i) => numerator + adjustExtraCount(numerator, cyclicAt(extraCounts, i)));
}
