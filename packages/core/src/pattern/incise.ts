/**
 * Incision parameters: fixed prefix and suffix patterns cut into each division.
 */

import { isPowerOfTwo } from "../duration.js";
import { InvalidArgumentError } from "../errors.js";

export interface InciseSpec {
  /** Signed counts read cyclically at the start of divisions. */
  prefixTalea?: readonly number[];
  /** How many prefix counts each division takes (cyclic). */
  prefixCounts?: readonly number[];
  suffixTalea?: readonly number[];
  suffixCounts?: readonly number[];
  /** Denominator of the prefix and suffix counts (power of two). */
  taleaDenominator?: number;
  /** Proportions of the body between prefix and suffix. Defaults to one note. */
  bodyRatio?: readonly number[];
  /** Fill the body with one rest instead of notes. */
  fillWithRests?: boolean;
  /** Only incise the start of the first division and the end of the last. */
  outerDivisionsOnly?: boolean;
}

export interface Incise {
  prefixTalea: number[];
  prefixCounts: number[];
  suffixTalea: number[];
  suffixCounts: number[];
  taleaDenominator: number;
  bodyRatio: number[];
  fillWithRests: boolean;
  outerDivisionsOnly: boolean;
}

function checkTalea(values: readonly number[], label: string): void {
  if (values.some((value) => !Number.isSafeInteger(value) || value === 0)) {
    throw new InvalidArgumentError(`${label} must contain nonzero integers`);
  }
}

function checkLengths(values: readonly number[], label: string): void {
  if (values.some((value) => !Number.isSafeInteger(value) || value < 0)) {
    throw new InvalidArgumentError(`${label} must contain nonnegative integers`);
  }
}

export function resolveIncise(spec: InciseSpec): Incise {
  const prefixTalea = [...(spec.prefixTalea ?? [])];
  const suffixTalea = [...(spec.suffixTalea ?? [])];
  const prefixCounts = spec.prefixCounts?.length ? [...spec.prefixCounts] : [0];
  const suffixCounts = spec.suffixCounts?.length ? [...spec.suffixCounts] : [0];
  const bodyRatio = spec.bodyRatio?.length ? [...spec.bodyRatio] : [1];
  const taleaDenominator = spec.taleaDenominator ?? 16;

  checkTalea(prefixTalea, "prefix talea");
  checkTalea(suffixTalea, "suffix talea");
  checkLengths(prefixCounts, "prefix counts");
  checkLengths(suffixCounts, "suffix counts");
  if (!isPowerOfTwo(taleaDenominator)) {
    throw new InvalidArgumentError(`incise talea denominator ${taleaDenominator} must be a power of two`);
  }
  if (!prefixTalea.length && prefixCounts.some((count) => count > 0)) {
    throw new InvalidArgumentError("prefix counts ask for items from an empty prefix talea");
  }
  if (!suffixTalea.length && suffixCounts.some((count) => count > 0)) {
    throw new InvalidArgumentError("suffix counts ask for items from an empty suffix talea");
  }
  if (bodyRatio.some((term) => !Number.isSafeInteger(term)) || bodyRatio.every((term) => term === 0)) {
    throw new InvalidArgumentError("body ratio must contain integers with positive weight");
  }

  return {
    prefixTalea,
    prefixCounts,
    suffixTalea,
    suffixCounts,
    taleaDenominator,
    bodyRatio,
    fillWithRests: spec.fillWithRests ?? false,
    outerDivisionsOnly: spec.outerDivisionsOnly ?? false
  };
}
