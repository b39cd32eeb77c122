/**
 * Interpolated duration curves for accelerandi and ritardandi.
 *
 * The curve is computed in floating point: unit durations are interpolated
 * from `start` to `stop` by the position reached so far, until they cover the
 * total, and then rescaled to sum to it. {@link quantizeCurve} brings the
 * floats back to exact durations and absorbs the rounding error in the last
 * element, so the quantized curve always sums to the total exactly.
 */

import { Duration } from "../duration.js";
import { DurationMismatchError, InvalidArgumentError } from "../errors.js";
import type { CurveExponent } from "../types.js";

export type CurveResult =
  | { status: "ok"; durations: number[] }
  | { status: "too-small" };

/** Grid the curve is rounded to, in divisions of a whole note. */
export const CURVE_QUANTUM = 1024;

function interpolateCosine(y1: number, y2: number, mu: number): number {
  const mu2 = (1 - Math.cos(mu * Math.PI)) / 2;
  return y1 * (1 - mu2) + y2 * mu2;
}

/** Exponents above 1 linger near `y1`, exponents below 1 leave it quickly. */
function interpolateExponential(y1: number, y2: number, mu: number, exponent: number): number {
  return y1 * (1 - mu ** exponent) + y2 * mu ** exponent;
}

function positiveValue(value: number | Duration, label: string): number {
  const numeric = typeof value === "number" ? value : value.toNumber();
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new InvalidArgumentError(`${label} must be positive, got ${String(numeric)}`);
  }
  return numeric;
}

/**
 * Divide `total` into durations interpolated from `start` to `stop`.
 * Returns `too-small` when the total cannot hold one start and one stop unit.
 */
export function interpolateDivide(
  total: number | Duration,
  start: number | Duration,
  stop: number | Duration,
  exponent: CurveExponent = "cosine"
): CurveResult {
  const totalValue = positiveValue(total, "total duration");
  const startValue = positiveValue(start, "start duration");
  const stopValue = positiveValue(stop, "stop duration");
  if (exponent !== "cosine" && (!Number.isFinite(exponent) || exponent <= 0)) {
    throw new InvalidArgumentError(`curve exponent must be positive, got ${exponent}`);
  }
  if (totalValue < startValue + stopValue) {
    return { status: "too-small" };
  }

  const durations: number[] = [];
  let partial = 0;
  while (partial < totalValue) {
    const mu = partial / totalValue;
    const duration =
      exponent === "cosine"
        ? interpolateCosine(startValue, stopValue, mu)
        : interpolateExponential(startValue, stopValue, mu, exponent);
    durations.push(duration);
    partial += duration;
  }
  const sum = durations.reduce((acc, value) => acc + value, 0);
  return { status: "ok", durations: durations.map((value) => (value * totalValue) / sum) };
}

function roundCurve(curve: readonly number[], total: Duration, denominator: number): Duration[] {
  if (!Number.isSafeInteger(denominator) || denominator <= 0) {
    throw new InvalidArgumentError(`quantization denominator must be a positive integer, got ${denominator}`);
  }
  if (!curve.length) {
    throw new InvalidArgumentError("cannot quantize an empty curve");
  }
  const head = curve.slice(0, -1).map((value) => Duration.fromFloat(value, denominator));
  return [...head, total.subtract(Duration.sum(head))];
}

/**
 * Round a curve to multiples of `1/denominator`; the last element takes up the rounding error.
 *
 * Units close to the grid size can round up often enough to leave nothing
 * for the last element, even when the total holds the curve.
 * @throws DurationMismatchError when rounding leaves an element without positive duration
 */
export function quantizeCurve(
  curve: readonly number[],
  total: Duration,
  denominator: number = CURVE_QUANTUM
): Duration[] {
  const quantized = roundCurve(curve, total, denominator);
  quantized.forEach((duration, index) => {
    if (duration.sign() <= 0) {
      throw new DurationMismatchError(
        `quantized curve element ${index} is ${duration.toString()}; ${total.toString()} is too short for the curve`
      );
    }
  });
  return quantized;
}

/** {@link quantizeCurve}, or `undefined` where rounding leaves an element without positive duration. */
export function tryQuantizeCurve(
  curve: readonly number[],
  total: Duration,
  denominator: number = CURVE_QUANTUM
): Duration[] | undefined {
  const quantized = roundCurve(curve, total, denominator);
  return quantized.every((duration) => duration.sign() > 0) ? quantized : undefined;
}

/**
 * Chains {@link interpolateDivide} over consecutive segments: segment `i`
 * divides `totals[i]` from `references[i]` to `references[i + 1]`.
 * Returns `too-small` when any segment is.
 */
export function interpolateDivideMultiple(
  totals: readonly (number | Duration)[],
  references: readonly (number | Duration)[],
  exponent: CurveExponent = "cosine"
): CurveResult {
  if (references.length !== totals.length + 1) {
    throw new InvalidArgumentError(
      `${totals.length} totals need ${totals.length + 1} reference durations, got ${references.length}`
    );
  }
  const durations: number[] = [];
  for (let i = 0; i < totals.length; i++) {
    const segment = interpolateDivide(totals[i], references[i], references[i + 1], exponent);
    if (segment.status === "too-small") {
      return segment;
    }
    durations.push(...segment.durations);
  }
  return { status: "ok", durations };
}
