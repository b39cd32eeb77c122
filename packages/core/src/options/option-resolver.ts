/**
 * Option resolution for the rhythm makers.
 *
 * Every maker takes a loose, caller-friendly options object: durations as
 * pairs or integers, patterns as value objects, plain specs or preset ids.
 * This module turns those into validated values once, at the entry point, so
 * the generation code never sees an unchecked input. Anything malformed is
 * rejected here with an {@link InvalidArgumentError} and the call produces
 * no output.
 */

import { Duration, isPowerOfTwo, type DurationInput } from "../duration.js";
import { InvalidArgumentError } from "../errors.js";
import { resolveIncise, type Incise, type InciseSpec } from "../pattern/incise.js";
import { validateIndexPattern } from "../pattern/index-pattern.js";
import { Interpolation, type InterpolationSpec } from "../pattern/interpolation.js";
import { Talea, type TaleaSpec } from "../pattern/talea.js";
import type { CurveExponent, RhythmMask } from "../types.js";
import { incisePreset, interpolationPreset, taleaPreset } from "./preset-loader.js";

/**
 * Divisions must be positive and written over a power-of-two denominator,
 * since every maker rescales them to a shared binary grid.
 */
export function resolveDivisions(inputs: readonly DurationInput[]): Duration[] {
  return inputs.map((input, index) => {
    const division = Duration.from(input);
    if (division.sign() <= 0) {
      throw new InvalidArgumentError(`division ${index} must be positive, got ${division.toString()}`);
    }
    if (!isPowerOfTwo(division.denominator)) {
      throw new InvalidArgumentError(
        `division ${index} (${division.toString()}) must have a power-of-two denominator`
      );
    }
    return division;
  });
}

export function resolveTalea(input: Talea | TaleaSpec | string): Talea {
  return typeof input === "string" ? new Talea(taleaPreset(input)) : Talea.from(input);
}

export function resolveInciseOption(input: InciseSpec | string): Incise {
  return resolveIncise(typeof input === "string" ? incisePreset(input) : input);
}

/** Defaults to a single `1/8 → 1/16` accelerando. */
export function resolveInterpolations(
  inputs: readonly (Interpolation | InterpolationSpec | string)[] | undefined
): Interpolation[] {
  if (!inputs || !inputs.length) {
    return [new Interpolation()];
  }
  return inputs.map((input) =>
    typeof input === "string" ? new Interpolation(interpolationPreset(input)) : Interpolation.from(input)
  );
}

export function resolveExponent(exponent: CurveExponent | undefined): CurveExponent {
  if (exponent === undefined || exponent === "cosine") {
    return "cosine";
  }
  if (!Number.isFinite(exponent) || exponent <= 0) {
    throw new InvalidArgumentError(`curve exponent must be "cosine" or a positive number, got ${exponent}`);
  }
  return exponent;
}

export function resolveIntegers(values: readonly number[] | undefined, label: string): number[] {
  const resolved = [...(values ?? [])];
  for (const value of resolved) {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidArgumentError(`${label} must contain integers, got ${value}`);
    }
  }
  return resolved;
}

export function resolveAdvance(advance: number | undefined): number {
  const value = advance ?? 0;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`advance must be a nonnegative integer, got ${value}`);
  }
  return value;
}

/** Defaults to eighth-note pulses. */
export function resolveDenominators(values: readonly number[] | undefined): number[] {
  const denominators = values?.length ? [...values] : [8];
  for (const denominator of denominators) {
    if (!isPowerOfTwo(denominator)) {
      throw new InvalidArgumentError(`pulse denominator ${denominator} must be a power of two`);
    }
  }
  return denominators;
}

export function resolveRatios(ratios: readonly (readonly number[])[]): number[][] {
  if (!ratios.length) {
    throw new InvalidArgumentError("ratios must not be empty");
  }
  return ratios.map((ratio, index) => {
    if (!ratio.length || ratio.some((term) => !Number.isSafeInteger(term) || term === 0)) {
      throw new InvalidArgumentError(`ratio ${index} must be a non-empty list of nonzero integers`);
    }
    return [...ratio];
  });
}

export function resolveMasks(masks: readonly RhythmMask[] | undefined): RhythmMask[] {
  const resolved = [...(masks ?? [])];
  for (const mask of resolved) {
    if (mask.kind !== "silence" && mask.kind !== "sustain") {
      throw new InvalidArgumentError(`unknown mask kind: ${String(mask.kind)}`);
    }
    validateIndexPattern(mask.pattern);
  }
  return resolved;
}
