/**
 * Incised rhythm maker
 *
 * Cuts fixed prefix and suffix patterns into the start and end of divisions
 * and fills the body in between. Prefix and suffix items are read from their
 * own cyclic taleae with separate cursors; `prefixCounts[i]` and
 * `suffixCounts[i]` say how many items division `i` takes.
 *
 * When a division is too short for its incisions the prefix wins: it is
 * truncated to the division, and the suffix only gets whatever room the full
 * prefix leaves. Truncation never carries over into the next division.
 *
 * The maker keeps no position across calls; the state it returns is the one
 * it was given.
 */

import { Duration, lcm } from "../duration.js";
import { addNotice, createDiagnostics, recordDivisions } from "../diagnostics.js";
import type { Incise } from "../pattern/incise.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { cyclicAt, divideIntegerByRatio, truncateToWeight, weight } from "../pattern/sequence.js";
import {
  resolveDivisions,
  resolveInciseOption,
  resolveIntegers,
  resolveMasks
} from "../options/option-resolver.js";
import type { IncisedRhythmOptions, RhythmDiagnostics, RhythmResult, RhythmTuplet } from "../types.js";
import { prolateNumerators } from "./extra-counts.js";
import { seedState } from "./generator-state.js";
import { applyMasks } from "./masks.js";

function takeCyclic(values: readonly number[], start: number, length: number): number[] {
  return Array.from({ length }, (_, offset) => cyclicAt(values, start + offset));
}

interface IncisionPlan {
  numerator: number;
  prefix: number[];
  suffix: number[];
  /** Split the body by the incise body ratio. */
  splitBody: boolean;
}

function buildBody(middle: number, incise: Incise, splitBody: boolean): number[] {
  if (middle <= 0) {
    return [];
  }
  if (incise.fillWithRests) {
    return [-middle];
  }
  if (!splitBody) {
    return [middle];
  }
  return divideIntegerByRatio(middle, incise.bodyRatio).filter((value) => value !== 0);
}

/** Signed counts of one division: prefix, body, suffix. */
function inciseDivision(
  plan: IncisionPlan,
  incise: Incise,
  diagnostics: RhythmDiagnostics,
  divisionIndex: number
): number[] {
  const { numerator, prefix, suffix } = plan;
  const prefixWeight = weight(prefix);
  const suffixWeight = weight(suffix);

  let head = prefix;
  if (numerator < prefixWeight) {
    head = truncateToWeight(prefix, numerator);
    addNotice(
      diagnostics,
      "PREFIX_TRUNCATED",
      "warning",
      `prefix of ${prefixWeight} units cut to fit a division of ${numerator}`,
      divisionIndex
    );
  }

  const body = buildBody(numerator - prefixWeight - suffixWeight, incise, plan.splitBody);

  const suffixSpace = numerator - prefixWeight;
  let tail = suffix;
  if (suffixWeight > 0 && suffixSpace < suffixWeight) {
    tail = suffixSpace > 0 ? truncateToWeight(suffix, suffixSpace) : [];
    addNotice(
      diagnostics,
      "SUFFIX_TRUNCATED",
      "warning",
      `suffix of ${suffixWeight} units cut to the ${Math.max(suffixSpace, 0)} left after the prefix`,
      divisionIndex
    );
  }

  return [...head, ...body, ...tail];
}

function planDivisions(numerators: readonly number[], incise: Incise, multiplier: number): IncisionPlan[] {
  const prefixTalea = incise.prefixTalea.map((value) => value * multiplier);
  const suffixTalea = incise.suffixTalea.map((value) => value * multiplier);

  if (incise.outerDivisionsOnly) {
    const last = numerators.length - 1;
    return numerators.map((numerator, index) => ({
      numerator,
      prefix: index === 0 ? takeCyclic(prefixTalea, 0, incise.prefixCounts[0]) : [],
      suffix: index === last ? takeCyclic(suffixTalea, 0, incise.suffixCounts[0]) : [],
      splitBody: false
    }));
  }

  let prefixCursor = 0;
  let suffixCursor = 0;
  return numerators.map((numerator, index) => {
    const prefixLength = cyclicAt(incise.prefixCounts, index);
    const suffixLength = cyclicAt(incise.suffixCounts, index);
    const plan: IncisionPlan = {
      numerator,
      prefix: takeCyclic(prefixTalea, prefixCursor, prefixLength),
      suffix: takeCyclic(suffixTalea, suffixCursor, suffixLength),
      splitBody: true
    };
    prefixCursor += prefixLength;
    suffixCursor += suffixLength;
    return plan;
  });
}

/**
 * Generates one tuplet per division with incised starts and ends.
 * With `outerDivisionsOnly` only the first division gets a prefix and only
 * the last gets a suffix; a single division gets both.
 */
export function makeIncisedRhythm(options: IncisedRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const incision = resolveInciseOption(options.incise);
  const extraCounts = resolveIntegers(options.extraCounts, "extra counts");
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const state = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const denominator = divisions.reduce(
    (acc, division) => lcm(acc, division.denominator),
    incision.taleaDenominator
  );
  const multiplier = denominator / incision.taleaDenominator;
  const numerators = prolateNumerators(
    divisions.map((division) => division.numeratorOver(denominator)),
    extraCounts
  );

  const tuplets: RhythmTuplet[] = planDivisions(numerators, incision, multiplier).map((plan, index) => ({
    duration: divisions[index],
    contents: inciseDivision(plan, incision, diagnostics, index).map((value) => new Duration(value, denominator))
  }));
  recordDivisions(
    diagnostics,
    tuplets,
    numerators.map((numerator) => new Duration(numerator, denominator))
  );

  return {
    tuplets: applyMasks(tuplets, masks),
    state,
    diagnostics,
    meta: {
      kind: "incised",
      denominator,
      spelling,
      replayOptions: {
        kind: "incised",
        divisions,
        incise: incision,
        extraCounts,
        previousState: state,
        spelling,
        masks
      }
    }
  };
}
