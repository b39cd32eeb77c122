/**
 * Accelerando rhythm maker
 *
 * Fills every division with notes whose durations follow an interpolation
 * curve. Interpolations are cyclic and rotated by the divisions already
 * consumed, so alternating accelerando and ritardando specs keep alternating
 * across calls.
 */

import { Duration, lcm } from "../duration.js";
import { addNotice, createDiagnostics, recordDivisions } from "../diagnostics.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { cyclicAt, rotateLeft } from "../pattern/sequence.js";
import type { Interpolation } from "../pattern/interpolation.js";
import {
  resolveDivisions,
  resolveExponent,
  resolveInterpolations,
  resolveMasks
} from "../options/option-resolver.js";
import type {
  AccelerandoRhythmOptions,
  CurveExponent,
  RhythmDiagnostics,
  RhythmResult,
  RhythmTuplet
} from "../types.js";
import { advanceState, countEvents, seedState } from "./generator-state.js";
import { CURVE_QUANTUM, interpolateDivide, tryQuantizeCurve } from "./interpolation-curve.js";
import { applyMasks } from "./masks.js";

function makeAccelerando(
  division: Duration,
  interpolation: Interpolation,
  exponent: CurveExponent,
  diagnostics: RhythmDiagnostics,
  divisionIndex: number
): RhythmTuplet {
  const curve = interpolateDivide(
    division,
    interpolation.startDuration,
    interpolation.stopDuration,
    exponent
  );
  if (curve.status === "too-small") {
    addNotice(
      diagnostics,
      "INTERPOLATION_TOO_SMALL",
      "info",
      `division ${division.toString()} is shorter than ${interpolation.startDuration.toString()} + ${interpolation.stopDuration.toString()}; written as one note`,
      divisionIndex
    );
    return { duration: division, contents: [division], writtenDuration: division };
  }
  const contents = tryQuantizeCurve(curve.durations, division, CURVE_QUANTUM);
  if (!contents) {
    addNotice(
      diagnostics,
      "INTERPOLATION_TOO_SMALL",
      "info",
      `curve over ${division.toString()} does not fit the 1/${CURVE_QUANTUM} grid; written as one note`,
      divisionIndex
    );
    return { duration: division, contents: [division], writtenDuration: division };
  }
  return { duration: division, contents, writtenDuration: interpolation.writtenDuration };
}

export function makeAccelerandoRhythm(options: AccelerandoRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const interpolations = resolveInterpolations(options.interpolations);
  const exponent = resolveExponent(options.exponent);
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const previous = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const rotated = rotateLeft(interpolations, previous.divisionsConsumed);
  const tuplets = divisions.map((division, index) =>
    makeAccelerando(division, cyclicAt(rotated, index), exponent, diagnostics, index)
  );
  recordDivisions(diagnostics, tuplets);

  const denominator = divisions.reduce((acc, division) => lcm(acc, division.denominator), CURVE_QUANTUM);
  const state = advanceState(previous, {
    divisions: divisions.length,
    logicalTies: countEvents(tuplets)
  });

  return {
    tuplets: applyMasks(tuplets, masks),
    state,
    diagnostics,
    meta: {
      kind: "accelerando",
      denominator,
      spelling,
      replayOptions: {
        kind: "accelerando",
        divisions,
        interpolations: interpolations.map((interpolation) => interpolation.toSpec()),
        exponent,
        previousState: previous,
        spelling,
        masks
      }
    }
  };
}
