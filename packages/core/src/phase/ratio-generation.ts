/**
 * Ratio rhythm maker
 *
 * Divides each division exactly in proportion to a ratio such as `[1, -2, 1]`;
 * negative terms become rests. Ratios are cyclic and rotated by the divisions
 * already consumed.
 */

import { Duration, lcm } from "../duration.js";
import { createDiagnostics, recordDivisions } from "../diagnostics.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { cyclicAt, rotateLeft, weight } from "../pattern/sequence.js";
import { resolveDivisions, resolveMasks, resolveRatios } from "../options/option-resolver.js";
import type { RatioRhythmOptions, RhythmResult, RhythmTuplet } from "../types.js";
import { advanceState, countEvents, seedState } from "./generator-state.js";
import { applyMasks } from "./masks.js";

export function divideByRatio(division: Duration, ratio: readonly number[]): Duration[] {
  const ratioWeight = weight(ratio);
  return ratio.map((term) => division.multiply(new Duration(term, ratioWeight)));
}

export function makeRatioRhythm(options: RatioRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const ratios = resolveRatios(options.ratios);
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const previous = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const rotated = rotateLeft(ratios, previous.divisionsConsumed);
  const tuplets: RhythmTuplet[] = divisions.map((division, index) => ({
    duration: division,
    contents: divideByRatio(division, cyclicAt(rotated, index))
  }));
  recordDivisions(diagnostics, tuplets);

  const denominator = tuplets
    .flatMap((tuplet) => tuplet.contents)
    .reduce((acc, content) => lcm(acc, content.denominator), 1);
  const state = advanceState(previous, {
    divisions: divisions.length,
    logicalTies: countEvents(tuplets)
  });

  return {
    tuplets: applyMasks(tuplets, masks),
    state,
    diagnostics,
    meta: {
      kind: "ratio",
      denominator,
      spelling,
      replayOptions: {
        kind: "ratio",
        divisions,
        ratios,
        previousState: previous,
        spelling,
        masks
      }
    }
  };
}
