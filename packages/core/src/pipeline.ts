import type { RhythmMakerOptions, RhythmResult } from "./types.js";
import { makeTaleaRhythm } from "./phase/talea-generation.js";
import { makeIncisedRhythm } from "./phase/incised-generation.js";
import { makeAccelerandoRhythm } from "./phase/accelerando-generation.js";
import { makeEvenDivisionRhythm } from "./phase/even-division.js";
import { makeRatioRhythm } from "./phase/ratio-generation.js";
import { makeNoteRhythm } from "./phase/note-generation.js";

/**
 * Runs the rhythm maker named by `options.kind`.
 *
 * Every maker follows the same three steps: resolve the loose options into
 * validated values, generate one tuplet per division in integer units over a
 * common denominator, then apply masks and account the new state. The result
 * echoes the resolved options as `meta.replayOptions`, so passing them back
 * here regenerates the same tuplets.
 *
 * To continue a stream, pass `result.state` as `previousState` of the next
 * call with the same pattern options.
 *
 * @param options Maker options discriminated by `kind`
 * @returns Tuplets, next state, diagnostics and metadata
 */
export function runRhythmMaker(options: RhythmMakerOptions): RhythmResult {
  switch (options.kind) {
    case "talea":
      return makeTaleaRhythm(options);
    case "incised":
      return makeIncisedRhythm(options);
    case "accelerando":
      return makeAccelerandoRhythm(options);
    case "evenDivision":
      return makeEvenDivisionRhythm(options);
    case "ratio":
      return makeRatioRhythm(options);
    case "note":
      return makeNoteRhythm(options);
  }
}

/**
 * Runs several passes over one stream, threading the state from each into the next.
 *
 * Each pass keeps its own `previousState` out of the way: the state always
 * comes from the pass before, starting from `initial` (zeros by default).
 */
export function runRhythmSequence(
  passes: readonly RhythmMakerOptions[],
  initial?: RhythmMakerOptions["previousState"]
): RhythmResult[] {
  const results: RhythmResult[] = [];
  let state = initial;
  for (const pass of passes) {
    const result = runRhythmMaker({ ...pass, previousState: state });
    results.push(result);
    state = result.state;
  }
  return results;
}
