/**
 * Note rhythm maker
 *
 * Writes one note per division. Masks are the only way to vary it, which makes
 * it the plain baseline the other makers are layered against.
 */

import { lcm } from "../duration.js";
import { createDiagnostics, recordDivisions } from "../diagnostics.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { resolveDivisions, resolveMasks } from "../options/option-resolver.js";
import type { NoteRhythmOptions, RhythmResult, RhythmTuplet } from "../types.js";
import { advanceState, countEvents, seedState } from "./generator-state.js";
import { applyMasks } from "./masks.js";

export function makeNoteRhythm(options: NoteRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const previous = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const tuplets: RhythmTuplet[] = divisions.map((division) => ({ duration: division, contents: [division] }));
  recordDivisions(diagnostics, tuplets);

  return {
    tuplets: applyMasks(tuplets, masks),
    state: advanceState(previous, {
      divisions: divisions.length,
      logicalTies: countEvents(tuplets)
    }),
    diagnostics,
    meta: {
      kind: "note",
      denominator: divisions.reduce((acc, division) => lcm(acc, division.denominator), 1),
      spelling,
      replayOptions: {
        kind: "note",
        divisions,
        previousState: previous,
        spelling,
        masks
      }
    }
  };
}
