/**
 * Talea rhythm maker
 *
 * Reads a talea across a run of divisions, cutting counts wherever a division
 * boundary falls inside them.
 *
 * ## Grid
 *
 * All arithmetic happens in integer units of `1/denominator`, where the
 * denominator is the least common multiple of the talea denominator and every
 * division denominator. Since all of them are powers of two this is simply the
 * largest one; the talea is refined onto it once.
 *
 * ## Resumption
 *
 * The position reached in the talea is reported in `state.taleaWeightConsumed`,
 * counted in units of that grid. Passing the state back to a call on the same
 * grid makes it start exactly there, so generating divisions `D1 ++ D2` in one
 * call or in two calls gives the same events. A note cut by the last division
 * of a call continues into the next one; `incompleteLastNote` tells the next
 * call not to count it as a new logical tie.
 */

import { Duration, lcm } from "../duration.js";
import { DurationMismatchError, PatternExhaustedError } from "../errors.js";
import { addNotice, createDiagnostics, recordDivisions } from "../diagnostics.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { cyclicAt, repeatToWeight, rotateLeft, splitByWeights, truncateToWeight, weight } from "../pattern/sequence.js";
import type { SplitPiece } from "../pattern/sequence.js";
import type { TaleaCount } from "../pattern/talea.js";
import {
  resolveAdvance,
  resolveDivisions,
  resolveIntegers,
  resolveMasks,
  resolveTalea
} from "../options/option-resolver.js";
import type { RhythmDiagnostics, RhythmResult, RhythmTuplet, TaleaRhythmOptions } from "../types.js";
import { prolateNumerators } from "./extra-counts.js";
import { advanceState, seedState } from "./generator-state.js";
import { applyMasks } from "./masks.js";

/** Replace the fill sentinel by whatever weight the explicit counts leave over. */
function expandSentinel(counts: readonly TaleaCount[], total: number): number[] {
  const explicit = counts.filter((count): count is number => typeof count === "number");
  if (explicit.length === counts.length) {
    return explicit;
  }
  const explicitWeight = weight(explicit);
  const fill = total - explicitWeight;
  if (fill < 0) {
    throw new DurationMismatchError(
      `talea counts weigh ${explicitWeight} but the divisions only hold ${total}`
    );
  }
  return counts
    .map((count) => {
      if (typeof count === "number") {
        return count;
      }
      return count === "+" ? fill : -fill;
    })
    .filter((count) => count !== 0);
}

interface TaleaSource {
  values: number[];
  cycled: boolean;
}

/** Exactly `total` units read from `preamble ++ counts ++ counts ...`. */
function readTalea(
  preamble: readonly number[],
  counts: readonly number[],
  total: number,
  readOnce: boolean
): TaleaSource {
  const preambleWeight = weight(preamble);
  const period = weight(counts);
  if (readOnce && preambleWeight + period < total) {
    throw new PatternExhaustedError(
      `talea holds ${preambleWeight + period} units but ${total} were requested`
    );
  }
  if (total <= preambleWeight) {
    return { values: truncateToWeight(preamble, total), cycled: false };
  }
  return {
    values: [...preamble, ...repeatToWeight(counts, total - preambleWeight)],
    cycled: total > preambleWeight + period
  };
}

/** A note piece continuing a count cut at a division boundary is not a new tie. */
function countLogicalTies(parts: readonly SplitPiece[][]): number {
  return parts.reduce(
    (sum, part) => sum + part.filter((piece) => !(piece.continues && piece.value > 0)).length,
    0
  );
}

function noteExtraCountReductions(
  diagnostics: RhythmDiagnostics,
  numerators: readonly number[],
  prolated: readonly number[],
  extraCounts: readonly number[]
): void {
  if (!extraCounts.length) {
    return;
  }
  numerators.forEach((numerator, index) => {
    const requested = cyclicAt(extraCounts, index);
    const applied = prolated[index] - numerator;
    if (applied !== requested) {
      addNotice(
        diagnostics,
        "EXTRA_COUNT_REDUCED",
        "info",
        `extra count ${requested} applied as ${applied} to a division of ${numerator} units`,
        index
      );
    }
  });
}

/**
 * Generates one tuplet per division from a cyclic talea.
 *
 * Steps:
 * 1. Apply the static `advance`, refine the talea onto the grid and resume it at the weight already consumed.
 * 2. Rotate extra counts by the divisions already consumed and prolate each division.
 * 3. Read exactly the prolated total from the talea, expanding a fill sentinel.
 * 4. Splice the end counts over the tail and split at the division boundaries.
 *
 * @throws PatternExhaustedError when `readTaleaOnceOnly` is set and the talea runs out
 * @throws DurationMismatchError when sentinel or end counts cannot fit the divisions
 */
export function makeTaleaRhythm(options: TaleaRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const baseTalea = resolveTalea(options.talea);
  const extraCounts = resolveIntegers(options.extraCounts, "extra counts");
  const staticAdvance = resolveAdvance(options.advance);
  const readOnce = options.readTaleaOnceOnly ?? false;
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const previous = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const denominator = divisions.reduce((acc, division) => lcm(acc, division.denominator), baseTalea.denominator);
  let talea = baseTalea.advance(staticAdvance).refine(denominator);
  if (!talea.hasSentinel) {
    talea = talea.advance(previous.taleaWeightConsumed);
  }
  const rotatedExtraCounts = rotateLeft(extraCounts, previous.divisionsConsumed);

  const numerators = divisions.map((division) => division.numeratorOver(denominator));
  const prolated = prolateNumerators(numerators, rotatedExtraCounts);
  noteExtraCountReductions(diagnostics, numerators, prolated, rotatedExtraCounts);
  const total = prolated.reduce((sum, value) => sum + value, 0);

  const counts = expandSentinel(talea.counts, total);
  const source = readTalea(talea.preamble, counts, total, readOnce);
  if (source.cycled) {
    addNotice(diagnostics, "TALEA_CYCLED", "info", `talea read past its first period to fill ${total} units`);
  }

  const endCounts = talea.endCounts;
  const endWeight = weight(endCounts);
  if (endWeight > total) {
    throw new DurationMismatchError(`end counts weigh ${endWeight} but the divisions only hold ${total}`);
  }
  const values = endCounts.length
    ? [...truncateToWeight(source.values, total - endWeight), ...endCounts]
    : source.values;
  const parts = splitByWeights(values, prolated);

  const tuplets: RhythmTuplet[] = parts.map((part, index) => ({
    duration: divisions[index],
    contents: part.map((piece) => new Duration(piece.value, denominator))
  }));
  recordDivisions(
    diagnostics,
    tuplets,
    prolated.map((numerator) => new Duration(numerator, denominator))
  );

  const consumed = talea.hasSentinel ? 0 : total - endWeight;
  const lastValue = values.length ? values[values.length - 1] : 0;
  const incompleteLastNote =
    !endCounts.length &&
    lastValue > 0 &&
    consumed > 0 &&
    !talea.contains(consumed);
  if (incompleteLastNote) {
    addNotice(
      diagnostics,
      "INCOMPLETE_LAST_NOTE",
      "info",
      `last note stops ${consumed} units into the talea and continues in the next call`,
      tuplets.length - 1
    );
  }

  const state = advanceState(previous, {
    divisions: divisions.length,
    logicalTies: countLogicalTies(parts),
    taleaWeight: consumed,
    incompleteLastNote
  });

  return {
    tuplets: applyMasks(tuplets, masks),
    state,
    diagnostics,
    meta: {
      kind: "talea",
      denominator,
      spelling,
      replayOptions: {
        kind: "talea",
        divisions,
        talea: baseTalea.toSpec(),
        extraCounts,
        readTaleaOnceOnly: readOnce,
        advance: staticAdvance,
        previousState: previous,
        spelling,
        masks
      }
    }
  };
}
