/**
 * Even-division rhythm maker
 *
 * Fills each division with equal pulses of `1/d`, where `d` cycles through the
 * requested denominators. Extra counts add or remove pulses; the tuplet ratio
 * between the division and its pulses is left implied.
 */

import { Duration, lcm } from "../duration.js";
import { addNotice, createDiagnostics, recordDivisions } from "../diagnostics.js";
import { resolveSpelling } from "../pattern/spelling.js";
import { cyclicAt, rotateLeft } from "../pattern/sequence.js";
import {
  resolveDenominators,
  resolveDivisions,
  resolveIntegers,
  resolveMasks
} from "../options/option-resolver.js";
import type { EvenDivisionRhythmOptions, RhythmResult, RhythmTuplet } from "../types.js";
import { adjustExtraCount } from "./extra-counts.js";
import { advanceState, countEvents, seedState } from "./generator-state.js";
import { applyMasks } from "./masks.js";

export function makeEvenDivisionRhythm(options: EvenDivisionRhythmOptions): RhythmResult {
  const divisions = resolveDivisions(options.divisions);
  const denominators = resolveDenominators(options.denominators);
  const extraCounts = resolveIntegers(options.extraCounts, "extra counts");
  const spelling = resolveSpelling(options.spelling);
  const masks = resolveMasks(options.masks);
  const previous = seedState(options.previousState);
  const diagnostics = createDiagnostics();

  const rotatedDenominators = rotateLeft(denominators, previous.divisionsConsumed);
  const rotatedExtraCounts = rotateLeft(extraCounts.length ? extraCounts : [0], previous.divisionsConsumed);

  const targets: Duration[] = [];
  const tuplets: RhythmTuplet[] = divisions.map((division, index) => {
    const pulseDenominator = cyclicAt(rotatedDenominators, index);
    const pulse = new Duration(1, pulseDenominator);
    if (division.lessThan(pulse.multiply(new Duration(2)))) {
      targets.push(division);
      return { duration: division, contents: [division] };
    }
    const pulses = Math.floor((division.numerator * pulseDenominator) / division.denominator);
    const requested = cyclicAt(rotatedExtraCounts, index);
    const applied = adjustExtraCount(pulses, requested);
    if (applied !== requested) {
      addNotice(
        diagnostics,
        "EXTRA_COUNT_REDUCED",
        "info",
        `extra count ${requested} applied as ${applied} to ${pulses} pulses`,
        index
      );
    }
    const count = pulses + applied;
    targets.push(new Duration(count, pulseDenominator));
    return { duration: division, contents: Array.from({ length: count }, () => pulse) };
  });
  recordDivisions(diagnostics, tuplets, targets);

  const denominator = [...rotatedDenominators, ...divisions.map((division) => division.denominator)].reduce(
    (acc, value) => lcm(acc, value),
    1
  );
  const state = advanceState(previous, {
    divisions: divisions.length,
    logicalTies: countEvents(tuplets)
  });

  return {
    tuplets: applyMasks(tuplets, masks),
    state,
    diagnostics,
    meta: {
      kind: "evenDivision",
      denominator,
      spelling,
      replayOptions: {
        kind: "evenDivision",
        divisions,
        denominators,
        extraCounts,
        previousState: previous,
        spelling,
        masks
      }
    }
  };
}
