/**
 * Generator state accounting.
 *
 * State is a plain value passed in and handed back, never held by a maker.
 * Two calls on the same stream must be serialized by the caller; separate
 * streams share nothing.
 */

import { InvalidArgumentError } from "../errors.js";
import type { GeneratorState, RhythmTuplet } from "../types.js";

export function initialState(): GeneratorState {
  return {
    divisionsConsumed: 0,
    logicalTiesProduced: 0,
    taleaWeightConsumed: 0,
    incompleteLastNote: false
  };
}

function counter(value: number | undefined, label: string): number {
  if (value === undefined) {
    return 0;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`previous state ${label} must be a nonnegative integer, got ${value}`);
  }
  return value;
}

/** Fill a partial previous state with zeros and validate it. */
export function seedState(previous?: Partial<GeneratorState>): GeneratorState {
  if (!previous) {
    return initialState();
  }
  return {
    divisionsConsumed: counter(previous.divisionsConsumed, "divisionsConsumed"),
    logicalTiesProduced: counter(previous.logicalTiesProduced, "logicalTiesProduced"),
    taleaWeightConsumed: counter(previous.taleaWeightConsumed, "taleaWeightConsumed"),
    incompleteLastNote: previous.incompleteLastNote ?? false
  };
}

export interface StateAdvance {
  divisions: number;
  logicalTies: number;
  taleaWeight?: number;
  incompleteLastNote?: boolean;
}

/**
 * Returns the state after one call.
 * A note left incomplete by the previous call is continued, not restarted, so it is counted once.
 */
export function advanceState(previous: GeneratorState, advance: StateAdvance): GeneratorState {
  let logicalTies = previous.logicalTiesProduced + advance.logicalTies;
  if (previous.incompleteLastNote && advance.logicalTies > 0) {
    logicalTies -= 1;
  }
  return {
    divisionsConsumed: previous.divisionsConsumed + advance.divisions,
    logicalTiesProduced: logicalTies,
    taleaWeightConsumed: previous.taleaWeightConsumed + (advance.taleaWeight ?? 0),
    incompleteLastNote: advance.incompleteLastNote ?? false
  };
}

/**
 * Count logical ties in tuplets where every event starts its own tie.
 * Rests and notes alike count once.
 */
export function countEvents(tuplets: readonly RhythmTuplet[]): number {
  return tuplets.reduce((sum, tuplet) => sum + tuplet.contents.length, 0);
}
