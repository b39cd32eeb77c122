export type RhythmErrorCode = "INVALID_ARGUMENT" | "PATTERN_EXHAUSTED" | "DURATION_MISMATCH";

/**
 * Base class for every failure raised by the rhythm makers.
 * All of them are terminal for the call that raised them: no partial output is returned.
 */
export class RhythmError extends Error {
  readonly code: RhythmErrorCode;

  constructor(code: RhythmErrorCode, message: string) {
    super(message);
    this.name = "RhythmError";
    this.code = code;
  }
}

/** Malformed pattern, denominator, division or state value. */
export class InvalidArgumentError extends RhythmError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/** A talea marked read-once is shorter than the weight requested from it. */
export class PatternExhaustedError extends RhythmError {
  constructor(message: string) {
    super("PATTERN_EXHAUSTED", message);
    this.name = "PatternExhaustedError";
  }
}

/** Sub-durations do not add up to the whole they are meant to fill. */
export class DurationMismatchError extends RhythmError {
  constructor(message: string) {
    super("DURATION_MISMATCH", message);
    this.name = "DurationMismatchError";
  }
}
