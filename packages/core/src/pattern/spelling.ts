import { Duration, type DurationInput } from "../duration.js";
import { InvalidArgumentError } from "../errors.js";

/**
 * Duration spelling constraints for the leaf builder that consumes the numeric maps.
 * The makers never apply these themselves; they only validate and echo them.
 */
export interface SpellingSpec {
  forbiddenNoteDuration?: DurationInput;
  forbiddenRestDuration?: DurationInput;
  increaseMonotonic?: boolean;
}

export interface Spelling {
  forbiddenNoteDuration?: Duration;
  forbiddenRestDuration?: Duration;
  increaseMonotonic: boolean;
}

function forbidden(input: DurationInput | undefined, label: string): Duration | undefined {
  if (input === undefined) {
    return undefined;
  }
  const duration = Duration.from(input);
  if (duration.sign() <= 0) {
    throw new InvalidArgumentError(`${label} must be positive, got ${duration.toString()}`);
  }
  return duration;
}

export function resolveSpelling(spec: SpellingSpec = {}): Spelling {
  const spelling: Spelling = { increaseMonotonic: spec.increaseMonotonic ?? false };
  const note = forbidden(spec.forbiddenNoteDuration, "forbidden note duration");
  const rest = forbidden(spec.forbiddenRestDuration, "forbidden rest duration");
  if (note) {
    spelling.forbiddenNoteDuration = note;
  }
  if (rest) {
    spelling.forbiddenRestDuration = rest;
  }
  return spelling;
}
