import { Duration, type DurationInput } from "../duration.js";
import { InvalidArgumentError } from "../errors.js";

export interface InterpolationSpec {
  startDuration?: DurationInput;
  stopDuration?: DurationInput;
  writtenDuration?: DurationInput;
}

function positive(input: DurationInput, label: string): Duration {
  const duration = Duration.from(input);
  if (duration.sign() <= 0) {
    throw new InvalidArgumentError(`${label} must be positive, got ${duration.toString()}`);
  }
  return duration;
}

/**
 * Start and stop unit durations of one accelerando or ritardando.
 * Start longer than stop accelerates; `reverse()` turns one into the other.
 */
export class Interpolation {
  readonly startDuration: Duration;
  readonly stopDuration: Duration;
  readonly writtenDuration: Duration;

  constructor(spec: InterpolationSpec = {}) {
    this.startDuration = positive(spec.startDuration ?? [1, 8], "start duration");
    this.stopDuration = positive(spec.stopDuration ?? [1, 16], "stop duration");
    this.writtenDuration = positive(spec.writtenDuration ?? [1, 16], "written duration");
  }

  static from(input: Interpolation | InterpolationSpec): Interpolation {
    return input instanceof Interpolation ? input : new Interpolation(input);
  }

  reverse(): Interpolation {
    return new Interpolation({
      startDuration: this.stopDuration,
      stopDuration: this.startDuration,
      writtenDuration: this.writtenDuration
    });
  }

  toSpec(): Required<InterpolationSpec> {
    return {
      startDuration: this.startDuration,
      stopDuration: this.stopDuration,
      writtenDuration: this.writtenDuration
    };
  }
}
