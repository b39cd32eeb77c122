/**
 * Exact rational durations.
 *
 * Every maker computes in integer counts over a common denominator and hands
 * results back as `Duration` values. Floating point only appears inside the
 * interpolation curve and is brought back through {@link Duration.fromFloat}.
 */

import { InvalidArgumentError } from "./errors.js";

/** Anything accepted where a duration is expected at the API boundary. */
export type DurationInput = Duration | readonly [number, number] | number;

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

export function lcm(a: number, b: number): number {
  if (a === 0 || b === 0) {
    return 0;
  }
  return Math.abs((a / gcd(a, b)) * b);
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/**
 * Round to nearest integer, ties to even.
 * Quantized curves must not drift upward on exact halves.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function assertInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${label} must be a safe integer, got ${value}`);
  }
}

export class Duration {
  readonly numerator: number;
  readonly denominator: number;

  constructor(numerator: number, denominator: number = 1) {
    assertInteger(numerator, "numerator");
    assertInteger(denominator, "denominator");
    if (denominator === 0) {
      throw new InvalidArgumentError("denominator must not be zero");
    }
    const sign = denominator < 0 ? -1 : 1;
    const divisor = gcd(numerator, denominator) || 1;
    // `+ 0` normalizes -0 so that equal durations compare equal under deepStrictEqual
    this.numerator = (sign * numerator) / divisor + 0;
    this.denominator = Math.abs(denominator) / divisor;
  }

  static readonly ZERO = new Duration(0, 1);

  static from(input: DurationInput): Duration {
    if (input instanceof Duration) {
      return input;
    }
    if (typeof input === "number") {
      return new Duration(input, 1);
    }
    return new Duration(input[0], input[1]);
  }

  /** Quantize a float to the nearest multiple of `1/denominator`. */
  static fromFloat(value: number, denominator: number): Duration {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`cannot quantize non-finite value ${value}`);
    }
    return new Duration(roundHalfEven(value * denominator), denominator);
  }

  static sum(durations: readonly Duration[]): Duration {
    return durations.reduce<Duration>((acc, duration) => acc.add(duration), Duration.ZERO);
  }

  /** Sum of absolute values. */
  static weight(durations: readonly Duration[]): Duration {
    return durations.reduce<Duration>((acc, duration) => acc.add(duration.abs()), Duration.ZERO);
  }

  add(other: Duration): Duration {
    const denominator = lcm(this.denominator, other.denominator);
    return new Duration(
      this.numerator * (denominator / this.denominator) + other.numerator * (denominator / other.denominator),
      denominator
    );
  }

  subtract(other: Duration): Duration {
    return this.add(other.negate());
  }

  multiply(other: Duration): Duration {
    const left = gcd(this.numerator, other.denominator) || 1;
    const right = gcd(other.numerator, this.denominator) || 1;
    return new Duration(
      (this.numerator / left) * (other.numerator / right),
      (this.denominator / right) * (other.denominator / left)
    );
  }

  divide(other: Duration): Duration {
    if (other.numerator === 0) {
      throw new InvalidArgumentError("division by zero duration");
    }
    return this.multiply(new Duration(other.denominator, other.numerator));
  }

  negate(): Duration {
    return new Duration(-this.numerator, this.denominator);
  }

  abs(): Duration {
    return this.numerator < 0 ? this.negate() : this;
  }

  sign(): -1 | 0 | 1 {
    return this.numerator < 0 ? -1 : this.numerator > 0 ? 1 : 0;
  }

  compare(other: Duration): number {
    return this.numerator * other.denominator - other.numerator * this.denominator;
  }

  equals(other: Duration): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator;
  }

  lessThan(other: Duration): boolean {
    return this.compare(other) < 0;
  }

  lessThanOrEqual(other: Duration): boolean {
    return this.compare(other) <= 0;
  }

  greaterThan(other: Duration): boolean {
    return this.compare(other) > 0;
  }

  isZero(): boolean {
    return this.numerator === 0;
  }

  /**
   * Numerator of this duration written over `denominator`.
   * Throws when the duration is not a whole multiple of `1/denominator`.
   */
  numeratorOver(denominator: number): number {
    const scaled = (this.numerator * denominator) / this.denominator;
    if (!Number.isSafeInteger(scaled)) {
      throw new InvalidArgumentError(`${this.toString()} cannot be written over denominator ${denominator}`);
    }
    return scaled;
  }

  toNumber(): number {
    return this.numerator / this.denominator;
  }

  toPair(): [number, number] {
    return [this.numerator, this.denominator];
  }

  toString(): string {
    return this.denominator === 1 ? `${this.numerator}` : `${this.numerator}/${this.denominator}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
