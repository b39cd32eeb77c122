import { InvalidArgumentError } from "../errors.js";

/**
 * Selects positions in a run of `total` items.
 * Negative indices count from the end; `period` repeats the selection.
 */
export interface IndexPattern {
  indices: readonly number[];
  period?: number;
  inverted?: boolean;
}

export function validateIndexPattern(pattern: IndexPattern): void {
  if (pattern.indices.some((index) => !Number.isSafeInteger(index))) {
    throw new InvalidArgumentError("pattern indices must be integers");
  }
  if (pattern.period !== undefined && (!Number.isSafeInteger(pattern.period) || pattern.period <= 0)) {
    throw new InvalidArgumentError(`pattern period must be a positive integer, got ${pattern.period}`);
  }
}

export function matchesIndex(pattern: IndexPattern, index: number, total: number): boolean {
  const normalized = pattern.indices.map((candidate) => (candidate < 0 ? total + candidate : candidate));
  let matched: boolean;
  if (pattern.period !== undefined) {
    const period = pattern.period;
    const position = index % period;
    matched = normalized.some((candidate) => ((candidate % period) + period) % period === position);
  } else {
    matched = normalized.includes(index);
  }
  return pattern.inverted ? !matched : matched;
}

export function indexAll(): IndexPattern {
  return { indices: [0], period: 1 };
}

export function indexFirst(count: number): IndexPattern {
  return { indices: Array.from({ length: count }, (_, i) => i) };
}

export function indexLast(count: number): IndexPattern {
  return { indices: Array.from({ length: count }, (_, i) => -(i + 1)) };
}
