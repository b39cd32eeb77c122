/**
 * Meter-aligned partitioning
 *
 * Groups consecutive events by target durations (beats, beam groups, bars).
 * A group is only produced where the events fit the target exactly: when an
 * event straddles either edge of a target timespan the whole target comes
 * back as an empty group, never as a partial one. Callers use the empty group
 * to skip whatever they would have built over it.
 */

import { Duration } from "../duration.js";
import { DurationMismatchError } from "../errors.js";

export interface DurationItem {
  duration: Duration;
}

interface Span<T> {
  item: T;
  start: Duration;
  stop: Duration;
}

function layout<T>(items: readonly T[], durationOf: (item: T) => Duration): Span<T>[] {
  let offset = Duration.ZERO;
  return items.map((item) => {
    const start = offset;
    offset = offset.add(durationOf(item).abs());
    return { item, start, stop: offset };
  });
}

function partition<T>(
  items: readonly T[],
  targets: readonly Duration[],
  durationOf: (item: T) => Duration
): T[][] {
  const itemTotal = Duration.weight(items.map(durationOf));
  const targetTotal = Duration.sum(targets);
  if (!itemTotal.equals(targetTotal)) {
    throw new DurationMismatchError(
      `items last ${itemTotal.toString()} but targets add up to ${targetTotal.toString()}`
    );
  }

  const spans = layout(items, durationOf);
  const groups: T[][] = [];
  let groupStart = Duration.ZERO;
  for (const target of targets) {
    const groupStop = groupStart.add(target);
    const inside = spans.filter(
      (span) => !span.start.lessThan(groupStart) && !groupStop.lessThan(span.stop)
    );
    const covered = Duration.weight(inside.map((span) => durationOf(span.item)));
    groups.push(covered.equals(target) ? inside.map((span) => span.item) : []);
    groupStart = groupStop;
  }
  return groups;
}

/**
 * One group of items per target; empty where the items do not align.
 * @throws DurationMismatchError when items and targets have different totals
 */
export function partitionByDurations<T extends DurationItem>(items: readonly T[], targets: readonly Duration[]): T[][] {
  return partition(items, targets, (item) => item.duration);
}

/** {@link partitionByDurations} over bare signed durations, measured by absolute value. */
export function partitionDurations(durations: readonly Duration[], targets: readonly Duration[]): Duration[][] {
  return partition(durations, targets, (duration) => duration);
}
