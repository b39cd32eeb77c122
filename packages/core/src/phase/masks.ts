import { matchesIndex } from "../pattern/index-pattern.js";
import type { RhythmMask, RhythmTuplet } from "../types.js";
import type { Duration } from "../duration.js";
import { countEvents } from "./generator-state.js";

function maskEvent(event: Duration, index: number, total: number, masks: readonly RhythmMask[]): Duration {
  let masked = event;
  for (const mask of masks) {
    if (!matchesIndex(mask.pattern, index, total)) {
      continue;
    }
    masked = mask.kind === "silence" ? masked.abs().negate() : masked.abs();
  }
  return masked;
}

/**
 * Rewrite event signs by index pattern.
 *
 * Events are numbered across all tuplets in order. Masks apply in sequence,
 * so a later mask overrides an earlier one on the events both match. Only
 * signs change; durations and grouping stay as they are.
 */
export function applyMasks(tuplets: readonly RhythmTuplet[], masks: readonly RhythmMask[]): RhythmTuplet[] {
  const total = countEvents(tuplets);
  let index = 0;
  return tuplets.map((tuplet) => ({
    ...tuplet,
    contents: tuplet.contents.map((event) => maskEvent(event, index++, total, masks))
  }));
}
