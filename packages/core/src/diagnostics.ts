import { Duration } from "./duration.js";
import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  RhythmDiagnostics,
  RhythmTuplet
} from "./types.js";

export function createDiagnostics(): RhythmDiagnostics {
  return { notices: [], divisions: [] };
}

export function addNotice(
  diagnostics: RhythmDiagnostics,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  divisionIndex?: number
): void {
  const notice: Diagnostic = { code, severity, message };
  if (divisionIndex !== undefined) {
    notice.divisionIndex = divisionIndex;
  }
  diagnostics.notices.push(notice);
}

/**
 * Record target and emitted weight for every tuplet.
 * `targets` are the prolated divisions; they default to the tuplet durations.
 */
export function recordDivisions(
  diagnostics: RhythmDiagnostics,
  tuplets: readonly RhythmTuplet[],
  targets?: readonly Duration[]
): void {
  tuplets.forEach((tuplet, index) => {
    diagnostics.divisions.push({
      index,
      division: tuplet.duration,
      target: targets?.[index] ?? tuplet.duration,
      emitted: Duration.weight(tuplet.contents)
    });
  });
}
