import type { Duration, DurationInput } from "./duration.js";
import type { IndexPattern } from "./pattern/index-pattern.js";
import type { InciseSpec } from "./pattern/incise.js";
import type { Interpolation, InterpolationSpec } from "./pattern/interpolation.js";
import type { Spelling, SpellingSpec } from "./pattern/spelling.js";
import type { Talea, TaleaSpec } from "./pattern/talea.js";

export type RhythmKind = "talea" | "incised" | "accelerando" | "evenDivision" | "ratio" | "note";

/**
 * Accounting threaded through successive calls on one logical stream.
 *
 * The value is owned by the caller: makers never keep it, they return a new
 * one. Feeding it back as `previousState` continues the stream exactly where
 * the previous call stopped.
 */
export interface GeneratorState {
  divisionsConsumed: number;
  logicalTiesProduced: number;
  /** Talea weight read so far, in units of the grid the talea maker computed on (`meta.denominator`). */
  taleaWeightConsumed: number;
  /** Last note of the previous call is cut mid-count and continues into the next call. */
  incompleteLastNote: boolean;
}

/**
 * One group of events per division.
 *
 * `contents` is the numeric map for the division: signed durations, positive
 * for notes and negative for rests, never zero. When extra counts prolate a
 * division the contents weigh more or less than `duration`; the ratio between
 * the two is the tuplet multiplier.
 */
export interface RhythmTuplet {
  duration: Duration;
  contents: Duration[];
  /** Written value of accelerando notes; a content divided by it is that note's duration multiplier. */
  writtenDuration?: Duration;
}

export type MaskKind = "silence" | "sustain";

export interface RhythmMask {
  kind: MaskKind;
  pattern: IndexPattern;
}

// ========================================
// Diagnostics
// ========================================

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "TALEA_CYCLED"
  | "INCOMPLETE_LAST_NOTE"
  | "INTERPOLATION_TOO_SMALL"
  | "PREFIX_TRUNCATED"
  | "SUFFIX_TRUNCATED"
  | "EXTRA_COUNT_REDUCED";

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  divisionIndex?: number;
}

export interface DivisionDiagnostic {
  index: number;
  division: Duration;
  /** Division after extra counts, i.e. what the contents must weigh. */
  target: Duration;
  emitted: Duration;
}

export interface RhythmDiagnostics {
  notices: Diagnostic[];
  divisions: DivisionDiagnostic[];
}

// ========================================
// Options
// ========================================

export type CurveExponent = "cosine" | number;

interface CommonRhythmOptions {
  divisions: readonly DurationInput[];
  previousState?: Partial<GeneratorState>;
  spelling?: SpellingSpec;
  masks?: readonly RhythmMask[];
}

export interface TaleaRhythmOptions extends CommonRhythmOptions {
  /** Talea value, plain spec, or preset id. */
  talea: Talea | TaleaSpec | string;
  extraCounts?: readonly number[];
  readTaleaOnceOnly?: boolean;
  /** Static offset into the talea applied before resumption. */
  advance?: number;
}

export interface IncisedRhythmOptions extends CommonRhythmOptions {
  /** Incision spec or preset id. */
  incise: InciseSpec | string;
  extraCounts?: readonly number[];
}

export interface AccelerandoRhythmOptions extends CommonRhythmOptions {
  /** Cyclic; defaults to one `1/8 → 1/16` interpolation. Entries may be preset ids. */
  interpolations?: readonly (Interpolation | InterpolationSpec | string)[];
  exponent?: CurveExponent;
}

export interface EvenDivisionRhythmOptions extends CommonRhythmOptions {
  /** Cyclic pulse denominators; defaults to `[8]`. */
  denominators?: readonly number[];
  extraCounts?: readonly number[];
}

export interface RatioRhythmOptions extends CommonRhythmOptions {
  /** Cyclic ratios; signs mark rests. */
  ratios: readonly (readonly number[])[];
}

export type NoteRhythmOptions = CommonRhythmOptions;

export type RhythmMakerOptions =
  | ({ kind: "talea" } & TaleaRhythmOptions)
  | ({ kind: "incised" } & IncisedRhythmOptions)
  | ({ kind: "accelerando" } & AccelerandoRhythmOptions)
  | ({ kind: "evenDivision" } & EvenDivisionRhythmOptions)
  | ({ kind: "ratio" } & RatioRhythmOptions)
  | ({ kind: "note" } & NoteRhythmOptions);

// ========================================
// Results
// ========================================

export interface RhythmMeta {
  kind: RhythmKind;
  /** Common denominator the maker computed in. */
  denominator: number;
  spelling: Spelling;
  /** Options that regenerate this exact result. */
  replayOptions: RhythmMakerOptions;
}

export interface RhythmResult {
  tuplets: RhythmTuplet[];
  state: GeneratorState;
  diagnostics: RhythmDiagnostics;
  meta: RhythmMeta;
}
