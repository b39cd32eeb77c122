export { runRhythmMaker, runRhythmSequence } from "./pipeline.js";
export { makeTaleaRhythm } from "./phase/talea-generation.js";
export { makeIncisedRhythm } from "./phase/incised-generation.js";
export { makeAccelerandoRhythm } from "./phase/accelerando-generation.js";
export { makeEvenDivisionRhythm } from "./phase/even-division.js";
export { makeRatioRhythm, divideByRatio } from "./phase/ratio-generation.js";
export { makeNoteRhythm } from "./phase/note-generation.js";
export { partitionByDurations, partitionDurations } from "./phase/meter-partition.js";
export type { DurationItem } from "./phase/meter-partition.js";
export {
  interpolateDivide,
  interpolateDivideMultiple,
  quantizeCurve,
  tryQuantizeCurve,
  CURVE_QUANTUM
} from "./phase/interpolation-curve.js";
export type { CurveResult } from "./phase/interpolation-curve.js";
export { adjustExtraCount, prolateNumerators } from "./phase/extra-counts.js";
export { applyMasks } from "./phase/masks.js";
export { initialState } from "./phase/generator-state.js";
export { Duration, gcd, lcm } from "./duration.js";
export type { DurationInput } from "./duration.js";
export { Talea } from "./pattern/talea.js";
export type { TaleaSpec, TaleaCount, TaleaItem, TaleaSentinel } from "./pattern/talea.js";
export { Interpolation } from "./pattern/interpolation.js";
export type { InterpolationSpec } from "./pattern/interpolation.js";
export type { InciseSpec, Incise } from "./pattern/incise.js";
export type { SpellingSpec, Spelling } from "./pattern/spelling.js";
export { indexAll, indexFirst, indexLast } from "./pattern/index-pattern.js";
export type { IndexPattern } from "./pattern/index-pattern.js";
export { taleaPresets, incisePresets, interpolationPresets } from "./options/preset-loader.js";
export {
  RhythmError,
  InvalidArgumentError,
  PatternExhaustedError,
  DurationMismatchError
} from "./errors.js";
export type { RhythmErrorCode } from "./errors.js";
export type {
  RhythmKind,
  RhythmMakerOptions,
  RhythmResult,
  RhythmTuplet,
  RhythmMeta,
  RhythmMask,
  MaskKind,
  GeneratorState,
  RhythmDiagnostics,
  Diagnostic,
  DiagnosticCode,
  DivisionDiagnostic,
  CurveExponent,
  TaleaRhythmOptions,
  IncisedRhythmOptions,
  AccelerandoRhythmOptions,
  EvenDivisionRhythmOptions,
  RatioRhythmOptions,
  NoteRhythmOptions
} from "./types.js";
