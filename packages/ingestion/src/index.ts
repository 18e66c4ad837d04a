export { LocalPhotometryArchive, type PhotometrySource } from './archive/photometry-source.js';
export {
  convertToFlux,
  fluxErrorFromMagnitudeError,
  magnitudeToFlux,
  type FluxConversion,
} from './convert/flux-converter.js';
export {
  normalizePassbands,
  resolvePassband,
  type NormalizationDiagnostics,
  type NormalizationResult,
  type PassbandResolution,
} from './normalize/passband-normalizer.js';
export type { LightCurveRecord, LightCurveWriter } from './output/light-curve-writer.js';
export { SnanaFileWriter, snanaOutputPath } from './output/snana-file-writer.js';
export { formatSnanaLightCurve, SNANA_VARLIST } from './output/snana-format.js';
export { DelimitedTextParser } from './parsing/delimited-text-parser.js';
export { FitsTableParser } from './parsing/fits-table-parser.js';
export { NotesAndLimitsParser } from './parsing/notes-and-limits-parser.js';
export type { ParsedTable, PhotometryParser } from './parsing/parser.js';
export {
  createDefaultParsers,
  ParserChain,
  type ParseOutcome,
  type ParserAttempt,
  type ParserAttemptStatus,
} from './parsing/parser-chain.js';
export { TabSeparatedParser } from './parsing/tab-separated-parser.js';
export {
  runBatch,
  type BatchObjectResult,
  type BatchOptions,
  type BatchSummary,
  type ObjectHandler,
} from './processing/batch-runner.js';
export {
  ObjectProcessor,
  type FileReport,
  type ObjectOutcome,
  type ObjectProcessorDeps,
  type SkipReason,
  type UnrecognizedLabelPolicy,
} from './processing/object-processor.js';
export { sanitize } from './sanitize/sanitizer.js';
