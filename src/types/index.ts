/**
 * Central type exports
 */

// Configuration
export type {
  StudykitConfig,
  PartialStudykitConfig,
  CsvConfig,
  JsonConfig,
  TranscriptConfig,
  LoggingConfig,
  LogLevel,
  ValuePolicy,
} from "./config";
export {
  StudykitConfigSchema,
  PartialStudykitConfigSchema,
} from "./config";

// Records
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  DataRecord,
  ConversionDirection,
  SourceFormat,
  ConversionSummary,
} from "./records";
export { CONVERSION_DIRECTIONS } from "./records";

// Terms
export type { Term, TermField, ParseIssue, RangeTotals } from "./terms";
export { TERM_FIELD_LABELS } from "./terms";

// Context
export type { ConversionContext, LoadedSource } from "./context";
