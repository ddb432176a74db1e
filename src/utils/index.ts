/**
 * Utility exports
 */

// Errors
export {
  StudykitError,
  InputNotFoundError,
  FormatError,
  ParseError,
  ExtractionError,
  NoTermsFoundError,
  InvalidRangeError,
  InputClosedError,
  describeError,
} from "./errors";
export type { ErrorCode } from "./errors";

// Filesystem utilities
export { fileExists, readInputFile, writeOutputFile } from "./fs";

// Number utilities
export {
  parseDecimal,
  parseGroupedDecimal,
  parseInteger,
  formatOptional,
} from "./number";

// Transcript patterns
export {
  TERM_HEADER_PATTERN,
  GRADE_POINTS_PATTERN,
  CREDITS_PATTERN,
  DEBUG_KEYWORDS,
} from "./patterns";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { Logger } from "./logger";
export { TermStore } from "./term-store";
