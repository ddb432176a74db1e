/**
 * Pipeline modules export
 */

// Converter pipeline
export { load } from "./loader";
export { normalize } from "./normalizer";
export { collectSchema } from "./schema-collector";
export { write } from "./writer";

// Transcript pipeline (PDF extraction is imported from ./extractor directly)
export { parseTerms } from "./term-parser";
export type { ParseOptions, ParseResult } from "./term-parser";
export {
  validateRange,
  selectRange,
  fillMissingValues,
  aggregate,
  computeGpa,
} from "./aggregator";
export { ReadlinePrompter } from "./prompter";
export type { ValuePrompter } from "./prompter";
export {
  formatTermListing,
  formatSelection,
  formatTotals,
  formatGpa,
} from "./report";
