/**
 * Term Parser Module
 * Walks transcript text line by line and collects per-term totals
 *
 * The parser has two states: before the first term header nothing is
 * recorded; after a header every line belongs to that term until the next
 * header. A header line never carries values.
 */

import {
  TermStore,
  ParseError,
  parseGroupedDecimal,
  TERM_HEADER_PATTERN,
  GRADE_POINTS_PATTERN,
  CREDITS_PATTERN,
  DEBUG_KEYWORDS,
  type Logger,
} from "../utils";
import {
  TERM_FIELD_LABELS,
  type ParseIssue,
  type Term,
  type TermField,
  type ValuePolicy,
} from "../types";

const VALUE_PATTERNS: ReadonlyArray<[TermField, RegExp]> = [
  ["gradePoints", GRADE_POINTS_PATTERN],
  ["credits", CREDITS_PATTERN],
];

export interface ParseOptions {
  // "last-wins" overwrites on every value line, "first-wins" keeps the first
  valuePolicy?: ValuePolicy;
  // Candidate lines are echoed at debug level
  logger?: Logger;
}

export interface ParseResult {
  store: TermStore;
  issues: ParseIssue[];
}

function normalizeLine(rawLine: string): string {
  return rawLine.replace(/\u00a0/g, " ").trim();
}

function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}

function readValue(text: string, field: TermField, term: Term): number {
  const value = parseGroupedDecimal(text);
  if (value === undefined) {
    throw new ParseError(
      text,
      `could not parse ${TERM_FIELD_LABELS[field]} '${text}' for term ${term.name}`,
    );
  }
  return value;
}

export function parseTerms(text: string, options: ParseOptions = {}): ParseResult {
  const { valuePolicy = "last-wins", logger } = options;
  const debug = logger?.isEnabled("debug") ?? false;

  const store = new TermStore();
  const issues: ParseIssue[] = [];
  let current: Term | undefined;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = normalizeLine(rawLine);
    if (!line) {
      continue;
    }

    if (debug) {
      const lower = line.toLowerCase();
      if (DEBUG_KEYWORDS.some((keyword) => lower.includes(keyword))) {
        logger?.debug(`Line: ${JSON.stringify(line)}`);
      }
    }

    const header = TERM_HEADER_PATTERN.exec(line);
    if (header) {
      current = store.add(collapseWhitespace(header[1]));
      continue;
    }

    if (!current) {
      continue;
    }

    for (const [field, pattern] of VALUE_PATTERNS) {
      const match = pattern.exec(line);
      if (!match) {
        continue;
      }
      if (valuePolicy === "first-wins" && current[field] !== undefined) {
        continue;
      }

      const valueText = match[1].replace(/,/g, "").trim();
      try {
        current[field] = readValue(valueText, field, current);
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        issues.push({
          term: current.name,
          field,
          value: error.value,
          message: error.message,
        });
      }
    }

    current.rawLines.push(line);
  }

  return { store, issues };
}
