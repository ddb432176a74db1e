/**
 * Transcript line patterns
 *
 * Each pattern is matched case-insensitively anywhere in a trimmed line and
 * exposes exactly one capture group:
 *
 * - TERM_HEADER_PATTERN, group 1: the term label, e.g. "Fall Qtr 2025",
 *   "Sum Ses II 2024" or "Winter Quarter 2023". An optional "Term:" prefix
 *   is matched but not captured.
 * - GRADE_POINTS_PATTERN, group 1: the numeric text after
 *   "Term Grade Points", digits with optional "." and "," characters.
 * - CREDITS_PATTERN, group 1: the numeric text after "Term GPA Credits".
 */

export const TERM_HEADER_PATTERN =
  /(?:Term:\s*)?((?:Fall|Winter|Spring|Summer|Sum\s+Ses\s+[IVXLC]+)\s*(?:Qtr|Quarter|Ses)?\s*\d{4})/i;

export const GRADE_POINTS_PATTERN = /Term\s+Grade\s+Points[:\s]*([\d.,]+)/i;

export const CREDITS_PATTERN = /Term\s+GPA\s+Credits[:\s]*([\d.,]+)/i;

// Lines worth echoing in debug mode
export const DEBUG_KEYWORDS = [
  "term",
  "qtr",
  "quarter",
  "sum ses",
  "grade points",
  "gpa credits",
];
