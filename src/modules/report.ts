/**
 * Report Module
 * Plain-text lines for the transcript session
 */

import { formatOptional } from "../utils";
import type { RangeTotals, Term } from "../types";

export function formatTermListing(
  terms: readonly Term[],
  decimals: number,
): string[] {
  return terms.map(
    (term, index) =>
      `${index + 1}. ${term.name} | Grade Points: ${formatOptional(term.gradePoints, decimals)} | Credits: ${formatOptional(term.credits, decimals)}`,
  );
}

function formatPlain(value: number | undefined): string {
  return value === undefined ? "MISSING" : String(value);
}

/**
 * Selected terms with their values as stored, unrounded
 */
export function formatSelection(terms: readonly Term[]): string[] {
  return terms.map(
    (term) =>
      ` - ${term.name}: GP=${formatPlain(term.gradePoints)}, Credits=${formatPlain(term.credits)}`,
  );
}

export function formatTotals(totals: RangeTotals, decimals: number): string {
  return `Totals -> Grade Points: ${totals.totalGradePoints.toFixed(decimals)}   Credits: ${totals.totalCredits.toFixed(decimals)}`;
}

export function formatGpa(gpa: number | undefined, decimals: number): string {
  if (gpa === undefined) {
    return "Cannot compute GPA: total credits = 0.";
  }
  return `CUMULATIVE GPA for selected range: ${gpa.toFixed(decimals)}`;
}
