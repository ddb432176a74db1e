/**
 * Aggregator Module
 * Range selection, gap filling and GPA totals over chronological terms
 */

import { InvalidRangeError, parseDecimal } from "../utils";
import {
  TERM_FIELD_LABELS,
  type RangeTotals,
  type Term,
  type TermField,
} from "../types";
import type { ValuePrompter } from "./prompter";

const FILL_ORDER: readonly TermField[] = ["gradePoints", "credits"];

/**
 * Check a 0-based inclusive range against a list length
 */
export function validateRange(start: number, end: number, length: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    end >= length ||
    start > end
  ) {
    throw new InvalidRangeError();
  }
}

/**
 * Validated slice of a 0-based inclusive range
 */
export function selectRange<T>(items: readonly T[], start: number, end: number): T[] {
  validateRange(start, end, items.length);
  return items.slice(start, end + 1);
}

/**
 * Ask for every missing value of the given terms
 *
 * A blank answer leaves the value unset; anything that is not a
 * non-negative number is rejected and asked again.
 */
export async function fillMissingValues(
  terms: readonly Term[],
  prompter: ValuePrompter,
): Promise<void> {
  for (const term of terms) {
    for (const field of FILL_ORDER) {
      if (term[field] !== undefined) {
        continue;
      }

      const question = `${term.name} is missing ${TERM_FIELD_LABELS[field]}. Enter value (or press Enter to skip): `;
      for (;;) {
        const answer = (await prompter.ask(question)).trim();
        if (!answer) {
          break;
        }
        const value = parseDecimal(answer);
        if (value !== undefined) {
          term[field] = value;
          break;
        }
        prompter.notify("Invalid number. Try again.");
      }
    }
  }
}

/**
 * Sum grade points and credits; a term missing either value adds nothing
 * and is reported as skipped
 */
export function aggregate(terms: readonly Term[]): RangeTotals {
  let totalGradePoints = 0;
  let totalCredits = 0;
  const skipped: string[] = [];

  for (const term of terms) {
    if (term.gradePoints === undefined || term.credits === undefined) {
      skipped.push(term.name);
      continue;
    }
    totalGradePoints += term.gradePoints;
    totalCredits += term.credits;
  }

  return { totalGradePoints, totalCredits, skipped };
}

/**
 * Grade points per credit, undefined when there are no credits
 */
export function computeGpa(
  totals: Pick<RangeTotals, "totalGradePoints" | "totalCredits">,
): number | undefined {
  if (totals.totalCredits === 0) {
    return undefined;
  }
  return totals.totalGradePoints / totals.totalCredits;
}
