/**
 * Transcript term type definitions
 */

export interface Term {
  // Whitespace-collapsed label, suffixed " (n)" when the label repeats
  readonly name: string;
  gradePoints?: number;
  credits?: number;
  // Source lines attributed to this term, kept for diagnostics
  readonly rawLines: string[];
}

export type TermField = "gradePoints" | "credits";

export const TERM_FIELD_LABELS: Record<TermField, string> = {
  gradePoints: "grade points",
  credits: "credits",
};

export interface ParseIssue {
  term: string;
  field: TermField;
  value: string;
  message: string;
}

export interface RangeTotals {
  totalGradePoints: number;
  totalCredits: number;
  // Names of selected terms missing either field
  skipped: string[];
}
