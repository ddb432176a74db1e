/**
 * Error Types
 * Every failure the tools raise on purpose, plus a mapper that turns
 * anything thrown into a one-line diagnostic
 */

import { ZodError } from "zod";

// ============================================================================
// Types
// ============================================================================

export type ErrorCode =
  | "input-not-found"
  | "invalid-format"
  | "invalid-number"
  | "extraction-failed"
  | "no-terms"
  | "invalid-range"
  | "input-closed";

export abstract class StudykitError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends StudykitError {
  readonly code = "input-not-found";

  constructor(readonly path: string) {
    super(`Input file '${path}' not found`);
  }
}

/**
 * Structural problem with an input document (bad JSON root, non-object rows)
 */
export class FormatError extends StudykitError {
  readonly code = "invalid-format";
}

/**
 * A value line whose number could not be read. Recovered by the caller:
 * reported as a warning, never thrown out of the parser
 */
export class ParseError extends StudykitError {
  readonly code = "invalid-number";

  constructor(
    readonly value: string,
    message: string,
  ) {
    super(message);
  }
}

export class ExtractionError extends StudykitError {
  readonly code = "extraction-failed";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Could not open '${path}': ${messageOf(cause)}`, { cause });
  }
}

export class NoTermsFoundError extends StudykitError {
  readonly code = "no-terms";

  constructor() {
    super("No terms found.");
  }
}

/**
 * A term selection that is not a whole-number range inside the term list
 */
export class InvalidRangeError extends StudykitError {
  readonly code = "invalid-range";

  constructor(message = "Invalid range.") {
    super(message);
  }
}

/**
 * Standard input ended while a prompt was waiting for an answer
 */
export class InputClosedError extends StudykitError {
  readonly code = "input-closed";

  constructor() {
    super("Input ended before an answer was given.");
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map any thrown value to a single line suitable for the console
 */
export function describeError(error: unknown): string {
  if (error instanceof StudykitError) {
    return error.message;
  }
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.map(String).join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
  }
  if (error instanceof SyntaxError) {
    return `Invalid JSON: ${error.message}`;
  }
  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT" && "path" in error) {
      return `No such file: ${String(error.path)}`;
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return `Permission denied: ${error.message}`;
    }
  }
  return messageOf(error).split("\n")[0];
}
