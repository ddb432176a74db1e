/**
 * Number Utilities
 */

const DECIMAL_PATTERN = /^(?:\d+\.?\d*|\.\d+)$/;

/**
 * Parse a plain non-negative decimal ("52.30", "16", ".5", "5.")
 * Returns undefined for anything else, including empty text
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

/**
 * Parse a transcript value that may use commas as thousands separators
 *
 * @example
 * parseGroupedDecimal("1,234.50") // 1234.5
 * parseGroupedDecimal("1.2.3") // undefined
 */
export function parseGroupedDecimal(text: string): number | undefined {
  return parseDecimal(text.replace(/,/g, ""));
}

/**
 * Parse a whole number as typed by a user ("3", " 12 ", "+4", "-1")
 */
export function parseInteger(text: string): number | undefined {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

export function formatOptional(
  value: number | undefined,
  decimals: number,
  missing = "MISSING",
): string {
  return value === undefined ? missing : value.toFixed(decimals);
}
