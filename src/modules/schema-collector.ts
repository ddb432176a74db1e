/**
 * Schema Collector Module
 * Derives the CSV column order from the records
 */

import type { ConversionContext, DataRecord } from "../types";

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
  const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

/**
 * Union of field names across every record, sorted by code point
 */
export function collectColumns(records: readonly DataRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      names.add(key);
    }
  }
  return [...names].sort(compareCodePoints);
}

/**
 * Reads from context:
 * - records (set by normalizer)
 *
 * Writes to context:
 * - columns
 */
export async function collectSchema(ctx: ConversionContext): Promise<void> {
  if (!ctx.records) {
    throw new Error("Normalizer must run before schema collector");
  }
  ctx.columns = collectColumns(ctx.records);
}
