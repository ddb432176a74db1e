/**
 * Normalizer Module
 * Turns the loaded document into a flat list of records
 */

import { LosslessNumber } from "lossless-json";
import { FormatError } from "../utils";
import type { ConversionContext, DataRecord } from "../types";

/**
 * Check for a JSON object (not null, not an array)
 */
export function isRecord(value: unknown): value is DataRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof LosslessNumber)
  );
}

/**
 * Coerce a JSON document into a list of records
 * A single object becomes a one-element list
 */
export function normalizeJsonDocument(document: unknown): DataRecord[] {
  if (isRecord(document)) {
    return [document];
  }

  if (!Array.isArray(document)) {
    throw new FormatError("JSON must be a list of objects or a single object");
  }

  return document.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new FormatError(
        `JSON must be a list of objects: item ${index} is ${describeJsonType(item)}`,
      );
    }
    return item;
  });
}

function describeJsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (value instanceof LosslessNumber) return "a number";
  return `a ${typeof value}`;
}

export interface NormalizedCsv {
  records: DataRecord[];
  // Cells beyond the header width, summed over all rows
  droppedCells: number;
}

/**
 * Map CSV rows to header -> cell records
 * The first row is the header; short rows are padded with ""
 */
export function normalizeCsvRows(rows: string[][]): NormalizedCsv {
  const [header = [], ...body] = rows;
  let droppedCells = 0;

  const records = body.map((row) => {
    // fromEntries defines own properties, so a "__proto__" header is kept
    const record: DataRecord = Object.fromEntries(
      header.map((field, index) => [field, row[index] ?? ""]),
    );
    droppedCells += Math.max(0, row.length - header.length);
    return record;
  });

  return { records, droppedCells };
}

/**
 * Normalizes loaded data into records
 *
 * Reads from context:
 * - source (set by loader)
 *
 * Writes to context:
 * - records
 */
export async function normalize(ctx: ConversionContext): Promise<void> {
  const { source } = ctx;
  if (!source) {
    throw new Error("Loader must run before normalizer");
  }

  if (source.format === "json") {
    ctx.records = normalizeJsonDocument(source.document);
  } else {
    const { records, droppedCells } = normalizeCsvRows(source.rows);
    if (droppedCells > 0) {
      ctx.warnings.push(
        `${droppedCells} cell(s) beyond the header width were dropped`,
      );
    }
    ctx.records = records;
  }

  ctx.logger.debug(`Normalized ${ctx.records.length} record(s)`);
}
