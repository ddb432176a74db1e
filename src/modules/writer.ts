/**
 * Writer Module
 * Serializes records to the target format and writes the output file
 */

import { stringify } from "csv-stringify/sync";
import { LosslessNumber, stringify as stringifyJson } from "lossless-json";
import { writeOutputFile } from "../utils";
import type {
  ConversionContext,
  CsvConfig,
  DataRecord,
  JsonValue,
} from "../types";

/**
 * Render one value as CSV cell text
 * Missing and null values become empty cells; nested values become JSON
 */
export function formatCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (value instanceof LosslessNumber) {
    return value.toString();
  }
  if (typeof value === "object") {
    return stringifyJson(value) ?? "";
  }
  return String(value);
}

export function toCsvText(
  records: readonly DataRecord[],
  columns: string[],
  csv: CsvConfig,
): string {
  const rows = records.map((record) =>
    columns.map((column) =>
      formatCell(Object.hasOwn(record, column) ? record[column] : undefined),
    ),
  );
  return stringify([columns, ...rows], {
    delimiter: csv.delimiter,
    record_delimiter: csv.recordDelimiter,
  });
}

export function toJsonText(records: readonly DataRecord[], indent: number): string {
  return JSON.stringify(records, null, indent) + "\n";
}

/**
 * Writes records to the output path
 *
 * Reads from context:
 * - records (set by normalizer)
 * - columns (set by schema collector, json-to-csv only)
 *
 * Writes to context:
 * - written: false when an empty JSON list left nothing to write
 */
export async function write(ctx: ConversionContext): Promise<void> {
  const { records, config } = ctx;
  if (!records) {
    throw new Error("Normalizer must run before writer");
  }

  if (ctx.direction === "csv-to-json") {
    await writeOutputFile(ctx.outputPath, toJsonText(records, config.json.indent));
    ctx.written = true;
    return;
  }

  if (records.length === 0) {
    ctx.warnings.push("JSON file is empty");
    ctx.written = false;
    return;
  }

  if (!ctx.columns) {
    throw new Error("Schema collector must run before writer");
  }

  await writeOutputFile(
    ctx.outputPath,
    toCsvText(records, ctx.columns, config.csv),
  );
  ctx.written = true;
}
