/**
 * Loader Module
 * Reads the input file into memory as a JSON document or a CSV cell grid
 */

import { parse as parseCsv } from "csv-parse/sync";
import {
  parse as parseLosslessJson,
  isInteger,
  isSafeNumber,
  LosslessNumber,
} from "lossless-json";
import { z } from "zod";
import { readInputFile } from "../utils";
import type { ConversionContext, CsvConfig } from "../types";

const CellGridSchema = z.array(z.array(z.string()));

/**
 * Integers that a double cannot hold exactly stay as their source text
 */
function parseJsonNumber(text: string): number | LosslessNumber {
  return isInteger(text) && !isSafeNumber(text)
    ? new LosslessNumber(text)
    : parseFloat(text);
}

/**
 * Parse JSON text, ignoring a leading byte order mark
 */
export function parseJsonDocument(content: string): unknown {
  return parseLosslessJson(
    content.replace(/^\uFEFF/, ""),
    null,
    parseJsonNumber,
  );
}

/**
 * Parse CSV text into rows of cells (header row included)
 * Empty lines are skipped and rows may differ in length
 */
export function parseCsvGrid(content: string, csv: CsvConfig): string[][] {
  const rows: unknown = parseCsv(content, {
    bom: true,
    delimiter: csv.delimiter,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return CellGridSchema.parse(rows);
}

/**
 * Loads the input file and populates context
 *
 * Writes to context:
 * - source: parsed JSON document (json-to-csv) or CSV rows (csv-to-json)
 */
export async function load(ctx: ConversionContext): Promise<void> {
  const content = await readInputFile(ctx.inputPath);

  ctx.source =
    ctx.direction === "json-to-csv"
      ? { format: "json", document: parseJsonDocument(content) }
      : { format: "csv", rows: parseCsvGrid(content, ctx.config.csv) };

  ctx.logger.debug(
    `Loaded ${ctx.source.format.toUpperCase()} from ${ctx.inputPath}`,
  );
}
