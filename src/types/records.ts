/**
 * Record type definitions for the CSV/JSON converter
 */

import type { LosslessNumber } from "lossless-json";

// Integers beyond the safe range keep their source text as a LosslessNumber
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * One row of tabular data: field name -> value
 * CSV input always yields string values; JSON input passes values through
 */
export type DataRecord = JsonObject;

export const CONVERSION_DIRECTIONS = ["json-to-csv", "csv-to-json"] as const;
export type ConversionDirection = (typeof CONVERSION_DIRECTIONS)[number];

export type SourceFormat = "json" | "csv";

export interface ConversionSummary {
  direction: ConversionDirection;
  input: string;
  output: string;
  // False when nothing was written (empty JSON list)
  written: boolean;
  records: number;
  columns: number;
  warnings: string[];
}
