/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const CsvConfigSchema = z.object({
  delimiter: z.string().length(1),
  // "unix" writes \n between records, "windows" writes \r\n
  recordDelimiter: z.enum(["unix", "windows"]),
});

export const JsonConfigSchema = z.object({
  indent: z.number().int().nonnegative().max(10),
});

export const TranscriptConfigSchema = z.object({
  // Which value wins when a term carries the same value line twice
  valuePolicy: z.enum(["last-wins", "first-wins"]),
  pointsDecimals: z.number().int().nonnegative(),
  gpaDecimals: z.number().int().nonnegative(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const StudykitConfigSchema = z.object({
  csv: CsvConfigSchema,
  json: JsonConfigSchema,
  transcript: TranscriptConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialStudykitConfigSchema = z.object({
  csv: CsvConfigSchema.partial().optional(),
  json: JsonConfigSchema.partial().optional(),
  transcript: TranscriptConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type CsvConfig = z.infer<typeof CsvConfigSchema>;
export type JsonConfig = z.infer<typeof JsonConfigSchema>;
export type TranscriptConfig = z.infer<typeof TranscriptConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ValuePolicy = TranscriptConfig["valuePolicy"];
export type StudykitConfig = z.infer<typeof StudykitConfigSchema>;
export type PartialStudykitConfig = z.infer<typeof PartialStudykitConfigSchema>;
