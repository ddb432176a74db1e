/**
 * Conversion context - flows through the converter pipeline
 * Each module reads what it needs and writes its results back
 */

import type { StudykitConfig } from "./config";
import type { ConversionDirection, DataRecord } from "./records";
import type { Logger } from "../utils/logger";

export type LoadedSource =
  | { format: "json"; document: unknown }
  | { format: "csv"; rows: string[][] };

export interface ConversionContext {
  // Input - provided at initialization
  config: StudykitConfig;
  logger: Logger;
  direction: ConversionDirection;
  inputPath: string;
  outputPath: string;

  // Loader fills these:
  source?: LoadedSource;

  // Normalizer fills these:
  records?: DataRecord[];

  // Schema collector fills these (json-to-csv only):
  columns?: string[];

  // Writer fills these:
  written?: boolean;

  // Non-fatal problems found along the way
  warnings: string[];
}
