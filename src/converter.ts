/**
 * Converter - Pipeline orchestrator
 * Coordinates the CSV/JSON conversion pipeline with zero business logic
 */

import type {
  ConversionContext,
  ConversionDirection,
  ConversionSummary,
  StudykitConfig,
} from "./types";
import type { Logger } from "./utils";
import * as modules from "./modules";

export class Converter {
  constructor(
    private config: StudykitConfig,
    private logger: Logger,
  ) {}

  /**
   * Run the conversion pipeline
   * Pure orchestration - just calls modules in sequence
   */
  async run(
    direction: ConversionDirection,
    inputPath: string,
    outputPath: string,
  ): Promise<ConversionSummary> {
    const ctx: ConversionContext = {
      config: this.config,
      logger: this.logger,
      direction,
      inputPath,
      outputPath,
      warnings: [],
    };

    await modules.load(ctx);
    await modules.normalize(ctx);
    if (direction === "json-to-csv") {
      await modules.collectSchema(ctx);
    }
    await modules.write(ctx);

    return {
      direction,
      input: inputPath,
      output: outputPath,
      written: ctx.written ?? false,
      records: ctx.records?.length ?? 0,
      columns: ctx.columns?.length ?? 0,
      warnings: ctx.warnings,
    };
  }

  jsonToCsv(inputPath: string, outputPath: string): Promise<ConversionSummary> {
    return this.run("json-to-csv", inputPath, outputPath);
  }

  csvToJson(inputPath: string, outputPath: string): Promise<ConversionSummary> {
    return this.run("csv-to-json", inputPath, outputPath);
  }
}
