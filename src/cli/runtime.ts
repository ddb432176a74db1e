/**
 * Shared command setup - global options, configuration and logger
 */

import { z } from "zod";
import type { Command } from "commander";
import { loadConfig, Logger, describeError } from "../utils";
import type { StudykitConfig } from "../types";

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface Runtime {
  config: StudykitConfig;
  logger: Logger;
}

/**
 * Load configuration (default → user → custom) and build the logger
 * Config files that fail to load are reported and skipped
 */
export async function createRuntime(command: Command): Promise<Runtime> {
  const options = GlobalOptionsSchema.parse(command.optsWithGlobals());
  const { config, errors } = await loadConfig(options.config);

  const logger = new Logger(options.verbose ? "debug" : config.logging.level);
  for (const { path, error } of errors) {
    logger.warn(`Ignoring config ${path}: ${describeError(error)}`);
  }

  return { config, logger };
}
