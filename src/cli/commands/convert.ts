/**
 * Convert command - Runs the CSV/JSON conversion pipeline
 */

import ora from "ora";
import chalk from "chalk";
import type { Command } from "commander";
import { Converter } from "../../converter";
import { CONVERSION_DIRECTIONS, type ConversionDirection } from "../../types";
import { fileExists, describeError } from "../../utils";
import { createRuntime } from "../runtime";

function isDirection(value: string): value is ConversionDirection {
  return CONVERSION_DIRECTIONS.some((direction) => direction === value);
}

function fail(...lines: string[]): never {
  for (const line of lines) {
    console.error(chalk.red(line));
  }
  process.exit(1);
}

export async function convertCommand(
  commandName: string,
  input: string,
  output: string,
  _options: unknown,
  command: Command,
): Promise<void> {
  const { config, logger } = await createRuntime(command);

  if (!(await fileExists(input))) {
    fail(`Error: Input file '${input}' not found`);
  }

  const direction = commandName.toLowerCase();
  if (!isDirection(direction)) {
    fail(
      `Error: Unknown command '${direction}'`,
      "Use 'json-to-csv' or 'csv-to-json'",
    );
  }

  const spinner = ora({ text: "Converting...", indent: 2 }).start();

  try {
    const converter = new Converter(config, logger);
    const summary = await converter.run(direction, input, output);

    spinner.stop();

    for (const warning of summary.warnings) {
      logger.warn(warning);
    }
    if (!summary.written) {
      return;
    }

    console.log(chalk.green(`✓ Converted ${input} to ${output}`));
    console.log(
      direction === "json-to-csv"
        ? `  Rows: ${summary.records}, Columns: ${summary.columns}`
        : `  Objects: ${summary.records}`,
    );
  } catch (error) {
    spinner.fail("Conversion failed");
    fail(`Error: ${describeError(error)}`);
  }
}
