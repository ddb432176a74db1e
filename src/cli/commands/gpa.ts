/**
 * GPA command - Interactive cumulative GPA over a range of transcript terms
 */

import ora from "ora";
import chalk from "chalk";
import type { Command } from "commander";
import { ReadlinePrompter } from "../../modules";
import { PdfTextExtractor, type TextExtractor } from "../../modules/extractor";
import { TranscriptSession } from "../../transcript-session";
import { describeError } from "../../utils";
import { createRuntime } from "../runtime";

export async function gpaCommand(
  pdfPath: string | undefined,
  _options: unknown,
  command: Command,
): Promise<void> {
  const { config, logger } = await createRuntime(command);
  const prompter = new ReadlinePrompter();

  try {
    const path =
      pdfPath ?? (await prompter.ask("Enter transcript PDF path: ")).trim();

    const spinner = ora({ text: "Reading transcript...", indent: 2 }).start();
    let text: string;
    try {
      const extractor: TextExtractor = new PdfTextExtractor();
      text = await extractor.extract(path);
    } finally {
      spinner.stop();
    }

    const session = new TranscriptSession({
      config: config.transcript,
      logger,
      prompter,
      print: (line) => console.log(line),
    });
    const result = await session.run(text);

    logger.debug(
      `Selected ${result.selected.length} of ${result.terms.length} term(s)`,
    );
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    process.exitCode = 1;
  } finally {
    prompter.close();
  }
}
