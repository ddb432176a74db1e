/**
 * Transcript Session - Interactive GPA flow
 * Parses transcript text, asks for a term range, fills gaps and reports totals
 */

import * as modules from "./modules";
import type { ValuePrompter } from "./modules";
import type { RangeTotals, Term, TranscriptConfig } from "./types";
import { InvalidRangeError, NoTermsFoundError, parseInteger } from "./utils";
import type { Logger } from "./utils";

export interface TranscriptSessionOptions {
  config: TranscriptConfig;
  logger: Logger;
  prompter: ValuePrompter;
  // Receives every report line, in order
  print: (line: string) => void;
}

export interface SessionResult {
  terms: Term[];
  selected: Term[];
  totals: RangeTotals;
  gpa: number | undefined;
}

export class TranscriptSession {
  constructor(private options: TranscriptSessionOptions) {}

  async run(text: string): Promise<SessionResult> {
    const { config, logger, prompter, print } = this.options;

    const { store, issues } = modules.parseTerms(text, {
      valuePolicy: config.valuePolicy,
      logger,
    });
    for (const issue of issues) {
      logger.warn(issue.message);
    }
    if (store.size === 0) {
      throw new NoTermsFoundError();
    }

    const terms = store.chronological();
    print("");
    print("Detected terms (chronological order):");
    modules
      .formatTermListing(terms, config.pointsDecimals)
      .forEach((line) => print(line));

    print("");
    const start = await this.askTermNumber("Enter start term number: ");
    const end = await this.askTermNumber("Enter end term number: ");
    const selected = modules.selectRange(terms, start - 1, end - 1);

    await modules.fillMissingValues(selected, prompter);

    const totals = modules.aggregate(selected);
    const gpa = modules.computeGpa(totals);

    print("");
    print("Selected terms:");
    modules
      .formatSelection(selected)
      .forEach((line) => print(line));

    if (totals.skipped.length > 0) {
      print("");
      print("WARNING: Still missing values for these terms:");
      totals.skipped.forEach((name) => print(`  - ${name}`));
    }

    print("");
    print(modules.formatTotals(totals, config.pointsDecimals));
    print(modules.formatGpa(gpa, config.gpaDecimals));

    return { terms, selected, totals, gpa };
  }

  private async askTermNumber(question: string): Promise<number> {
    const value = parseInteger(await this.options.prompter.ask(question));
    if (value === undefined) {
      throw new InvalidRangeError("Invalid input.");
    }
    return value;
  }
}
