/**
 * Prompter Module
 * Console questions behind an interface so callers can be driven by a script
 */

import { createInterface, type Interface } from "node:readline/promises";
import { InputClosedError } from "../utils";

export interface ValuePrompter {
  /**
   * Ask one question and resolve with the raw answer line
   */
  ask(question: string): Promise<string>;

  notify(message: string): void;
}

/**
 * Answers are read from a line queue, so lines piped in or typed ahead of
 * a question are kept for the next ask
 */
export class ReadlinePrompter implements ValuePrompter {
  private rl: Interface;
  private lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string> {
    this.rl.setPrompt(question);
    this.rl.prompt();

    const next = await this.lines.next();
    if (next.done) {
      throw new InputClosedError();
    }
    return next.value;
  }

  notify(message: string): void {
    this.output.write(`${message}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
