/**
 * Config command - Show configuration file location and active settings
 */

import chalk from "chalk";
import type { Command } from "commander";
import { getUserConfigPath } from "../../utils";
import { createRuntime } from "../runtime";

export async function configCommand(
  _options: unknown,
  command: Command,
): Promise<void> {
  const { config } = await createRuntime(command);

  console.log("User configuration file location:");
  console.log(chalk.white(getUserConfigPath()));
  console.log("\nActive settings:");
  console.log(chalk.gray(JSON.stringify(config, null, 2)));
  console.log("\nCreate the file above to override any of these settings.");
}
