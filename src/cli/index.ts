#!/usr/bin/env node

/**
 * CLI entry point for studykit
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { gpaCommand } from "./commands/gpa";

const program = new Command();

program
  .name("studykit")
  .description("Convert CSV/JSON record files and total up transcript GPA")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output");

// Convert command - CSV <-> JSON
program
  .command("convert")
  .description("Convert between JSON and CSV record files")
  .argument("<command>", "json-to-csv or csv-to-json")
  .argument("<input>", "Input file path")
  .argument("<output>", "Output file path")
  .action(convertCommand);

// GPA command - interactive transcript aggregation
program
  .command("gpa")
  .description("Compute a cumulative GPA over a range of transcript terms")
  .argument("[pdf]", "Transcript PDF path (prompted when omitted)")
  .action(gpaCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location and active settings")
  .action(configCommand);

await program.parseAsync();
