#!/usr/bin/env node

import { Command } from "commander";
import { detect } from "./commands/detect.js";
import { validate } from "./commands/validate.js";
import { parse } from "./commands/parse.js";
import { configShow, configSet } from "./commands/config.js";
import { FORMAT_CHOICES } from "./core/config.js";

interface GlobalOptions {
  debug?: boolean;
}

interface ParseFlagOptions {
  format?: string;
  continueOnError?: boolean;
  keepEmptyRows?: boolean;
}

const program = new Command();

program
  .name("timesheet")
  .description("Parse and validate CSV timesheets into billable work items")
  .version("0.1.0")
  .option("--debug", "Print debug log lines to stderr");

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

program
  .command("detect <file>")
  .description("Detect the delimiter and format of a timesheet file")
  .action(async (file: string) => {
    await detect(file, globals());
  });

program
  .command("validate <file>")
  .description("Check a timesheet for import without importing it")
  .option("-f, --format <name>", `Input format (${FORMAT_CHOICES.join(", ")})`)
  .option("-c, --continue-on-error", "Collect row errors instead of stopping at the first")
  .option("--keep-empty-rows", "Treat rows with only blank fields as data")
  .option("-j, --json", "Output structured JSON (for piping)")
  .action(async (file: string, options: ParseFlagOptions & { json?: boolean }) => {
    await validate(file, { ...options, ...globals() });
  });

program
  .command("parse <file>")
  .description("Parse a timesheet and print the work items as JSON")
  .option("-f, --format <name>", `Input format (${FORMAT_CHOICES.join(", ")})`)
  .option("-c, --continue-on-error", "Collect row errors instead of stopping at the first")
  .option("--keep-empty-rows", "Treat rows with only blank fields as data")
  .option("-o, --output <path>", "Write the JSON result to a file")
  .action(async (file: string, options: ParseFlagOptions & { output?: string }) => {
    await parse(file, { ...options, ...globals() });
  });

const configCmd = program
  .command("config")
  .description("View and modify configuration");

configCmd
  .command("show")
  .description("Show current configuration")
  .action(async () => {
    await configShow();
  });

configCmd
  .command("set <key> <value>")
  .description("Set a config value (format, continue-on-error, skip-empty-rows, date-format, debug, log-file)")
  .action(async (key: string, value: string) => {
    await configSet(key, value);
  });

// `timesheet config` with no subcommand → show
configCmd.action(async () => {
  await configShow();
});

await program.parseAsync();
