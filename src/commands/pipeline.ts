import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig, type TimesheetConfig } from "../core/config.js";
import { RandomIdGenerator } from "../core/ids.js";
import { ConsoleLogger, JsonlLogger, TeeLogger, type Logger } from "../core/logger.js";
import { WorkItemValidator } from "../core/validator.js";
import { TimesheetParser } from "../parsers/csv.js";

export interface GlobalFlags {
  debug?: boolean;
}

export interface Pipeline {
  config: TimesheetConfig;
  logger: Logger;
  validator: WorkItemValidator;
  parser: TimesheetParser;
}

/** Wire logger, validator and parser from the config file and global flags */
export function createPipeline(flags: GlobalFlags = {}): Pipeline {
  const config = loadConfig();
  const consoleLogger = new ConsoleLogger(flags.debug ?? config.debug);
  const logger = config.logFile
    ? new TeeLogger(consoleLogger, new JsonlLogger(`run-${process.pid}`))
    : consoleLogger;

  const validator = new WorkItemValidator(logger);
  const parser = new TimesheetParser(validator, logger, new RandomIdGenerator());
  return { config, logger, validator, parser };
}

/** Read a timesheet file or throw a plain "File not found" error */
export function readTimesheetFile(path: string): Buffer {
  const filepath = resolve(path);
  if (!existsSync(filepath)) {
    throw new Error(`File not found: ${filepath}`);
  }
  return readFileSync(filepath);
}
