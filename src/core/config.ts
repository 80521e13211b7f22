import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { FORMAT_NAMES, type FormatName, type ParseOptions } from "../parsers/types.js";
import { isSupportedFormat } from "../parsers/format.js";

export const FORMAT_CHOICES = ["auto", ...FORMAT_NAMES] as const;

export type FormatChoice = (typeof FORMAT_CHOICES)[number];

export interface TimesheetConfig {
  format: FormatChoice;
  continueOnError: boolean;
  skipEmptyRows: boolean;
  dateFormat?: string;
  debug: boolean;
  logFile: boolean;
}

export const CONFIG_KEYS = [
  "format",
  "continue-on-error",
  "skip-empty-rows",
  "date-format",
  "debug",
  "log-file",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const DEFAULT_CONFIG: TimesheetConfig = {
  format: "auto",
  continueOnError: false,
  skipEmptyRows: true,
  debug: false,
  logFile: false,
};

/** Resolved per call so HOME can be swapped in tests */
export function configPath(): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? "~";
  return join(home, ".timesheet", "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Keep only well-typed keys from a parsed config file */
function sanitize(raw: unknown): Partial<TimesheetConfig> {
  if (!isRecord(raw)) return {};

  const out: Partial<TimesheetConfig> = {};
  const format = raw.format;
  if (typeof format === "string" && isFormatChoice(format)) out.format = format;
  if (typeof raw.continueOnError === "boolean") out.continueOnError = raw.continueOnError;
  if (typeof raw.skipEmptyRows === "boolean") out.skipEmptyRows = raw.skipEmptyRows;
  if (typeof raw.dateFormat === "string") out.dateFormat = raw.dateFormat;
  if (typeof raw.debug === "boolean") out.debug = raw.debug;
  if (typeof raw.logFile === "boolean") out.logFile = raw.logFile;
  return out;
}

export function isFormatChoice(value: string): value is FormatChoice {
  return value === "auto" || isSupportedFormat(value);
}

/** Read config from disk. Returns defaults if file doesn't exist. */
export function loadConfig(): TimesheetConfig {
  const path = configPath();
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return { ...DEFAULT_CONFIG, ...sanitize(raw) };
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: TimesheetConfig): void {
  const path = configPath();
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

function parseBoolean(key: ConfigKey, value: string): boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`Invalid value for ${key}: "${value}". Valid: true, false`);
}

/** Apply one `config set` assignment, returning the updated config */
export function applyConfigValue(config: TimesheetConfig, key: string, value: string): TimesheetConfig {
  switch (key) {
    case "format":
      if (!isFormatChoice(value)) {
        throw new Error(`Invalid format: "${value}". Valid: ${FORMAT_CHOICES.join(", ")}`);
      }
      return { ...config, format: value };
    case "continue-on-error":
      return { ...config, continueOnError: parseBoolean(key, value) };
    case "skip-empty-rows":
      return { ...config, skipEmptyRows: parseBoolean(key, value) };
    case "date-format":
      return { ...config, dateFormat: value };
    case "debug":
      return { ...config, debug: parseBoolean(key, value) };
    case "log-file":
      return { ...config, logFile: parseBoolean(key, value) };
    default:
      throw new Error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
}

export interface ParseFlags {
  format?: string;
  continueOnError?: boolean;
  keepEmptyRows?: boolean;
}

/** Effective parse options — CLI flag > config file > built-in default */
export function resolveParseOptions(flags: ParseFlags, config: TimesheetConfig): ParseOptions {
  const choice = flags.format ?? config.format;
  if (!isFormatChoice(choice)) {
    throw new Error(`Invalid format: "${choice}". Valid: ${FORMAT_CHOICES.join(", ")}`);
  }
  const format: FormatName | undefined = choice === "auto" ? undefined : choice;

  return {
    format,
    continueOnError: flags.continueOnError ?? config.continueOnError,
    skipEmptyRows: flags.keepEmptyRows ? false : config.skipEmptyRows,
    dateFormat: config.dateFormat,
  };
}

export { DEFAULT_CONFIG };
