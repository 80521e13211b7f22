import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";
export const LOGS_DIR = join(HOME, ".timesheet", "logs");

export type LogFields = Record<string, unknown>;

/** Side channel only — removing it never changes a parse outcome. */
export interface Logger {
  info(msg: string, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export type LogLevel = "info" | "debug" | "error";

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  msg: string;
  [key: string]: unknown;
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value.includes(" ") ? JSON.stringify(value) : value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/** Render `key=value` pairs the way the console logger prints them */
export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  return Object.entries(fields)
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join("");
}

/**
 * ConsoleLogger — `[LEVEL] msg key=value` lines on stderr so stdout stays
 * clean for JSON output. Debug lines only when enabled.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled = false) {}

  info(msg: string, fields?: LogFields): void {
    console.error(`[INFO] ${msg}${formatFields(fields)}`);
  }

  debug(msg: string, fields?: LogFields): void {
    if (this.debugEnabled) {
      console.error(`[DEBUG] ${msg}${formatFields(fields)}`);
    }
  }

  error(msg: string, fields?: LogFields): void {
    console.error(`[ERROR] ${msg}${formatFields(fields)}`);
  }
}

/**
 * JsonlLogger — one JSON object per line, appended as each entry is
 * logged; nothing is held in memory.
 */
export class JsonlLogger implements Logger {
  private filepath: string;

  constructor(runId: string, logsDir?: string) {
    const dir = logsDir ?? LOGS_DIR;
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const ts = new Date().toISOString().replace(/[:.]/g, "-");
    this.filepath = join(dir, `${ts}_${runId}.jsonl`);
  }

  get path(): string {
    return this.filepath;
  }

  private append(level: LogLevel, msg: string, fields?: LogFields): void {
    const entry: LogEntry = {
      ...fields,
      level,
      timestamp: new Date().toISOString(),
      msg,
    };
    appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
  }

  info(msg: string, fields?: LogFields): void {
    this.append("info", msg, fields);
  }

  debug(msg: string, fields?: LogFields): void {
    this.append("debug", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.append("error", msg, fields);
  }
}

/** Fan each entry out to several loggers */
export class TeeLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(...loggers: Logger[]) {
    this.loggers = loggers;
  }

  info(msg: string, fields?: LogFields): void {
    for (const l of this.loggers) l.info(msg, fields);
  }

  debug(msg: string, fields?: LogFields): void {
    for (const l of this.loggers) l.debug(msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    for (const l of this.loggers) l.error(msg, fields);
  }
}

export const silentLogger: Logger = {
  info() {},
  debug() {},
  error() {},
};
