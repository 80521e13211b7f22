import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { describe, it, expect, beforeEach } from "vitest";
import {
  DEFAULT_CONFIG,
  applyConfigValue,
  configPath,
  loadConfig,
  resolveParseOptions,
  saveConfig,
} from "../../src/core/config.js";

beforeEach(() => {
  rmSync(dirname(configPath()), { recursive: true, force: true });
});

function writeRawConfig(text: string): void {
  mkdirSync(dirname(configPath()), { recursive: true });
  writeFileSync(configPath(), text, "utf-8");
}

describe("Story 7.1: Config file", () => {
  it("lives under the home directory", () => {
    expect(configPath()).toBe(`${process.env.HOME}/.timesheet/config.json`);
  });

  it("returns defaults when no file exists", () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("round-trips through disk", () => {
    const cfg = { ...DEFAULT_CONFIG, format: "semicolon" as const, continueOnError: true, dateFormat: "DD/MM/YYYY" };
    saveConfig(cfg);

    expect(existsSync(configPath())).toBe(true);
    expect(loadConfig()).toEqual(cfg);
  });

  it("falls back to defaults for unreadable JSON", () => {
    writeRawConfig("{ not json");
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("ignores keys with the wrong type", () => {
    writeRawConfig(JSON.stringify({ format: "pipe", debug: "yes", skipEmptyRows: false }));
    expect(loadConfig()).toEqual({ ...DEFAULT_CONFIG, skipEmptyRows: false });
  });

  it("writes pretty JSON", () => {
    saveConfig(DEFAULT_CONFIG);
    expect(readFileSync(configPath(), "utf-8")).toBe(JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n");
  });
});

describe("Story 7.2: config set", () => {
  it("applies each key", () => {
    let cfg = DEFAULT_CONFIG;
    cfg = applyConfigValue(cfg, "format", "tab");
    cfg = applyConfigValue(cfg, "continue-on-error", "true");
    cfg = applyConfigValue(cfg, "skip-empty-rows", "false");
    cfg = applyConfigValue(cfg, "date-format", "MM/DD/YYYY");
    cfg = applyConfigValue(cfg, "debug", "true");
    cfg = applyConfigValue(cfg, "log-file", "true");

    expect(cfg).toEqual({
      format: "tab",
      continueOnError: true,
      skipEmptyRows: false,
      dateFormat: "MM/DD/YYYY",
      debug: true,
      logFile: true,
    });
  });

  it("rejects unknown formats", () => {
    expect(() => applyConfigValue(DEFAULT_CONFIG, "format", "pipe")).toThrow(
      'Invalid format: "pipe". Valid: auto, standard, rfc4180, tab, tsv, semicolon, excel'
    );
  });

  it("rejects non-boolean values", () => {
    expect(() => applyConfigValue(DEFAULT_CONFIG, "debug", "yes")).toThrow(
      'Invalid value for debug: "yes". Valid: true, false'
    );
  });

  it("rejects unknown keys", () => {
    expect(() => applyConfigValue(DEFAULT_CONFIG, "colour", "red")).toThrow(
      'Unknown config key: "colour". Valid keys: format, continue-on-error, skip-empty-rows, date-format, debug, log-file'
    );
  });
});

describe("Story 7.3: Effective parse options", () => {
  it("detects the format when set to auto", () => {
    expect(resolveParseOptions({}, DEFAULT_CONFIG)).toEqual({
      format: undefined,
      continueOnError: false,
      skipEmptyRows: true,
      dateFormat: undefined,
    });
  });

  it("prefers flags over the config file", () => {
    const cfg = { ...DEFAULT_CONFIG, format: "tab" as const, continueOnError: false };
    expect(resolveParseOptions({ format: "semicolon", continueOnError: true, keepEmptyRows: true }, cfg)).toEqual({
      format: "semicolon",
      continueOnError: true,
      skipEmptyRows: false,
      dateFormat: undefined,
    });
  });

  it("rejects an unknown format flag", () => {
    expect(() => resolveParseOptions({ format: "pipe" }, DEFAULT_CONFIG)).toThrow('Invalid format: "pipe"');
  });
});
