/**
 * Shared test helpers.
 *
 * Everything time-dependent runs against a pinned clock so the date rules
 * ("not more than 2 years ago") do not drift with the calendar.
 */
import { vi, type Mock } from "vitest";
import { SequentialIdGenerator } from "../../src/core/ids.js";
import type { LogFields, Logger } from "../../src/core/logger.js";
import { WorkItemValidator } from "../../src/core/validator.js";
import { createWorkItem, type WorkItem, type WorkItemFields } from "../../src/core/work-item.js";
import { TimesheetParser } from "../../src/parsers/csv.js";

export const NOW = new Date("2024-02-01T12:00:00Z");

export type LogFn = (msg: string, fields?: LogFields) => void;

export interface RecordingLogger extends Logger {
  info: Mock<LogFn>;
  debug: Mock<LogFn>;
  error: Mock<LogFn>;
}

export function recordingLogger(): RecordingLogger {
  return { info: vi.fn<LogFn>(), debug: vi.fn<LogFn>(), error: vi.fn<LogFn>() };
}

export function utc(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

export function createTestParser(now: Date = NOW) {
  const logger = recordingLogger();
  const validator = new WorkItemValidator(logger, { now: () => now });
  const parser = new TimesheetParser(validator, logger, new SequentialIdGenerator(), { now: () => now });
  return { logger, validator, parser };
}

export function makeItem(overrides: Partial<WorkItemFields> = {}): WorkItem {
  return createWorkItem(
    {
      id: "work-1",
      date: utc(2024, 1, 15),
      hours: 8,
      rate: 100,
      description: "Reviewed pull requests",
      ...overrides,
    },
    NOW
  );
}

/** Join lines into CSV text with a trailing newline */
export function csv(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

/** Run fn and return what it threw; fails the test if nothing was thrown */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
