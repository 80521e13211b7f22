import { throwIfCancelled } from "./cancel.js";
import { TimesheetError, isTimesheetError } from "./errors.js";
import type { Logger } from "./logger.js";
import { formatDate, type WorkItem } from "./work-item.js";
import type { RawRow } from "../parsers/types.js";

export interface RuleContext {
  now: Date;
  logger: Logger;
}

/** A problem description, or undefined when the value passes. */
export type RuleOutcome = string | undefined;

/**
 * A rule is data: a name plus an item check and/or a row check.
 * Rules run in registration order; the first failure stops the run.
 */
export interface ValidationRule {
  name: string;
  description?: string;
  field?: string; // column the rule inspects, reported on failure
  validate?: (item: WorkItem, ctx: RuleContext) => RuleOutcome;
  validateRow?: (row: RawRow, line: number, ctx: RuleContext) => RuleOutcome;
}

export interface ValidatorOptions {
  now?: () => Date;
}

/** Ways one parsed item, raw row, or batch can be checked */
export interface TimesheetValidator {
  validateWorkItem(item: WorkItem, signal?: AbortSignal): void;
  validateRow(row: RawRow, line: number, signal?: AbortSignal): void;
  validateBatch(items: WorkItem[], signal?: AbortSignal): void;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_BATCH_SPAN_DAYS = 365;
const MAX_DISTINCT_RATES = 3;

export const GENERIC_DESCRIPTIONS = [
  "work", "development", "coding", "programming", "task", "project",
  "meeting", "call", "todo", "fix", "bug", "feature",
];

// ─── Standard rules ───

function checkDate(item: WorkItem, { now }: RuleContext): RuleOutcome {
  if (Number.isNaN(item.date.getTime())) {
    return "work date cannot be empty";
  }

  const futureLimit = new Date(now.getTime());
  futureLimit.setUTCDate(futureLimit.getUTCDate() + 7);
  if (item.date.getTime() > futureLimit.getTime()) {
    return `work date is too far in the future (more than 1 week from now): ${formatDate(item.date)}`;
  }

  const pastLimit = new Date(now.getTime());
  pastLimit.setUTCFullYear(pastLimit.getUTCFullYear() - 2);
  if (item.date.getTime() < pastLimit.getTime()) {
    return `work date is too far in the past (more than 2 years ago): ${formatDate(item.date)}`;
  }

  return undefined;
}

function checkHours(item: WorkItem, { logger }: RuleContext): RuleOutcome {
  if (!(item.hours > 0)) return `hours must be positive, got ${item.hours}`;
  if (item.hours > 24) return `hours cannot exceed 24 per day, got ${item.hours}`;

  if (item.hours > 12) {
    logger.debug("unusually high hours detected", { hours: item.hours, date: item.date });
  }

  if (Number(item.hours.toFixed(2)) !== item.hours) {
    return `hours should not have more than 2 decimal places, got ${item.hours}`;
  }
  return undefined;
}

function checkRate(item: WorkItem, { logger }: RuleContext): RuleOutcome {
  if (!(item.rate > 0)) return `hourly rate must be positive, got ${item.rate}`;
  if (item.rate < 1) return `hourly rate seems too low: $${item.rate} per hour`;
  if (item.rate > 1000) return `hourly rate seems too high: $${item.rate} per hour`;

  if (item.rate > 500) {
    logger.debug("unusually high rate detected", { rate: item.rate, date: item.date });
  }
  return undefined;
}

function checkDescription(item: WorkItem): RuleOutcome {
  const description = item.description.trim();

  if (description === "") return "work description cannot be empty";

  // limits are in UTF-8 bytes
  const length = Buffer.byteLength(description, "utf8");
  if (length < 3) {
    return `work description too short: '${description}' (minimum 3 characters)`;
  }
  if (length > 500) {
    return `work description too long: ${length} characters (maximum 500)`;
  }
  if (GENERIC_DESCRIPTIONS.includes(description.toLowerCase())) {
    return `work description too generic: '${description}' (please be more specific)`;
  }
  return undefined;
}

function checkTotal(item: WorkItem): RuleOutcome {
  const expected = item.hours * item.rate;
  const tolerance = 0.01;

  if (item.total < expected - tolerance || item.total > expected + tolerance) {
    return `total amount does not match calculated value ${item.total} vs ${expected} (hours: ${item.hours}, rate: ${item.rate})`;
  }
  return undefined;
}

function checkRowFormat(row: RawRow): RuleOutcome {
  if (row.length < 4) {
    return `row has invalid number of fields: has ${row.length} fields, expected at least 4 (date, hours, rate, description)`;
  }
  if (row.length > 20) {
    return `row has too many fields: has ${row.length} fields, which seems excessive (maximum expected: 20)`;
  }
  return undefined;
}

export function standardRules(): ValidationRule[] {
  return [
    {
      name: "DateValidation",
      description: "Work dates are within a week ahead and two years back",
      field: "date",
      validate: checkDate,
    },
    {
      name: "HoursValidation",
      description: "Hours are positive, at most 24, and in hundredths",
      field: "hours",
      validate: checkHours,
    },
    {
      name: "RateValidation",
      description: "Hourly rate is between 1 and 1000",
      field: "rate",
      validate: checkRate,
    },
    {
      name: "DescriptionValidation",
      description: "Descriptions are specific and 3–500 characters",
      field: "description",
      validate: checkDescription,
    },
    {
      name: "TotalValidation",
      description: "Total equals hours × rate within a cent",
      field: "total",
      validate: checkTotal,
    },
    { name: "RowFormatValidation", description: "Rows carry 4–20 fields", validateRow: checkRowFormat },
  ];
}

/**
 * WorkItemValidator — ordered rule registry applied per item, per raw row
 * and per batch. The rule list is not safe to mutate while a validation
 * is running.
 */
export class WorkItemValidator implements TimesheetValidator {
  private rules: ValidationRule[];
  private readonly now: () => Date;

  constructor(private readonly logger: Logger, options: ValidatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.rules = standardRules();
  }

  private context(): RuleContext {
    return { now: this.now(), logger: this.logger };
  }

  validateWorkItem(item: WorkItem, signal?: AbortSignal): void {
    throwIfCancelled(signal);

    const ctx = this.context();
    for (const rule of this.rules) {
      const problem = rule.validate?.(item, ctx);
      if (problem !== undefined) {
        throw new TimesheetError("rule_failed", `validation rule '${rule.name}' failed: ${problem}`, {
          field: rule.field,
        });
      }
    }
  }

  validateRow(row: RawRow, line: number, signal?: AbortSignal): void {
    throwIfCancelled(signal);

    if (row.length === 0) {
      throw new TimesheetError("empty_row", "row is empty", { line });
    }
    if (row.every((field) => field.trim() === "")) {
      throw new TimesheetError("row_no_data", "row contains no data", { line });
    }

    const ctx = this.context();
    for (const rule of this.rules) {
      const problem = rule.validateRow?.(row, line, ctx);
      if (problem !== undefined) {
        throw new TimesheetError("rule_failed", `row validation rule '${rule.name}' failed: ${problem}`, {
          line,
          field: rule.field,
        });
      }
    }
  }

  validateBatch(items: WorkItem[], signal?: AbortSignal): void {
    throwIfCancelled(signal);

    if (items.length === 0) {
      throw new TimesheetError("no_work_items", "no work items to validate");
    }

    this.logger.debug("validating work items batch", { count: items.length });

    items.forEach((item, i) => {
      throwIfCancelled(signal);
      try {
        this.validateWorkItem(item);
      } catch (err) {
        if (!isTimesheetError(err)) throw err;
        throw new TimesheetError("validation_failed", `work item ${i + 1} validation failed: ${err.message}`, {
          cause: err,
        });
      }
    });

    this.checkDateSpan(items);
    this.checkRateConsistency(items);
    this.checkTotalHours(items);

    this.logger.debug("batch validation completed successfully", { items: items.length });
  }

  private checkDateSpan(items: WorkItem[]): void {
    if (items.length <= 1) return;

    let min = items[0].date;
    let max = items[0].date;
    for (const item of items) {
      if (item.date.getTime() < min.getTime()) min = item.date;
      if (item.date.getTime() > max.getTime()) max = item.date;
    }

    if (max.getTime() - min.getTime() > MAX_BATCH_SPAN_DAYS * DAY_MS) {
      throw new TimesheetError(
        "date_range_too_large",
        `date range validation failed: work item date range is too large: ${formatDate(min)} to ${formatDate(max)} (more than 1 year)`
      );
    }
  }

  private checkRateConsistency(items: WorkItem[]): void {
    if (items.length <= 1) return;

    const rates = new Set(items.map((item) => item.rate));
    if (rates.size > MAX_DISTINCT_RATES) {
      this.logger.debug("multiple different rates detected", { unique_rates: rates.size });
    }
  }

  private checkTotalHours(items: WorkItem[]): void {
    const totalHours = items.reduce((sum, item) => sum + item.hours, 0);

    if (totalHours > 200) {
      this.logger.debug("large total hours detected", { total_hours: totalHours });
    }
    if (totalHours === 0) {
      throw new TimesheetError("total_hours_zero", "total hours validation failed: total hours cannot be zero");
    }
  }

  /** Append a rule; it runs after every rule already registered. */
  addRule(rule: ValidationRule): void {
    this.rules.push(rule);
    this.logger.debug("custom validation rule added", { rule: rule.name });
  }

  /** Remove the first rule with this name. Returns false if none matched. */
  removeRule(name: string): boolean {
    const index = this.rules.findIndex((rule) => rule.name === name);
    if (index === -1) return false;

    this.rules.splice(index, 1);
    this.logger.debug("validation rule removed", { rule: name });
    return true;
  }

  getRules(): ValidationRule[] {
    return [...this.rules];
  }
}
