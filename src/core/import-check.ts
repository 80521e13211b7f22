import { isTimesheetError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { TimesheetValidator } from "./validator.js";
import { formatDate, roundCents, type WorkItem } from "./work-item.js";
import type { TimesheetParser } from "../parsers/csv.js";
import type { ParseOptions, ParseResult, TimesheetSource } from "../parsers/types.js";

export type ImportWarningType = "weekend_work" | "high_hours";

export interface ImportWarning {
  type: ImportWarningType;
  message: string;
}

export interface ImportCheck {
  valid: boolean;
  parseResult: ParseResult;
  batchError?: string;
  warnings: ImportWarning[];
  suggestions: string[];
  estimatedTotal: number;
}

const HIGH_HOURS = 10;

export function estimateTotal(items: WorkItem[]): number {
  return roundCents(items.reduce((sum, item) => sum + item.total, 0));
}

export function importWarnings(items: WorkItem[]): ImportWarning[] {
  const warnings: ImportWarning[] = [];

  for (const item of items) {
    const day = item.date.getUTCDay();
    if (day === 0 || day === 6) {
      warnings.push({ type: "weekend_work", message: `Work item on weekend: ${formatDate(item.date)}` });
    }
  }

  for (const item of items) {
    if (item.hours > HIGH_HOURS) {
      warnings.push({
        type: "high_hours",
        message: `High hours on ${formatDate(item.date)}: ${item.hours} hours`,
      });
    }
  }

  return warnings;
}

export function importSuggestions(result: ParseResult, batchError?: string): string[] {
  const suggestions: string[] = [];

  if (result.errorRows > 0) {
    suggestions.push(
      "Check data format in rows with errors",
      "Ensure dates are in YYYY-MM-DD format",
      "Verify numeric fields (hours, rates) contain valid numbers"
    );
  }
  if (batchError !== undefined) {
    suggestions.push(
      "Review work item validation rules",
      "Check for unusual values (very high hours, extreme rates)"
    );
  }
  if (result.workItems.length === 0) {
    suggestions.push(
      "File appears to be empty or header-only",
      "Ensure CSV contains data rows after header"
    );
  }

  return suggestions;
}

/**
 * Dry run of an import: parse, batch-validate and report, without handing
 * the work items to anyone. Structural failures still throw.
 */
export async function checkImport(
  parser: TimesheetParser,
  validator: TimesheetValidator,
  logger: Logger,
  source: TimesheetSource,
  options: ParseOptions = {}
): Promise<ImportCheck> {
  logger.info("starting import validation", { format: options.format ?? "auto" });

  const parseResult = await parser.parseTimesheet(source, options);

  let batchError: string | undefined;
  try {
    validator.validateBatch(parseResult.workItems, options.signal);
  } catch (err) {
    if (!isTimesheetError(err)) throw err;
    batchError = err.message;
  }

  const check: ImportCheck = {
    valid: parseResult.errorRows === 0 && batchError === undefined,
    parseResult,
    batchError,
    warnings: importWarnings(parseResult.workItems),
    suggestions: importSuggestions(parseResult, batchError),
    estimatedTotal: estimateTotal(parseResult.workItems),
  };

  logger.info("import validation completed", {
    valid: check.valid,
    work_items: parseResult.workItems.length,
  });
  return check;
}
