/** Every failure the parser and validator can raise, by category. */
export type ErrorKind =
  // structural — abort before any row is processed
  | "empty_input"
  | "read_failed"
  | "cannot_detect_format"
  | "ambiguous_format"
  | "no_delimiters"
  | "too_few_columns"
  | "too_many_columns"
  | "unsupported_format"
  | "missing_header_field"
  // per row
  | "empty_row"
  | "row_no_data"
  | "field_missing"
  | "field_empty"
  | "unsupported_date_format"
  | "invalid_date"
  | "invalid_number"
  | "rule_failed"
  | "validation_failed"
  | "row_failed"
  // batch
  | "no_work_items"
  | "date_range_too_large"
  | "total_hours_zero";

export interface ErrorContext {
  line?: number;
  field?: string;
  value?: string;
  cause?: unknown;
}

export class TimesheetError extends Error {
  readonly kind: ErrorKind;
  readonly line?: number;
  readonly field?: string;
  readonly value?: string;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "TimesheetError";
    this.kind = kind;
    this.line = context.line;
    this.field = context.field;
    this.value = context.value;
  }
}

/** Raised when the caller's AbortSignal fires. Never a TimesheetError. */
export class CancelledError extends Error {
  constructor(reason?: unknown) {
    super("operation cancelled", reason === undefined ? undefined : { cause: reason });
    this.name = "CancelledError";
  }
}

export function isTimesheetError(err: unknown, kind?: ErrorKind): err is TimesheetError {
  return err instanceof TimesheetError && (kind === undefined || err.kind === kind);
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const SUGGESTIONS: Partial<Record<ErrorKind, string>> = {
  empty_row: "Remove the empty line or enable skipping of empty rows",
  row_no_data: "Remove the blank row or enable skipping of empty rows",
  field_missing: "Add the missing column value to this row",
  field_empty: "Fill in the empty field",
  unsupported_date_format: "Use YYYY-MM-DD, MM/DD/YYYY or 'Jan 15, 2024' style dates",
  invalid_date: "Use YYYY-MM-DD, MM/DD/YYYY or 'Jan 15, 2024' style dates",
  invalid_number: "Use a plain decimal number such as 7.5",
  rule_failed: "Correct the value so it passes the named rule",
  validation_failed: "Correct the value so it passes the named rule",
  missing_header_field: "Add a header column for date, hours, rate and description",
  ambiguous_format: "Pass the format explicitly (standard, tab, semicolon, ...)",
};

/** Short hint shown next to a failed line */
export function suggestionFor(kind: ErrorKind): string {
  return SUGGESTIONS[kind] ?? "";
}
