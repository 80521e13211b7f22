import Papa from "papaparse";
import { throwIfCancelled } from "../core/cancel.js";
import { TimesheetError, isTimesheetError, suggestionFor } from "../core/errors.js";
import type { IdGenerator } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import type { TimesheetValidator } from "../core/validator.js";
import { createWorkItem, type WorkItem } from "../core/work-item.js";
import { parseDate } from "./dates.js";
import { detectFormat, formatInfo, hasLenientQuotes, isSupportedFormat } from "./format.js";
import { buildHeaderMap } from "./headers.js";
import { readSource } from "./source.js";
import type {
  CanonicalField,
  FormatInfo,
  HeaderMap,
  ParseError,
  ParseOptions,
  ParseResult,
  RawRow,
  TimesheetSource,
} from "./types.js";

export interface TimesheetParserOptions {
  now?: () => Date;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strict decimal text → number; rejects "", hex, Infinity and NaN */
function parseDecimal(field: "hours" | "rate", raw: string, line: number): number {
  const text = raw.trim();
  if (!DECIMAL.test(text)) {
    throw new TimesheetError("invalid_number", `invalid ${field} '${raw}': not a decimal number`, {
      line,
      field,
      value: raw,
    });
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new TimesheetError("invalid_number", `invalid ${field} '${raw}': value out of range`, {
      line,
      field,
      value: raw,
    });
  }
  return value;
}

function fieldValue(row: RawRow, headerMap: HeaderMap, field: CanonicalField, line: number): string {
  const index = headerMap[field];
  if (index >= row.length) {
    throw new TimesheetError("field_missing", `field missing in row: ${field}`, { line, field });
  }

  const value = row[index].trim();
  if (value === "") {
    throw new TimesheetError("field_empty", `field is empty: ${field}`, { line, field });
  }
  return value;
}

/**
 * Drop spaces between a delimiter (or line start) and an opening quote, so
 * `a, "b, c"` reads as two fields. Quoted content is copied untouched.
 */
export function trimSpaceBeforeQuotes(content: string, delimiter: string): string {
  let out = "";
  let inQuotes = false;
  let fieldStart = true;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuotes) {
      out += ch;
      if (ch === '"') {
        if (content[i + 1] === '"') {
          out += '"';
          i++;
        } else {
          inQuotes = false;
        }
      }
      continue;
    }

    if (fieldStart && ch === " ") {
      let j = i;
      while (content[j] === " ") j++;
      if (content[j] === '"') {
        i = j - 1;
        continue;
      }
    }

    out += ch;
    if (fieldStart && ch === '"') {
      inQuotes = true;
      fieldStart = false;
      continue;
    }
    fieldStart = ch === delimiter || ch === "\n" || ch === "\r";
  }

  return out;
}

function toParseError(err: TimesheetError, line: number, row: RawRow, message: string): ParseError {
  return {
    line,
    column: err.field ?? "",
    value: err.value ?? "",
    message,
    suggestion: suggestionFor(err.kind),
    row,
  };
}

/**
 * TimesheetParser — reads delimiter-separated timesheet text into
 * validated WorkItems.
 *
 * The whole input is buffered, the header is mapped once, then each data
 * row is parsed and validated in order. With `continueOnError` a failing
 * row becomes a ParseError and the scan moves on; without it the first
 * failure aborts the parse and nothing is returned.
 */
export class TimesheetParser {
  private readonly now: () => Date;

  constructor(
    private readonly validator: TimesheetValidator,
    private readonly logger: Logger,
    private readonly idGenerator: IdGenerator,
    options: TimesheetParserOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async parseTimesheet(source: TimesheetSource, options: ParseOptions = {}): Promise<ParseResult> {
    const { signal } = options;
    throwIfCancelled(signal);

    this.logger.info("starting timesheet parsing", {
      format: options.format ?? "auto",
      continue_on_error: options.continueOnError ?? false,
      ...(options.dateFormat ? { date_format: options.dateFormat } : {}),
    });

    const content = await readSource(source, signal);
    if (content.trim() === "") {
      throw new TimesheetError("empty_input", "timesheet data is empty");
    }

    const format = this.resolveFormat(content, options.format);
    const rows = this.readRows(content, format, options.skipEmptyRows ?? false);
    if (rows.length === 0) {
      throw new TimesheetError("empty_input", "timesheet data is empty");
    }

    let headerMap: HeaderMap;
    try {
      headerMap = buildHeaderMap(rows[0]);
    } catch (err) {
      if (!isTimesheetError(err)) throw err;
      throw new TimesheetError(err.kind, `header processing failed: ${err.message}`, {
        line: 1,
        field: err.field,
        cause: err,
      });
    }
    this.logger.debug("header processed", { fields: Object.keys(headerMap).length, header_map: headerMap });

    throwIfCancelled(signal);

    const workItems: WorkItem[] = [];
    const errors: ParseError[] = [];

    for (let i = 1; i < rows.length; i++) {
      throwIfCancelled(signal);

      const line = i + 1;
      const row = rows[i];

      let item: WorkItem;
      try {
        item = this.parseRow(row, headerMap, line);
      } catch (err) {
        if (!isTimesheetError(err)) throw err;
        errors.push(toParseError(err, line, row, err.message));
        if (!options.continueOnError) {
          this.logger.error("timesheet parsing aborted", { line, error: err.message });
          throw new TimesheetError("row_failed", `parsing failed at line ${line}: ${err.message}`, {
            line,
            field: err.field,
            value: err.value,
            cause: err,
          });
        }
        continue;
      }

      try {
        this.validator.validateWorkItem(item);
      } catch (err) {
        if (!isTimesheetError(err)) throw err;
        errors.push(toParseError(err, line, row, `validation failed: ${err.message}`));
        if (!options.continueOnError) {
          this.logger.error("timesheet validation aborted", { line, error: err.message });
          throw new TimesheetError("validation_failed", `validation failed at line ${line}: ${err.message}`, {
            line,
            field: err.field,
            cause: err,
          });
        }
        continue;
      }

      workItems.push(item);
    }

    const result: ParseResult = {
      workItems,
      totalRows: rows.length - 1,
      successRows: workItems.length,
      errorRows: errors.length,
      errors,
      headerMap,
      format: format.name,
    };

    this.logger.info("timesheet parsing completed", {
      total_rows: result.totalRows,
      success_rows: result.successRows,
      error_rows: result.errorRows,
    });

    return result;
  }

  /**
   * Turn one raw row into a WorkItem. Either every field converts or the
   * row fails as a whole.
   */
  parseRow(row: RawRow, headerMap: HeaderMap, line: number, signal?: AbortSignal): WorkItem {
    throwIfCancelled(signal);

    if (row.length === 0) {
      throw new TimesheetError("empty_row", "empty row", { line });
    }

    const dateText = fieldValue(row, headerMap, "date", line);
    const hoursText = fieldValue(row, headerMap, "hours", line);
    const rateText = fieldValue(row, headerMap, "rate", line);
    const description = fieldValue(row, headerMap, "description", line);

    const now = this.now();
    let date: Date;
    try {
      date = parseDate(dateText, now);
    } catch (err) {
      if (!isTimesheetError(err)) throw err;
      throw new TimesheetError("invalid_date", `invalid date '${dateText}': ${err.message}`, {
        line,
        field: "date",
        value: dateText,
        cause: err,
      });
    }

    const hours = parseDecimal("hours", hoursText, line);
    const rate = parseDecimal("rate", rateText, line);

    return createWorkItem(
      { id: this.idGenerator.generateId(), date, hours, rate, description },
      now
    );
  }

  async detectFormat(source: TimesheetSource, signal?: AbortSignal): Promise<FormatInfo> {
    throwIfCancelled(signal);

    const content = await readSource(source, signal);
    const format = detectFormat(content);

    this.logger.debug("format detection completed", {
      detected_format: format.name,
      delimiter: JSON.stringify(format.delimiter),
    });
    return format;
  }

  /** Detect the format and confirm it is one this parser reads */
  async validateFormat(source: TimesheetSource, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);

    const format = await this.detectFormat(source, signal);
    if (!isSupportedFormat(format.name)) {
      throw new TimesheetError("unsupported_format", `unsupported CSV format: ${format.name}`);
    }
  }

  private resolveFormat(content: string, requested?: string): FormatInfo {
    if (requested === undefined) {
      const detected = detectFormat(content);
      this.logger.debug("format detected", { format: detected.name });
      return detected;
    }
    if (!isSupportedFormat(requested)) {
      throw new TimesheetError("unsupported_format", `unsupported CSV format: ${requested}`, {
        value: requested,
      });
    }
    return formatInfo(requested);
  }

  private readRows(content: string, format: FormatInfo, skipEmptyRows: boolean): RawRow[] {
    const parsed = Papa.parse<string[]>(trimSpaceBeforeQuotes(content, format.delimiter), {
      delimiter: format.delimiter,
      quoteChar: '"',
      header: false,
      skipEmptyLines: skipEmptyRows ? "greedy" : true,
    });

    if (!hasLenientQuotes(format.name)) {
      const quoteError = parsed.errors.find((e) => e.type === "Quotes");
      if (quoteError) {
        const line = (quoteError.row ?? 0) + 1;
        throw new TimesheetError(
          "read_failed",
          `failed to read CSV data: ${quoteError.message} (line ${line})`,
          { line }
        );
      }
    }

    return parsed.data;
  }
}
