import { TimesheetError } from "../core/errors.js";
import { FORMAT_NAMES, type FormatInfo, type FormatName } from "./types.js";

const MIN_COLUMNS = 3;
const MAX_COLUMNS = 50;

const DELIMITERS: Record<FormatName, string> = {
  standard: ",",
  rfc4180: ",",
  excel: ",",
  tab: "\t",
  tsv: "\t",
  semicolon: ";",
};

/** Formats whose reader tolerates stray quotes */
const LENIENT_QUOTES = new Set<FormatName>(["excel"]);

export function isSupportedFormat(name: string): name is FormatName {
  return FORMAT_NAMES.some((format) => format === name);
}

export function formatInfo(name: FormatName): FormatInfo {
  return { name, delimiter: DELIMITERS[name], hasHeader: true, encoding: "UTF-8" };
}

export function hasLenientQuotes(name: FormatName): boolean {
  return LENIENT_QUOTES.has(name);
}

function count(line: string, ch: string): number {
  let n = 0;
  for (const c of line) if (c === ch) n++;
  return n;
}

/**
 * Infer the delimiter from the first line only. Comma, tab and semicolon
 * are the only candidates; a line mixing them is rejected as ambiguous.
 */
export function detectFormat(content: string): FormatInfo {
  const firstLine = content.split("\n")[0].trim();
  if (firstLine === "") {
    throw new TimesheetError("cannot_detect_format", "cannot detect format of empty content");
  }

  const commas = count(firstLine, ",");
  const tabs = count(firstLine, "\t");
  const semicolons = count(firstLine, ";");

  const kinds = [commas, tabs, semicolons].filter((n) => n > 0).length;
  if (kinds > 1) {
    throw new TimesheetError(
      "ambiguous_format",
      "ambiguous format: multiple delimiter types detected, specify the format explicitly"
    );
  }
  if (kinds === 0) {
    throw new TimesheetError("no_delimiters", "no delimiters found in first line");
  }

  const columns = Math.max(commas, tabs, semicolons) + 1;
  if (columns < MIN_COLUMNS) {
    throw new TimesheetError(
      "too_few_columns",
      `too few columns detected (${columns}), need at least ${MIN_COLUMNS} for work items`
    );
  }
  if (columns > MAX_COLUMNS) {
    throw new TimesheetError(
      "too_many_columns",
      `too many columns detected (${columns}), maximum supported is ${MAX_COLUMNS}`
    );
  }

  if (tabs > commas && tabs > semicolons) return formatInfo("tab");
  if (semicolons > commas && semicolons > tabs) return formatInfo("semicolon");
  return formatInfo("standard");
}
