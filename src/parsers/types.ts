import type { WorkItem } from "../core/work-item.js";

export const FORMAT_NAMES = ["standard", "rfc4180", "tab", "tsv", "semicolon", "excel"] as const;

export type FormatName = (typeof FORMAT_NAMES)[number];

export type CanonicalField = "date" | "hours" | "rate" | "description";

export const CANONICAL_FIELDS: readonly CanonicalField[] = ["date", "hours", "rate", "description"];

/** One input line split into fields; no meaning until mapped through the header */
export type RawRow = string[];

/** Normalized header name → zero-based column index */
export type HeaderMap = Record<string, number>;

export interface FormatInfo {
  name: FormatName;
  delimiter: string;
  hasHeader: boolean;
  encoding: string;
}

export interface ParseOptions {
  format?: FormatName;       // explicit format, bypasses detection
  continueOnError?: boolean; // collect row failures instead of aborting
  skipEmptyRows?: boolean;   // also skip rows whose fields are all blank
  dateFormat?: string;       // preferred date format, advisory
  signal?: AbortSignal;
}

export interface ParseError {
  line: number;       // 1-based
  column: string;     // canonical field, "" when not tied to one
  value: string;
  message: string;
  suggestion: string;
  row: RawRow;
}

export interface ParseResult {
  workItems: WorkItem[];
  totalRows: number;
  successRows: number;
  errorRows: number;
  errors: ParseError[];
  headerMap: HeaderMap;
  format: FormatName;
}

/** Anything that yields the raw CSV text — a string, bytes, or a stream */
export type TimesheetSource = string | Uint8Array | AsyncIterable<string | Uint8Array>;
