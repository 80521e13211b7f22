import { TimesheetError } from "../core/errors.js";

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

type Part = "year" | "month" | "day" | "monthName" | "hour" | "minute" | "second";

interface DatePattern {
  name: string;
  regex: RegExp;
  parts: Part[];
}

interface DateParts {
  year?: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

// Order matters: US wins over EU for 01/02/2024, and the strict
// two-digit patterns run before their one-or-two-digit siblings.
const FULL_YEAR: DatePattern[] = [
  { name: "YYYY-MM-DD", regex: /^(\d{4})-(\d{2})-(\d{2})$/, parts: ["year", "month", "day"] },
  { name: "MM/DD/YYYY", regex: /^(\d{2})\/(\d{2})\/(\d{4})$/, parts: ["month", "day", "year"] },
  { name: "DD/MM/YYYY", regex: /^(\d{2})\/(\d{2})\/(\d{4})$/, parts: ["day", "month", "year"] },
  { name: "YYYY/MM/DD", regex: /^(\d{4})\/(\d{2})\/(\d{2})$/, parts: ["year", "month", "day"] },
  { name: "Mon D, YYYY", regex: /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/, parts: ["monthName", "day", "year"] },
  { name: "Month D, YYYY", regex: /^([A-Za-z]{4,9}) (\d{1,2}), (\d{4})$/, parts: ["monthName", "day", "year"] },
  {
    name: "YYYY-MM-DD HH:MM:SS",
    regex: /^(\d{4})-(\d{2})-(\d{2}) (\d{1,2}):(\d{2}):(\d{2})$/,
    parts: ["year", "month", "day", "hour", "minute", "second"],
  },
];

const TWO_DIGIT_YEAR: DatePattern[] = [
  { name: "MM/DD/YY", regex: /^(\d{2})\/(\d{2})\/(\d{2})$/, parts: ["month", "day", "year"] },
  { name: "DD/MM/YY", regex: /^(\d{2})\/(\d{2})\/(\d{2})$/, parts: ["day", "month", "year"] },
  { name: "M/D/YY", regex: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, parts: ["month", "day", "year"] },
  { name: "D/M/YY", regex: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, parts: ["day", "month", "year"] },
  { name: "YY-MM-DD", regex: /^(\d{2})-(\d{2})-(\d{2})$/, parts: ["year", "month", "day"] },
];

const NO_YEAR: DatePattern[] = [
  { name: "MM/DD", regex: /^(\d{2})\/(\d{2})$/, parts: ["month", "day"] },
  { name: "M/D", regex: /^(\d{1,2})\/(\d{1,2})$/, parts: ["month", "day"] },
  { name: "Mon D", regex: /^([A-Za-z]{3}) (\d{1,2})$/, parts: ["monthName", "day"] },
];

/** Two-digit years: 00–50 → 2000–2050, 51–99 → 1951–1999 */
export const TWO_DIGIT_YEAR_PIVOT = 50;

/** A no-year date further than this ahead of now is read as last year */
export const NO_YEAR_FUTURE_MONTHS = 6;

function isLeap(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeap(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function monthFromName(name: string, abbreviated: boolean): number | undefined {
  const lower = name.toLowerCase();
  const index = abbreviated
    ? MONTHS.findIndex((m) => m.slice(0, 3) === lower)
    : MONTHS.indexOf(lower);
  return index === -1 ? undefined : index + 1;
}

function match(pattern: DatePattern, text: string): DateParts | undefined {
  const m = pattern.regex.exec(text);
  if (!m) return undefined;

  const out: DateParts = { month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (let i = 0; i < pattern.parts.length; i++) {
    const part = pattern.parts[i];
    const raw = m[i + 1];
    if (part === "monthName") {
      const month = monthFromName(raw, raw.length === 3);
      if (month === undefined) return undefined;
      out.month = month;
    } else {
      out[part] = Number(raw);
    }
  }

  if (out.month < 1 || out.month > 12) return undefined;
  // No year yet: validate against a leap year so Feb 29 is accepted
  const checkYear = out.year ?? 2000;
  if (out.day < 1 || out.day > daysInMonth(checkYear, out.month)) return undefined;
  if (out.hour > 23 || out.minute > 59 || out.second > 59) return undefined;
  return out;
}

function toDate(year: number, p: DateParts): Date {
  const date = new Date(Date.UTC(2000, p.month - 1, p.day, p.hour, p.minute, p.second));
  // setUTCFullYear keeps years 0–99 literal, unlike the Date.UTC constructor
  date.setUTCFullYear(year);
  return date;
}

function expandTwoDigitYear(yy: number): number {
  return yy <= TWO_DIGIT_YEAR_PIVOT ? 2000 + yy : 1900 + yy;
}

/**
 * Current year, unless that lands more than six months after `now`;
 * then the previous year ("Dec 15" typed in January means last December).
 */
function inferYear(p: DateParts, now: Date): Date {
  const candidate = new Date(Date.UTC(now.getUTCFullYear(), p.month - 1, p.day));

  const limit = new Date(now.getTime());
  limit.setUTCMonth(limit.getUTCMonth() + NO_YEAR_FUTURE_MONTHS);

  if (candidate.getTime() > limit.getTime()) {
    candidate.setUTCFullYear(candidate.getUTCFullYear() - 1);
  }
  return candidate;
}

/**
 * Parse a free-form timesheet date.
 *
 * Full four-digit-year formats are tried first, then two-digit years,
 * then dates with no year at all. The first pattern that matches wins.
 * `now` only matters for the no-year case.
 *
 * @throws TimesheetError `unsupported_date_format` when nothing matches
 */
export function parseDate(text: string, now: Date = new Date()): Date {
  const value = text.trim();

  if (value !== "") {
    for (const pattern of FULL_YEAR) {
      const p = match(pattern, value);
      if (p?.year !== undefined) return toDate(p.year, p);
    }

    for (const pattern of TWO_DIGIT_YEAR) {
      const p = match(pattern, value);
      if (p?.year !== undefined) return toDate(expandTwoDigitYear(p.year), p);
    }

    for (const pattern of NO_YEAR) {
      const p = match(pattern, value);
      if (p) return inferYear(p, now);
    }
  }

  throw new TimesheetError("unsupported_date_format", "unsupported date format", { value: text });
}
