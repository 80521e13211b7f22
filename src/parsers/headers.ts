import { TimesheetError } from "../core/errors.js";
import { CANONICAL_FIELDS, type CanonicalField, type HeaderMap, type RawRow } from "./types.js";

const ALIASES: Record<string, CanonicalField> = {
  date: "date",
  work_date: "date",
  day: "date",

  hours: "hours",
  time: "hours",
  duration: "hours",
  hours_worked: "hours",

  rate: "rate",
  hourly_rate: "rate",
  hour_rate: "rate",
  billing_rate: "rate",

  description: "description",
  desc: "description",
  task: "description",
  work_description: "description",
  notes: "description",
};

/**
 * Trim + lowercase, then map known aliases to a canonical field.
 * Unknown headers pass through in their trimmed, lowercased form.
 */
export function normalizeHeader(raw: string): string {
  const normalized = raw.trim().toLowerCase();
  return Object.hasOwn(ALIASES, normalized) ? ALIASES[normalized] : normalized;
}

/** Map each header cell to its column; a later duplicate wins. */
export function buildHeaderMap(header: RawRow): HeaderMap {
  const map: HeaderMap = {};
  header.forEach((cell, i) => {
    map[normalizeHeader(cell)] = i;
  });

  for (const field of CANONICAL_FIELDS) {
    if (!Object.hasOwn(map, field)) {
      throw new TimesheetError(
        "missing_header_field",
        `required field not found in header: ${field}`,
        { field }
      );
    }
  }

  return map;
}
