import { describe, it, expect } from "vitest";
import { parseDate } from "../../src/parsers/dates.js";
import { TimesheetError } from "../../src/core/errors.js";
import { NOW, thrown, utc } from "./helpers.js";

describe("Story 2.1: Dates with a full year", () => {
  it("parses ISO dates", () => {
    expect(parseDate("2024-01-15", NOW)).toEqual(utc(2024, 1, 15));
  });

  it("reads slash dates month-first when both readings are possible", () => {
    expect(parseDate("01/02/2024", NOW)).toEqual(utc(2024, 1, 2));
  });

  it("falls back to day-first when the month would be out of range", () => {
    expect(parseDate("15/01/2024", NOW)).toEqual(utc(2024, 1, 15));
  });

  it("parses year-first slash dates", () => {
    expect(parseDate("2024/03/05", NOW)).toEqual(utc(2024, 3, 5));
  });

  it("parses abbreviated and full month names in any case", () => {
    expect(parseDate("Jan 5, 2024", NOW)).toEqual(utc(2024, 1, 5));
    expect(parseDate("jan 5, 2024", NOW)).toEqual(utc(2024, 1, 5));
    expect(parseDate("January 15, 2024", NOW)).toEqual(utc(2024, 1, 15));
  });

  it("keeps the time of day from timestamp values", () => {
    expect(parseDate("2024-01-15 14:30:00", NOW)).toEqual(
      new Date(Date.UTC(2024, 0, 15, 14, 30, 0))
    );
  });

  it("trims surrounding whitespace", () => {
    expect(parseDate("  2024-01-15  ", NOW)).toEqual(utc(2024, 1, 15));
  });

  it("accepts Feb 29 only in leap years", () => {
    expect(parseDate("2024-02-29", NOW)).toEqual(utc(2024, 2, 29));
    expect(() => parseDate("2023-02-29", NOW)).toThrow("unsupported date format");
  });
});

describe("Story 2.2: Two-digit years", () => {
  it("maps 00–50 into the 2000s", () => {
    expect(parseDate("12/25/23", NOW)).toEqual(utc(2023, 12, 25));
    expect(parseDate("01/15/50", NOW)).toEqual(utc(2050, 1, 15));
  });

  it("maps 51–99 into the 1900s", () => {
    expect(parseDate("01/15/51", NOW)).toEqual(utc(1951, 1, 15));
  });

  it("falls back to day-first for two-digit years", () => {
    expect(parseDate("25/12/23", NOW)).toEqual(utc(2023, 12, 25));
  });

  it("accepts single-digit month and day", () => {
    expect(parseDate("1/5/24", NOW)).toEqual(utc(2024, 1, 5));
  });

  it("parses YY-MM-DD", () => {
    expect(parseDate("24-03-10", NOW)).toEqual(utc(2024, 3, 10));
  });
});

describe("Story 2.3: Dates without a year", () => {
  it("uses the previous year when the date would land more than 6 months ahead", () => {
    const newYear = new Date("2025-01-01T00:00:00Z");
    expect(parseDate("9/8", newYear)).toEqual(utc(2024, 9, 8));
  });

  it("uses the current year for recent dates", () => {
    const june = new Date("2024-06-15T00:00:00Z");
    expect(parseDate("03/10", june)).toEqual(utc(2024, 3, 10));
  });

  it("resolves month-name dates the same way", () => {
    const january = new Date("2024-01-10T00:00:00Z");
    expect(parseDate("Dec 15", january)).toEqual(utc(2023, 12, 15));
  });

  it("keeps the current year exactly at the 6-month limit", () => {
    const january = new Date("2024-01-10T00:00:00Z");
    expect(parseDate("7/10", january)).toEqual(utc(2024, 7, 10));
  });
});

describe("Story 2.4: Unparseable dates", () => {
  it.each(["", "   ", "not a date", "2024-13-01", "02/30/2024", "2024.01.15"])(
    "rejects %j",
    (text) => {
      const err = thrown(() => parseDate(text, NOW));
      expect(err).toBeInstanceOf(TimesheetError);
      expect(err).toMatchObject({
        kind: "unsupported_date_format",
        message: "unsupported date format",
      });
    }
  );

  it("gives the same answer for the same input and clock", () => {
    expect(parseDate("03/04/2024", NOW)).toEqual(parseDate("03/04/2024", NOW));
  });
});
