import { describe, it, expect } from "vitest";
import { buildHeaderMap, normalizeHeader } from "../../src/parsers/headers.js";
import { TimesheetError } from "../../src/core/errors.js";
import { thrown } from "./helpers.js";

describe("Story 1.5: Header normalization", () => {
  it.each([
    [" Work_Date ", "date"],
    ["Day", "date"],
    ["HOURS_WORKED", "hours"],
    ["Duration", "hours"],
    ["Billing_Rate", "rate"],
    ["hourly_rate", "rate"],
    ["Notes", "description"],
    ["Task", "description"],
    ["Client", "client"],
  ])("normalizes %j to %j", (raw, expected) => {
    expect(normalizeHeader(raw)).toBe(expected);
  });

  it("is idempotent", () => {
    for (const raw of ["Work_Date", "Time", "DESC", "Project Code"]) {
      const once = normalizeHeader(raw);
      expect(normalizeHeader(once)).toBe(once);
    }
  });

  it("passes replacement characters through untouched", () => {
    expect(normalizeHeader("\uFFFDDate")).toBe("\uFFFDdate");
  });

  it("does not treat object prototype names as aliases", () => {
    expect(normalizeHeader("constructor")).toBe("constructor");
  });
});

describe("Story 1.6: Header map", () => {
  it("maps canonical fields and extra columns to their indices", () => {
    expect(buildHeaderMap(["Date", "Hours", "Rate", "Description", "Client"])).toEqual({
      date: 0,
      hours: 1,
      rate: 2,
      description: 3,
      client: 4,
    });
  });

  it("lets a later duplicate win", () => {
    expect(buildHeaderMap(["Date", "Hours", "Rate", "Notes", "Description"]).description).toBe(4);
  });

  it("rejects a header without a rate column", () => {
    const err = thrown(() => buildHeaderMap(["Date", "Hours", "Description"]));
    expect(err).toBeInstanceOf(TimesheetError);
    expect(err).toMatchObject({
      kind: "missing_header_field",
      field: "rate",
      message: "required field not found in header: rate",
    });
  });
});
