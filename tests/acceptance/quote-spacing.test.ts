import { describe, it, expect } from "vitest";
import { trimSpaceBeforeQuotes } from "../../src/parsers/csv.js";

describe("Story 5.8: Spaces before quoted fields", () => {
  it("drops spaces between a delimiter and an opening quote", () => {
    expect(trimSpaceBeforeQuotes('a, "b, c"\n  "d";x', ",")).toBe('a,"b, c"\n"d";x');
  });

  it("keeps spaces in unquoted fields and inside quotes", () => {
    expect(trimSpaceBeforeQuotes('a, b,"x, ""y"""', ",")).toBe('a, b,"x, ""y"""');
  });

  it("follows the given delimiter", () => {
    expect(trimSpaceBeforeQuotes('a;  "b; c"', ";")).toBe('a;"b; c"');
    expect(trimSpaceBeforeQuotes('a;  "b"', ",")).toBe('a;  "b"');
  });
});
