import { describe, expect, it } from "vitest";

import { hasControlCharacters, normalizeString } from "./strings";

describe("normalizeString", () => {
  it("trims strings and maps blanks and non-strings to null", () => {
    expect(normalizeString("  alice ")).toBe("alice");
    expect(normalizeString("   ")).toBeNull();
    expect(normalizeString(42)).toBeNull();
    expect(normalizeString(null)).toBeNull();
  });
});

describe("hasControlCharacters", () => {
  it("flags tabs, newlines and DEL", () => {
    expect(hasControlCharacters("us\n")).toBe(true);
    expect(hasControlCharacters("a\tb")).toBe(true);
    expect(hasControlCharacters("x\u007f")).toBe(true);
    expect(hasControlCharacters("plain text")).toBe(false);
  });
});
