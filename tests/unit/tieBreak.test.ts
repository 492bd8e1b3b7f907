/**
 * Unit tests for the code point tie-break
 */

import { describe, it, expect } from "vitest";
import { codePointCmp, compareCodePoint } from "@/compare/tieBreak";

describe("codePointCmp", () => {
  it("should return 0 only for identical strings", () => {
    expect(codePointCmp("", "")).toBe(0);
    expect(codePointCmp("fóò", "fóò")).toBe(0);
  });

  it("should order by the first differing code point", () => {
    expect(codePointCmp("Foo", "fóò")).toBe(-1);
    expect(codePointCmp("fóò", "Foo")).toBe(1);
    expect(codePointCmp("a", "á")).toBe(-1);
    expect(codePointCmp("straße", "strasse")).toBe(1);
  });

  it("should order a proper prefix first", () => {
    expect(codePointCmp("", "-")).toBe(-1);
    expect(codePointCmp("ab", "ab\u{1F600}")).toBe(-1);
    expect(codePointCmp("ab\u{1F600}", "ab")).toBe(1);
  });

  it("should compare scalar values rather than UTF-16 code units", () => {
    // UTF-16 order would put the surrogate pair (0xD800...) first
    expect(codePointCmp("\u{10000}", "\uE000")).toBe(1);
    expect(codePointCmp("\uE000", "\u{10000}")).toBe(-1);
  });

  it("should keep going past equal astral characters", () => {
    expect(codePointCmp("\u{1F600}a", "\u{1F600}b")).toBe(-1);
  });
});

describe("compareCodePoint", () => {
  it("should return an Ordering", () => {
    expect(compareCodePoint(1, 2)).toBe(-1);
    expect(compareCodePoint(2, 2)).toBe(0);
    expect(compareCodePoint(3, 2)).toBe(1);
  });
});
