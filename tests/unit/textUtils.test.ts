/**
 * Unit tests for code point and character class helpers
 */

import { describe, it, expect } from "vitest";
import {
  codePointsOf,
  foldAsciiCase,
  isAlphanumeric,
  isAsciiDigit,
  utf16Length,
} from "@/utils";

describe("codePointsOf", () => {
  it("should yield nothing for the empty string", () => {
    expect([...codePointsOf("")]).toEqual([]);
  });

  it("should decode surrogate pairs into single code points", () => {
    expect([...codePointsOf("a😀b")]).toEqual([0x61, 0x1f600, 0x62]);
  });

  it("should report UTF-16 lengths", () => {
    expect(utf16Length(0xffff)).toBe(1);
    expect(utf16Length(0x10000)).toBe(2);
  });
});

describe("character classes", () => {
  it("should recognize only ASCII digits as digits", () => {
    expect(isAsciiDigit(0x30)).toBe(true);
    expect(isAsciiDigit(0x39)).toBe(true);
    expect(isAsciiDigit(0x2f)).toBe(false);
    expect(isAsciiDigit(0x661)).toBe(false); // ARABIC-INDIC DIGIT ONE
  });

  it("should treat letters and numbers of any script as alphanumeric", () => {
    expect(isAlphanumeric(0x61)).toBe(true);
    expect(isAlphanumeric(0x5a)).toBe(true);
    expect(isAlphanumeric(0x35)).toBe(true);
    expect(isAlphanumeric(0x4e2d)).toBe(true); // 中
    expect(isAlphanumeric(0x661)).toBe(true);
  });

  it("should treat punctuation, whitespace and symbols as non-alphanumeric", () => {
    expect(isAlphanumeric(0x2d)).toBe(false); // -
    expect(isAlphanumeric(0x20)).toBe(false);
    expect(isAlphanumeric(0x5f)).toBe(false); // _
    expect(isAlphanumeric(0x1fa70)).toBe(false); // emoji
    expect(isAlphanumeric(0x301)).toBe(false); // combining mark
  });

  it("should fold only ASCII upper case", () => {
    expect(foldAsciiCase(0x41)).toBe(0x61);
    expect(foldAsciiCase(0x5a)).toBe(0x7a);
    expect(foldAsciiCase(0x61)).toBe(0x61);
    expect(foldAsciiCase(0x40)).toBe(0x40);
    expect(foldAsciiCase(0xc1)).toBe(0xc1);
  });
});
