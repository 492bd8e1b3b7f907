/**
 * Unit tests for the lexicographic stream comparator
 */

import { describe, it, expect } from "vitest";
import { compareCharStreams } from "@/compare/lexical";
import { iterateCodePoints, iterateTransliterated } from "@/iter";

function cmpRaw(lhs: string, rhs: string): number {
  return compareCharStreams(iterateCodePoints(lhs), iterateCodePoints(rhs));
}

function cmpFolded(lhs: string, rhs: string): number {
  return compareCharStreams(
    iterateTransliterated(lhs, { caseInsensitive: true }),
    iterateTransliterated(rhs, { caseInsensitive: true }),
  );
}

describe("compareCharStreams", () => {
  it("should report equal streams", () => {
    expect(cmpRaw("", "")).toBe(0);
    expect(cmpRaw("abc", "abc")).toBe(0);
  });

  it("should decide on the first mismatch by code point", () => {
    expect(cmpRaw("abc", "abd")).toBe(-1);
    expect(cmpRaw("b", "a")).toBe(1);
    expect(cmpRaw("B", "a")).toBe(-1);
    expect(cmpRaw("-$", "-a")).toBe(-1);
  });

  it("should put the stream that ends first first", () => {
    expect(cmpRaw("ab", "abc")).toBe(-1);
    expect(cmpRaw("abc", "ab")).toBe(1);
    expect(cmpRaw("", "a")).toBe(-1);
  });

  it("should compare folded streams as equal when only accents or case differ", () => {
    expect(cmpFolded("á", "a")).toBe(0);
    expect(cmpFolded("straße", "strasse")).toBe(0);
    expect(cmpFolded("Foo", "fóò")).toBe(0);
    expect(cmpFolded("æ", "AE")).toBe(0);
  });

  it("should stop reading at the first difference", () => {
    let pulled = 0;
    function* counting(): Generator<number, void, undefined> {
      for (const codePoint of [0x61, 0x62, 0x63, 0x64]) {
        pulled++;
        yield codePoint;
      }
    }

    expect(compareCharStreams(counting(), iterateCodePoints("ax"))).toBe(-1);
    expect(pulled).toBe(2);
  });
});
