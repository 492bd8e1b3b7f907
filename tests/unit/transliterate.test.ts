/**
 * Unit tests for the transliterating character producers
 */

import { describe, it, expect } from "vitest";
import {
  collectCodePoints,
  iterateCaseFolded,
  iterateCodePoints,
  iterateTransliterated,
  onlyAlphanumeric,
  PeekableChars,
  transliterate,
} from "@/iter";

function asString(producer: Iterable<number>): string {
  return String.fromCodePoint(...producer);
}

describe("iterateTransliterated", () => {
  it("should expand each character through the table in order", () => {
    expect(asString(iterateTransliterated("Straße"))).toBe("Strasse");
    expect(asString(iterateTransliterated("Ærøskøbing"))).toBe("AEroskobing");
  });

  it("should keep case unless case-insensitive", () => {
    expect(asString(iterateTransliterated("ÆON"))).toBe("AEON");
    expect(
      asString(iterateTransliterated("ÆON", { caseInsensitive: true })),
    ).toBe("aeon");
  });

  it("should fold case of expanded replacements too", () => {
    expect(
      asString(iterateTransliterated("ẞ", { caseInsensitive: true })),
    ).toBe("ss");
  });

  it("should pass unmapped characters through unchanged", () => {
    expect(asString(iterateTransliterated("a中b"))).toBe("a中b");
    expect(
      asString(iterateTransliterated("Ü中", { caseInsensitive: true })),
    ).toBe("u中");
  });

  it("should lower-case unmapped letters when case-insensitive", () => {
    // Armenian capital Ayb has no table entry
    expect(asString(iterateTransliterated("\u0531b"))).toBe("\u0531b");
    expect(
      asString(iterateTransliterated("\u0531B", { caseInsensitive: true })),
    ).toBe("\u0561b");
  });

  it("should lower-case unmapped astral letters", () => {
    expect(
      asString(iterateTransliterated("\u{10400}", { caseInsensitive: true })),
    ).toBe("\u{10428}");
  });

  it("should produce characters lazily", () => {
    const producer = iterateTransliterated("æ😀");

    expect(producer.next()).toEqual({ value: 0x61, done: false });
    expect(producer.next()).toEqual({ value: 0x65, done: false });
    expect(producer.next()).toEqual({ value: 0x3a, done: false });
  });

  it("should produce nothing for the empty string", () => {
    expect(iterateTransliterated("").next().done).toBe(true);
  });

  it("should create independent producers per call", () => {
    const first = iterateTransliterated("ab");
    first.next();
    const second = iterateTransliterated("ab");

    expect(second.next()).toEqual({ value: 0x61, done: false });
  });
});

describe("transliterate", () => {
  it("should materialize the folded string", () => {
    expect(transliterate("Crème brûlée")).toBe("Creme brulee");
    expect(transliterate("½ ﬁle…")).toBe("1/2 file...");
    expect(transliterate("Ok 👍")).toBe("Ok :thumbs_up_sign:");
    expect(transliterate("Ok 👍", { caseInsensitive: true })).toBe(
      "ok :thumbs_up_sign:",
    );
  });
});

describe("iterateCaseFolded", () => {
  it("should keep non-ASCII characters untransliterated", () => {
    expect(asString(iterateCaseFolded("Straße"))).toBe("Straße");
    expect(
      asString(iterateCaseFolded("ÆON Straße", { caseInsensitive: true })),
    ).toBe("æon straße");
  });
});

describe("collectCodePoints", () => {
  it("should drain a producer into a string", () => {
    expect(collectCodePoints(iterateCaseFolded("Ab"))).toBe("Ab");
    expect(collectCodePoints(iterateCodePoints(""))).toBe("");
  });
});

describe("iterateCodePoints", () => {
  it("should yield the string unchanged", () => {
    expect(asString(iterateCodePoints("Straße"))).toBe("Straße");
  });
});

describe("onlyAlphanumeric", () => {
  it("should drop everything but letters and numbers", () => {
    expect(asString(onlyAlphanumeric(iterateTransliterated("f-5, a_b!")))).toBe(
      "f5ab",
    );
  });

  it("should keep unmapped letters", () => {
    expect(asString(onlyAlphanumeric(iterateTransliterated("中-x")))).toBe(
      "中x",
    );
  });
});

describe("PeekableChars", () => {
  it("should peek without consuming", () => {
    const chars = new PeekableChars(iterateCodePoints("ab"));

    expect(chars.peek()).toBe(0x61);
    expect(chars.peek()).toBe(0x61);
    expect(chars.next()).toBe(0x61);
    expect(chars.peek()).toBe(0x62);
    expect(chars.next()).toBe(0x62);
  });

  it("should return undefined once exhausted", () => {
    const chars = new PeekableChars(iterateCodePoints("a"));
    chars.next();

    expect(chars.peek()).toBeUndefined();
    expect(chars.next()).toBeUndefined();
    expect(chars.next()).toBeUndefined();
  });
});
