/**
 * Character classification for comparison
 *
 * ASCII is answered by range checks. Anything else (code points the
 * transliteration table leaves untouched) goes through Unicode
 * property escapes.
 */

import { ASCII_LIMIT } from "@/constants/transliteration";

const UNICODE_ALPHANUMERIC_PATTERN = /^[\p{L}\p{N}]$/u;

const DIGIT_ZERO = 0x30;
const DIGIT_NINE = 0x39;
const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const LOWER_A = 0x61;
const LOWER_Z = 0x7a;
const CASE_OFFSET = LOWER_A - UPPER_A;

export function isAsciiDigit(codePoint: number): boolean {
  return codePoint >= DIGIT_ZERO && codePoint <= DIGIT_NINE;
}

export function isAsciiUpper(codePoint: number): boolean {
  return codePoint >= UPPER_A && codePoint <= UPPER_Z;
}

/**
 * Letters and numbers of any script.
 */
export function isAlphanumeric(codePoint: number): boolean {
  if (codePoint < ASCII_LIMIT) {
    return (
      isAsciiDigit(codePoint) ||
      isAsciiUpper(codePoint) ||
      (codePoint >= LOWER_A && codePoint <= LOWER_Z)
    );
  }
  return UNICODE_ALPHANUMERIC_PATTERN.test(String.fromCodePoint(codePoint));
}

/**
 * Maps ASCII A-Z to a-z; every other code point is returned as is.
 */
export function foldAsciiCase(codePoint: number): number {
  return isAsciiUpper(codePoint) ? codePoint + CASE_OFFSET : codePoint;
}

/**
 * Lower-case form of a single character, as a string: one code point
 * may lower-case to several ("İ" to "i" plus a combining dot).
 */
export function lowerCaseOf(codePoint: number): string {
  return String.fromCodePoint(codePoint).toLowerCase();
}
