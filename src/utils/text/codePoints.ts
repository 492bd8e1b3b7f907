/**
 * Code point helpers
 *
 * Strings are UTF-16 in JavaScript; these helpers walk them by Unicode
 * scalar value so surrogate pairs are handled as single characters.
 */

import { BMP_MAX } from "@/constants/transliteration";

/**
 * Number of UTF-16 code units a code point occupies.
 */
export function utf16Length(codePoint: number): 1 | 2 {
  return codePoint > BMP_MAX ? 2 : 1;
}

/**
 * Lazily yields the code points of a string, left to right.
 *
 * @example
 * [...codePointsOf("a😀")] // [0x61, 0x1f600]
 */
export function* codePointsOf(text: string): Generator<number, void, undefined> {
  let index = 0;
  for (;;) {
    const codePoint = text.codePointAt(index);
    if (codePoint === undefined) {
      return;
    }
    yield codePoint;
    index += utf16Length(codePoint);
  }
}
