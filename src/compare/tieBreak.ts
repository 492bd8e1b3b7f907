/**
 * Raw code point comparison
 *
 * Used as the final tie-break when two strings fold to the same ASCII
 * stream. Compares Unicode scalar values, not UTF-16 code units, so
 * U+10000 sorts after U+E000.
 */

import type { Ordering } from "@/types/ordering";
import { ORDERING } from "@/constants/ordering";
import { utf16Length } from "@/utils/text/codePoints";

/**
 * Compares two code points.
 */
export function compareCodePoint(lhs: number, rhs: number): Ordering {
  if (lhs === rhs) {
    return ORDERING.Equal;
  }
  return lhs < rhs ? ORDERING.Less : ORDERING.Greater;
}

/**
 * Compares two strings by code point; a proper prefix is less.
 *
 * @example
 * codePointCmp("Foo", "fóò") // -1 ("F" < "f")
 * codePointCmp("\u{10000}", "") // 1
 */
export function codePointCmp(lhs: string, rhs: string): Ordering {
  let lhsIndex = 0;
  let rhsIndex = 0;

  for (;;) {
    const lhsCodePoint = lhs.codePointAt(lhsIndex);
    const rhsCodePoint = rhs.codePointAt(rhsIndex);

    if (lhsCodePoint === undefined) {
      return rhsCodePoint === undefined ? ORDERING.Equal : ORDERING.Less;
    }
    if (rhsCodePoint === undefined) {
      return ORDERING.Greater;
    }
    if (lhsCodePoint !== rhsCodePoint) {
      return compareCodePoint(lhsCodePoint, rhsCodePoint);
    }

    lhsIndex += utf16Length(lhsCodePoint);
    rhsIndex += utf16Length(rhsCodePoint);
  }
}
