/**
 * Natural comparison of two character producers
 *
 * Both streams are split into tokens on the fly:
 * - digit run: maximal run of ASCII 0-9
 * - word run: maximal run of any other letter or number
 * - separators (everything that is not a letter or number) end the
 *   current token and are otherwise ignored, so "f-5" and "f5" tokenize
 *   identically
 *
 * Tokens are compared pairwise without being materialized. Digit runs
 * compare by numeric value (leading zeros ignored, then length, then
 * first differing digit), word runs lexicographically. When a digit run
 * meets a word run, the digit run is less.
 */

import type { CharProducer } from "@/types/iter";
import type { Ordering } from "@/types/ordering";
import { ORDERING } from "@/constants/ordering";
import { isAlphanumeric, isAsciiDigit } from "@/utils/text/charClass";
import { PeekableChars } from "@/iter/peekable";
import { compareCodePoint } from "./tieBreak";

const DIGIT_ZERO = 0x30;

function isDigit(codePoint: number | undefined): codePoint is number {
  return codePoint !== undefined && isAsciiDigit(codePoint);
}

function isWordChar(codePoint: number | undefined): codePoint is number {
  return (
    codePoint !== undefined &&
    !isAsciiDigit(codePoint) &&
    isAlphanumeric(codePoint)
  );
}

function skipSeparators(chars: PeekableChars): void {
  for (;;) {
    const codePoint = chars.peek();
    if (codePoint === undefined || isAlphanumeric(codePoint)) {
      return;
    }
    chars.next();
  }
}

function skipLeadingZeros(chars: PeekableChars): void {
  while (chars.peek() === DIGIT_ZERO) {
    chars.next();
  }
}

/**
 * Compares the digit runs at the head of both cursors by value.
 *
 * Consumes both runs completely when they are equal.
 */
function compareDigitRuns(lhs: PeekableChars, rhs: PeekableChars): Ordering {
  skipLeadingZeros(lhs);
  skipLeadingZeros(rhs);

  // Significant digits of equal count: the first difference decides
  let firstDifference: Ordering = ORDERING.Equal;

  for (;;) {
    const left = lhs.peek();
    const right = rhs.peek();

    if (!isDigit(left) || !isDigit(right)) {
      if (isDigit(left)) {
        return ORDERING.Greater;
      }
      if (isDigit(right)) {
        return ORDERING.Less;
      }
      return firstDifference;
    }

    if (firstDifference === ORDERING.Equal) {
      firstDifference = compareCodePoint(left, right);
    }
    lhs.next();
    rhs.next();
  }
}

/**
 * Compares the word runs at the head of both cursors lexicographically.
 *
 * Consumes both runs completely when they are equal.
 */
function compareWordRuns(lhs: PeekableChars, rhs: PeekableChars): Ordering {
  for (;;) {
    const left = lhs.peek();
    const right = rhs.peek();

    if (!isWordChar(left) || !isWordChar(right)) {
      if (isWordChar(left)) {
        return ORDERING.Greater;
      }
      if (isWordChar(right)) {
        return ORDERING.Less;
      }
      return ORDERING.Equal;
    }

    if (left !== right) {
      return compareCodePoint(left, right);
    }
    lhs.next();
    rhs.next();
  }
}

/**
 * Token-by-token natural comparison.
 *
 * @example
 * compareNatural(iterateTransliterated("item2"), iterateTransliterated("item10")) // -1
 */
export function compareNatural(lhs: CharProducer, rhs: CharProducer): Ordering {
  const left = new PeekableChars(lhs);
  const right = new PeekableChars(rhs);

  for (;;) {
    skipSeparators(left);
    skipSeparators(right);

    const leftHead = left.peek();
    const rightHead = right.peek();

    if (leftHead === undefined) {
      return rightHead === undefined ? ORDERING.Equal : ORDERING.Less;
    }
    if (rightHead === undefined) {
      return ORDERING.Greater;
    }

    const leftIsDigit = isAsciiDigit(leftHead);
    if (leftIsDigit !== isAsciiDigit(rightHead)) {
      return leftIsDigit ? ORDERING.Less : ORDERING.Greater;
    }

    const tokenOrder = leftIsDigit
      ? compareDigitRuns(left, right)
      : compareWordRuns(left, right);
    if (tokenOrder !== ORDERING.Equal) {
      return tokenOrder;
    }
  }
}
