/**
 * Lexicographic comparison of two character producers
 */

import type { CharProducer } from "@/types/iter";
import type { Ordering } from "@/types/ordering";
import { ORDERING } from "@/constants/ordering";
import { compareCodePoint } from "./tieBreak";

/**
 * Walks both producers in lock-step and stops at the first difference.
 *
 * The producer that runs out first is less; if both run out together
 * the streams are equal.
 */
export function compareCharStreams(
  lhs: CharProducer,
  rhs: CharProducer,
): Ordering {
  for (;;) {
    const left = lhs.next();
    const right = rhs.next();

    if (left.done) {
      return right.done ? ORDERING.Equal : ORDERING.Less;
    }
    if (right.done) {
      return ORDERING.Greater;
    }
    if (left.value !== right.value) {
      return compareCodePoint(left.value, right.value);
    }
  }
}
