/**
 * Transliterating character producers
 *
 * Each producer is a generator: characters are produced on demand, so a
 * comparison that stops at the first difference never looks at the rest
 * of either string.
 */

import type { CharProducer, ProducerOptions } from "@/types/iter";
import { ASCII_LIMIT } from "@/constants/transliteration";
import { codePointsOf } from "@/utils/text/codePoints";
import {
  foldAsciiCase,
  isAlphanumeric,
  lowerCaseOf,
} from "@/utils/text/charClass";
import { lookupReplacement } from "@/transliteration/table";

const CASE_SENSITIVE: ProducerOptions = { caseInsensitive: false };

/**
 * Yields the closest ASCII representation of `text`, one code point at
 * a time. Characters without a table entry pass through unchanged
 * (lower-cased in case-insensitive mode).
 *
 * @example
 * String.fromCodePoint(...iterateTransliterated("Straße")) // "Strasse"
 * String.fromCodePoint(...iterateTransliterated("Æon", { caseInsensitive: true })) // "aeon"
 */
export function* iterateTransliterated(
  text: string,
  options: ProducerOptions = CASE_SENSITIVE,
): Generator<number, void, undefined> {
  const { caseInsensitive } = options;

  for (const codePoint of codePointsOf(text)) {
    if (codePoint < ASCII_LIMIT) {
      yield caseInsensitive ? foldAsciiCase(codePoint) : codePoint;
      continue;
    }

    const replacement = lookupReplacement(codePoint);
    if (replacement === undefined) {
      if (caseInsensitive) {
        yield* codePointsOf(lowerCaseOf(codePoint));
      } else {
        yield codePoint;
      }
      continue;
    }

    for (const ascii of replacement) {
      yield caseInsensitive ? foldAsciiCase(ascii) : ascii;
    }
  }
}

/**
 * Identity producer: the code points of `text` as they are.
 *
 * Used over strings that are already folded (sort keys).
 */
export function iterateCodePoints(text: string): Generator<number, void, undefined> {
  return codePointsOf(text);
}

/**
 * The code points of `text` without transliteration, lower-cased in
 * case-insensitive mode.
 *
 * @example
 * String.fromCodePoint(...iterateCaseFolded("Æon", { caseInsensitive: true })) // "æon"
 */
export function* iterateCaseFolded(
  text: string,
  options: ProducerOptions = CASE_SENSITIVE,
): Generator<number, void, undefined> {
  if (!options.caseInsensitive) {
    yield* codePointsOf(text);
    return;
  }
  for (const codePoint of codePointsOf(text)) {
    if (codePoint < ASCII_LIMIT) {
      yield foldAsciiCase(codePoint);
    } else {
      yield* codePointsOf(lowerCaseOf(codePoint));
    }
  }
}

/**
 * Drops every code point that is not a letter or number.
 */
export function* onlyAlphanumeric(
  producer: CharProducer,
): Generator<number, void, undefined> {
  for (;;) {
    const result = producer.next();
    if (result.done) {
      return;
    }
    if (isAlphanumeric(result.value)) {
      yield result.value;
    }
  }
}

/**
 * Materializes the transliterated form of `text`.
 *
 * For sort keys and display; comparators consume the lazy producer.
 */
export function transliterate(
  text: string,
  options: ProducerOptions = CASE_SENSITIVE,
): string {
  return collectCodePoints(iterateTransliterated(text, options));
}

/**
 * Drains a producer into a string.
 */
export function collectCodePoints(producer: CharProducer): string {
  let result = "";
  for (;;) {
    const next = producer.next();
    if (next.done) {
      return result;
    }
    result += String.fromCodePoint(next.value);
  }
}
