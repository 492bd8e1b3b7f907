/**
 * Comparator composition
 *
 * Every comparator runs in two stages:
 * 1. the primary comparison over the folded streams
 *    (lexical or natural, case-sensitive or not, transliterated or raw)
 * 2. on equality only, codePointCmp over the original strings
 *
 * Stage 2 makes the result a strict total order: distinct strings never
 * compare equal, so "Foo" and "fóò" keep a fixed relative order.
 */

import type {
  CharProducer,
  Comparator,
  CompareOptions,
  Ordering,
  ProducerOptions,
  ResolvedCompareOptions,
} from "@/types";
import { DEFAULT_COMPARE_OPTIONS } from "@/constants/compare";
import { ORDERING } from "@/constants/ordering";
import {
  iterateCaseFolded,
  iterateTransliterated,
  onlyAlphanumeric,
} from "@/iter/transliterate";
import { compareCharStreams } from "./lexical";
import { compareNatural } from "./natural";
import { codePointCmp } from "./tieBreak";

/**
 * Applies defaults to every option the caller left out.
 */
export function resolveCompareOptions(
  options?: CompareOptions,
): ResolvedCompareOptions {
  const caseInsensitive =
    options?.caseInsensitive ?? DEFAULT_COMPARE_OPTIONS.caseInsensitive;
  const transliterate =
    options?.transliterate ?? DEFAULT_COMPARE_OPTIONS.transliterate;

  if (options?.mode === "natural") {
    return { mode: "natural", caseInsensitive, transliterate };
  }
  return {
    mode: "lexical",
    caseInsensitive,
    transliterate,
    onlyAlnum: options?.onlyAlnum ?? DEFAULT_COMPARE_OPTIONS.onlyAlnum,
  };
}

export function toProducerOptions(
  options: ResolvedCompareOptions,
): ProducerOptions {
  return { caseInsensitive: options.caseInsensitive };
}

/**
 * Folded character stream of `text` for the primary stage.
 */
export function createProducer(
  text: string,
  options: ResolvedCompareOptions,
): CharProducer {
  const producerOptions = toProducerOptions(options);
  return options.transliterate
    ? iterateTransliterated(text, producerOptions)
    : iterateCaseFolded(text, producerOptions);
}

/**
 * Primary stage over two already-folded producers.
 */
export function comparePrimary(
  lhs: CharProducer,
  rhs: CharProducer,
  options: ResolvedCompareOptions,
): Ordering {
  if (options.mode === "natural") {
    return compareNatural(lhs, rhs);
  }
  if (options.onlyAlnum) {
    return compareCharStreams(onlyAlphanumeric(lhs), onlyAlphanumeric(rhs));
  }
  return compareCharStreams(lhs, rhs);
}

function compareResolved(
  lhs: string,
  rhs: string,
  options: ResolvedCompareOptions,
): Ordering {
  const primary = comparePrimary(
    createProducer(lhs, options),
    createProducer(rhs, options),
    options,
  );
  return primary !== ORDERING.Equal ? primary : codePointCmp(lhs, rhs);
}

/**
 * Compares two strings with ASCII folding and a code point tie-break.
 *
 * @example
 * compare("straße", "strasse")            // 1 (equal when folded, "ß" > "s")
 * compare("item2", "item10", { mode: "natural" }) // -1
 */
export function compare(
  lhs: string,
  rhs: string,
  options?: CompareOptions,
): Ordering {
  return compareResolved(lhs, rhs, resolveCompareOptions(options));
}

/**
 * Binds options once and returns a comparator for Array.prototype.sort.
 */
export function createComparator(options?: CompareOptions): Comparator {
  const resolved = resolveCompareOptions(options);
  return (lhs: string, rhs: string) => compareResolved(lhs, rhs, resolved);
}

/** Lexical, case-insensitive */
export const lexicalCmp: Comparator = createComparator({
  mode: "lexical",
  caseInsensitive: true,
});

/** Lexical, case-sensitive ("B" < "a") */
export const lexicalCaseSensitiveCmp: Comparator = createComparator({
  mode: "lexical",
  caseInsensitive: false,
});

/** Lexical, case-insensitive, ignoring everything but letters and numbers */
export const lexicalOnlyAlnumCmp: Comparator = createComparator({
  mode: "lexical",
  caseInsensitive: true,
  onlyAlnum: true,
});

/** Natural, case-insensitive */
export const naturalLexicalCmp: Comparator = createComparator({
  mode: "natural",
  caseInsensitive: true,
});

/** Natural, case-sensitive */
export const naturalLexicalCaseSensitiveCmp: Comparator = createComparator({
  mode: "natural",
  caseInsensitive: false,
});

/** Lexical over the raw code points, case-sensitive, letters and numbers only */
export const onlyAlnumCmp: Comparator = createComparator({
  mode: "lexical",
  caseInsensitive: false,
  transliterate: false,
  onlyAlnum: true,
});

/** Natural over the raw code points, case-sensitive */
export const naturalCmp: Comparator = createComparator({
  mode: "natural",
  caseInsensitive: false,
  transliterate: false,
});
