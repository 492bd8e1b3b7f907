/**
 * Comparison configuration types
 */

/**
 * How the folded character streams are compared.
 *
 * - lexical: character by character
 * - natural: digit runs compare by numeric value, separators are skipped
 */
export type OrderingMode = "lexical" | "natural";

type BaseCompareOptions = {
  /**
   * Fold letters to lower case before comparing (default true).
   *
   * Table replacements are folded as ASCII; letters without a table
   * entry are folded with their Unicode lower case ("Ա" like "ա").
   */
  caseInsensitive?: boolean;
  /**
   * Fold characters to their closest ASCII representation before
   * comparing (default true). When false the raw code points are
   * compared.
   */
  transliterate?: boolean;
};

export type LexicalCompareOptions = BaseCompareOptions & {
  /** Ordering mode (default "lexical") */
  mode?: "lexical";
  /** Skip characters that are not letters or numbers (default false) */
  onlyAlnum?: boolean;
};

/**
 * Natural mode always skips characters that are not letters or
 * numbers, so it takes no `onlyAlnum` flag.
 */
export type NaturalCompareOptions = BaseCompareOptions & {
  mode: "natural";
  onlyAlnum?: never;
};

/**
 * Caller-facing comparison options. Every field but a natural `mode` is
 * optional.
 */
export type CompareOptions = LexicalCompareOptions | NaturalCompareOptions;

export type ResolvedLexicalCompareOptions = {
  mode: "lexical";
  caseInsensitive: boolean;
  transliterate: boolean;
  onlyAlnum: boolean;
};

export type ResolvedNaturalCompareOptions = {
  mode: "natural";
  caseInsensitive: boolean;
  transliterate: boolean;
};

/**
 * Comparison options with every default applied.
 */
export type ResolvedCompareOptions =
  | ResolvedLexicalCompareOptions
  | ResolvedNaturalCompareOptions;

/**
 * Precomputed comparison key for repeated comparisons of the same string.
 */
export type SortKey = {
  /** The untransformed input, used for the tie-break */
  original: string;
  /** Transliterated (if requested) and case-folded form of the input */
  folded: string;
};
