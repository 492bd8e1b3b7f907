/**
 * Comparison defaults
 */

import type { ResolvedLexicalCompareOptions } from "@/types";

/**
 * Applied to every option the caller leaves out.
 *
 * Lexical, case-insensitive comparison of every transliterated character.
 */
export const DEFAULT_COMPARE_OPTIONS: ResolvedLexicalCompareOptions = {
  mode: "lexical",
  caseInsensitive: true,
  transliterate: true,
  onlyAlnum: false,
};
