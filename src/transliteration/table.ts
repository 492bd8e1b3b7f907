/**
 * Process-wide transliteration table
 *
 * Loaded on first lookup and never mutated afterwards.
 */

import type { TransliterationTable } from "@/types/transliteration";
import { ASCII_LIMIT } from "@/constants/transliteration";
import { loadTransliterationTable } from "./loader";

let cachedTable: TransliterationTable | null = null;

/**
 * Returns the bundled table, loading it on first use.
 */
export function getTransliterationTable(): TransliterationTable {
  if (cachedTable === null) {
    cachedTable = loadTransliterationTable();
  }
  return cachedTable;
}

/**
 * Drops the cached table so the next lookup reloads it. Test use only.
 */
export function resetTransliterationTable(): void {
  cachedTable = null;
}

/**
 * Replacement code points for a non-ASCII code point, or undefined when
 * the table has no entry (the character then passes through unchanged).
 */
export function lookupReplacement(
  codePoint: number,
): readonly number[] | undefined {
  return getTransliterationTable().entries.get(codePoint);
}

/**
 * Closest ASCII representation of a single character.
 *
 * ASCII maps to itself; unknown characters are returned unchanged.
 *
 * @example
 * transliterateChar(0xe1) // "a"
 * transliterateChar(0xdf) // "ss"
 */
export function transliterateChar(codePoint: number): string {
  if (codePoint < ASCII_LIMIT) {
    return String.fromCodePoint(codePoint);
  }
  const replacement = lookupReplacement(codePoint);
  return replacement === undefined
    ? String.fromCodePoint(codePoint)
    : String.fromCharCode(...replacement);
}
