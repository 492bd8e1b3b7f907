/**
 * Transliteration table type definitions
 *
 * Two forms exist:
 * - TransliterationTableRaw: JSON shape (deserialized from file)
 * - TransliterationTable: compiled form used for lookups
 */

/**
 * Raw table structure as deserialized from JSON.
 */
export type TransliterationTableRaw = {
  /** Table version (semantic versioning) */
  version: string;
  /**
   * Replacements keyed by upper-case hexadecimal code point
   * (e.g. "00E1" for "á"). Values are printable ASCII.
   */
  entries: Record<string, string>;
};

/**
 * Compiled table.
 *
 * Replacements are stored as ASCII code point arrays so producers can
 * emit them without re-scanning strings.
 */
export type TransliterationTable = {
  /** Table version */
  version: string;
  /** Replacement code points indexed by source code point */
  entries: ReadonlyMap<number, readonly number[]>;
};
