/**
 * Transliteration table validation module
 *
 * Validates table JSON structure and enforces invariants:
 * - Non-empty version string
 * - Keys are hexadecimal code points outside ASCII and not surrogates
 * - Values are non-empty printable ASCII
 *
 * Validation is fail-fast: throws on first error.
 */

import type { TransliterationTableRaw } from "@/types/transliteration";
import {
  ASCII_LIMIT,
  CODE_POINT_KEY_PATTERN,
  MAX_CODE_POINT,
  PRINTABLE_ASCII_MAX,
  PRINTABLE_ASCII_MIN,
  SURROGATE_MAX,
  SURROGATE_MIN,
} from "@/constants/transliteration";

/**
 * Error thrown when transliteration table validation fails.
 */
export class TransliterationTableError extends Error {
  constructor(message: string) {
    super(`Transliteration table invalid: ${message}`);
    this.name = "TransliterationTableError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a table key names a non-ASCII Unicode scalar value.
 *
 * @param key - Entry key (e.g. "00E1")
 * @returns The code point the key names
 * @throws {TransliterationTableError} If the key is malformed or out of range
 */
function validateCodePointKey(key: string): number {
  if (!CODE_POINT_KEY_PATTERN.test(key)) {
    throw new TransliterationTableError(
      `entries key "${key}" must be 4 to 6 upper-case hex digits`,
    );
  }
  const codePoint = parseInt(key, 16);
  if (codePoint < ASCII_LIMIT) {
    throw new TransliterationTableError(
      `entries key "${key}" is ASCII; ASCII maps to itself`,
    );
  }
  if (codePoint > MAX_CODE_POINT) {
    throw new TransliterationTableError(
      `entries key "${key}" is beyond U+10FFFF`,
    );
  }
  if (codePoint >= SURROGATE_MIN && codePoint <= SURROGATE_MAX) {
    throw new TransliterationTableError(
      `entries key "${key}" is a surrogate, not a scalar value`,
    );
  }
  return codePoint;
}

/**
 * Validates a replacement string.
 *
 * @param value - Entry value
 * @param key - Entry key for error messages
 * @throws {TransliterationTableError} If the value is empty or not printable ASCII
 */
function validateReplacement(
  value: unknown,
  key: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new TransliterationTableError(
      `entries["${key}"] must be a string, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new TransliterationTableError(`entries["${key}"] cannot be empty`);
  }
  for (let index = 0; index < value.length; index++) {
    const code = value.charCodeAt(index);
    if (code < PRINTABLE_ASCII_MIN || code > PRINTABLE_ASCII_MAX) {
      throw new TransliterationTableError(
        `entries["${key}"] contains non-printable-ASCII character at index ${index}`,
      );
    }
  }
}

/**
 * Validates raw table data from JSON.
 *
 * @param raw - Parsed JSON
 * @returns The validated table
 * @throws {TransliterationTableError} On the first violation found
 *
 * @example
 * const table = validateTransliterationTableRaw(JSON.parse(jsonString));
 */
export function validateTransliterationTableRaw(
  raw: unknown,
): TransliterationTableRaw {
  if (!isRecord(raw)) {
    throw new TransliterationTableError("Table must be an object");
  }

  const version = raw.version;
  if (typeof version !== "string" || version.trim().length === 0) {
    throw new TransliterationTableError("version must be a non-empty string");
  }

  const rawEntries = raw.entries;
  if (!isRecord(rawEntries)) {
    throw new TransliterationTableError("entries must be an object");
  }

  const entries: Record<string, string> = {};
  const seen = new Set<number>();
  for (const [key, value] of Object.entries(rawEntries)) {
    const codePoint = validateCodePointKey(key);
    // "00E1" and "0000E1" name the same character
    if (seen.has(codePoint)) {
      throw new TransliterationTableError(
        `Duplicate entry for code point "${key}"`,
      );
    }
    seen.add(codePoint);
    validateReplacement(value, key);
    entries[key] = value;
  }

  return { version, entries };
}
