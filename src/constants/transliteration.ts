/**
 * Transliteration table constants
 */

/**
 * Path to the table JSON file, relative to the package root.
 */
export const TRANSLITERATION_TABLE_PATH = "data/transliteration.json";

/**
 * Code points below this value are ASCII and map to themselves.
 */
export const ASCII_LIMIT = 0x80;

/** Lowest code point a replacement may contain (space) */
export const PRINTABLE_ASCII_MIN = 0x20;

/** Highest code point a replacement may contain (tilde) */
export const PRINTABLE_ASCII_MAX = 0x7e;

export const MAX_CODE_POINT = 0x10ffff;

export const SURROGATE_MIN = 0xd800;
export const SURROGATE_MAX = 0xdfff;

/**
 * Table keys: 4 to 6 upper-case hexadecimal digits.
 */
export const CODE_POINT_KEY_PATTERN = /^[0-9A-F]{4,6}$/;

/**
 * Code points above this value take two UTF-16 code units.
 */
export const BMP_MAX = 0xffff;
