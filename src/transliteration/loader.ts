/**
 * Transliteration table loading and compilation
 *
 * Loads the table JSON, validates it, and compiles it into a
 * lookup map of code point arrays.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  TransliterationTable,
  TransliterationTableRaw,
} from "@/types/transliteration";
import { validateTransliterationTableRaw } from "@/utils/transliterationValidation";
import { TRANSLITERATION_TABLE_PATH } from "@/constants/transliteration";
import * as logger from "@/logger";

/**
 * Default table location.
 *
 * Resolved against the package root (two levels above this module in
 * both src/ and dist/) so it does not depend on the working directory.
 */
export const DEFAULT_TRANSLITERATION_TABLE_FILE = path.resolve(
  __dirname,
  "..",
  "..",
  TRANSLITERATION_TABLE_PATH,
);

/**
 * Compiles a validated raw table into runtime form.
 *
 * Replacement strings are ASCII (validated), so one UTF-16 code unit
 * is one code point.
 */
export function compileTransliterationTable(
  raw: TransliterationTableRaw,
): TransliterationTable {
  const entries = new Map<number, readonly number[]>();
  for (const [key, replacement] of Object.entries(raw.entries)) {
    const codePoints: number[] = [];
    for (let index = 0; index < replacement.length; index++) {
      codePoints.push(replacement.charCodeAt(index));
    }
    entries.set(parseInt(key, 16), codePoints);
  }

  return {
    version: raw.version,
    entries,
  };
}

/**
 * Loads and compiles a transliteration table.
 *
 * Fail-fast: any read, parse or validation error is thrown.
 *
 * @param filePath - Table file (defaults to the bundled table)
 * @throws {Error} If file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {TransliterationTableError} If validation fails
 */
export function loadTransliterationTable(
  filePath: string = DEFAULT_TRANSLITERATION_TABLE_FILE,
): TransliterationTable {
  const jsonContent = fs.readFileSync(filePath, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  const table = compileTransliterationTable(
    validateTransliterationTableRaw(raw),
  );

  logger.debug("Transliteration table loaded", {
    file: filePath,
    version: table.version,
    entries: table.entries.size,
  });

  return table;
}
