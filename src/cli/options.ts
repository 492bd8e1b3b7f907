/**
 * CLI argument parsing
 *
 * Defaults come from the environment, flags override them.
 */

import type { CliOptions, OrderingMode } from "@/types";
import {
  BOOLEAN_ENV_VALUES,
  FOLDSORT_CASE_SENSITIVE_ENV,
  FOLDSORT_MODE_ENV,
  STDIN_PATH,
} from "@/constants/cli";
import { resolveCompareOptions } from "@/compare/comparators";

/**
 * Error thrown for invalid arguments or environment values.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(`Invalid usage: ${message}`);
    this.name = "CliUsageError";
  }
}

function parseModeEnv(raw: string | undefined): OrderingMode | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = raw.trim().toLowerCase();
  if (value === "lexical" || value === "natural") {
    return value;
  }
  throw new CliUsageError(
    `${FOLDSORT_MODE_ENV} must be "lexical" or "natural", got "${raw}"`,
  );
}

function parseBooleanEnv(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = BOOLEAN_ENV_VALUES[raw.trim().toLowerCase()];
  if (value === undefined) {
    throw new CliUsageError(`${name} must be true or false, got "${raw}"`);
  }
  return value;
}

/**
 * Parses command-line arguments (without node and script path).
 *
 * @param argv - Arguments, e.g. process.argv.slice(2)
 * @param env - Environment to read defaults from
 * @throws {CliUsageError} On unknown flags, extra positionals, bad env values
 * or --only-alnum in natural mode
 *
 * @example
 * parseCliArgs(["--natural", "names.txt"], {})
 * // { compare: { mode: "natural", caseInsensitive: true, transliterate: true },
 * //   reverse: false, unique: false, inputPath: "names.txt", help: false }
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
): CliOptions {
  let mode = parseModeEnv(env[FOLDSORT_MODE_ENV]);
  const caseSensitive = parseBooleanEnv(
    FOLDSORT_CASE_SENSITIVE_ENV,
    env[FOLDSORT_CASE_SENSITIVE_ENV],
  );
  let caseInsensitive =
    caseSensitive === undefined ? undefined : !caseSensitive;
  let onlyAlnum = false;
  let transliterate: boolean | undefined;
  let reverse = false;
  let unique = false;
  let help = false;
  let inputPath: string | null = null;

  for (const arg of argv) {
    switch (arg) {
      case "--natural":
        mode = "natural";
        break;
      case "--lexical":
        mode = "lexical";
        break;
      case "--case-sensitive":
        caseInsensitive = false;
        break;
      case "--ignore-case":
        caseInsensitive = true;
        break;
      case "--only-alnum":
        onlyAlnum = true;
        break;
      case "--no-fold":
        transliterate = false;
        break;
      case "-r":
      case "--reverse":
        reverse = true;
        break;
      case "-u":
      case "--unique":
        unique = true;
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== STDIN_PATH) {
          throw new CliUsageError(`unknown option "${arg}"`);
        }
        if (inputPath !== null) {
          throw new CliUsageError(
            `expected at most one input file, got "${inputPath}" and "${arg}"`,
          );
        }
        inputPath = arg;
    }
  }

  if (mode === "natural" && onlyAlnum) {
    throw new CliUsageError(
      "--only-alnum applies to lexical mode, natural mode always skips punctuation",
    );
  }

  return {
    compare:
      mode === "natural"
        ? resolveCompareOptions({ mode, caseInsensitive, transliterate })
        : resolveCompareOptions({
            mode,
            caseInsensitive,
            transliterate,
            onlyAlnum,
          }),
    reverse,
    unique,
    inputPath: inputPath === STDIN_PATH ? null : inputPath,
    help,
  };
}
