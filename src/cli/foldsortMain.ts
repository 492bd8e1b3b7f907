#!/usr/bin/env node
/**
 * foldsort entrypoint — sorts lines with ASCII folding
 *
 * Usage:
 *   foldsort [--natural|--lexical] [--case-sensitive|--ignore-case] [--only-alnum] [--no-fold] [-r] [-u] [-h] [file|-]
 *   cat names.txt | foldsort --natural
 *
 * Environment variables (optional, also read from .env):
 *   - FOLDSORT_MODE: lexical | natural
 *   - FOLDSORT_CASE_SENSITIVE: true | false
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import * as fs from "fs";
import {
  EXIT_CODE_IO_ERROR,
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE_ERROR,
  USAGE,
} from "@/constants/cli";
import * as logger from "@/logger";
import { CliUsageError, parseCliArgs } from "./options";
import { sortLines } from "./sortLines";

const STDIN_FD = 0;

const log = logger.withContext({ component: "foldsort" });

function main(): number {
  try {
    const options = parseCliArgs(process.argv.slice(2), process.env);

    if (options.help) {
      process.stdout.write(USAGE);
      return EXIT_CODE_SUCCESS;
    }

    const input = fs.readFileSync(options.inputPath ?? STDIN_FD, "utf-8");
    const output = sortLines(input, options);
    process.stdout.write(output);

    log.debug("Sorted input", {
      source: options.inputPath ?? "stdin",
      mode: options.compare.mode,
      caseInsensitive: options.compare.caseInsensitive,
      transliterate: options.compare.transliterate,
      characters: output.length,
    });
    return EXIT_CODE_SUCCESS;
  } catch (error) {
    if (error instanceof CliUsageError) {
      log.error(error.message);
      process.stderr.write(USAGE);
      return EXIT_CODE_USAGE_ERROR;
    }
    log.error("foldsort failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return EXIT_CODE_IO_ERROR;
  }
}

process.exitCode = main();
