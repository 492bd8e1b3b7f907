/**
 * Line sorting core of the CLI
 */

import type { CliOptions } from "@/types";
import { createComparator } from "@/compare/comparators";

const LINE_BREAK_PATTERN = /\r?\n/;

/**
 * Splits input into lines, sorts them and joins them back.
 *
 * A trailing line break does not produce an empty last line; non-empty
 * output always ends with a line break.
 *
 * @example
 * sortLines("b\nä\na\n", options) // "a\nä\nb\n"
 */
export function sortLines(
  input: string,
  options: Pick<CliOptions, "compare" | "reverse" | "unique">,
): string {
  const lines = input.split(LINE_BREAK_PATTERN);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const cmp = createComparator(options.compare);
  lines.sort(options.reverse ? (lhs, rhs) => cmp(rhs, lhs) : cmp);

  // Total order: only identical lines compare equal, and they are adjacent
  const output = options.unique
    ? lines.filter((line, index) => index === 0 || line !== lines[index - 1])
    : lines;

  return output.length === 0 ? "" : output.join("\n") + "\n";
}
