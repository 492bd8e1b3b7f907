/**
 * CLI type definitions
 */

import type { ResolvedCompareOptions } from "./compare";

export type CliOptions = {
  /** Comparison used to order the lines */
  compare: ResolvedCompareOptions;
  /** Emit the lines in descending order */
  reverse: boolean;
  /** Drop repeated identical lines */
  unique: boolean;
  /** File to read, or null for stdin */
  inputPath: string | null;
  /** Print usage and exit */
  help: boolean;
};
