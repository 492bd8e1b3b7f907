/**
 * CLI constants
 */

/** Default ordering mode ("lexical" or "natural") */
export const FOLDSORT_MODE_ENV = "FOLDSORT_MODE";

/** Default case handling ("true" compares case-sensitively) */
export const FOLDSORT_CASE_SENSITIVE_ENV = "FOLDSORT_CASE_SENSITIVE";

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_IO_ERROR = 1;
export const EXIT_CODE_USAGE_ERROR = 2;

/**
 * Positional argument that names stdin explicitly.
 */
export const STDIN_PATH = "-";

export const BOOLEAN_ENV_VALUES: Record<string, boolean> = {
  true: true,
  "1": true,
  yes: true,
  false: false,
  "0": false,
  no: false,
};

export const USAGE = `Usage: foldsort [options] [file]

Sorts the lines of a file (or stdin) with ASCII folding.

Options:
  --natural         Compare digit runs by numeric value, skip punctuation
  --lexical         Compare character by character (default)
  --case-sensitive  Keep upper and lower case apart
  --ignore-case     Fold case before comparing (default)
  --only-alnum      Skip characters that are not letters or numbers (lexical)
  --no-fold         Compare raw characters, without ASCII folding
  -r, --reverse     Sort in descending order
  -u, --unique      Drop repeated lines
  -h, --help        Show this help

Environment:
  FOLDSORT_MODE            lexical | natural
  FOLDSORT_CASE_SENSITIVE  true | false
  LOG_LEVEL                debug | info | warn | error
`;
