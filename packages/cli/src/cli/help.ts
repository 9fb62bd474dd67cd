/**
 * CLI help message
 */

import { CONFIG_FILE_NAME, VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
lifthook - lifecycle operation analysis v${VERSION}

USAGE:
  lifthook <command> [files...] [options]

COMMANDS:
  check [files...]          Bind lifecycle operators and report diagnostics
  annotate [files...]       Check, then print operation tables, scope-exit
                            destroy schedules and deep-copy handoffs

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print errors
  -c, --config <file>       Config file path (default: ${CONFIG_FILE_NAME})
  -s, --src <dir>           Directory source files are resolved against
  --fail-on-warnings        Exit with status 1 when warnings are reported

EXIT STATUS:
  0  no errors
  1  errors reported (or warnings with --fail-on-warnings)
  2  internal error: analysis of a unit was aborted

EXAMPLES:
  lifthook check src/handles.ts
  lifthook annotate src/jobs.ts --verbose
`);
};
