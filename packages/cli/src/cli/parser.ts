/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly files: readonly string[];
  readonly options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Command, then source files
    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        files.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-s":
      case "--src":
        options.src = args[++i] ?? "";
        break;
      case "--fail-on-warnings":
        options.failOnWarnings = true;
        break;
      default:
        return { command: "unknown-option", files: [arg], options };
    }
  }

  return { command, files, options };
};
