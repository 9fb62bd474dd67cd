/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import { annotateCommand } from "../commands/annotate.js";
import type { LifthookConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: readonly string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`lifthook v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command === "unknown-option") {
    console.error(`Error: Unknown option '${parsed.files[0] ?? ""}'`);
    console.error("Run 'lifthook --help' for usage");
    return 1;
  }

  if (parsed.command !== "check" && parsed.command !== "annotate") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'lifthook --help' for usage");
    return 1;
  }

  // The config file is optional unless named explicitly
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());

  let fileConfig: LifthookConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error}`);
      return 1;
    }
    fileConfig = loaded.value;
    if (parsed.options.verbose) {
      console.log(`Using config: ${configPath}`);
    }
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    parsed.files,
    configPath ? dirname(configPath) : process.cwd()
  );
  if (!config.ok) {
    console.error(`Error: ${config.error}`);
    return 1;
  }

  return parsed.command === "check"
    ? checkCommand(config.value)
    : annotateCommand(config.value);
};
