/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_DESTRUCTIBLE_CONTEXTS,
  DestructibleContextPolicy,
  ok,
  parseDestructibleContexts,
} from "@lifthook/frontend";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type {
  CliOptions,
  LifthookConfig,
  ResolvedConfig,
  Result,
} from "./types.js";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Validate parsed JSON against the lifthook.json shape.
 */
export const parseConfig = (
  content: string,
  source: string = CONFIG_FILE_NAME
): Result<LifthookConfig, string> => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, error: `${source}: expected a JSON object` };
  }

  const sourceFiles: unknown = Reflect.get(raw, "sourceFiles");
  const sourceRoot: unknown = Reflect.get(raw, "sourceRoot");
  const destructibleContexts: unknown = Reflect.get(raw, "destructibleContexts");
  const failOnWarnings: unknown = Reflect.get(raw, "failOnWarnings");

  if (sourceFiles !== undefined && !isStringArray(sourceFiles)) {
    return { ok: false, error: `${source}: 'sourceFiles' must be an array of strings` };
  }
  if (sourceRoot !== undefined && typeof sourceRoot !== "string") {
    return { ok: false, error: `${source}: 'sourceRoot' must be a string` };
  }
  if (destructibleContexts !== undefined) {
    if (!isStringArray(destructibleContexts)) {
      return {
        ok: false,
        error: `${source}: 'destructibleContexts' must be an array of strings`,
      };
    }
    const policy = parseDestructibleContexts(destructibleContexts);
    if (!policy.ok) {
      return { ok: false, error: `${source}: ${policy.error}` };
    }
  }
  if (failOnWarnings !== undefined && typeof failOnWarnings !== "boolean") {
    return { ok: false, error: `${source}: 'failOnWarnings' must be a boolean` };
  }

  return {
    ok: true,
    value: {
      sourceFiles,
      sourceRoot,
      destructibleContexts,
      failOnWarnings,
    },
  };
};

/**
 * Load lifthook.json
 */
export const loadConfig = (
  configPath: string
): Result<LifthookConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    return parseConfig(readFileSync(configPath, "utf-8"), configPath);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find lifthook.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find lifthook.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Combine config file values with CLI options; CLI wins.
 */
export const resolveConfig = (
  config: LifthookConfig,
  cliOptions: CliOptions,
  files: readonly string[],
  projectRoot: string
): Result<ResolvedConfig, string> => {
  const contexts: Result<DestructibleContextPolicy, string> =
    config.destructibleContexts
      ? parseDestructibleContexts(config.destructibleContexts)
      : ok(DEFAULT_DESTRUCTIBLE_CONTEXTS);
  if (!contexts.ok) {
    return { ok: false, error: contexts.error };
  }

  return {
    ok: true,
    value: {
      projectRoot,
      sourceRoot: resolve(projectRoot, cliOptions.src ?? config.sourceRoot ?? "."),
      sourceFiles: files.length > 0 ? files : (config.sourceFiles ?? []),
      destructibleContexts: contexts.value,
      failOnWarnings: cliOptions.failOnWarnings ?? config.failOnWarnings ?? false,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};
