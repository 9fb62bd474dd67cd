/**
 * CLI types
 */

import type { DestructibleContextPolicy } from "@lifthook/frontend";

export type { Result } from "@lifthook/frontend";

/**
 * lifthook.json
 */
export type LifthookConfig = {
  readonly sourceFiles?: readonly string[];
  readonly sourceRoot?: string;
  readonly destructibleContexts?: readonly string[];
  readonly failOnWarnings?: boolean;
};

/**
 * CLI options (can override config)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  src?: string;
  failOnWarnings?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing lifthook.json, or the working directory */
  readonly projectRoot: string;
  readonly sourceRoot: string;
  readonly sourceFiles: readonly string[];
  readonly destructibleContexts: DestructibleContextPolicy;
  readonly failOnWarnings: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
