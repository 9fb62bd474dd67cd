/**
 * check command - analyze source files and report diagnostics
 */

import {
  CompileResult,
  Diagnostic,
  DiagnosticsCollector,
  compile,
  formatDiagnostic,
  isDiagnosticError,
  isFatal,
} from "@lifthook/frontend";
import type { ResolvedConfig } from "../types.js";

/**
 * Exit status for a set of diagnostics:
 * 2 when a unit was aborted, 1 for errors (or warnings under
 * failOnWarnings), 0 otherwise.
 */
export const exitCodeFor = (
  diagnostics: readonly Diagnostic[],
  failOnWarnings: boolean
): number => {
  if (diagnostics.some(isFatal)) return 2;
  if (diagnostics.some(isDiagnosticError)) return 1;
  if (failOnWarnings && diagnostics.some((d) => d.severity === "warning")) {
    return 1;
  }
  return 0;
};

const reportDiagnostics = (
  collector: DiagnosticsCollector,
  config: ResolvedConfig
): void => {
  for (const diagnostic of collector.diagnostics) {
    if (isDiagnosticError(diagnostic)) {
      console.error(formatDiagnostic(diagnostic));
    } else if (!config.quiet) {
      console.log(formatDiagnostic(diagnostic));
    }
  }
};

export type AnalysisRun = {
  readonly exitCode: number;
  readonly result?: CompileResult;
};

/**
 * Compile the configured files and print their diagnostics.
 */
export const runAnalysis = (config: ResolvedConfig): AnalysisRun => {
  if (config.sourceFiles.length === 0) {
    console.error("Error: No source files");
    console.error(
      "Pass files on the command line or set 'sourceFiles' in lifthook.json"
    );
    return { exitCode: 1 };
  }

  if (config.verbose) {
    console.log(`Analyzing ${config.sourceFiles.length} file(s)`);
    console.log(`  Source root: ${config.sourceRoot}`);
    console.log(
      `  Destructible contexts: ${[...config.destructibleContexts].join(", ")}`
    );
  }

  const compiled = compile(config.sourceFiles, {
    sourceRoot: config.sourceRoot,
    destructibleContexts: config.destructibleContexts,
  });

  if (!compiled.ok) {
    reportDiagnostics(compiled.error, config);
    return { exitCode: 1 };
  }

  reportDiagnostics(compiled.value.diagnostics, config);

  if (config.verbose) {
    for (const unit of compiled.value.units) {
      const status = unit.aborted ? " (aborted)" : "";
      console.log(
        `  ${unit.unit.filePath}: ${unit.unit.nominals.length} type(s), ${unit.registry.getAllEntries().length} binding(s), ${unit.diagnostics.diagnostics.length} diagnostic(s)${status}`
      );
    }
  }

  return {
    exitCode: exitCodeFor(
      compiled.value.diagnostics.diagnostics,
      config.failOnWarnings
    ),
    result: compiled.value,
  };
};

export const checkCommand = (config: ResolvedConfig): number => {
  const { exitCode } = runAnalysis(config);
  if (exitCode === 0 && !config.quiet) {
    console.log(
      `✓ No lifecycle errors in ${config.sourceFiles.length} file(s)`
    );
  }
  return exitCode;
};
