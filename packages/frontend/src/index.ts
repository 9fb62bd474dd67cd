/**
 * lifthook frontend - lifecycle operation analysis core and surface front end
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type LifecycleErrorKind,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  LIFECYCLE_ERROR_CODES,
  createDiagnostic,
  createLifecycleDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  addDiagnostics,
  mergeDiagnostics,
  isFatal,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./ir/index.js";
export * from "./lifecycle/index.js";
export * from "./analysis.js";
export * from "./annotations.js";

import * as fs from "node:fs";
import * as path from "node:path";
import {
  Diagnostic,
  DiagnosticsCollector,
  addDiagnostics,
  createDiagnostic,
  createDiagnosticsCollector,
  mergeDiagnostics,
} from "./types/diagnostic.js";
import { Result, ok, error } from "./types/result.js";
import { buildUnitFromSource } from "./ir/builder/orchestrator.js";
import { AnalysisOptions, AnalysisResult, analyzeUnit } from "./analysis.js";

export type CompileOptions = AnalysisOptions & {
  /** Directory relative file paths resolve against */
  readonly sourceRoot?: string;
};

export type CompileResult = {
  readonly units: readonly AnalysisResult[];
  /** Front-end and analysis diagnostics of every unit, in file order */
  readonly diagnostics: DiagnosticsCollector;
};

const readSource = (
  filePath: string
): Result<string, Diagnostic> => {
  try {
    return ok(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    return error(
      createDiagnostic(
        "LHK7001",
        "error",
        `Cannot read '${filePath}': ${e instanceof Error ? e.message : String(e)}`
      )
    );
  }
};

/**
 * Main entry point: analyze each surface file as one compilation unit.
 * Fails only when a file cannot be read.
 */
export const compile = (
  filePaths: readonly string[],
  options: CompileOptions = {}
): Result<CompileResult, DiagnosticsCollector> => {
  const units: AnalysisResult[] = [];
  let diagnostics = createDiagnosticsCollector();

  for (const filePath of filePaths) {
    const absolute = path.resolve(options.sourceRoot ?? process.cwd(), filePath);
    const source = readSource(absolute);
    if (!source.ok) {
      return error(addDiagnostics(createDiagnosticsCollector(), [source.error]));
    }

    const built = buildUnitFromSource(filePath, source.value);
    const analysis = analyzeUnit(built.unit, options);
    const unitDiagnostics = mergeDiagnostics(
      addDiagnostics(createDiagnosticsCollector(), built.diagnostics),
      analysis.diagnostics
    );

    units.push({ ...analysis, diagnostics: unitDiagnostics });
    diagnostics = mergeDiagnostics(diagnostics, unitDiagnostics);
  }

  return ok({ units, diagnostics });
};
