/**
 * Golden scenario runner
 */

import { expect } from "chai";
import * as fs from "fs";
import * as path from "path";
import { compile } from "../index.js";
import { Diagnostic, isError } from "../types/diagnostic.js";
import { printAnnotations } from "../annotations.js";
import { AnalysisResult } from "../analysis.js";
import { DiagnosticsCheck, Scenario } from "./types.js";

/**
 * Normalize annotation text for comparison
 */
export const normalizeAnnotations = (text: string): string =>
  text.trim().replace(/\r\n/g, "\n").replace(/[ \t]+$/gm, "");

const listDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics.map((d) => `  ${d.code}: ${d.message}`).join("\n");

const checkDiagnostics = (
  check: DiagnosticsCheck,
  actual: readonly Diagnostic[]
): void => {
  const reported = new Set<string>(actual.map((d) => d.code));
  const listed = new Set(check.codes);

  const missing = check.codes.filter((c) => !reported.has(c));
  if (missing.length > 0) {
    throw new Error(
      `Missing expected diagnostics (${check.match}): ${missing.join(", ")}\n` +
        `Actual diagnostics:\n${listDiagnostics(actual)}`
    );
  }

  if (check.match === "exact") {
    const unexpected = actual.filter((d) => !listed.has(d.code));
    if (unexpected.length > 0) {
      throw new Error(
        `Unexpected diagnostics, expected exactly ${check.codes.join(", ")}:\n` +
          listDiagnostics(unexpected)
      );
    }
  }
};

const checkAnnotations = (
  expectedPath: string,
  unit: AnalysisResult | undefined,
  actual: readonly Diagnostic[]
): void => {
  const errors = actual.filter(isError);
  if (errors.length > 0) {
    throw new Error(`Analysis failed:\n${listDiagnostics(errors)}`);
  }
  if (!unit) {
    throw new Error(`No analysis produced for ${expectedPath}`);
  }
  expect(normalizeAnnotations(printAnnotations(unit))).to.equal(
    normalizeAnnotations(fs.readFileSync(expectedPath, "utf-8"))
  );
};

/**
 * Compile a scenario's source on its own and apply its check.
 */
export const runScenario = (scenario: Scenario): void => {
  const compiled = compile([scenario.inputPath], {
    sourceRoot: path.dirname(scenario.inputPath),
  });
  if (!compiled.ok) {
    throw new Error(
      `Compilation failed:\n${listDiagnostics(compiled.error.diagnostics)}`
    );
  }

  const actual = compiled.value.diagnostics.diagnostics;
  const { check } = scenario;
  switch (check.mode) {
    case "diagnostics":
      checkDiagnostics(check, actual);
      return;
    case "annotations":
      checkAnnotations(check.expectedPath, compiled.value.units[0], actual);
      return;
  }
};
