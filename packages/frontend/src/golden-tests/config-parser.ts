/**
 * config.yaml parser for golden scenarios
 *
 * The file is a list of entries:
 *
 *   - input: EarlyReturn.ts
 *     title: destroys locals on an early return
 *   - input: RefAndPtr.ts
 *     title: rejects a Ref and a Ptr binding for one type
 *     expectDiagnostics: [LHK1004]
 *     expectDiagnosticsMode: exact
 */

import YAML from "yaml";
import { DiagnosticsMatch, Expectation, TestEntry } from "./types.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const DIAGNOSTIC_CODE = /^LHK\d{4}$/;

const parseCodes = (input: string, value: unknown): readonly string[] => {
  if (!Array.isArray(value)) {
    throw new Error(`${input}: expectDiagnostics must be a list of codes`);
  }
  const codes = value.map((code: unknown): string => {
    if (typeof code !== "string" || !DIAGNOSTIC_CODE.test(code.trim())) {
      throw new Error(
        `${input}: invalid diagnostic code ${JSON.stringify(code)}, expected LHK####`
      );
    }
    return code.trim();
  });
  if (codes.length === 0) {
    throw new Error(`${input}: expectDiagnostics is empty`);
  }
  return [...new Set(codes)].sort();
};

const parseMatch = (input: string, value: unknown): DiagnosticsMatch => {
  if (value === undefined) return "contains";
  if (value === "contains" || value === "exact") return value;
  throw new Error(
    `${input}: expectDiagnosticsMode must be "contains" or "exact", got ${JSON.stringify(value)}`
  );
};

const parseExpectation = (
  input: string,
  entry: Record<string, unknown>
): Expectation => {
  if (entry.expectDiagnostics === undefined) {
    if (entry.expectDiagnosticsMode !== undefined) {
      throw new Error(
        `${input}: expectDiagnosticsMode needs expectDiagnostics`
      );
    }
    return { mode: "annotations" };
  }
  return {
    mode: "diagnostics",
    codes: parseCodes(input, entry.expectDiagnostics),
    match: parseMatch(input, entry.expectDiagnosticsMode),
  };
};

const parseEntry = (item: unknown): TestEntry => {
  if (!isRecord(item)) {
    throw new Error(`Invalid test entry: ${JSON.stringify(item)}`);
  }
  const { input, title } = item;
  if (typeof input !== "string" || !input.endsWith(".ts")) {
    throw new Error(
      `Test entry input must name a .ts file: ${JSON.stringify(input)}`
    );
  }
  if (typeof title !== "string" || title.trim().length === 0) {
    throw new Error(`${input}: title must be a non-empty string`);
  }
  return { input, title, expectation: parseExpectation(input, item) };
};

export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);
  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be a list of test entries");
  }
  return parsed.map(parseEntry);
};
