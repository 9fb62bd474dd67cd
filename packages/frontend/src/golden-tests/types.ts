/**
 * Golden scenario types
 */

/**
 * How listed diagnostic codes are matched: "contains" allows extra codes,
 * "exact" requires the set of reported codes to equal the listed one.
 */
export type DiagnosticsMatch = "contains" | "exact";

export type DiagnosticsCheck = {
  readonly mode: "diagnostics";
  readonly codes: readonly string[];
  readonly match: DiagnosticsMatch;
};

/** What a config.yaml entry asks for; annotations are the default. */
export type Expectation = { readonly mode: "annotations" } | DiagnosticsCheck;

export type TestEntry = {
  readonly input: string;
  readonly title: string;
  readonly expectation: Expectation;
};

/**
 * An annotation scenario carries the file its printed annotations must
 * equal; a diagnostics scenario never has one.
 */
export type ScenarioCheck =
  | { readonly mode: "annotations"; readonly expectedPath: string }
  | DiagnosticsCheck;

export type Scenario = {
  /** Directory of the config.yaml relative to testcases/, e.g. "common/scopes/exits" */
  readonly group: string;
  readonly title: string;
  readonly inputPath: string;
  readonly check: ScenarioCheck;
};
