/**
 * Golden scenario discovery
 *
 *   testcases/common/<category>/<test>/config.yaml   sources and their entries
 *   testcases/common/expected/<category>/<test>/     <Input>.txt annotations
 */

import * as fs from "fs";
import * as path from "path";
import { Scenario, ScenarioCheck, TestEntry } from "./types.js";
import { parseConfigYaml } from "./config-parser.js";

const EXPECTED_DIR = "expected";

const checkFor = (
  entry: TestEntry,
  expectedDir: string,
  configPath: string
): ScenarioCheck => {
  if (entry.expectation.mode === "diagnostics") {
    return entry.expectation;
  }
  const expectedPath = path.join(
    expectedDir,
    `${path.basename(entry.input, ".ts")}.txt`
  );
  if (!fs.existsSync(expectedPath)) {
    throw new Error(
      `Expected annotations not found: ${expectedPath} ("${entry.title}", ${configPath})`
    );
  }
  return { mode: "annotations", expectedPath };
};

const scenariosIn = (
  dir: string,
  group: string,
  expectedDir: string
): readonly Scenario[] => {
  const configPath = path.join(dir, "config.yaml");
  return parseConfigYaml(fs.readFileSync(configPath, "utf-8")).map(
    (entry): Scenario => {
      const inputPath = path.join(dir, entry.input);
      if (!fs.existsSync(inputPath)) {
        throw new Error(
          `Input file not found: ${inputPath} ("${entry.title}", ${configPath})`
        );
      }
      return {
        group,
        title: entry.title,
        inputPath,
        check: checkFor(entry, expectedDir, configPath),
      };
    }
  );
};

/**
 * Every config.yaml entry under `<baseDir>/common`, in directory order.
 */
export const discoverScenarios = (baseDir: string): readonly Scenario[] => {
  const commonDir = path.join(baseDir, "common");

  const walk = (dir: string, parts: readonly string[]): readonly Scenario[] => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    const own = entries.some((e) => e.isFile() && e.name === "config.yaml")
      ? scenariosIn(
          dir,
          ["common", ...parts].join("/"),
          path.join(commonDir, EXPECTED_DIR, ...parts)
        )
      : [];
    const nested = entries
      .filter((e) => e.isDirectory() && !(parts.length === 0 && e.name === EXPECTED_DIR))
      .flatMap((e) => walk(path.join(dir, e.name), [...parts, e.name]));
    return [...own, ...nested];
  };

  return fs.existsSync(commonDir) ? walk(commonDir, []) : [];
};
