/**
 * Golden scenarios
 *
 * Each testcases/ directory with a config.yaml lists surface sources; an
 * entry either expects diagnostic codes or compares the printed annotations
 * with testcases/common/expected/.../<Input>.txt. Scenarios are grouped by
 * the directory of their config.yaml.
 */

import { describe, it } from "mocha";
import * as path from "path";
import { fileURLToPath } from "url";
import { discoverScenarios } from "./golden-tests/discovery.js";
import { runScenario } from "./golden-tests/runner.js";
import type { Scenario } from "./golden-tests/types.js";

const testcasesDir = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "../testcases"
);

const byGroup = (
  scenarios: readonly Scenario[]
): ReadonlyMap<string, readonly Scenario[]> => {
  const groups = new Map<string, Scenario[]>();
  for (const scenario of scenarios) {
    const group = groups.get(scenario.group);
    if (group) group.push(scenario);
    else groups.set(scenario.group, [scenario]);
  }
  return groups;
};

describe("Golden Tests", () => {
  const scenarios = discoverScenarios(testcasesDir);

  if (scenarios.length === 0) {
    console.warn("⚠️  No golden test cases found in testcases/");
    return;
  }

  for (const [group, members] of byGroup(scenarios)) {
    describe(group, () => {
      for (const scenario of members) {
        it(scenario.title, () => runScenario(scenario));
      }
    });
  }
});
