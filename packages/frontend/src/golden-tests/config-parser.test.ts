import { describe, it } from "mocha";
import { expect } from "chai";
import { parseConfigYaml } from "./config-parser.js";

describe("Golden config parser", () => {
  it("defaults an entry to comparing annotations", () => {
    expect(
      parseConfigYaml("- input: Loops.ts\n  title: loop exits\n")
    ).to.deep.equal([
      { input: "Loops.ts", title: "loop exits", expectation: { mode: "annotations" } },
    ]);
  });

  it("reads listed diagnostic codes, sorted and deduplicated", () => {
    const [entry] = parseConfigYaml(
      [
        "- input: Bad.ts",
        "  title: bad bindings",
        "  expectDiagnostics: [LHK1004, LHK1001, LHK1004]",
        "  expectDiagnosticsMode: exact",
      ].join("\n")
    );

    expect(entry?.expectation).to.deep.equal({
      mode: "diagnostics",
      codes: ["LHK1001", "LHK1004"],
      match: "exact",
    });
  });

  it("matches diagnostics by containment unless exact is asked for", () => {
    const [entry] = parseConfigYaml(
      "- input: Bad.ts\n  title: t\n  expectDiagnostics: [LHK3001]\n"
    );
    expect(entry?.expectation).to.deep.equal({
      mode: "diagnostics",
      codes: ["LHK3001"],
      match: "contains",
    });
  });

  it("rejects a match mode without codes and malformed codes", () => {
    expect(() =>
      parseConfigYaml("- input: A.ts\n  title: t\n  expectDiagnosticsMode: exact\n")
    ).to.throw("A.ts: expectDiagnosticsMode needs expectDiagnostics");
    expect(() =>
      parseConfigYaml("- input: A.ts\n  title: t\n  expectDiagnostics: [E1001]\n")
    ).to.throw('A.ts: invalid diagnostic code "E1001", expected LHK####');
    expect(() => parseConfigYaml("input: A.ts\n")).to.throw(
      "config.yaml must be a list of test entries"
    );
  });
});
