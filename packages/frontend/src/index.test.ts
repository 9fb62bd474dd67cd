import { describe, it } from "mocha";
import { expect } from "chai";
import * as path from "path";
import { fileURLToPath } from "url";
import { compile } from "./index.js";

const here = path.dirname(fileURLToPath(import.meta.url));

describe("compile", () => {
  it("analyzes each readable file as its own unit", () => {
    const result = compile(["EarlyReturn.ts", "Loops.ts"], {
      sourceRoot: path.join(here, "../testcases/common/scopes/exits"),
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.units.map((u) => u.unit.filePath)).to.deep.equal([
      "EarlyReturn.ts",
      "Loops.ts",
    ]);
    expect(result.value.diagnostics.hasErrors).to.equal(false);
  });

  it("reports an unreadable source with its own code", () => {
    const sourceRoot = path.join(here, "no-such-directory");
    const result = compile(["Missing.ts"], { sourceRoot });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(
      result.error.diagnostics.map((d) => `${d.code} ${d.severity}`)
    ).to.deep.equal(["LHK7001 error"]);
    expect(result.error.diagnostics[0]?.message).to.match(
      /^Cannot read '.*no-such-directory[\\/]Missing\.ts': ENOENT/
    );
  });
});
