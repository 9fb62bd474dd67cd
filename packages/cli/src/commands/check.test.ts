import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  createLifecycleDiagnostic,
} from "@lifthook/frontend";
import { exitCodeFor } from "./check.js";

describe("exitCodeFor", () => {
  const warning = createDiagnostic("LHK5002", "warning", "Unsupported syntax");
  const error = createLifecycleDiagnostic(
    "DuplicateBinding",
    "'=destroy' is already bound",
    undefined
  );
  const fatal = createLifecycleDiagnostic(
    "MissingScopeExitEdge",
    "Control-flow graph of 'main' is incomplete",
    undefined
  );

  it("returns 0 without diagnostics", () => {
    expect(exitCodeFor([], false)).to.equal(0);
  });

  it("returns 0 for warnings unless they fail the run", () => {
    expect(exitCodeFor([warning], false)).to.equal(0);
    expect(exitCodeFor([warning], true)).to.equal(1);
  });

  it("returns 1 for errors", () => {
    expect(exitCodeFor([warning, error], false)).to.equal(1);
  });

  it("returns 2 when a unit was aborted", () => {
    expect(exitCodeFor([error, fatal], false)).to.equal(2);
  });
});
