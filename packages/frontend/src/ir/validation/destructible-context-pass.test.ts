/**
 * Tests for the destructible context pass
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { voidType } from "../builder/factory.js";
import {
  parseDestructibleContexts,
  tagContextSites,
  validateDestructibleContexts,
} from "./destructible-context-pass.js";
import { createHarness, handle, line, pair, point } from "./test-harness.js";

describe("Destructible Context Pass", () => {
  it("rejects a destructible value used as a bare statement", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([f.exprStmt(f.call("openHandle", [], handle, line(2)))])
    );

    const diagnostics = validateDestructibleContexts([main], resolver);

    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("LHK3001");
    expect(diagnostics[0]?.message).to.equal(
      "Value of destructible type 'Handle' is used as a temporary in 'main'"
    );
    expect(diagnostics[0]?.location?.line).to.equal(2);
    expect(diagnostics[0]?.typeName).to.equal("Handle");
  });

  it("accepts the same value as a var or const initializer", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([
        f.varDecl("a", handle, f.call("openHandle", [], handle)),
        f.letDecl("b", handle, f.call("openHandle", [], handle)),
      ])
    );

    expect(validateDestructibleContexts([main], resolver)).to.deep.equal([]);
  });

  it("accepts return values and assignments to result", () => {
    const { f, resolver, procedure } = createHarness();
    const open = procedure(
      "open",
      f.block([
        f.assign(f.result(handle), f.call("openHandle", [], handle)),
        f.ret(f.call("openHandle", [], handle)),
      ]),
      handle
    );

    expect(validateDestructibleContexts([open], resolver)).to.deep.equal([]);
  });

  it("rejects destructible call arguments and assignments to other targets", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([
        f.varDecl("h", handle),
        f.exprStmt(
          f.call("consume", [f.call("openHandle", [], handle)], voidType)
        ),
        f.assign(f.identifier("h", handle), f.call("openHandle", [], handle)),
      ])
    );

    const messages = validateDestructibleContexts([main], resolver).map(
      (d) => d.message
    );

    expect(messages).to.deep.equal([
      "Value of destructible type 'Handle' is used as a temporary in 'main'",
      "Value of destructible type 'Handle' is used as a temporary in 'main'",
    ]);
  });

  it("gives construction components the site of the construction", () => {
    const { f, resolver, procedure } = createHarness();
    const build = () =>
      f.construct(pair, [
        { name: "first", value: f.call("openHandle", [], handle) },
        { name: "second", value: f.call("openHandle", [], handle) },
      ]);
    const main = procedure(
      "main",
      f.block([
        f.varDecl("p", pair, build()),
        f.exprStmt(f.call("consume", [build()], voidType)),
      ])
    );

    const sites = tagContextSites(main).map(
      ({ expression, site }) => `${expression.kind}:${site}`
    );
    expect(sites).to.deep.equal([
      "construct:var-init",
      "call:var-init",
      "call:var-init",
      "call:other",
      "construct:other",
      "call:other",
      "call:other",
    ]);

    const types = validateDestructibleContexts([main], resolver).map(
      (d) => d.typeName
    );
    expect(types).to.deep.equal(["Pair", "Handle", "Handle"]);
  });

  it("never checks place expressions", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([
        f.varDecl("p", pair),
        f.exprStmt(f.identifier("p", pair)),
        f.exprStmt(f.member(f.identifier("p", pair), "first", handle)),
      ])
    );

    expect(validateDestructibleContexts([main], resolver)).to.deep.equal([]);
  });

  it("reports a converted value once, through the converted expression", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([
        f.exprStmt(
          f.conversion(
            f.conversion(f.call("openHandle", [], handle), handle),
            handle
          )
        ),
      ])
    );

    const diagnostics = validateDestructibleContexts([main], resolver);
    expect(diagnostics).to.have.length(1);
  });

  it("ignores values whose destroy is the default", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([f.exprStmt(f.construct(point)), f.exprStmt(f.call("make", [], point))])
    );

    expect(validateDestructibleContexts([main], resolver)).to.deep.equal([]);
  });

  it("follows a configured policy", () => {
    const { f, resolver, procedure } = createHarness();
    const main = procedure(
      "main",
      f.block([
        f.varDecl("a", handle, f.call("openHandle", [], handle)),
        f.exprStmt(f.call("openHandle", [], handle)),
      ])
    );
    const policy = parseDestructibleContexts(["let-init", "other"]);

    expect(policy.ok).to.equal(true);
    if (!policy.ok) return;
    const diagnostics = validateDestructibleContexts([main], resolver, policy.value);
    expect(diagnostics.map((d) => d.message)).to.deep.equal([
      "Value of destructible type 'Handle' is used as a var initializer in 'main'",
    ]);
  });

  it("rejects unknown context names", () => {
    const policy = parseDestructibleContexts(["var-init", "field-init"]);

    expect(policy.ok).to.equal(false);
    expect(!policy.ok && policy.error).to.equal(
      "Unknown destructible context 'field-init' (expected one of: var-init, let-init, return-value, result-assignment, other)"
    );
  });
});
