/**
 * Tests for the surface front end
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { buildUnitFromSource } from "./builder.js";
import {
  IrExpression,
  IrStatement,
  formatIrType,
} from "./types.js";

const build = (source: string) => buildUnitFromSource("test.ts", source);

const describeStatement = (stmt: IrStatement): string => {
  switch (stmt.kind) {
    case "variableDeclaration":
      return `${stmt.declarationKind} ${stmt.name}: ${formatIrType(stmt.type)}`;
    case "assignmentStatement":
      return `assign ${stmt.target.kind} = ${stmt.value.kind}`;
    case "spawnStatement":
      return `spawn ${stmt.callee}(${stmt.arguments.length})`;
    case "expressionStatement":
      return `expr ${stmt.expression.kind}`;
    default:
      return stmt.kind;
  }
};

const bodyOf = (source: string, name = "main"): readonly string[] => {
  const { unit } = build(source);
  const procedure = unit.procedures.find((p) => p.name === name);
  return procedure ? procedure.body.body.map(describeStatement) : [];
};

const HANDLE = `
class Handle { fd: int; }
declare function openHandle(): Handle;
`;

describe("IR Builder", () => {
  describe("Type declarations", () => {
    it("converts classes, interfaces and distinct aliases to nominal types", () => {
      const { unit, diagnostics } = build(`
class Handle { fd: int; }
interface Pair { first: Handle; second: Handle }
type Fd = Distinct<int>;
type Handles = Seq<Handle>;
class Buffer extends Handle { data: byte[]; pool: Handles; slots: Arr<4, Ptr<Handle>>; }
`);

      expect(diagnostics).to.deep.equal([]);
      expect(unit.nominals.map((n) => `${n.kind}:${n.name}`)).to.deep.equal([
        "objectDeclaration:Handle",
        "objectDeclaration:Pair",
        "distinctDeclaration:Fd",
        "objectDeclaration:Buffer",
      ]);

      const buffer = unit.nominals[3];
      expect(buffer?.id).to.equal("test.ts#Buffer");
      if (buffer?.kind !== "objectDeclaration") return;
      expect(buffer.base && formatIrType(buffer.base)).to.equal("Handle");
      expect(buffer.fields.map((f) => `${f.name}: ${formatIrType(f.type)}`)).to.deep.equal([
        "data: Seq<byte>",
        "pool: Seq<Handle>",
        "slots: Arr<4, Ptr<Handle>>",
      ]);
    });

    it("keeps type parameters of generic declarations", () => {
      const { unit } = build(`class Box<T> { item: T; next: Ptr<Box<T>>; }`);
      const box = unit.nominals[0];

      expect(box?.typeParameters).to.deep.equal(["T"]);
      expect(
        box?.kind === "objectDeclaration" &&
          box.fields.map((f) => formatIrType(f.type))
      ).to.deep.equal(["T", "Ptr<Box<T>>"]);
    });

    it("reports unknown type names", () => {
      const { diagnostics } = build(`class Holder { item: Widget; }`);

      expect(diagnostics).to.have.length(1);
      expect(diagnostics[0]?.code).to.equal("LHK5001");
      expect(diagnostics[0]?.message).to.equal("Unknown type name 'Widget'");
      expect(diagnostics[0]?.location?.line).to.equal(1);
      expect(diagnostics[0]?.location?.column).to.equal(22);
    });

    it("requires a literal length for fixed arrays", () => {
      const { diagnostics } = build(`class Grid { cells: Arr<number, int>; }`);

      expect(diagnostics.map((d) => d.message)).to.deep.equal([
        "The length of Arr<N, T> must be a non-negative integer literal",
      ]);
    });
  });

  describe("Operator declarations", () => {
    it("reads the @operator tag and the parameter passing modes", () => {
      const { unit, diagnostics } = build(`${HANDLE}
/** @operator =destroy */
function closeHandle(h: Handle): void {}

/** @operator = */
function assignHandle(dest: Var<Handle>, src: In<Handle>): void {}

/** @operator =deepCopy */
function dupHandle(h: Ref<Handle>): Ref<Handle> { return h; }
`);

      expect(diagnostics).to.deep.equal([]);
      expect(unit.operators.map((op) => `${op.operator} ${op.name}`)).to.deep.equal([
        "=destroy closeHandle",
        "= assignHandle",
        "=deepCopy dupHandle",
      ]);
      expect(unit.operators[1]?.parameters.map((p) => p.passing)).to.deep.equal([
        "var",
        "in",
      ]);
      expect(unit.procedures).to.deep.equal([]);
    });

    it("rejects an unknown @operator value", () => {
      const { unit, diagnostics } = build(`${HANDLE}
/** @operator =move */
function moveHandle(h: Handle): void {}
`);

      expect(unit.operators).to.deep.equal([]);
      expect(diagnostics[0]?.code).to.equal("LHK5003");
      expect(diagnostics[0]?.message).to.equal("Invalid @operator tag '=move'");
      expect(diagnostics[0]?.hint).to.equal("Use one of: =, =destroy, =deepCopy");
    });
  });

  describe("Procedure bodies", () => {
    it("maps const to immutable and let/var to mutable locals", () => {
      expect(
        bodyOf(`${HANDLE}
function main(): void {
  const a = openHandle();
  let b: Handle = openHandle();
  var n: int = 4;
  openHandle();
}
`)
      ).to.deep.equal([
        "let a: Handle",
        "var b: Handle",
        "var n: int",
        "expr call",
      ]);
    });

    it("treats result as the implicit result of procedures with a return type", () => {
      const { unit } = build(`${HANDLE}
function open(): Handle {
  result = openHandle();
}
`);
      const [stmt] = unit.procedures[0]?.body.body ?? [];

      expect(stmt && describeStatement(stmt)).to.equal("assign result = call");
      expect(
        stmt?.kind === "assignmentStatement" && formatIrType(stmt.target.inferredType)
      ).to.equal("Handle");
    });

    it("recognizes task submissions unless spawn is declared", () => {
      const source = `${HANDLE}
declare function worker(h: Handle): void;
function main(): void {
  const h = openHandle();
  spawn(worker, h);
}
`;
      expect(bodyOf(source)).to.deep.equal(["let h: Handle", "spawn worker(1)"]);
      expect(
        bodyOf(`declare function spawn(n: int): void;\n${source}`)
      ).to.deep.equal(["let h: Handle", "expr call"]);
    });

    it("types member access through fields and base objects", () => {
      const { unit } = build(`${HANDLE}
class Named { name: string; }
class File extends Named { handle: Handle; }
declare function openFile(): File;
function main(): void {
  const f = openFile();
  const h = f.handle;
  const n = f.name;
}
`);
      const locals = unit.procedures[0]?.body.body.map(describeStatement);

      expect(locals).to.deep.equal([
        "let f: File",
        "let h: Handle",
        "let n: string",
      ]);
    });

    it("converts control flow into nested blocks", () => {
      const { unit } = build(`
function main(ready: bool): void {
  while (ready) {
    if (ready) break;
    else { continue; }
  }
  return;
}
`);
      const [loop, ret] = unit.procedures[0]?.body.body ?? [];

      expect(ret?.kind).to.equal("returnStatement");
      expect(loop?.kind).to.equal("whileStatement");
      if (loop?.kind !== "whileStatement") return;
      const [branch] = loop.body.body;
      expect(branch?.kind).to.equal("ifStatement");
      if (branch?.kind !== "ifStatement") return;
      expect(branch.thenStatement.body.map((s) => s.kind)).to.deep.equal([
        "breakStatement",
      ]);
      expect(branch.elseStatement?.body.map((s) => s.kind)).to.deep.equal([
        "continueStatement",
      ]);
    });

    it("types object literals by their declared type", () => {
      const { unit } = build(`${HANDLE}
interface Pair { first: Handle; second: Handle }
function main(): void {
  const p: Pair = { first: openHandle(), second: openHandle() };
}
`);
      const [decl] = unit.procedures[0]?.body.body ?? [];
      const init: IrExpression | undefined =
        decl?.kind === "variableDeclaration" ? decl.initializer : undefined;

      expect(init?.kind).to.equal("construct");
      expect(init && formatIrType(init.inferredType)).to.equal("Pair");
      expect(
        init?.kind === "construct" && init.fields.map((f) => formatIrType(f.value.inferredType))
      ).to.deep.equal(["Handle", "Handle"]);
    });

    it("lowers a for loop into a block around a while loop", () => {
      const { unit, diagnostics } = build(`${HANDLE}
function main(): void {
  for (let i = 0; i < 3; i++) {
    const h = openHandle();
  }
}
`);

      expect(diagnostics).to.deep.equal([]);
      const [loop] = unit.procedures[0]?.body.body ?? [];
      if (loop?.kind !== "blockStatement") {
        expect.fail(`expected a block, got ${loop?.kind}`);
      }
      expect(loop.body.map(describeStatement)).to.deep.equal([
        "var i: number",
        "whileStatement",
      ]);

      const [, whileStmt] = loop.body;
      if (whileStmt?.kind !== "whileStatement") {
        expect.fail(`expected a while loop, got ${whileStmt?.kind}`);
      }
      expect(whileStmt.condition.kind).to.equal("binary");
      expect(whileStmt.body.body.map(describeStatement)).to.deep.equal([
        "blockStatement",
        "assign identifier = binary",
      ]);
      const [body] = whileStmt.body.body;
      expect(
        body?.kind === "blockStatement" && body.body.map(describeStatement)
      ).to.deep.equal(["let h: Handle"]);
    });

    it("lowers for(;;) to an endless while and do-while to while", () => {
      const { unit, diagnostics } = build(`
function main(more: bool): void {
  for (;;) {}
  do {
    var n: int = 1;
  } while (more);
}
`);

      expect(diagnostics).to.deep.equal([]);
      const [forLoop, doLoop] = unit.procedures[0]?.body.body ?? [];
      const endless =
        forLoop?.kind === "blockStatement" ? forLoop.body[0] : undefined;
      expect(
        endless?.kind === "whileStatement" &&
          endless.condition.kind === "literal" &&
          endless.condition.value
      ).to.equal(true);
      expect(doLoop?.kind).to.equal("whileStatement");
      expect(
        doLoop?.kind === "whileStatement" &&
          doLoop.body.body.map(describeStatement)
      ).to.deep.equal(["var n: int"]);
    });

    it("warns about unsupported statements that leave scopes alone", () => {
      const { unit, diagnostics } = build(`
function main(): void {
  throw 1;
  var n: int = 1;
}
`);

      expect(diagnostics.map((d) => `${d.code} ${d.severity}`)).to.deep.equal([
        "LHK5002 warning",
      ]);
      expect(unit.procedures[0]?.body.body.map(describeStatement)).to.deep.equal([
        "var n: int",
      ]);
    });

    it("rejects unsupported statements that declare locals or exit scopes", () => {
      const { diagnostics } = build(`${HANDLE}
function main(n: int): void {
  switch (n) {
    case 1:
      return;
  }
  for (const h of [openHandle()]) {}
}
`);

      expect(diagnostics.map((d) => `${d.code} ${d.severity}`)).to.deep.equal([
        "LHK5002 error",
        "LHK5002 error",
      ]);
      expect(diagnostics[0]?.message).to.equal(
        "Unsupported syntax: SwitchStatement statement declares locals or leaves a scope, so its destroys cannot be scheduled"
      );
    });
  });
});
