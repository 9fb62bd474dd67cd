import { describe, it } from "mocha";
import { expect } from "chai";
import type {
  IrObjectDeclaration,
  IrOperatorDeclaration,
  IrParameter,
  IrType,
  LifecycleOperator,
} from "../ir/types/index.js";
import {
  indirection,
  parameter,
  primitive,
  voidType,
} from "../ir/builder/factory.js";
import { createTypeRegistry } from "./type-registry.js";
import { runOperationBinder } from "./operation-binder.js";

const handleDecl: IrObjectDeclaration = {
  kind: "objectDeclaration",
  id: "handles.ts#Handle",
  name: "Handle",
  typeParameters: [],
  fields: [{ name: "fd", type: primitive("int") }],
};

const handle: IrType = {
  kind: "nominalType",
  id: "handles.ts#Handle",
  name: "Handle",
};

const at = (line: number) => ({
  file: "handles.ts",
  line,
  column: 1,
  length: 10,
});

const operator = (
  op: LifecycleOperator,
  name: string,
  parameters: readonly IrParameter[],
  returnType: IrType = voidType,
  line = 1
): IrOperatorDeclaration => ({
  kind: "operatorDeclaration",
  operator: op,
  name,
  typeParameters: [],
  parameters,
  returnType,
  location: at(line),
});

const bind = (operators: readonly IrOperatorDeclaration[]) => {
  const registry = createTypeRegistry([handleDecl]);
  const result = runOperationBinder(operators, registry);
  return { registry, ...result };
};

describe("Operation Binder", () => {
  it("binds valid declarations and seals the registry", () => {
    const { registry, bound, diagnostics } = bind([
      operator("=destroy", "closeHandle", [parameter("h", handle)]),
      operator("=", "assignHandle", [
        parameter("dest", handle, "var"),
        parameter("src", handle, "in"),
      ]),
      operator(
        "=deepCopy",
        "copyHandle",
        [parameter("h", indirection("ref", handle))],
        indirection("ref", handle)
      ),
    ]);

    expect(diagnostics).to.deep.equal([]);
    expect(bound.map((e) => `${e.kind}:${e.implementation.name}`)).to.deep.equal(
      ["destroy:closeHandle", "assign:assignHandle", "deepCopy:copyHandle"]
    );
    expect(registry.isSealed()).to.equal(true);
    expect(
      registry.lookup("handles.ts#Handle", "deepCopy")?.signature.indirection
    ).to.equal("ref");
  });

  it("reports a second override for the same slot and keeps the first", () => {
    const { registry, diagnostics } = bind([
      operator("=destroy", "closeHandle", [parameter("h", handle)], voidType, 3),
      operator("=destroy", "releaseHandle", [parameter("h", handle)], voidType, 7),
    ]);

    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("LHK1001");
    expect(diagnostics[0]?.message).to.equal(
      "'=destroy' is already bound for 'Handle' by 'closeHandle'"
    );
    expect(diagnostics[0]?.location?.line).to.equal(7);
    expect(diagnostics[0]?.relatedLocations).to.deep.equal([at(3)]);
    expect(
      registry.lookup("handles.ts#Handle", "destroy")?.implementation.name
    ).to.equal("closeHandle");
  });

  it("requires '=' to take its destination as a mutable reference", () => {
    const { bound, diagnostics } = bind([
      operator("=", "assignHandle", [
        parameter("dest", handle),
        parameter("src", handle),
      ]),
    ]);

    expect(bound).to.deep.equal([]);
    expect(diagnostics[0]?.kind).to.equal("InvalidSignature");
    expect(diagnostics[0]?.message).to.equal(
      "Invalid signature for '=' (assignHandle): the first parameter 'dest' must be a mutable reference"
    );
  });

  it("rejects '=destroy' with a return value", () => {
    const { diagnostics } = bind([
      operator("=destroy", "closeHandle", [parameter("h", handle)], primitive("int")),
    ]);

    expect(diagnostics[0]?.code).to.equal("LHK1002");
    expect(diagnostics[0]?.hint).to.equal("Declare the return type as void");
  });

  it("rejects receivers that are not nominal", () => {
    const { diagnostics } = bind([
      operator("=destroy", "closeInt", [parameter("x", primitive("int"))]),
    ]);

    expect(diagnostics[0]?.code).to.equal("LHK1003");
    expect(diagnostics[0]?.message).to.equal(
      "'=destroy' (closeInt) must be declared for an object or distinct type, not 'int'"
    );
    expect(diagnostics[0]?.typeName).to.equal("int");
  });

  it("rejects '=deepCopy' whose return type differs from its parameter", () => {
    const { diagnostics } = bind([
      operator(
        "=deepCopy",
        "copyHandle",
        [parameter("h", indirection("ref", handle))],
        indirection("ptr", handle)
      ),
    ]);

    expect(diagnostics[0]?.kind).to.equal("InvalidSignature");
    expect(diagnostics[0]?.message).to.equal(
      "Invalid signature for '=deepCopy' (copyHandle): return type 'Ptr<Handle>' must match the parameter type 'Ref<Handle>'"
    );
  });

  it("reports '=deepCopy' bound through both Ref and Ptr", () => {
    const { diagnostics } = bind([
      operator(
        "=deepCopy",
        "copyByRef",
        [parameter("h", indirection("ref", handle))],
        indirection("ref", handle)
      ),
      operator(
        "=deepCopy",
        "copyByPtr",
        [parameter("h", indirection("ptr", handle))],
        indirection("ptr", handle)
      ),
    ]);

    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("LHK1004");
    expect(diagnostics[0]?.message).to.equal(
      "'=deepCopy' for 'Handle' is bound through both Ref<Handle> (copyByRef) and Ptr<Handle> (copyByPtr)"
    );
  });

  it("continues binding after a rejected declaration", () => {
    const { bound, diagnostics } = bind([
      operator("=destroy", "closeInt", [parameter("x", primitive("int"))]),
      operator("=destroy", "closeHandle", [parameter("h", handle)]),
    ]);

    expect(diagnostics).to.have.length(1);
    expect(bound.map((e) => e.implementation.name)).to.deep.equal([
      "closeHandle",
    ]);
  });
});
