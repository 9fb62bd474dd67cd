import { describe, it } from "mocha";
import { expect } from "chai";
import type {
  IrField,
  IrNominalDeclaration,
  IrObjectDeclaration,
  IrOperatorDeclaration,
  IrType,
} from "../ir/types/index.js";
import {
  arrayOf,
  indirection,
  nominalOf,
  objectOf,
  parameter,
  primitive,
  sequenceOf,
  tupleOf,
  typeParameter,
  voidType,
} from "../ir/builder/factory.js";
import { createTypeRegistry } from "./type-registry.js";
import { runOperationBinder } from "./operation-binder.js";
import { createLiftingResolver, LiftingResolver } from "./lifting-resolver.js";
import { LIFECYCLE_KINDS } from "./types.js";

const object = (
  name: string,
  fields: readonly IrField[],
  options: { readonly base?: IrType; readonly typeParameters?: readonly string[] } = {}
): IrObjectDeclaration => ({
  kind: "objectDeclaration",
  id: `model.ts#${name}`,
  name,
  typeParameters: options.typeParameters ?? [],
  base: options.base,
  fields,
});

const destroyOf = (
  decl: IrNominalDeclaration,
  implementation: string
): IrOperatorDeclaration => ({
  kind: "operatorDeclaration",
  operator: "=destroy",
  name: implementation,
  typeParameters: [],
  parameters: [parameter("x", nominalOf(decl))],
  returnType: voidType,
});

const assignOf = (
  decl: IrNominalDeclaration,
  implementation: string
): IrOperatorDeclaration => ({
  kind: "operatorDeclaration",
  operator: "=",
  name: implementation,
  typeParameters: [],
  parameters: [
    parameter("dest", nominalOf(decl), "var"),
    parameter("src", nominalOf(decl)),
  ],
  returnType: voidType,
});

const deepCopyOf = (
  decl: IrNominalDeclaration,
  implementation: string
): IrOperatorDeclaration => ({
  kind: "operatorDeclaration",
  operator: "=deepCopy",
  name: implementation,
  typeParameters: [],
  parameters: [parameter("x", indirection("ref", nominalOf(decl)))],
  returnType: indirection("ref", nominalOf(decl)),
});

const resolverFor = (
  nominals: readonly IrNominalDeclaration[],
  operators: readonly IrOperatorDeclaration[]
): LiftingResolver => {
  const registry = createTypeRegistry(nominals);
  const { diagnostics } = runOperationBinder(operators, registry);
  expect(diagnostics).to.deep.equal([]);
  return createLiftingResolver(registry);
};

const handleDecl = object("Handle", [{ name: "fd", type: primitive("int") }]);
const handle = nominalOf(handleDecl);

describe("Lifting Resolver", () => {
  it("requires a sealed registry", () => {
    expect(() => createLiftingResolver(createTypeRegistry())).to.throw(
      "Lifting resolver requires a sealed type registry"
    );
  });

  it("returns the user override for a nominal type with a binding", () => {
    const resolver = resolverFor([handleDecl], [destroyOf(handleDecl, "closeHandle")]);
    const operation = resolver.resolve(handle, "destroy");

    expect(operation.outcome).to.equal("override");
    expect(
      operation.outcome === "override" && operation.entry.implementation.name
    ).to.equal("closeHandle");
    expect(resolver.resolve(handle, "assign").outcome).to.equal("default");
  });

  it("lifts through fixed arrays and sequences", () => {
    const resolver = resolverFor([handleDecl], [assignOf(handleDecl, "assignHandle")]);
    const array = resolver.resolve(arrayOf(3, handle), "assign");
    const sequence = resolver.resolve(sequenceOf(handle), "assign");

    expect(array.outcome).to.equal("lifted");
    expect(array.outcome === "lifted" && array.steps.map((s) => s.slot)).to.deep.equal([
      { kind: "arrayElements", length: 3 },
    ]);
    expect(sequence.outcome === "lifted" && sequence.steps[0]?.outcome).to.equal(
      "override"
    );
  });

  it("visits object fields in declaration order, and in reverse for destroy", () => {
    const pair = object("Pair", [
      { name: "first", type: handle },
      { name: "count", type: primitive("int") },
      { name: "second", type: handle },
    ]);
    const resolver = resolverFor(
      [handleDecl, pair],
      [destroyOf(handleDecl, "closeHandle"), assignOf(handleDecl, "assignHandle")]
    );

    const slots = (kind: "assign" | "destroy") => {
      const op = resolver.resolve(nominalOf(pair), kind);
      return op.outcome === "lifted"
        ? op.steps.map((s) => (s.slot.kind === "field" ? s.slot.name : s.slot.kind))
        : [];
    };

    expect(slots("assign")).to.deep.equal(["first", "count", "second"]);
    expect(slots("destroy")).to.deep.equal(["second", "count", "first"]);
  });

  it("places the base sub-object first for assign and last for destroy", () => {
    const base = object("Resource", [{ name: "handle", type: handle }]);
    const derived = object("File", [{ name: "path", type: primitive("string") }], {
      base: nominalOf(base),
    });
    const resolver = resolverFor(
      [handleDecl, base, derived],
      [destroyOf(handleDecl, "closeHandle"), assignOf(handleDecl, "assignHandle")]
    );

    const kinds = (kind: "assign" | "destroy") => {
      const op = resolver.resolve(nominalOf(derived), kind);
      return op.outcome === "lifted" ? op.steps.map((s) => s.slot.kind) : [];
    };

    expect(kinds("assign")).to.deep.equal(["base", "field"]);
    expect(kinds("destroy")).to.deep.equal(["field", "base"]);
  });

  it("chains a destructible base after a derived destroy override", () => {
    const base = object("Resource", [{ name: "handle", type: handle }]);
    const derived = object("File", [{ name: "path", type: primitive("string") }], {
      base: nominalOf(base),
    });
    const plain = object("Label", [{ name: "text", type: primitive("string") }]);
    const tagged = object("Tag", [], { base: nominalOf(plain) });
    const resolver = resolverFor(
      [handleDecl, base, derived, plain, tagged],
      [
        destroyOf(handleDecl, "closeHandle"),
        destroyOf(derived, "closeFile"),
        destroyOf(tagged, "dropTag"),
      ]
    );

    const file = resolver.resolve(nominalOf(derived), "destroy");
    expect(file.outcome).to.equal("override");
    expect(
      file.outcome === "override" && file.chainedBase
        ? [file.chainedBase.slot.kind, file.chainedBase.outcome]
        : []
    ).to.deep.equal(["base", "lifted"]);

    const tag = resolver.resolve(nominalOf(tagged), "destroy");
    expect(tag.outcome === "override" && tag.chainedBase).to.equal(undefined);

    const assign = resolver.resolve(nominalOf(derived), "assign");
    expect(assign.outcome).to.equal("default");
  });

  it("resolves types without overrides to default for every kind", () => {
    const point = object("Point", [
      { name: "x", type: primitive("float") },
      { name: "y", type: primitive("float") },
    ]);
    const resolver = resolverFor([handleDecl, point], [destroyOf(handleDecl, "closeHandle")]);
    const shapes: readonly IrType[] = [
      nominalOf(point),
      arrayOf(4, nominalOf(point)),
      tupleOf(primitive("int"), sequenceOf(primitive("char"))),
      objectOf([{ name: "p", type: nominalOf(point) }]),
    ];

    for (const shape of shapes) {
      for (const kind of LIFECYCLE_KINDS) {
        expect(resolver.resolve(shape, kind).outcome).to.equal("default");
      }
    }
  });

  it("memoizes operations per type identity and kind", () => {
    const resolver = resolverFor([handleDecl], [destroyOf(handleDecl, "closeHandle")]);
    const first = resolver.resolve(sequenceOf(handle), "destroy");
    const second = resolver.resolve(sequenceOf(handle), "destroy");

    expect(second).to.equal(first);
    expect(resolver.arena.intern(sequenceOf(handle))).to.equal(first.typeId);
  });

  it("does not destroy or assign through indirections", () => {
    const resolver = resolverFor(
      [handleDecl],
      [destroyOf(handleDecl, "closeHandle"), deepCopyOf(handleDecl, "copyHandle")]
    );
    const ptr = indirection("ptr", handle);

    expect(resolver.resolve(ptr, "destroy").outcome).to.equal("default");
    expect(resolver.isDestructible(ptr)).to.equal(false);
    expect(resolver.isDestructible(handle)).to.equal(true);
  });

  it("resolves deep copy of an indirection to its pointee's override", () => {
    const resolver = resolverFor([handleDecl], [deepCopyOf(handleDecl, "copyHandle")]);
    const operation = resolver.resolve(indirection("ref", handle), "deepCopy");

    expect(operation.outcome).to.equal("override");
    expect(
      operation.outcome === "override" && operation.entry.implementation.name
    ).to.equal("copyHandle");
  });

  it("lifts generic instantiations by their type arguments", () => {
    const box = object("Box", [{ name: "item", type: typeParameter("T") }], {
      typeParameters: ["T"],
    });
    const resolver = resolverFor([handleDecl, box], [destroyOf(handleDecl, "closeHandle")]);

    expect(resolver.resolve(nominalOf(box, [handle]), "destroy").outcome).to.equal("lifted");
    expect(
      resolver.resolve(nominalOf(box, [primitive("int")]), "destroy").outcome
    ).to.equal("default");
  });

  it("terminates on types that refer to themselves through a sequence", () => {
    const tree = object("Tree", []);
    const treeWithFields: IrObjectDeclaration = {
      ...tree,
      fields: [
        { name: "children", type: sequenceOf(nominalOf(tree)) },
        { name: "handle", type: handle },
      ],
    };
    const resolver = resolverFor(
      [handleDecl, treeWithFields],
      [destroyOf(handleDecl, "closeHandle")]
    );
    const operation = resolver.resolve(nominalOf(tree), "destroy");

    expect(operation.outcome).to.equal("lifted");
    expect(
      operation.outcome === "lifted" && operation.steps.map((s) => s.outcome)
    ).to.deep.equal(["override", "lifted"]);
    expect(resolver.getDiagnostics()).to.deep.equal([]);
  });

  it("reports a type that contains itself by value exactly once", () => {
    const node = object("Node", []);
    const nodeWithFields: IrObjectDeclaration = {
      ...node,
      fields: [
        { name: "handle", type: handle },
        { name: "next", type: nominalOf(node) },
      ],
    };
    const resolver = resolverFor(
      [handleDecl, nodeWithFields],
      [destroyOf(handleDecl, "closeHandle")]
    );

    resolver.checkDeclarations();
    const operation = resolver.resolve(nominalOf(node), "destroy");
    resolver.resolve(nominalOf(node), "assign");
    resolver.resolve(sequenceOf(nominalOf(node)), "destroy");

    const diagnostics = resolver.getDiagnostics();
    expect(operation.outcome).to.equal("default");
    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("LHK2001");
    expect(diagnostics[0]?.message).to.equal(
      "Type 'Node' contains itself by value and has no finite layout"
    );
  });
});
