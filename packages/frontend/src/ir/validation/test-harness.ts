/**
 * Test harness for the validation passes.
 * Declares a destructible `Handle`, a `Pair` of handles, a plain `Point` and
 * a `Socket` whose base `Stream` has its own destroy, binds their operators
 * and hands out a resolver plus an IR factory.
 */

import type {
  IrBlockStatement,
  IrObjectDeclaration,
  IrOperatorDeclaration,
  IrProcedureDeclaration,
  IrType,
} from "../types/index.js";
import {
  IrFactory,
  createIrFactory,
  indirection,
  nominalOf,
  parameter,
  primitive,
  voidType,
} from "../builder/factory.js";
import { createTypeRegistry } from "../../lifecycle/type-registry.js";
import { runOperationBinder } from "../../lifecycle/operation-binder.js";
import {
  LiftingResolver,
  createLiftingResolver,
} from "../../lifecycle/lifting-resolver.js";

const object = (
  name: string,
  fields: IrObjectDeclaration["fields"],
  base?: IrType
): IrObjectDeclaration => ({
  kind: "objectDeclaration",
  id: `harness.ts#${name}`,
  name,
  typeParameters: [],
  base,
  fields,
});

export const handleDecl = object("Handle", [{ name: "fd", type: primitive("int") }]);
export const handle: IrType = nominalOf(handleDecl);

export const pairDecl = object("Pair", [
  { name: "first", type: handle },
  { name: "second", type: handle },
]);
export const pair: IrType = nominalOf(pairDecl);

export const pointDecl = object("Point", [
  { name: "x", type: primitive("float") },
  { name: "y", type: primitive("float") },
]);
export const point: IrType = nominalOf(pointDecl);

export const streamDecl = object("Stream", [{ name: "fd", type: primitive("int") }]);
export const socketDecl = object(
  "Socket",
  [{ name: "peer", type: handle }],
  nominalOf(streamDecl)
);
export const socket: IrType = nominalOf(socketDecl);

const destroyOperator = (
  name: string,
  decl: IrObjectDeclaration
): IrOperatorDeclaration => ({
  kind: "operatorDeclaration",
  operator: "=destroy",
  name,
  typeParameters: [],
  parameters: [parameter("x", nominalOf(decl))],
  returnType: voidType,
});

const operators: readonly IrOperatorDeclaration[] = [
  {
    kind: "operatorDeclaration",
    operator: "=destroy",
    name: "closeHandle",
    typeParameters: [],
    parameters: [parameter("h", handle)],
    returnType: voidType,
  },
  {
    kind: "operatorDeclaration",
    operator: "=deepCopy",
    name: "dupHandle",
    typeParameters: [],
    parameters: [parameter("h", indirection("ref", handle))],
    returnType: indirection("ref", handle),
  },
  destroyOperator("closeStream", streamDecl),
  destroyOperator("closeSocket", socketDecl),
];

export type Harness = {
  readonly f: IrFactory;
  readonly resolver: LiftingResolver;
  readonly procedure: (
    name: string,
    body: IrBlockStatement,
    returnType?: IrType
  ) => IrProcedureDeclaration;
};

export const createHarness = (): Harness => {
  const registry = createTypeRegistry([
    handleDecl,
    pairDecl,
    pointDecl,
    streamDecl,
    socketDecl,
  ]);
  runOperationBinder(operators, registry);

  return {
    f: createIrFactory(),
    resolver: createLiftingResolver(registry),
    procedure: (name, body, returnType = voidType) => ({
      kind: "procedureDeclaration",
      name,
      parameters: [],
      returnType,
      body,
    }),
  };
};

/**
 * Source location on `line`, column 1.
 */
export const line = (n: number) => ({
  file: "harness.ts",
  line: n,
  column: 1,
  length: 1,
});
