/**
 * IR node factory
 *
 * Hands out unit-unique node ids. Used by the surface front end and by
 * tests that build IR directly.
 */

import type { SourceLocation } from "../../types/diagnostic.js";
import type {
  IndirectionKind,
  IrBinaryOperator,
  IrBlockStatement,
  IrExpression,
  IrField,
  IrNominalDeclaration,
  IrNominalType,
  IrParameter,
  IrParameterPassing,
  IrStatement,
  IrType,
  NodeId,
  PrimitiveTypeName,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export const primitive = (name: PrimitiveTypeName): IrType => ({
  kind: "primitiveType",
  name,
});

export const voidType: IrType = { kind: "voidType" };
export const unknownType: IrType = { kind: "unknownType" };

export const nominalOf = (
  decl: IrNominalDeclaration,
  typeArguments?: readonly IrType[]
): IrNominalType =>
  typeArguments && typeArguments.length > 0
    ? { kind: "nominalType", id: decl.id, name: decl.name, typeArguments }
    : { kind: "nominalType", id: decl.id, name: decl.name };

export const typeParameter = (name: string): IrType => ({
  kind: "typeParameterType",
  name,
});

export const arrayOf = (length: number, elementType: IrType): IrType => ({
  kind: "arrayType",
  length,
  elementType,
});

export const sequenceOf = (elementType: IrType): IrType => ({
  kind: "sequenceType",
  elementType,
});

export const tupleOf = (...elementTypes: readonly IrType[]): IrType => ({
  kind: "tupleType",
  elementTypes,
});

export const objectOf = (fields: readonly IrField[]): IrType => ({
  kind: "objectType",
  fields,
});

export const indirection = (
  kind: IndirectionKind,
  pointee: IrType
): IrType => ({ kind: "indirectionType", indirection: kind, pointee });

export const parameter = (
  name: string,
  type: IrType,
  passing: IrParameterPassing = "value",
  location?: SourceLocation
): IrParameter => ({ kind: "parameter", name, type, passing, location });

// ============================================================================
// Nodes
// ============================================================================

export type IrFactory = {
  readonly nextId: () => NodeId;

  readonly literal: (
    value: string | number | boolean,
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly identifier: (
    name: string,
    type: IrType,
    binding?: "local" | "parameter" | "global",
    location?: SourceLocation
  ) => IrExpression;
  readonly result: (type: IrType, location?: SourceLocation) => IrExpression;
  readonly call: (
    callee: string,
    args: readonly IrExpression[],
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly construct: (
    type: IrType,
    fields?: readonly { readonly name: string; readonly value: IrExpression }[],
    location?: SourceLocation
  ) => IrExpression;
  readonly arrayLiteral: (
    elements: readonly IrExpression[],
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly tupleLiteral: (
    elements: readonly IrExpression[],
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly member: (
    object: IrExpression,
    property: string,
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly element: (
    object: IrExpression,
    index: IrExpression,
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly conversion: (
    expression: IrExpression,
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;
  readonly binary: (
    operator: IrBinaryOperator,
    left: IrExpression,
    right: IrExpression,
    type: IrType,
    location?: SourceLocation
  ) => IrExpression;

  readonly varDecl: (
    name: string,
    type: IrType,
    initializer?: IrExpression,
    location?: SourceLocation
  ) => IrStatement;
  readonly letDecl: (
    name: string,
    type: IrType,
    initializer?: IrExpression,
    location?: SourceLocation
  ) => IrStatement;
  readonly exprStmt: (
    expression: IrExpression,
    location?: SourceLocation
  ) => IrStatement;
  readonly assign: (
    target: IrExpression,
    value: IrExpression,
    location?: SourceLocation
  ) => IrStatement;
  readonly ret: (value?: IrExpression, location?: SourceLocation) => IrStatement;
  readonly block: (
    body: readonly IrStatement[],
    location?: SourceLocation
  ) => IrBlockStatement;
  readonly ifStmt: (
    condition: IrExpression,
    thenStatement: IrBlockStatement,
    elseStatement?: IrBlockStatement,
    location?: SourceLocation
  ) => IrStatement;
  readonly whileStmt: (
    condition: IrExpression,
    body: IrBlockStatement,
    location?: SourceLocation
  ) => IrStatement;
  readonly breakStmt: (location?: SourceLocation) => IrStatement;
  readonly continueStmt: (location?: SourceLocation) => IrStatement;
  readonly spawn: (
    callee: string,
    args: readonly IrExpression[],
    location?: SourceLocation
  ) => IrStatement;
};

export const createIrFactory = (firstId: NodeId = 1): IrFactory => {
  let counter = firstId;
  const nextId = (): NodeId => counter++;

  return {
    nextId,

    literal: (value, inferredType, location) => ({
      kind: "literal",
      id: nextId(),
      value,
      inferredType,
      location,
    }),
    identifier: (name, inferredType, binding = "local", location) => ({
      kind: "identifier",
      id: nextId(),
      name,
      binding,
      inferredType,
      location,
    }),
    result: (inferredType, location) => ({
      kind: "result",
      id: nextId(),
      inferredType,
      location,
    }),
    call: (callee, args, inferredType, location) => ({
      kind: "call",
      id: nextId(),
      callee,
      arguments: args,
      inferredType,
      location,
    }),
    construct: (inferredType, fields = [], location) => ({
      kind: "construct",
      id: nextId(),
      fields,
      inferredType,
      location,
    }),
    arrayLiteral: (elements, inferredType, location) => ({
      kind: "arrayLiteral",
      id: nextId(),
      elements,
      inferredType,
      location,
    }),
    tupleLiteral: (elements, inferredType, location) => ({
      kind: "tupleLiteral",
      id: nextId(),
      elements,
      inferredType,
      location,
    }),
    member: (object, property, inferredType, location) => ({
      kind: "memberAccess",
      id: nextId(),
      object,
      property,
      inferredType,
      location,
    }),
    element: (object, index, inferredType, location) => ({
      kind: "elementAccess",
      id: nextId(),
      object,
      index,
      inferredType,
      location,
    }),
    conversion: (expression, inferredType, location) => ({
      kind: "conversion",
      id: nextId(),
      expression,
      inferredType,
      location,
    }),
    binary: (operator, left, right, inferredType, location) => ({
      kind: "binary",
      id: nextId(),
      operator,
      left,
      right,
      inferredType,
      location,
    }),

    varDecl: (name, type, initializer, location) => ({
      kind: "variableDeclaration",
      id: nextId(),
      declarationKind: "var",
      name,
      type,
      initializer,
      location,
    }),
    letDecl: (name, type, initializer, location) => ({
      kind: "variableDeclaration",
      id: nextId(),
      declarationKind: "let",
      name,
      type,
      initializer,
      location,
    }),
    exprStmt: (expression, location) => ({
      kind: "expressionStatement",
      id: nextId(),
      expression,
      location,
    }),
    assign: (target, value, location) => ({
      kind: "assignmentStatement",
      id: nextId(),
      target,
      value,
      location,
    }),
    ret: (value, location) => ({
      kind: "returnStatement",
      id: nextId(),
      value,
      location,
    }),
    block: (body, location) => ({
      kind: "blockStatement",
      id: nextId(),
      body,
      location,
    }),
    ifStmt: (condition, thenStatement, elseStatement, location) => ({
      kind: "ifStatement",
      id: nextId(),
      condition,
      thenStatement,
      elseStatement,
      location,
    }),
    whileStmt: (condition, body, location) => ({
      kind: "whileStatement",
      id: nextId(),
      condition,
      body,
      location,
    }),
    breakStmt: (location) => ({ kind: "breakStatement", id: nextId(), location }),
    continueStmt: (location) => ({
      kind: "continueStatement",
      id: nextId(),
      location,
    }),
    spawn: (callee, args, location) => ({
      kind: "spawnStatement",
      id: nextId(),
      callee,
      arguments: args,
      location,
    }),
  };
};
