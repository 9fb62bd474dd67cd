/**
 * Expression converter - TypeScript expressions to IR expressions
 *
 * Static types come from declarations: locals and parameters carry their
 * declared types, calls take the callee's declared return type, member and
 * element access follow the accessed type's structure. An optional expected
 * type (from an annotation, `as`, or an enclosing literal) types object and
 * array literals.
 */

import * as ts from "typescript";
import type {
  IrBinaryOperator,
  IrExpression,
  IrType,
} from "./types/index.js";
import {
  bindTypeArguments,
  substituteTypeParameters,
} from "./types/index.js";
import {
  BuildContext,
  TypeScope,
  getNodeLocation,
  report,
  reportUnsupported,
} from "./builder/context.js";
import { convertType } from "./type-converter.js";

const UNKNOWN: IrType = { kind: "unknownType" };
const BOOL: IrType = { kind: "primitiveType", name: "bool" };

/**
 * Names visible in a procedure body.
 */
export type BodyEnv = {
  readonly typeScope: TypeScope;
  readonly parameters: ReadonlyMap<string, IrType>;
  /** Block scopes, innermost last */
  readonly locals: readonly Map<string, IrType>[];
  /** Type of the implicit `result` variable, when the procedure returns one */
  readonly resultType?: IrType;
};

export const lookupLocal = (env: BodyEnv, name: string): IrType | undefined => {
  for (let i = env.locals.length - 1; i >= 0; i--) {
    const type = env.locals[i]?.get(name);
    if (type) return type;
  }
  return undefined;
};

/**
 * True when `result` in this body names the implicit result variable.
 */
export const isResultName = (env: BodyEnv, name: string): boolean =>
  name === "result" &&
  env.resultType !== undefined &&
  lookupLocal(env, name) === undefined &&
  !env.parameters.has(name);

/**
 * Type of `object.property`, following object fields, base objects,
 * the `value` of a distinct type and indirections.
 */
export const memberType = (
  ctx: BuildContext,
  type: IrType,
  property: string
): IrType => {
  switch (type.kind) {
    case "objectType":
      return type.fields.find((f) => f.name === property)?.type ?? UNKNOWN;

    case "indirectionType":
      return memberType(ctx, type.pointee, property);

    case "sequenceType":
      return property === "length"
        ? { kind: "primitiveType", name: "int" }
        : UNKNOWN;

    case "nominalType": {
      const decl = ctx.nominals.get(type.id);
      if (!decl) return UNKNOWN;
      const bindings = bindTypeArguments(
        decl.typeParameters,
        type.typeArguments
      );

      if (decl.kind === "distinctDeclaration") {
        return property === "value"
          ? substituteTypeParameters(decl.underlying, bindings)
          : UNKNOWN;
      }

      const field = decl.fields.find((f) => f.name === property);
      if (field) return substituteTypeParameters(field.type, bindings);
      return decl.base
        ? memberType(ctx, substituteTypeParameters(decl.base, bindings), property)
        : UNKNOWN;
    }

    default:
      return UNKNOWN;
  }
};

const elementType = (type: IrType, index: ts.Expression): IrType => {
  switch (type.kind) {
    case "arrayType":
    case "sequenceType":
      return type.elementType;
    case "tupleType":
      return ts.isNumericLiteral(index)
        ? type.elementTypes[Number(index.text)] ?? UNKNOWN
        : UNKNOWN;
    case "indirectionType":
      return elementType(type.pointee, index);
    default:
      return UNKNOWN;
  }
};

const BINARY_OPERATORS: ReadonlyMap<ts.SyntaxKind, IrBinaryOperator> = new Map([
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.AsteriskToken, "*"],
  [ts.SyntaxKind.SlashToken, "/"],
  [ts.SyntaxKind.PercentToken, "%"],
  [ts.SyntaxKind.EqualsEqualsToken, "=="],
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "=="],
  [ts.SyntaxKind.ExclamationEqualsToken, "!="],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!="],
  [ts.SyntaxKind.LessThanToken, "<"],
  [ts.SyntaxKind.GreaterThanToken, ">"],
  [ts.SyntaxKind.LessThanEqualsToken, "<="],
  [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
  [ts.SyntaxKind.AmpersandAmpersandToken, "&&"],
  [ts.SyntaxKind.BarBarToken, "||"],
]);

const isBooleanOperator = (op: IrBinaryOperator): boolean =>
  op !== "+" && op !== "-" && op !== "*" && op !== "/" && op !== "%";

/**
 * Field types an object literal is checked against.
 */
const expectedFields = (
  ctx: BuildContext,
  expected: IrType | undefined
): ReadonlyMap<string, IrType> => {
  if (!expected) return new Map();
  if (expected.kind === "objectType") {
    return new Map(expected.fields.map((f) => [f.name, f.type]));
  }
  if (expected.kind !== "nominalType") return new Map();

  const decl = ctx.nominals.get(expected.id);
  if (!decl || decl.kind !== "objectDeclaration") return new Map();
  const bindings = bindTypeArguments(decl.typeParameters, expected.typeArguments);
  const own = decl.fields.map((f): [string, IrType] => [
    f.name,
    substituteTypeParameters(f.type, bindings),
  ]);
  const inherited = decl.base
    ? [...expectedFields(ctx, substituteTypeParameters(decl.base, bindings))]
    : [];
  return new Map([...inherited, ...own]);
};

const expectedElement = (
  expected: IrType | undefined,
  index: number
): IrType | undefined => {
  switch (expected?.kind) {
    case "arrayType":
    case "sequenceType":
      return expected.elementType;
    case "tupleType":
      return expected.elementTypes[index];
    default:
      return undefined;
  }
};

export const convertExpression = (
  ctx: BuildContext,
  node: ts.Expression,
  env: BodyEnv,
  expected?: IrType
): IrExpression => {
  const f = ctx.factory;
  const location = getNodeLocation(ctx.sourceFile, node);

  if (ts.isParenthesizedExpression(node)) {
    return convertExpression(ctx, node.expression, env, expected);
  }

  if (ts.isNumericLiteral(node)) {
    const type: IrType =
      expected?.kind === "primitiveType" &&
      expected.name !== "string" &&
      expected.name !== "bool"
        ? expected
        : { kind: "primitiveType", name: "number" };
    return f.literal(Number(node.text), type, location);
  }

  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return f.literal(node.text, { kind: "primitiveType", name: "string" }, location);
  }

  if (node.kind === ts.SyntaxKind.TrueKeyword) {
    return f.literal(true, BOOL, location);
  }
  if (node.kind === ts.SyntaxKind.FalseKeyword) {
    return f.literal(false, BOOL, location);
  }

  if (ts.isIdentifier(node)) {
    const name = node.text;
    if (isResultName(env, name) && env.resultType) {
      return f.result(env.resultType, location);
    }
    const local = lookupLocal(env, name);
    if (local) return f.identifier(name, local, "local", location);
    const param = env.parameters.get(name);
    if (param) return f.identifier(name, param, "parameter", location);

    const signature = ctx.signatures.get(name);
    const type: IrType = signature
      ? {
          kind: "procedureType",
          parameters: signature.parameters.map((p) => p.type),
          returnType: signature.returnType,
        }
      : UNKNOWN;
    return f.identifier(name, type, "global", location);
  }

  if (ts.isCallExpression(node)) {
    const args = node.arguments.map((arg) => convertExpression(ctx, arg, env));
    if (!ts.isIdentifier(node.expression)) {
      reportUnsupported(
        ctx,
        node.expression,
        `callee '${node.expression.getText(ctx.sourceFile)}'`
      );
      return f.call(node.expression.getText(ctx.sourceFile), args, UNKNOWN, location);
    }
    const callee = node.expression.text;
    const returnType = ctx.signatures.get(callee)?.returnType ?? UNKNOWN;
    return f.call(callee, args, returnType, location);
  }

  if (ts.isNewExpression(node)) {
    if (node.arguments && node.arguments.length > 0) {
      reportUnsupported(ctx, node, "constructor arguments");
    }
    const type = ts.isIdentifier(node.expression)
      ? convertTypeReferenceExpression(ctx, node.expression, node.typeArguments, env)
      : UNKNOWN;
    return f.construct(type, [], location);
  }

  if (ts.isObjectLiteralExpression(node)) {
    const fieldTypes = expectedFields(ctx, expected);
    const fields = node.properties.flatMap((property) => {
      if (
        !ts.isPropertyAssignment(property) ||
        !ts.isIdentifier(property.name)
      ) {
        reportUnsupported(ctx, property, "object literal member");
        return [];
      }
      const name = property.name.text;
      return [
        {
          name,
          value: convertExpression(
            ctx,
            property.initializer,
            env,
            fieldTypes.get(name)
          ),
        },
      ];
    });
    const type: IrType = expected ?? {
      kind: "objectType",
      fields: fields.map((field) => ({
        name: field.name,
        type: field.value.inferredType,
      })),
    };
    return f.construct(type, fields, location);
  }

  if (ts.isArrayLiteralExpression(node)) {
    const elements = node.elements.map((element, index) =>
      convertExpression(ctx, element, env, expectedElement(expected, index))
    );
    if (expected?.kind === "tupleType") {
      return f.tupleLiteral(elements, expected, location);
    }
    const type: IrType =
      expected?.kind === "arrayType" || expected?.kind === "sequenceType"
        ? expected
        : {
            kind: "sequenceType",
            elementType: elements[0]?.inferredType ?? UNKNOWN,
          };
    return f.arrayLiteral(elements, type, location);
  }

  if (ts.isAsExpression(node)) {
    const target = convertType(ctx, node.type, env.typeScope);
    const inner = node.expression;
    if (
      ts.isObjectLiteralExpression(inner) ||
      ts.isArrayLiteralExpression(inner)
    ) {
      return convertExpression(ctx, inner, env, target);
    }
    return f.conversion(convertExpression(ctx, inner, env), target, location);
  }

  if (ts.isPropertyAccessExpression(node)) {
    const object = convertExpression(ctx, node.expression, env);
    const property = node.name.text;
    return f.member(
      object,
      property,
      memberType(ctx, object.inferredType, property),
      location
    );
  }

  if (ts.isElementAccessExpression(node)) {
    const object = convertExpression(ctx, node.expression, env);
    const index = convertExpression(ctx, node.argumentExpression, env);
    return f.element(
      object,
      index,
      elementType(object.inferredType, node.argumentExpression),
      location
    );
  }

  if (ts.isBinaryExpression(node)) {
    const operator = BINARY_OPERATORS.get(node.operatorToken.kind);
    if (operator) {
      const left = convertExpression(ctx, node.left, env);
      const right = convertExpression(ctx, node.right, env);
      return f.binary(
        operator,
        left,
        right,
        isBooleanOperator(operator) ? BOOL : left.inferredType,
        location
      );
    }
  }

  reportUnsupported(ctx, node, `expression '${node.getText(ctx.sourceFile)}'`);
  return f.literal(0, UNKNOWN, location);
};

/**
 * `new X<A>()`: the constructed nominal type.
 */
const convertTypeReferenceExpression = (
  ctx: BuildContext,
  name: ts.Identifier,
  typeArguments: ts.NodeArray<ts.TypeNode> | undefined,
  env: BodyEnv
): IrType => {
  const declared = ctx.typeNames.get(name.text);
  if (!declared || declared.kind !== "nominal") {
    report(
      ctx,
      "LHK5001",
      "error",
      `Unknown type name '${name.text}'`,
      name
    );
    return UNKNOWN;
  }
  const args = (typeArguments ?? []).map((arg) =>
    convertType(ctx, arg, env.typeScope)
  );
  return args.length > 0
    ? { kind: "nominalType", id: declared.id, name: declared.name, typeArguments: args }
    : { kind: "nominalType", id: declared.id, name: declared.name };
};
