/**
 * Type converter - TypeScript type syntax to IR types
 *
 * Purely syntactic: names resolve against the file's own declarations and
 * the built-in surface names below. No type checker is involved.
 */

import * as ts from "typescript";
import type { IrField, IrType, PrimitiveTypeName } from "./types/index.js";
import {
  bindTypeArguments,
  substituteTypeParameters,
} from "./types/index.js";
import {
  BuildContext,
  TypeScope,
  report,
  reportUnsupported,
} from "./builder/context.js";

const UNKNOWN: IrType = { kind: "unknownType" };

const PRIMITIVE_NAMES: ReadonlyMap<string, PrimitiveTypeName> = new Map([
  ["int", "int"],
  ["float", "float"],
  ["byte", "byte"],
  ["char", "char"],
  ["bool", "bool"],
]);

const convertKeyword = (kind: ts.SyntaxKind): IrType | undefined => {
  switch (kind) {
    case ts.SyntaxKind.NumberKeyword:
      return { kind: "primitiveType", name: "number" };
    case ts.SyntaxKind.StringKeyword:
      return { kind: "primitiveType", name: "string" };
    case ts.SyntaxKind.BooleanKeyword:
      return { kind: "primitiveType", name: "bool" };
    case ts.SyntaxKind.VoidKeyword:
      return { kind: "voidType" };
    default:
      return undefined;
  }
};

const typeArgumentsOf = (
  node: ts.TypeReferenceNode | ts.ExpressionWithTypeArguments
): readonly ts.TypeNode[] => node.typeArguments ?? [];

/**
 * `Arr<N, T>` length: a non-negative integer literal type.
 */
const arrayLength = (node: ts.TypeNode): number | undefined => {
  if (!ts.isLiteralTypeNode(node) || !ts.isNumericLiteral(node.literal)) {
    return undefined;
  }
  const value = Number(node.literal.text);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
};

const expectArity = (
  ctx: BuildContext,
  node: ts.Node,
  name: string,
  args: readonly ts.TypeNode[],
  arity: number
): boolean => {
  if (args.length === arity) return true;
  report(
    ctx,
    "LHK5002",
    "error",
    `'${name}' expects ${arity} type argument${arity === 1 ? "" : "s"}, got ${args.length}`,
    node
  );
  return false;
};

/**
 * Resolve a named type applied to type arguments.
 */
export const convertNamedType = (
  ctx: BuildContext,
  node: ts.Node,
  name: string,
  args: readonly ts.TypeNode[],
  scope: TypeScope
): IrType => {
  const convertArgs = (): readonly IrType[] =>
    args.map((arg) => convertType(ctx, arg, scope));

  if (scope.has(name) && args.length === 0) {
    return { kind: "typeParameterType", name };
  }

  const primitive = PRIMITIVE_NAMES.get(name);
  if (primitive && args.length === 0) {
    return { kind: "primitiveType", name: primitive };
  }

  switch (name) {
    case "Seq":
    case "Array": {
      const [element] = args;
      if (!element || !expectArity(ctx, node, name, args, 1)) return UNKNOWN;
      return {
        kind: "sequenceType",
        elementType: convertType(ctx, element, scope),
      };
    }

    case "Ref":
    case "Ptr": {
      const [pointee] = args;
      if (!pointee || !expectArity(ctx, node, name, args, 1)) return UNKNOWN;
      return {
        kind: "indirectionType",
        indirection: name === "Ref" ? "ref" : "ptr",
        pointee: convertType(ctx, pointee, scope),
      };
    }

    case "Arr": {
      const [lengthNode, element] = args;
      if (!lengthNode || !element || !expectArity(ctx, node, name, args, 2)) {
        return UNKNOWN;
      }
      const length = arrayLength(lengthNode);
      if (length === undefined) {
        report(
          ctx,
          "LHK5002",
          "error",
          "The length of Arr<N, T> must be a non-negative integer literal",
          lengthNode
        );
        return UNKNOWN;
      }
      return {
        kind: "arrayType",
        length,
        elementType: convertType(ctx, element, scope),
      };
    }

    case "Var":
    case "In":
    case "Distinct": {
      const placement =
        name === "Distinct"
          ? "the right-hand side of a type alias"
          : "parameter types";
      reportUnsupported(ctx, node, `'${name}<...>' outside ${placement}`);
      const [inner] = args;
      return inner ? convertType(ctx, inner, scope) : UNKNOWN;
    }
  }

  const declared = ctx.typeNames.get(name);
  if (!declared) {
    report(
      ctx,
      "LHK5001",
      "error",
      `Unknown type name '${name}'`,
      node,
      "Declare it as a class, interface or type alias in this file"
    );
    return UNKNOWN;
  }

  if (declared.kind === "nominal") {
    const typeArguments = convertArgs();
    return typeArguments.length > 0
      ? {
          kind: "nominalType",
          id: declared.id,
          name: declared.name,
          typeArguments,
        }
      : { kind: "nominalType", id: declared.id, name: declared.name };
  }

  if (ctx.expandingAliases.has(name)) {
    reportUnsupported(ctx, node, `recursive type alias '${name}'`);
    return UNKNOWN;
  }

  ctx.expandingAliases.add(name);
  const body = convertType(ctx, declared.type, new Set(declared.typeParameters));
  ctx.expandingAliases.delete(name);

  return substituteTypeParameters(
    body,
    bindTypeArguments(declared.typeParameters, convertArgs())
  );
};

export const convertMembers = (
  ctx: BuildContext,
  members: readonly ts.Node[],
  scope: TypeScope
): readonly IrField[] =>
  members.flatMap((member): IrField[] => {
    if (
      (ts.isPropertySignature(member) || ts.isPropertyDeclaration(member)) &&
      ts.isIdentifier(member.name)
    ) {
      if (!member.type) {
        report(
          ctx,
          "LHK5002",
          "error",
          `Field '${member.name.text}' needs a type annotation`,
          member
        );
        return [{ name: member.name.text, type: UNKNOWN }];
      }
      return [
        { name: member.name.text, type: convertType(ctx, member.type, scope) },
      ];
    }
    reportUnsupported(ctx, member, `member '${member.getText(ctx.sourceFile)}'`);
    return [];
  });

/**
 * Convert a TypeScript type node to an IR type.
 */
export const convertType = (
  ctx: BuildContext,
  typeNode: ts.TypeNode,
  scope: TypeScope
): IrType => {
  const keyword = convertKeyword(typeNode.kind);
  if (keyword) return keyword;

  if (ts.isTypeReferenceNode(typeNode)) {
    if (!ts.isIdentifier(typeNode.typeName)) {
      report(
        ctx,
        "LHK5001",
        "error",
        `Unknown type name '${typeNode.typeName.getText(ctx.sourceFile)}'`,
        typeNode
      );
      return UNKNOWN;
    }
    return convertNamedType(
      ctx,
      typeNode,
      typeNode.typeName.text,
      typeArgumentsOf(typeNode),
      scope
    );
  }

  if (ts.isArrayTypeNode(typeNode)) {
    return {
      kind: "sequenceType",
      elementType: convertType(ctx, typeNode.elementType, scope),
    };
  }

  if (ts.isTupleTypeNode(typeNode)) {
    return {
      kind: "tupleType",
      elementTypes: typeNode.elements.map((element) =>
        convertType(
          ctx,
          ts.isNamedTupleMember(element) ? element.type : element,
          scope
        )
      ),
    };
  }

  if (ts.isTypeLiteralNode(typeNode)) {
    return {
      kind: "objectType",
      fields: convertMembers(ctx, typeNode.members, scope),
    };
  }

  if (ts.isFunctionTypeNode(typeNode)) {
    return {
      kind: "procedureType",
      parameters: typeNode.parameters.map((p) =>
        p.type ? convertType(ctx, p.type, scope) : UNKNOWN
      ),
      returnType: convertType(ctx, typeNode.type, scope),
    };
  }

  if (ts.isParenthesizedTypeNode(typeNode)) {
    return convertType(ctx, typeNode.type, scope);
  }

  reportUnsupported(ctx, typeNode, `type '${typeNode.getText(ctx.sourceFile)}'`);
  return UNKNOWN;
};
