/**
 * Top-level declarations of a surface file
 *
 * - `class X { a: T }` / `interface X { a: T }` → object declaration
 * - `type X = Distinct<T>` → distinct declaration
 * - other type aliases → transparent
 * - functions tagged `@operator =`, `=destroy` or `=deepCopy` → operators
 * - other functions → procedures
 */

import * as ts from "typescript";
import type {
  IrNominalDeclaration,
  IrOperatorDeclaration,
  IrParameter,
  IrProcedureDeclaration,
  IrType,
  LifecycleOperator,
} from "../types/index.js";
import { LIFECYCLE_OPERATORS } from "../types/index.js";
import {
  BuildContext,
  ProcedureSignature,
  TypeScope,
  getNodeLocation,
  nominalIdOf,
  report,
  reportUnsupported,
} from "./context.js";
import { convertMembers, convertNamedType, convertType } from "../type-converter.js";
import { convertBlock } from "../statement-converter.js";

type TypeDeclarationNode =
  | ts.ClassDeclaration
  | ts.InterfaceDeclaration
  | ts.TypeAliasDeclaration;

const typeParametersOf = (
  node: TypeDeclarationNode | ts.FunctionDeclaration
): readonly string[] => (node.typeParameters ?? []).map((p) => p.name.text);

/**
 * `type X = Distinct<T>`: the underlying type node.
 */
const distinctUnderlying = (
  node: ts.TypeAliasDeclaration
): ts.TypeNode | undefined => {
  const type = node.type;
  if (
    ts.isTypeReferenceNode(type) &&
    ts.isIdentifier(type.typeName) &&
    type.typeName.text === "Distinct" &&
    type.typeArguments?.length === 1
  ) {
    return type.typeArguments[0];
  }
  return undefined;
};

/**
 * First pass: record every declared type name.
 */
export const collectTypeNames = (ctx: BuildContext): void => {
  for (const stmt of ctx.sourceFile.statements) {
    if (
      (ts.isClassDeclaration(stmt) || ts.isInterfaceDeclaration(stmt)) &&
      stmt.name
    ) {
      declareName(ctx, stmt, stmt.name.text, true);
    } else if (ts.isTypeAliasDeclaration(stmt)) {
      declareName(ctx, stmt, stmt.name.text, distinctUnderlying(stmt) !== undefined);
    }
  }
};

const declareName = (
  ctx: BuildContext,
  node: TypeDeclarationNode,
  name: string,
  nominal: boolean
): void => {
  if (ctx.typeNames.has(name)) {
    report(
      ctx,
      "LHK5002",
      "error",
      `Type '${name}' is declared more than once`,
      node
    );
    return;
  }
  const typeParameters = typeParametersOf(node);
  if (ts.isTypeAliasDeclaration(node) && !nominal) {
    ctx.typeNames.set(name, { kind: "alias", name, typeParameters, type: node.type });
    return;
  }
  ctx.typeNames.set(name, {
    kind: "nominal",
    id: nominalIdOf(ctx.sourceFile, name),
    name,
    typeParameters,
  });
};

const convertHeritage = (
  ctx: BuildContext,
  node: ts.ClassDeclaration | ts.InterfaceDeclaration,
  scope: TypeScope
): IrType | undefined => {
  const bases = (node.heritageClauses ?? [])
    .filter((clause) => clause.token === ts.SyntaxKind.ExtendsKeyword)
    .flatMap((clause) => [...clause.types]);

  const [first, ...rest] = bases;
  rest.forEach((extra) => reportUnsupported(ctx, extra, "additional base type"));
  if (!first) return undefined;

  if (!ts.isIdentifier(first.expression)) {
    reportUnsupported(ctx, first, "qualified base type");
    return undefined;
  }
  return convertNamedType(
    ctx,
    first,
    first.expression.text,
    first.typeArguments ?? [],
    scope
  );
};

/**
 * Second pass: convert type declarations.
 */
export const convertTypeDeclarations = (
  ctx: BuildContext
): readonly IrNominalDeclaration[] => {
  const nominals: IrNominalDeclaration[] = [];

  for (const stmt of ctx.sourceFile.statements) {
    const decl = convertTypeDeclaration(ctx, stmt);
    if (decl) {
      nominals.push(decl);
      ctx.nominals.set(decl.id, decl);
    }
  }

  return nominals;
};

const convertTypeDeclaration = (
  ctx: BuildContext,
  stmt: ts.Statement
): IrNominalDeclaration | undefined => {
  if (
    !(ts.isClassDeclaration(stmt) || ts.isInterfaceDeclaration(stmt)) &&
    !ts.isTypeAliasDeclaration(stmt)
  ) {
    return undefined;
  }
  if (!stmt.name) {
    reportUnsupported(ctx, stmt, "anonymous class");
    return undefined;
  }

  const name = stmt.name.text;
  const declared = ctx.typeNames.get(name);
  // Transparent aliases, and later declarations of a repeated name
  if (declared?.kind !== "nominal" || ctx.nominals.has(declared.id)) {
    return undefined;
  }

  const typeParameters = typeParametersOf(stmt);
  const scope: TypeScope = new Set(typeParameters);
  const location = getNodeLocation(ctx.sourceFile, stmt);

  if (ts.isTypeAliasDeclaration(stmt)) {
    const underlying = distinctUnderlying(stmt);
    return {
      kind: "distinctDeclaration",
      id: declared.id,
      name,
      typeParameters,
      underlying: underlying
        ? convertType(ctx, underlying, scope)
        : { kind: "unknownType" },
      location,
    };
  }

  return {
    kind: "objectDeclaration",
    id: declared.id,
    name,
    typeParameters,
    base: convertHeritage(ctx, stmt, scope),
    fields: convertMembers(ctx, stmt.members, scope),
    location,
  };
};

const convertParameters = (
  ctx: BuildContext,
  node: ts.FunctionDeclaration,
  scope: TypeScope
): readonly IrParameter[] =>
  node.parameters.map((param): IrParameter => {
    const location = getNodeLocation(ctx.sourceFile, param);
    const name = ts.isIdentifier(param.name)
      ? param.name.text
      : param.name.getText(ctx.sourceFile);
    const typeNode = param.type;

    if (!typeNode) {
      report(
        ctx,
        "LHK5002",
        "error",
        `Parameter '${name}' needs a type annotation`,
        param
      );
      return { kind: "parameter", name, type: { kind: "unknownType" }, passing: "value", location };
    }

    if (
      ts.isTypeReferenceNode(typeNode) &&
      ts.isIdentifier(typeNode.typeName) &&
      (typeNode.typeName.text === "Var" || typeNode.typeName.text === "In") &&
      typeNode.typeArguments?.length === 1
    ) {
      const [inner] = typeNode.typeArguments;
      return {
        kind: "parameter",
        name,
        type: inner ? convertType(ctx, inner, scope) : { kind: "unknownType" },
        passing: typeNode.typeName.text === "Var" ? "var" : "in",
        location,
      };
    }

    return {
      kind: "parameter",
      name,
      type: convertType(ctx, typeNode, scope),
      passing: "value",
      location,
    };
  });

const isLifecycleOperator = (value: string): value is LifecycleOperator =>
  LIFECYCLE_OPERATORS.some((op) => op === value);

/**
 * Value of the function's `@operator` tag, if it has one.
 */
const operatorTag = (
  ctx: BuildContext,
  node: ts.FunctionDeclaration
): LifecycleOperator | "invalid" | undefined => {
  const tag = ts
    .getJSDocTags(node)
    .find((t) => t.tagName.text === "operator");
  if (!tag) return undefined;

  const value = (ts.getTextOfJSDocComment(tag.comment) ?? "").trim();
  if (isLifecycleOperator(value)) return value;

  report(
    ctx,
    "LHK5003",
    "error",
    `Invalid @operator tag '${value}'`,
    tag,
    `Use one of: ${LIFECYCLE_OPERATORS.join(", ")}`
  );
  return "invalid";
};

type FunctionDeclarations = {
  readonly operators: readonly IrOperatorDeclaration[];
  readonly procedures: readonly IrProcedureDeclaration[];
};

/**
 * Third pass: operators, procedure signatures, then procedure bodies
 * (so calls may refer to procedures declared later in the file).
 */
export const convertFunctions = (ctx: BuildContext): FunctionDeclarations => {
  const operators: IrOperatorDeclaration[] = [];
  const pending: {
    readonly node: ts.FunctionDeclaration;
    readonly name: string;
    readonly signature: ProcedureSignature;
    readonly scope: TypeScope;
  }[] = [];

  for (const stmt of ctx.sourceFile.statements) {
    if (!ts.isFunctionDeclaration(stmt)) {
      if (!isDeclarationStatement(stmt)) {
        reportUnsupported(ctx, stmt, `top-level ${ts.SyntaxKind[stmt.kind]}`);
      }
      continue;
    }
    if (!stmt.name) {
      reportUnsupported(ctx, stmt, "anonymous function");
      continue;
    }

    const typeParameters = typeParametersOf(stmt);
    const scope: TypeScope = new Set(typeParameters);
    const signature: ProcedureSignature = {
      parameters: convertParameters(ctx, stmt, scope),
      returnType: stmt.type
        ? convertType(ctx, stmt.type, scope)
        : { kind: "voidType" },
    };
    const location = getNodeLocation(ctx.sourceFile, stmt);

    const operator = operatorTag(ctx, stmt);
    if (operator === "invalid") continue;
    if (operator) {
      operators.push({
        kind: "operatorDeclaration",
        operator,
        name: stmt.name.text,
        typeParameters,
        parameters: signature.parameters,
        returnType: signature.returnType,
        location,
      });
      continue;
    }

    // Bodiless declarations describe external procedures
    ctx.signatures.set(stmt.name.text, signature);
    if (stmt.body) {
      pending.push({ node: stmt, name: stmt.name.text, signature, scope });
    }
  }

  const procedures = pending.flatMap(
    ({ node, name, signature, scope }): IrProcedureDeclaration[] => {
      if (!node.body) return [];
      const body = convertBlock(ctx, node.body, {
        typeScope: scope,
        parameters: new Map(signature.parameters.map((p) => [p.name, p.type])),
        locals: [],
        resultType:
          signature.returnType.kind === "voidType"
            ? undefined
            : signature.returnType,
      });
      return [
        {
          kind: "procedureDeclaration",
          name,
          parameters: signature.parameters,
          returnType: signature.returnType,
          body,
          location: getNodeLocation(ctx.sourceFile, node),
        },
      ];
    }
  );

  return { operators, procedures };
};

const isDeclarationStatement = (stmt: ts.Statement): boolean =>
  ts.isClassDeclaration(stmt) ||
  ts.isInterfaceDeclaration(stmt) ||
  ts.isTypeAliasDeclaration(stmt) ||
  ts.isImportDeclaration(stmt) ||
  ts.isEmptyStatement(stmt);
