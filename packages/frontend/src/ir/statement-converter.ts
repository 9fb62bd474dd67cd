/**
 * Statement converter - TypeScript statements to IR statements
 *
 * `const` declares an immutable local (`let` in the IR), `let` and `var`
 * declare mutable ones. `spawn(worker, ...args)` submits a task, and
 * `result = e` assigns the implicit result of a procedure with a return type.
 *
 * `for (init; cond; update) body` becomes `{ init; while (cond) { body;
 * update } }` and `do body while (cond)` becomes `while (cond) body`; both
 * keep the scopes and exits of the source loop.
 */

import * as ts from "typescript";
import type {
  IrBlockStatement,
  IrExpression,
  IrStatement,
  IrType,
} from "./types/index.js";
import type { SourceLocation } from "../types/diagnostic.js";
import {
  BuildContext,
  getNodeLocation,
  report,
  reportUnsupported,
} from "./builder/context.js";
import { convertType } from "./type-converter.js";
import { BodyEnv, convertExpression } from "./expression-converter.js";

const withScope = (env: BodyEnv): BodyEnv => ({
  ...env,
  locals: [...env.locals, new Map<string, IrType>()],
});

const declareLocal = (env: BodyEnv, name: string, type: IrType): void => {
  env.locals[env.locals.length - 1]?.set(name, type);
};

const convertVariableDeclarations = (
  ctx: BuildContext,
  list: ts.VariableDeclarationList,
  env: BodyEnv
): readonly IrStatement[] => {
  const isConst = (list.flags & ts.NodeFlags.Const) !== 0;

  return list.declarations.flatMap((decl): IrStatement[] => {
    if (!ts.isIdentifier(decl.name)) {
      reportUnsupported(ctx, decl.name, "destructuring declaration");
      return [];
    }

    const declaredType = decl.type
      ? convertType(ctx, decl.type, env.typeScope)
      : undefined;
    const initializer = decl.initializer
      ? convertExpression(ctx, decl.initializer, env, declaredType)
      : undefined;
    const type: IrType = declaredType ??
      initializer?.inferredType ?? { kind: "unknownType" };

    declareLocal(env, decl.name.text, type);

    const location = getNodeLocation(ctx.sourceFile, decl);
    return [
      isConst
        ? ctx.factory.letDecl(decl.name.text, type, initializer, location)
        : ctx.factory.varDecl(decl.name.text, type, initializer, location),
    ];
  });
};

const convertSpawn = (
  ctx: BuildContext,
  node: ts.CallExpression,
  env: BodyEnv
): IrStatement => {
  const location = getNodeLocation(ctx.sourceFile, node);
  const [worker, ...rest] = node.arguments;
  if (!worker || !ts.isIdentifier(worker)) {
    reportUnsupported(ctx, node, "spawn without a named worker procedure");
  }
  const callee = worker && ts.isIdentifier(worker) ? worker.text : "<unknown>";
  const args = rest.map((arg): IrExpression => convertExpression(ctx, arg, env));
  return ctx.factory.spawn(callee, args, location);
};

const INCREMENTS: ReadonlyMap<ts.SyntaxKind, "+" | "-"> = new Map([
  [ts.SyntaxKind.PlusPlusToken, "+"],
  [ts.SyntaxKind.MinusMinusToken, "-"],
  [ts.SyntaxKind.PlusEqualsToken, "+"],
  [ts.SyntaxKind.MinusEqualsToken, "-"],
]);

type Increment = {
  readonly operand: ts.Expression;
  readonly operator: "+" | "-";
  readonly amount?: ts.Expression;
};

const incrementOf = (expr: ts.Expression): Increment | undefined => {
  if (ts.isPostfixUnaryExpression(expr) || ts.isPrefixUnaryExpression(expr)) {
    const operator = INCREMENTS.get(expr.operator);
    return operator ? { operand: expr.operand, operator } : undefined;
  }
  if (ts.isBinaryExpression(expr)) {
    const operator = INCREMENTS.get(expr.operatorToken.kind);
    return operator
      ? { operand: expr.left, operator, amount: expr.right }
      : undefined;
  }
  return undefined;
};

/**
 * `x++`, `--x`, `x += e`, `x -= e` as `x = x + e`.
 */
const convertIncrement = (
  ctx: BuildContext,
  increment: Increment,
  env: BodyEnv,
  location: SourceLocation
): IrStatement => {
  const target = convertExpression(ctx, increment.operand, env);
  const step = increment.amount
    ? convertExpression(ctx, increment.amount, env, target.inferredType)
    : ctx.factory.literal(1, target.inferredType, location);
  return ctx.factory.assign(
    target,
    ctx.factory.binary(
      increment.operator,
      target,
      step,
      target.inferredType,
      location
    ),
    location
  );
};

/**
 * An expression evaluated for its effect: statement bodies and `for` updates.
 */
const convertEffect = (
  ctx: BuildContext,
  expr: ts.Expression,
  env: BodyEnv,
  location: SourceLocation
): IrStatement => {
  const increment = incrementOf(expr);
  if (increment) return convertIncrement(ctx, increment, env, location);

  if (
    ts.isBinaryExpression(expr) &&
    expr.operatorToken.kind === ts.SyntaxKind.EqualsToken
  ) {
    const target = convertExpression(ctx, expr.left, env);
    const value = convertExpression(ctx, expr.right, env, target.inferredType);
    return ctx.factory.assign(target, value, location);
  }

  if (
    ts.isCallExpression(expr) &&
    ts.isIdentifier(expr.expression) &&
    expr.expression.text === "spawn" &&
    !ctx.signatures.has("spawn")
  ) {
    return convertSpawn(ctx, expr, env);
  }

  return ctx.factory.exprStmt(convertExpression(ctx, expr, env), location);
};

const BOOL: IrType = { kind: "primitiveType", name: "bool" };

const convertFor = (
  ctx: BuildContext,
  node: ts.ForStatement,
  env: BodyEnv
): IrStatement => {
  const f = ctx.factory;
  const location = getNodeLocation(ctx.sourceFile, node);
  const loopEnv = withScope(env);

  const init = !node.initializer
    ? []
    : ts.isVariableDeclarationList(node.initializer)
      ? convertVariableDeclarations(ctx, node.initializer, loopEnv)
      : [convertEffect(ctx, node.initializer, loopEnv, location)];
  const condition = node.condition
    ? convertExpression(ctx, node.condition, loopEnv)
    : f.literal(true, BOOL, location);
  const body = convertBody(ctx, node.statement, loopEnv);
  const update = node.incrementor
    ? [
        convertEffect(
          ctx,
          node.incrementor,
          loopEnv,
          getNodeLocation(ctx.sourceFile, node.incrementor)
        ),
      ]
    : [];

  return f.block(
    [...init, f.whileStmt(condition, f.block([body, ...update], body.location), location)],
    location
  );
};

/**
 * True when a statement declares locals or leaves a scope, so dropping it
 * would lose destroys.
 */
const affectsScopes = (node: ts.Node): boolean =>
  ts.isVariableDeclarationList(node) ||
  ts.isReturnStatement(node) ||
  ts.isBreakStatement(node) ||
  ts.isContinueStatement(node) ||
  (!ts.isFunctionLike(node) &&
    ts.forEachChild(node, (child) => affectsScopes(child) || undefined) === true);

const reportDropped = (ctx: BuildContext, node: ts.Statement): void => {
  const what = `${ts.SyntaxKind[node.kind]} statement`;
  if (!affectsScopes(node)) {
    reportUnsupported(ctx, node, what);
    return;
  }
  report(
    ctx,
    "LHK5002",
    "error",
    `Unsupported syntax: ${what} declares locals or leaves a scope, so its destroys cannot be scheduled`,
    node,
    "Rewrite it with if, while or for"
  );
};

/**
 * Convert a statement used as a branch or loop body into a block.
 */
const convertBody = (
  ctx: BuildContext,
  node: ts.Statement,
  env: BodyEnv
): IrBlockStatement =>
  ts.isBlock(node)
    ? convertBlock(ctx, node, env)
    : ctx.factory.block(
        convertStatement(ctx, node, withScope(env)),
        getNodeLocation(ctx.sourceFile, node)
      );

export const convertBlock = (
  ctx: BuildContext,
  node: ts.Block,
  env: BodyEnv
): IrBlockStatement => {
  const inner = withScope(env);
  const body = node.statements.flatMap((stmt) =>
    convertStatement(ctx, stmt, inner)
  );
  return ctx.factory.block(body, getNodeLocation(ctx.sourceFile, node));
};

export const convertStatement = (
  ctx: BuildContext,
  node: ts.Statement,
  env: BodyEnv
): readonly IrStatement[] => {
  const f = ctx.factory;
  const location = getNodeLocation(ctx.sourceFile, node);

  if (ts.isVariableStatement(node)) {
    return convertVariableDeclarations(ctx, node.declarationList, env);
  }

  if (ts.isExpressionStatement(node)) {
    return [convertEffect(ctx, node.expression, env, location)];
  }

  if (ts.isReturnStatement(node)) {
    const value = node.expression
      ? convertExpression(ctx, node.expression, env, env.resultType)
      : undefined;
    return [f.ret(value, location)];
  }

  if (ts.isBlock(node)) {
    return [convertBlock(ctx, node, env)];
  }

  if (ts.isIfStatement(node)) {
    const condition = convertExpression(ctx, node.expression, env);
    const thenStatement = convertBody(ctx, node.thenStatement, env);
    const elseStatement = node.elseStatement
      ? convertBody(ctx, node.elseStatement, env)
      : undefined;
    return [f.ifStmt(condition, thenStatement, elseStatement, location)];
  }

  if (ts.isWhileStatement(node)) {
    const condition = convertExpression(ctx, node.expression, env);
    return [f.whileStmt(condition, convertBody(ctx, node.statement, env), location)];
  }

  if (ts.isDoStatement(node)) {
    const condition = convertExpression(ctx, node.expression, env);
    return [f.whileStmt(condition, convertBody(ctx, node.statement, env), location)];
  }

  if (ts.isForStatement(node)) {
    return [convertFor(ctx, node, env)];
  }

  if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
    if (node.label) {
      reportUnsupported(ctx, node.label, "statement label");
    }
    return [
      ts.isBreakStatement(node) ? f.breakStmt(location) : f.continueStmt(location),
    ];
  }

  if (ts.isEmptyStatement(node)) {
    return [];
  }

  reportDropped(ctx, node);
  return [];
};
