/**
 * Statement types for IR
 */

import { IrType } from "./ir-types.js";
import { IrNodeBase } from "./helpers.js";
import { IrExpression } from "./expressions.js";

export type IrStatement =
  | IrVariableDeclaration
  | IrExpressionStatement
  | IrAssignmentStatement
  | IrReturnStatement
  | IrBlockStatement
  | IrIfStatement
  | IrWhileStatement
  | IrBreakStatement
  | IrContinueStatement
  | IrSpawnStatement;

/**
 * `var` declares a mutable local, `let` an immutable one.
 */
export type IrVariableDeclaration = IrNodeBase & {
  readonly kind: "variableDeclaration";
  readonly declarationKind: "var" | "let";
  readonly name: string;
  readonly type: IrType;
  readonly initializer?: IrExpression;
};

export type IrExpressionStatement = IrNodeBase & {
  readonly kind: "expressionStatement";
  readonly expression: IrExpression;
};

export type IrAssignmentStatement = IrNodeBase & {
  readonly kind: "assignmentStatement";
  readonly target: IrExpression;
  readonly value: IrExpression;
};

export type IrReturnStatement = IrNodeBase & {
  readonly kind: "returnStatement";
  readonly value?: IrExpression;
};

export type IrBlockStatement = IrNodeBase & {
  readonly kind: "blockStatement";
  readonly body: readonly IrStatement[];
};

export type IrIfStatement = IrNodeBase & {
  readonly kind: "ifStatement";
  readonly condition: IrExpression;
  readonly thenStatement: IrBlockStatement;
  readonly elseStatement?: IrBlockStatement;
};

export type IrWhileStatement = IrNodeBase & {
  readonly kind: "whileStatement";
  readonly condition: IrExpression;
  readonly body: IrBlockStatement;
};

export type IrBreakStatement = IrNodeBase & {
  readonly kind: "breakStatement";
};

export type IrContinueStatement = IrNodeBase & {
  readonly kind: "continueStatement";
};

/**
 * Submission of a parallel task: `spawn(worker, ...args)`.
 * Arguments cross an execution-unit boundary.
 */
export type IrSpawnStatement = IrNodeBase & {
  readonly kind: "spawnStatement";
  readonly callee: string;
  readonly arguments: readonly IrExpression[];
};
