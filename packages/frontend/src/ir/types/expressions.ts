/**
 * Expression types for IR
 *
 * Every expression carries the static type computed by the front end in
 * `inferredType`. The lifecycle passes never infer types themselves.
 */

import { IrType } from "./ir-types.js";
import { IrBinaryOperator, IrNodeBase } from "./helpers.js";

export type IrExpression =
  | IrLiteralExpression
  | IrIdentifierExpression
  | IrResultExpression
  | IrCallExpression
  | IrConstructExpression
  | IrArrayLiteralExpression
  | IrTupleLiteralExpression
  | IrMemberAccessExpression
  | IrElementAccessExpression
  | IrConversionExpression
  | IrBinaryExpression;

type ExpressionBase = IrNodeBase & {
  readonly inferredType: IrType;
};

export type IrLiteralExpression = ExpressionBase & {
  readonly kind: "literal";
  readonly value: string | number | boolean;
};

export type IrIdentifierExpression = ExpressionBase & {
  readonly kind: "identifier";
  readonly name: string;
  readonly binding: "local" | "parameter" | "global";
};

/**
 * The implicit `result` variable of a procedure with a return type.
 */
export type IrResultExpression = ExpressionBase & {
  readonly kind: "result";
};

export type IrCallExpression = ExpressionBase & {
  readonly kind: "call";
  readonly callee: string;
  readonly arguments: readonly IrExpression[];
};

export type IrConstructorField = {
  readonly name: string;
  readonly value: IrExpression;
};

/**
 * Construction of an object value, e.g. `new Handle()` or a typed object literal.
 */
export type IrConstructExpression = ExpressionBase & {
  readonly kind: "construct";
  readonly fields: readonly IrConstructorField[];
};

export type IrArrayLiteralExpression = ExpressionBase & {
  readonly kind: "arrayLiteral";
  readonly elements: readonly IrExpression[];
};

export type IrTupleLiteralExpression = ExpressionBase & {
  readonly kind: "tupleLiteral";
  readonly elements: readonly IrExpression[];
};

export type IrMemberAccessExpression = ExpressionBase & {
  readonly kind: "memberAccess";
  readonly object: IrExpression;
  readonly property: string;
};

export type IrElementAccessExpression = ExpressionBase & {
  readonly kind: "elementAccess";
  readonly object: IrExpression;
  readonly index: IrExpression;
};

export type IrConversionExpression = ExpressionBase & {
  readonly kind: "conversion";
  readonly expression: IrExpression;
};

export type IrBinaryExpression = ExpressionBase & {
  readonly kind: "binary";
  readonly operator: IrBinaryOperator;
  readonly left: IrExpression;
  readonly right: IrExpression;
};
