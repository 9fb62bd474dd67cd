/**
 * Supporting types (source ranges, parameters, node identity)
 */

import { IrType } from "./ir-types.js";
import type { SourceLocation } from "../../types/diagnostic.js";

/**
 * Identity of a statement or expression node within one unit.
 */
export type NodeId = number;

/**
 * Fields shared by every statement and expression node.
 */
export type IrNodeBase = {
  readonly id: NodeId;
  readonly location?: SourceLocation;
};

/**
 * Parameter passing mode:
 * - value: by value
 * - var: mutable reference
 * - in: const reference
 */
export type IrParameterPassing = "value" | "var" | "in";

export type IrParameter = {
  readonly kind: "parameter";
  readonly name: string;
  readonly type: IrType;
  readonly passing: IrParameterPassing;
  readonly location?: SourceLocation;
};

export type IrBinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "&&"
  | "||";
