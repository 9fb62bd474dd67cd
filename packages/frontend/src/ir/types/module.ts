/**
 * Declaration and compilation unit types for IR
 */

import { IrField, IrType, NominalId } from "./ir-types.js";
import { IrParameter } from "./helpers.js";
import { IrBlockStatement } from "./statements.js";
import type { SourceLocation } from "../../types/diagnostic.js";

export type IrNominalDeclaration = IrObjectDeclaration | IrDistinctDeclaration;

/**
 * Object type declaration. Fields are ordered; `base` names the parent
 * object type whose fields precede this declaration's own.
 */
export type IrObjectDeclaration = {
  readonly kind: "objectDeclaration";
  readonly id: NominalId;
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly base?: IrType;
  readonly fields: readonly IrField[];
  readonly location?: SourceLocation;
};

/**
 * Distinct type: a new nominal identity over an underlying type.
 */
export type IrDistinctDeclaration = {
  readonly kind: "distinctDeclaration";
  readonly id: NominalId;
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly underlying: IrType;
  readonly location?: SourceLocation;
};

export type LifecycleOperator = "=" | "=destroy" | "=deepCopy";

export const LIFECYCLE_OPERATORS: readonly LifecycleOperator[] = [
  "=",
  "=destroy",
  "=deepCopy",
];

/**
 * A user-declared lifecycle operator: a function tagged
 * `@operator =destroy`, e.g. `function closeHandle(h: Handle): void {}`.
 */
export type IrOperatorDeclaration = {
  readonly kind: "operatorDeclaration";
  readonly operator: LifecycleOperator;
  /** Symbol of the user implementation */
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
  readonly location?: SourceLocation;
};

export type IrProcedureDeclaration = {
  readonly kind: "procedureDeclaration";
  readonly name: string;
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
  readonly body: IrBlockStatement;
  readonly location?: SourceLocation;
};

/**
 * One compilation unit: the resolved type graph plus procedure bodies.
 */
export type IrUnit = {
  readonly kind: "unit";
  readonly filePath: string;
  readonly nominals: readonly IrNominalDeclaration[];
  readonly operators: readonly IrOperatorDeclaration[];
  readonly procedures: readonly IrProcedureDeclaration[];
};
