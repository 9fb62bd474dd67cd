/**
 * Lifecycle operation types
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type {
  IndirectionKind,
  IrParameter,
  IrType,
  LifecycleOperator,
  NominalId,
} from "../ir/types/index.js";

export type LifecycleKind = "assign" | "destroy" | "deepCopy";

export const LIFECYCLE_KINDS: readonly LifecycleKind[] = [
  "assign",
  "destroy",
  "deepCopy",
];

export const OPERATOR_KINDS: Readonly<Record<LifecycleOperator, LifecycleKind>> =
  {
    "=": "assign",
    "=destroy": "destroy",
    "=deepCopy": "deepCopy",
  };

export type OperationSignature = {
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
  /** Indirection a `=deepCopy` was declared through */
  readonly indirection?: IndirectionKind;
};

/**
 * A validated user override, keyed by (target, kind) in the registry.
 */
export type BoundOperationEntry = {
  readonly kind: LifecycleKind;
  readonly target: NominalId;
  readonly targetName: string;
  readonly signature: OperationSignature;
  readonly implementation: {
    readonly name: string;
    readonly location?: SourceLocation;
  };
};

/**
 * Index of an interned type in the type arena.
 */
export type TypeId = number;

export type EffectiveOutcome = "override" | "lifted" | "default";

/**
 * Position a lifted step applies to, relative to the value being processed.
 */
export type LiftSlot =
  | { readonly kind: "field"; readonly name: string }
  | { readonly kind: "base" }
  | { readonly kind: "tupleElement"; readonly index: number }
  | { readonly kind: "arrayElements"; readonly length: number }
  | { readonly kind: "sequenceElements" }
  | { readonly kind: "underlying" }
  | { readonly kind: "pointee" };

export type LiftStep = {
  readonly slot: LiftSlot;
  readonly typeId: TypeId;
  readonly type: IrType;
  readonly outcome: EffectiveOutcome;
};

type EffectiveOperationBase = {
  readonly kind: LifecycleKind;
  readonly typeId: TypeId;
  readonly type: IrType;
};

export type OverrideOperation = EffectiveOperationBase & {
  readonly outcome: "override";
  readonly entry: BoundOperationEntry;
  /**
   * Destroy of the base sub-object, run after the override when the base
   * has a non-default destroy of its own.
   */
  readonly chainedBase?: LiftStep;
};

/**
 * Operation synthesized from constituents. Steps reference constituents by
 * TypeId, so self-referential types yield finite operations.
 */
export type LiftedOperation = EffectiveOperationBase & {
  readonly outcome: "lifted";
  readonly steps: readonly LiftStep[];
};

/**
 * Bitwise copy, no-op destroy, or structural deep copy.
 */
export type DefaultOperation = EffectiveOperationBase & {
  readonly outcome: "default";
};

export type EffectiveOperation =
  | OverrideOperation
  | LiftedOperation
  | DefaultOperation;
