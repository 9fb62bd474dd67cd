/**
 * Lifecycle operation binding and lifting
 */

export type {
  LifecycleKind,
  OperationSignature,
  BoundOperationEntry,
  TypeId,
  EffectiveOutcome,
  LiftSlot,
  LiftStep,
  OverrideOperation,
  LiftedOperation,
  DefaultOperation,
  EffectiveOperation,
} from "./types.js";
export { LIFECYCLE_KINDS, OPERATOR_KINDS } from "./types.js";

export { createTypeRegistry, type TypeRegistry } from "./type-registry.js";
export { createTypeArena, type TypeArena } from "./type-arena.js";
export {
  runOperationBinder,
  type OperationBinderResult,
} from "./operation-binder.js";
export {
  createLiftingResolver,
  type LiftingResolver,
  type Constituent,
} from "./lifting-resolver.js";
export {
  expandOperation,
  enumerateCalls,
  type SynthesizedCall,
  type CallInstance,
} from "./operation-expansion.js";
export {
  planStructuralClone,
  needsStructuralClone,
  type ClonePlanEntry,
} from "./structural-clone.js";
export { slotPath } from "./slot-path.js";
