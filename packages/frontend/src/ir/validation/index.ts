/**
 * IR Validation exports
 */

export {
  tagContextSites,
  validateDestructibleContexts,
  parseDestructibleContexts,
  DEFAULT_DESTRUCTIBLE_CONTEXTS,
  DESTRUCTIBLE_CONTEXT_SITES,
  type DestructibleContextSite,
  type DestructibleContextPolicy,
  type TaggedSite,
} from "./destructible-context-pass.js";

export {
  buildScopeGraph,
  canCompleteNormally,
  type ScopeGraph,
  type ScopeGraphResult,
  type Scope,
  type ScopeId,
  type ScopeKind,
  type LocalVariable,
  type ExitEdge,
  type ExitEdgeKind,
} from "./scope-graph.js";

export {
  insertScopeExitDestroys,
  type ProcedureSchedule,
  type ExitSchedule,
  type ScheduledDestroy,
} from "./scope-exit-pass.js";

export {
  planCrossThreadHandoffs,
  type DeepCopyHandoff,
  type DeepCopyStrategy,
} from "./cross-thread-gate-pass.js";
