/**
 * Analysis pipeline - runs the lifecycle phases for one compilation unit
 *
 * Binder → (sealed) Registry → Resolver → {Context validator, Scope-exit
 * inserter, Cross-thread gate}. User-facing errors are collected and the
 * analysis continues; a fatal error stops the unit where it occurs.
 */

import {
  Diagnostic,
  DiagnosticsCollector,
  addDiagnostics,
  createDiagnosticsCollector,
  isFatal,
} from "./types/diagnostic.js";
import type {
  IrNominalDeclaration,
  IrType,
  IrUnit,
} from "./ir/types/index.js";
import { createTypeRegistry, TypeRegistry } from "./lifecycle/type-registry.js";
import { runOperationBinder } from "./lifecycle/operation-binder.js";
import {
  createLiftingResolver,
  LiftingResolver,
} from "./lifecycle/lifting-resolver.js";
import {
  EffectiveOperation,
  LIFECYCLE_KINDS,
  LifecycleKind,
} from "./lifecycle/types.js";
import {
  DEFAULT_DESTRUCTIBLE_CONTEXTS,
  DestructibleContextPolicy,
  validateDestructibleContexts,
} from "./ir/validation/destructible-context-pass.js";
import { buildScopeGraph } from "./ir/validation/scope-graph.js";
import {
  ProcedureSchedule,
  insertScopeExitDestroys,
} from "./ir/validation/scope-exit-pass.js";
import {
  DeepCopyHandoff,
  planCrossThreadHandoffs,
} from "./ir/validation/cross-thread-gate-pass.js";

export type AnalysisOptions = {
  readonly destructibleContexts?: DestructibleContextPolicy;
};

export type OperationTableRow = {
  readonly nominal: IrNominalDeclaration;
  readonly kind: LifecycleKind;
  readonly operation: EffectiveOperation;
};

export type AnalysisResult = {
  readonly unit: IrUnit;
  readonly registry: TypeRegistry;
  readonly resolver: LiftingResolver;
  /** Effective operation of every declared nominal type, per kind */
  readonly operationTable: readonly OperationTableRow[];
  readonly schedules: readonly ProcedureSchedule[];
  readonly handoffs: readonly DeepCopyHandoff[];
  readonly diagnostics: DiagnosticsCollector;
  /** True when a fatal error stopped the unit */
  readonly aborted: boolean;
};

/**
 * The declared type of a nominal, with its own type parameters as arguments.
 */
const declaredType = (decl: IrNominalDeclaration): IrType =>
  decl.typeParameters.length > 0
    ? {
        kind: "nominalType",
        id: decl.id,
        name: decl.name,
        typeArguments: decl.typeParameters.map(
          (name): IrType => ({ kind: "typeParameterType", name })
        ),
      }
    : { kind: "nominalType", id: decl.id, name: decl.name };

export const analyzeUnit = (
  unit: IrUnit,
  options: AnalysisOptions = {}
): AnalysisResult => {
  const registry = createTypeRegistry(unit.nominals);
  const binding = runOperationBinder(unit.operators, registry);

  const resolver = createLiftingResolver(registry);
  resolver.checkDeclarations();

  const operationTable = unit.nominals.flatMap((nominal) =>
    LIFECYCLE_KINDS.map(
      (kind): OperationTableRow => ({
        nominal,
        kind,
        operation: resolver.resolve(declaredType(nominal), kind),
      })
    )
  );

  const contextDiagnostics = validateDestructibleContexts(
    unit.procedures,
    resolver,
    options.destructibleContexts ?? DEFAULT_DESTRUCTIBLE_CONTEXTS
  );

  const controlFlowDiagnostics: Diagnostic[] = [];
  const schedules: ProcedureSchedule[] = [];
  const handoffs: DeepCopyHandoff[] = [];
  let fatal: Diagnostic | undefined;

  for (const procedure of unit.procedures) {
    const { graph, diagnostics } = buildScopeGraph(procedure);
    controlFlowDiagnostics.push(...diagnostics);

    if (diagnostics.length === 0) {
      const schedule = insertScopeExitDestroys(procedure, graph, resolver);
      if (!schedule.ok) {
        fatal = schedule.error;
        break;
      }
      schedules.push(schedule.value);
    }

    handoffs.push(...planCrossThreadHandoffs(procedure, resolver));
  }

  const collected = [
    ...binding.diagnostics,
    ...resolver.getDiagnostics(),
    ...contextDiagnostics,
    ...controlFlowDiagnostics,
    ...(fatal ? [fatal] : []),
  ];

  return {
    unit,
    registry,
    resolver,
    operationTable,
    schedules,
    handoffs,
    diagnostics: addDiagnostics(createDiagnosticsCollector(), collected),
    aborted: collected.some(isFatal),
  };
};
