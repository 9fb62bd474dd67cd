/**
 * Scope Exit Pass
 *
 * Schedules destroy calls on every exit edge of every scope of a procedure.
 * At an edge, the locals declared so far in each scope the edge leaves are
 * destroyed, most recently declared first. A local moved out by the edge
 * (`return x`) is skipped; parameters and `result` are never locals.
 *
 * The edge list comes from the scope graph. It is checked against the body
 * before anything is scheduled: every return, break and continue statement
 * needs an edge, every scope that can complete normally needs a fallthrough
 * edge, and every edge must lead to an enclosing scope. A gap means the
 * graph is wrong and no correct schedule exists, so the pass fails with the
 * fatal MissingScopeExitEdge.
 */

import {
  Diagnostic,
  createLifecycleDiagnostic,
} from "../../types/diagnostic.js";
import { Result, ok, error } from "../../types/result.js";
import type {
  IrBlockStatement,
  IrProcedureDeclaration,
  IrStatement,
} from "../types/index.js";
import type { LiftingResolver } from "../../lifecycle/lifting-resolver.js";
import {
  SynthesizedCall,
  expandOperation,
} from "../../lifecycle/operation-expansion.js";
import {
  ExitEdge,
  LocalVariable,
  Scope,
  ScopeGraph,
  ScopeId,
  canCompleteNormally,
} from "./scope-graph.js";

export type ScheduledDestroy = {
  readonly local: LocalVariable;
  readonly calls: readonly SynthesizedCall[];
};

export type ExitSchedule = {
  readonly edge: ExitEdge;
  readonly destroys: readonly ScheduledDestroy[];
};

export type ProcedureSchedule = {
  readonly procedure: string;
  readonly exits: readonly ExitSchedule[];
};

const missingEdge = (
  procedure: IrProcedureDeclaration,
  detail: string,
  stmt?: IrStatement
): Diagnostic =>
  createLifecycleDiagnostic(
    "MissingScopeExitEdge",
    `Control-flow graph of '${procedure.name}' is incomplete: ${detail}`,
    stmt?.location ?? procedure.location,
    { hint: "This is an internal compiler error" }
  );

/**
 * Scopes an edge unwinds, innermost first. Undefined when the edge's
 * target does not enclose its source.
 */
const unwoundScopes = (
  graph: ScopeGraph,
  edge: ExitEdge
): readonly Scope[] | undefined => {
  const unwound: Scope[] = [];
  let current: ScopeId | undefined = edge.from;

  while (current !== undefined && current !== edge.to) {
    const scope: Scope | undefined = graph.scopes[current];
    if (!scope) return undefined;
    unwound.push(scope);
    current = scope.parent;
  }

  return current === edge.to ? unwound : undefined;
};

const checkEdges = (
  procedure: IrProcedureDeclaration,
  graph: ScopeGraph
): Diagnostic | undefined => {
  const edgeSources = new Set(graph.edges.map((edge) => edge.source));
  const fallthroughScopes = new Set(
    graph.edges
      .filter((edge) => edge.kind === "fallthrough")
      .map((edge) => edge.from)
  );
  const scopesByBlock = new Map(
    graph.scopes.map((scope) => [scope.block, scope])
  );

  const checkBlock = (block: IrBlockStatement): Diagnostic | undefined => {
    const scope = scopesByBlock.get(block.id);
    if (!scope) {
      return missingEdge(procedure, `block ${block.id} has no scope`);
    }
    if (canCompleteNormally(block) && !fallthroughScopes.has(scope.id)) {
      return missingEdge(
        procedure,
        `scope ${scope.id} can complete normally but has no fallthrough edge`
      );
    }
    for (const stmt of block.body) {
      const found = checkStatement(stmt);
      if (found) return found;
    }
    return undefined;
  };

  const checkStatement = (stmt: IrStatement): Diagnostic | undefined => {
    switch (stmt.kind) {
      case "returnStatement":
      case "breakStatement":
      case "continueStatement":
        return edgeSources.has(stmt.id)
          ? undefined
          : missingEdge(
              procedure,
              `no exit edge for the ${stmt.kind.replace("Statement", "")} statement`,
              stmt
            );
      case "blockStatement":
        return checkBlock(stmt);
      case "ifStatement":
        return (
          checkBlock(stmt.thenStatement) ??
          (stmt.elseStatement ? checkBlock(stmt.elseStatement) : undefined)
        );
      case "whileStatement":
        return checkBlock(stmt.body);
      default:
        return undefined;
    }
  };

  const structural = checkBlock(procedure.body);
  if (structural) return structural;

  const dangling = graph.edges.find(
    (edge) => unwoundScopes(graph, edge) === undefined
  );
  return dangling
    ? missingEdge(
        procedure,
        `the ${dangling.kind} edge from scope ${dangling.from} does not lead to an enclosing scope`
      )
    : undefined;
};

/**
 * Compute the destroy schedule of every exit edge of a procedure.
 */
export const insertScopeExitDestroys = (
  procedure: IrProcedureDeclaration,
  graph: ScopeGraph,
  resolver: LiftingResolver
): Result<ProcedureSchedule, Diagnostic> => {
  const gap = checkEdges(procedure, graph);
  if (gap) return error(gap);

  const exits: ExitSchedule[] = [];
  for (const edge of graph.edges) {
    const unwound = unwoundScopes(graph, edge) ?? [];
    const live = unwound
      .flatMap((scope) => scope.locals)
      .filter((local) => local.order < edge.order);

    // `return x` moves the innermost visible `x` out
    const consumed =
      edge.consumes === undefined
        ? undefined
        : live
            .filter((local) => local.name === edge.consumes)
            .reduce<LocalVariable | undefined>(
              (latest, local) =>
                latest === undefined || local.order > latest.order
                  ? local
                  : latest,
              undefined
            );

    const destroys = live
      .filter(
        (local) => local !== consumed && resolver.isDestructible(local.type)
      )
      .sort((a, b) => b.order - a.order)
      .map(
        (local): ScheduledDestroy => ({
          local,
          calls: expandOperation(resolver, local.type, "destroy", local.name),
        })
      );

    exits.push({ edge, destroys });
  }

  return ok({ procedure: procedure.name, exits });
};
