/**
 * Scope Graph
 *
 * Builds the scope tree of one procedure body with its exit edges listed
 * explicitly. Every block is a scope: the body itself, nested blocks, the
 * branches of an `if`, and the body of a `while`.
 *
 * Edges:
 * - fallthrough: a scope's block completes normally and control leaves it
 *   (for a loop body, back to the loop head)
 * - return: leaves every scope up to and including the procedure scope
 * - break / continue: leaves every scope up to and including the innermost
 *   loop body
 *
 * Locals are numbered in program order across the whole body. An edge
 * records how many locals had been declared when it is taken, so the locals
 * live at the edge are the ones numbered below it.
 */

import {
  Diagnostic,
  createLifecycleDiagnostic,
} from "../../types/diagnostic.js";
import type {
  IrBlockStatement,
  IrProcedureDeclaration,
  IrStatement,
  IrType,
  NodeId,
} from "../types/index.js";
import type { SourceLocation } from "../../types/diagnostic.js";

export type ScopeId = number;

export type ScopeKind = "procedure" | "block" | "branch" | "loopBody";

export type LocalVariable = {
  readonly name: string;
  readonly type: IrType;
  readonly declarationKind: "var" | "let";
  readonly declaration: NodeId;
  readonly scope: ScopeId;
  /** Position in program order among all locals of the body */
  readonly order: number;
  readonly location?: SourceLocation;
};

export type Scope = {
  readonly id: ScopeId;
  readonly kind: ScopeKind;
  readonly parent?: ScopeId;
  /** The block statement that opens the scope */
  readonly block: NodeId;
  readonly locals: readonly LocalVariable[];
};

export type ExitEdgeKind = "fallthrough" | "return" | "break" | "continue";

export type ExitEdge = {
  readonly kind: ExitEdgeKind;
  /** Statement taking the edge; the scope's block for fallthrough */
  readonly source: NodeId;
  /** Innermost scope the edge leaves */
  readonly from: ScopeId;
  /** Scope control stays in; undefined when the edge leaves the procedure */
  readonly to?: ScopeId;
  /** Number of locals declared before the edge, in program order */
  readonly order: number;
  /** Local moved out by the edge (`return x`) */
  readonly consumes?: string;
  readonly location?: SourceLocation;
};

export type ScopeGraph = {
  readonly procedure: string;
  readonly scopes: readonly Scope[];
  readonly edges: readonly ExitEdge[];
};

export type ScopeGraphResult = {
  readonly graph: ScopeGraph;
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * True when the `break` statements of a loop body may leave the loop.
 * Breaks inside nested loops target those loops.
 */
const containsBreak = (statements: readonly IrStatement[]): boolean =>
  statements.some((stmt) => {
    switch (stmt.kind) {
      case "breakStatement":
        return true;
      case "blockStatement":
        return containsBreak(stmt.body);
      case "ifStatement":
        return (
          containsBreak(stmt.thenStatement.body) ||
          (stmt.elseStatement !== undefined &&
            containsBreak(stmt.elseStatement.body))
        );
      default:
        return false;
    }
  });

/**
 * Whether control can reach the end of a statement.
 */
export const canCompleteNormally = (stmt: IrStatement): boolean => {
  switch (stmt.kind) {
    case "returnStatement":
    case "breakStatement":
    case "continueStatement":
      return false;
    case "blockStatement":
      return stmt.body.every(canCompleteNormally);
    case "ifStatement":
      return (
        stmt.elseStatement === undefined ||
        canCompleteNormally(stmt.thenStatement) ||
        canCompleteNormally(stmt.elseStatement)
      );
    case "whileStatement":
      return !(
        stmt.condition.kind === "literal" &&
        stmt.condition.value === true &&
        !containsBreak(stmt.body.body)
      );
    default:
      return true;
  }
};

type MutableScope = {
  readonly id: ScopeId;
  readonly kind: ScopeKind;
  readonly parent?: ScopeId;
  readonly block: NodeId;
  readonly locals: LocalVariable[];
};

export const buildScopeGraph = (
  procedure: IrProcedureDeclaration
): ScopeGraphResult => {
  const scopes: MutableScope[] = [];
  const edges: ExitEdge[] = [];
  const diagnostics: Diagnostic[] = [];
  let declared = 0;

  const parentOf = (id: ScopeId): ScopeId | undefined => scopes[id]?.parent;

  const enclosingLoop = (from: ScopeId): ScopeId | undefined => {
    let current: ScopeId | undefined = from;
    while (current !== undefined) {
      const scope: MutableScope | undefined = scopes[current];
      if (scope?.kind === "loopBody") return current;
      current = scope?.parent;
    }
    return undefined;
  };

  const visitBlock = (
    block: IrBlockStatement,
    kind: ScopeKind,
    parent: ScopeId | undefined
  ): void => {
    const scope: MutableScope = {
      id: scopes.length,
      kind,
      parent,
      block: block.id,
      locals: [],
    };
    scopes.push(scope);

    for (const stmt of block.body) {
      visitStatement(stmt, scope);
    }

    if (canCompleteNormally(block)) {
      edges.push({
        kind: "fallthrough",
        source: block.id,
        from: scope.id,
        to: parent,
        order: declared,
        location: block.location,
      });
    }
  };

  const visitStatement = (stmt: IrStatement, scope: MutableScope): void => {
    switch (stmt.kind) {
      case "variableDeclaration":
        scope.locals.push({
          name: stmt.name,
          type: stmt.type,
          declarationKind: stmt.declarationKind,
          declaration: stmt.id,
          scope: scope.id,
          order: declared,
          location: stmt.location,
        });
        declared++;
        return;

      case "returnStatement":
        edges.push({
          kind: "return",
          source: stmt.id,
          from: scope.id,
          order: declared,
          consumes:
            stmt.value?.kind === "identifier" && stmt.value.binding === "local"
              ? stmt.value.name
              : undefined,
          location: stmt.location,
        });
        return;

      case "breakStatement":
      case "continueStatement": {
        const loop = enclosingLoop(scope.id);
        const keyword = stmt.kind === "breakStatement" ? "break" : "continue";
        if (loop === undefined) {
          diagnostics.push(
            createLifecycleDiagnostic(
              "InvalidControlFlow",
              `'${keyword}' outside of a loop in '${procedure.name}'`,
              stmt.location
            )
          );
          return;
        }
        edges.push({
          kind: keyword,
          source: stmt.id,
          from: scope.id,
          to: parentOf(loop),
          order: declared,
          location: stmt.location,
        });
        return;
      }

      case "blockStatement":
        visitBlock(stmt, "block", scope.id);
        return;

      case "ifStatement":
        visitBlock(stmt.thenStatement, "branch", scope.id);
        if (stmt.elseStatement) {
          visitBlock(stmt.elseStatement, "branch", scope.id);
        }
        return;

      case "whileStatement":
        visitBlock(stmt.body, "loopBody", scope.id);
        return;

      case "expressionStatement":
      case "assignmentStatement":
      case "spawnStatement":
        return;
    }
  };

  visitBlock(procedure.body, "procedure", undefined);

  return {
    graph: { procedure: procedure.name, scopes, edges },
    diagnostics,
  };
};
