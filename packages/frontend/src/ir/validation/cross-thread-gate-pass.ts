/**
 * Cross-Thread Gate Pass
 *
 * Plans the deep copy of every argument handed to a spawned task. The copy
 * runs on the submitting thread before the task starts; afterwards the task
 * owns the clone and the submitter must not touch the original's heap.
 *
 * Arguments whose type resolves deepCopy to an override or a lifted
 * operation get the expanded calls; the result replaces the argument.
 * Default arguments get a structural clone that lists every indirection and
 * sequence buffer to copy. Assign and destroy play no part here.
 */

import type { SourceLocation } from "../../types/diagnostic.js";
import type {
  IrBlockStatement,
  IrExpression,
  IrProcedureDeclaration,
  IrSpawnStatement,
  IrStatement,
  IrType,
  NodeId,
} from "../types/index.js";
import type { LiftingResolver } from "../../lifecycle/lifting-resolver.js";
import {
  SynthesizedCall,
  expandOperation,
} from "../../lifecycle/operation-expansion.js";
import {
  ClonePlanEntry,
  planStructuralClone,
} from "../../lifecycle/structural-clone.js";

export type DeepCopyStrategy = "override" | "lifted" | "structuralClone";

export type DeepCopyHandoff = {
  readonly submission: NodeId;
  readonly callee: string;
  readonly argumentIndex: number;
  /** Access path of the argument, or `arg<index>` for a temporary */
  readonly argument: string;
  readonly type: IrType;
  readonly strategy: DeepCopyStrategy;
  /** Calls producing the copy (override and lifted) */
  readonly calls: readonly SynthesizedCall[];
  /** Heap locations to clone (structuralClone) */
  readonly clonePlan: readonly ClonePlanEntry[];
  readonly location?: SourceLocation;
};

const describeArgument = (expr: IrExpression): string | undefined => {
  switch (expr.kind) {
    case "identifier":
      return expr.name;
    case "result":
      return "result";
    case "memberAccess": {
      const object = describeArgument(expr.object);
      return object === undefined ? undefined : `${object}.${expr.property}`;
    }
    case "conversion":
      return describeArgument(expr.expression);
    default:
      return undefined;
  }
};

const collectSubmissions = (block: IrBlockStatement): IrSpawnStatement[] => {
  const found: IrSpawnStatement[] = [];
  const visit = (stmt: IrStatement): void => {
    switch (stmt.kind) {
      case "spawnStatement":
        found.push(stmt);
        return;
      case "blockStatement":
        stmt.body.forEach(visit);
        return;
      case "ifStatement":
        visit(stmt.thenStatement);
        if (stmt.elseStatement) visit(stmt.elseStatement);
        return;
      case "whileStatement":
        visit(stmt.body);
        return;
      default:
        return;
    }
  };
  visit(block);
  return found;
};

export const planCrossThreadHandoffs = (
  procedure: IrProcedureDeclaration,
  resolver: LiftingResolver
): readonly DeepCopyHandoff[] =>
  collectSubmissions(procedure.body).flatMap((submission) =>
    submission.arguments.map((arg, argumentIndex): DeepCopyHandoff => {
      const type = arg.inferredType;
      const argument = describeArgument(arg) ?? `arg${argumentIndex}`;
      const operation = resolver.resolve(type, "deepCopy");
      const base = {
        submission: submission.id,
        callee: submission.callee,
        argumentIndex,
        argument,
        type,
        location: arg.location ?? submission.location,
      };

      return operation.outcome === "default"
        ? {
            ...base,
            strategy: "structuralClone",
            calls: [],
            clonePlan: planStructuralClone(resolver, type, argument),
          }
        : {
            ...base,
            strategy: operation.outcome,
            calls: expandOperation(resolver, type, "deepCopy", argument),
            clonePlan: [],
          };
    })
  );
