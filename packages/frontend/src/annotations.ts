/**
 * Annotation printer
 *
 * Renders an analysis as stable text, one line per program point:
 *
 *   type Pair: assign=lifted destroy=lifted deepCopy=default
 *   exit main 7:5 return: destroyHandle(b); destroyHandle(a)
 *   spawn worker 9:3 arg 0 job: structuralClone job.next (cyclic)
 */

import type { SourceLocation } from "./types/diagnostic.js";
import { formatIrType } from "./ir/types/index.js";
import type { EffectiveOperation } from "./lifecycle/types.js";
import type { SynthesizedCall } from "./lifecycle/operation-expansion.js";
import type { DeepCopyHandoff } from "./ir/validation/cross-thread-gate-pass.js";
import type { ProcedureSchedule } from "./ir/validation/scope-exit-pass.js";
import type { AnalysisResult } from "./analysis.js";

const formatLocation = (location: SourceLocation | undefined): string =>
  location ? `${location.line}:${location.column}` : "-";

const formatOutcome = (operation: EffectiveOperation): string =>
  operation.outcome === "override"
    ? `override(${operation.entry.implementation.name})`
    : operation.outcome;

export const formatCall = (call: SynthesizedCall): string => {
  switch (call.kind) {
    case "invoke":
      return `${call.entry.implementation.name}(${call.target})`;
    case "bitwise":
      return `copy(${call.target})`;
    case "clone":
      return `clone(${call.target})`;
    case "recurse":
      return `lifted<${formatIrType(call.type)}>(${call.target})`;
    case "loop": {
      const bound =
        call.count === undefined ? `${call.target}.length` : `${call.count}`;
      return `for ${call.indexName} < ${bound} { ${formatCalls(call.body)} }`;
    }
  }
};

export const formatCalls = (calls: readonly SynthesizedCall[]): string =>
  calls.map(formatCall).join("; ");

const scheduleLines = (schedule: ProcedureSchedule): readonly string[] =>
  schedule.exits
    .filter((exit) => exit.destroys.length > 0)
    .map(
      (exit) =>
        `exit ${schedule.procedure} ${formatLocation(exit.edge.location)} ${exit.edge.kind}: ${exit.destroys
          .map((destroy) => formatCalls(destroy.calls))
          .join("; ")}`
    );

const handoffLine = (handoff: DeepCopyHandoff): string => {
  const head = `spawn ${handoff.callee} ${formatLocation(handoff.location)} arg ${handoff.argumentIndex} ${handoff.argument}`;
  if (handoff.strategy !== "structuralClone") {
    return `${head}: ${handoff.strategy} ${formatCalls(handoff.calls)}`;
  }
  const plan = handoff.clonePlan
    .map((entry) => (entry.cyclic ? `${entry.path} (cyclic)` : entry.path))
    .join(", ");
  return plan.length > 0
    ? `${head}: structuralClone ${plan}`
    : `${head}: structuralClone`;
};

/**
 * Annotation lines of one analysis.
 */
export const annotationLines = (result: AnalysisResult): readonly string[] => {
  const typeLines = result.unit.nominals.map((nominal) => {
    const kinds = result.operationTable
      .filter((row) => row.nominal.id === nominal.id)
      .map((row) => `${row.kind}=${formatOutcome(row.operation)}`);
    return `type ${nominal.name}: ${kinds.join(" ")}`;
  });

  return [
    ...typeLines,
    ...result.schedules.flatMap(scheduleLines),
    ...result.handoffs.map(handoffLine),
  ];
};

export const printAnnotations = (result: AnalysisResult): string =>
  annotationLines(result).join("\n");
