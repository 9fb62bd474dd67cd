/**
 * Destructible Context Pass
 *
 * A value of a type with a non-default destroy may only be produced where
 * its owner is clear: as the initializer of a local, as a return value, or
 * as the value assigned to `result`. Every value-producing expression of a
 * procedure body is tagged with the syntactic position it appears in, and
 * tags outside the destructible context policy are rejected.
 *
 * The check is syntactic; control flow plays no part.
 *
 * Place expressions (identifiers, field and element access) name storage
 * that already has an owner and are never checked. Conversions are
 * transparent: the converted expression shares the conversion's tag.
 * Components of an array, tuple or object construction share the tag of
 * the construction they are moved into.
 */

import {
  Diagnostic,
  createLifecycleDiagnostic,
} from "../../types/diagnostic.js";
import { Result, ok, error } from "../../types/result.js";
import {
  IrBlockStatement,
  IrExpression,
  IrProcedureDeclaration,
  IrStatement,
  formatIrType,
  isValueProducingExpression,
} from "../types/index.js";
import type { LiftingResolver } from "../../lifecycle/lifting-resolver.js";

export type DestructibleContextSite =
  | "var-init"
  | "let-init"
  | "return-value"
  | "result-assignment"
  | "other";

export const DESTRUCTIBLE_CONTEXT_SITES: readonly DestructibleContextSite[] = [
  "var-init",
  "let-init",
  "return-value",
  "result-assignment",
  "other",
];

/**
 * Sites where a destructible value may be produced.
 */
export type DestructibleContextPolicy = ReadonlySet<DestructibleContextSite>;

export const DEFAULT_DESTRUCTIBLE_CONTEXTS: DestructibleContextPolicy = new Set<
  DestructibleContextSite
>(["var-init", "let-init", "return-value", "result-assignment"]);

export type TaggedSite = {
  readonly expression: IrExpression;
  readonly site: DestructibleContextSite;
};

const isSite = (name: string): name is DestructibleContextSite =>
  DESTRUCTIBLE_CONTEXT_SITES.some((site) => site === name);

/**
 * Build a policy from site names (configuration input).
 */
export const parseDestructibleContexts = (
  names: readonly string[]
): Result<DestructibleContextPolicy, string> => {
  const sites = new Set<DestructibleContextSite>();
  for (const name of names) {
    if (!isSite(name)) {
      return error(
        `Unknown destructible context '${name}' (expected one of: ${DESTRUCTIBLE_CONTEXT_SITES.join(", ")})`
      );
    }
    sites.add(name);
  }
  return ok(sites);
};

/**
 * Tag every value-producing expression of a procedure body, in source order.
 */
export const tagContextSites = (
  procedure: IrProcedureDeclaration
): readonly TaggedSite[] => {
  const tagged: TaggedSite[] = [];

  const visitExpression = (
    expr: IrExpression,
    site: DestructibleContextSite
  ): void => {
    // A conversion is reported through the expression it converts
    if (expr.kind !== "conversion" && isValueProducingExpression(expr)) {
      tagged.push({ expression: expr, site });
    }

    switch (expr.kind) {
      case "literal":
      case "identifier":
      case "result":
        return;

      case "call":
        expr.arguments.forEach((arg) => visitExpression(arg, "other"));
        return;

      case "construct":
        expr.fields.forEach((field) => visitExpression(field.value, site));
        return;

      case "arrayLiteral":
      case "tupleLiteral":
        expr.elements.forEach((element) => visitExpression(element, site));
        return;

      case "conversion":
        visitExpression(expr.expression, site);
        return;

      case "memberAccess":
        visitExpression(expr.object, "other");
        return;

      case "elementAccess":
        visitExpression(expr.object, "other");
        visitExpression(expr.index, "other");
        return;

      case "binary":
        visitExpression(expr.left, "other");
        visitExpression(expr.right, "other");
        return;
    }
  };

  const visitBlock = (block: IrBlockStatement): void => {
    block.body.forEach(visitStatement);
  };

  const visitStatement = (stmt: IrStatement): void => {
    switch (stmt.kind) {
      case "variableDeclaration":
        if (stmt.initializer) {
          visitExpression(
            stmt.initializer,
            stmt.declarationKind === "var" ? "var-init" : "let-init"
          );
        }
        return;

      case "expressionStatement":
        visitExpression(stmt.expression, "other");
        return;

      case "assignmentStatement":
        visitExpression(stmt.target, "other");
        visitExpression(
          stmt.value,
          stmt.target.kind === "result" ? "result-assignment" : "other"
        );
        return;

      case "returnStatement":
        if (stmt.value) visitExpression(stmt.value, "return-value");
        return;

      case "blockStatement":
        visitBlock(stmt);
        return;

      case "ifStatement":
        visitExpression(stmt.condition, "other");
        visitBlock(stmt.thenStatement);
        if (stmt.elseStatement) visitBlock(stmt.elseStatement);
        return;

      case "whileStatement":
        visitExpression(stmt.condition, "other");
        visitBlock(stmt.body);
        return;

      case "spawnStatement":
        stmt.arguments.forEach((arg) => visitExpression(arg, "other"));
        return;

      case "breakStatement":
      case "continueStatement":
        return;
    }
  };

  visitBlock(procedure.body);
  return tagged;
};

const describeSite = (site: DestructibleContextSite): string => {
  switch (site) {
    case "var-init":
      return "a var initializer";
    case "let-init":
      return "a const initializer";
    case "return-value":
      return "a return value";
    case "result-assignment":
      return "an assignment to result";
    case "other":
      return "a temporary";
  }
};

/**
 * Report every destructible value produced outside the policy's sites.
 */
export const validateDestructibleContexts = (
  procedures: readonly IrProcedureDeclaration[],
  resolver: LiftingResolver,
  policy: DestructibleContextPolicy = DEFAULT_DESTRUCTIBLE_CONTEXTS
): readonly Diagnostic[] =>
  procedures.flatMap((procedure) =>
    tagContextSites(procedure)
      .filter(
        ({ expression, site }) =>
          !policy.has(site) && resolver.isDestructible(expression.inferredType)
      )
      .map(({ expression, site }) =>
        createLifecycleDiagnostic(
          "IllegalDestructibleUsage",
          `Value of destructible type '${formatIrType(expression.inferredType)}' is used as ${describeSite(site)} in '${procedure.name}'`,
          expression.location,
          {
            typeName: formatIrType(expression.inferredType),
            hint: "Bind the value to a local with const or let, return it, or assign it to result",
          }
        )
      )
  );
