/**
 * Operation Binder
 *
 * Validates `=`, `=destroy` and `=deepCopy` declarations and records at most
 * one override per (nominal type, kind) in the type registry. A rejected
 * declaration is reported once and treated as absent; binding continues with
 * the next declaration. The registry is sealed when the phase completes.
 */

import {
  Diagnostic,
  createLifecycleDiagnostic,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import {
  IrNominalDeclaration,
  IrOperatorDeclaration,
  IrType,
  IndirectionKind,
  formatIrType,
  irTypesEqual,
} from "../ir/types/index.js";
import type { TypeRegistry } from "./type-registry.js";
import { BoundOperationEntry, OPERATOR_KINDS } from "./types.js";

export type OperationBinderResult = {
  readonly bound: readonly BoundOperationEntry[];
  readonly diagnostics: readonly Diagnostic[];
};

type BindingTarget = {
  readonly decl: IrNominalDeclaration;
  readonly indirection?: IndirectionKind;
};

const invalidSignature = (
  op: IrOperatorDeclaration,
  detail: string,
  hint: string
): Result<BindingTarget, Diagnostic> =>
  error(
    createLifecycleDiagnostic(
      "InvalidSignature",
      `Invalid signature for '${op.operator}' (${op.name}): ${detail}`,
      op.location,
      { hint }
    )
  );

/**
 * Resolve the receiver of `=` / `=destroy` to an object or distinct declaration.
 */
const resolveReceiver = (
  op: IrOperatorDeclaration,
  type: IrType,
  registry: TypeRegistry
): Result<IrNominalDeclaration, Diagnostic> => {
  const decl =
    type.kind === "nominalType" ? registry.getNominal(type.id) : undefined;

  if (!decl) {
    return error(
      createLifecycleDiagnostic(
        "NonNominalReceiver",
        `'${op.operator}' (${op.name}) must be declared for an object or distinct type, not '${formatIrType(type)}'`,
        op.location,
        {
          typeName: formatIrType(type),
          hint: "Wrap the type in an object or Distinct<...> declaration to give it an identity",
        }
      )
    );
  }

  return ok(decl);
};

const validateAssign = (
  op: IrOperatorDeclaration,
  registry: TypeRegistry
): Result<BindingTarget, Diagnostic> => {
  const [dest, source] = op.parameters;
  if (op.parameters.length !== 2 || !dest || !source) {
    return invalidSignature(
      op,
      `expected 2 parameters, got ${op.parameters.length}`,
      "Declare it as (dest: Var<T>, src: T)"
    );
  }
  if (dest.passing !== "var") {
    return invalidSignature(
      op,
      `the first parameter '${dest.name}' must be a mutable reference`,
      "Declare the destination as Var<T>"
    );
  }
  if (source.passing === "var") {
    return invalidSignature(
      op,
      `the second parameter '${source.name}' must be passed by value or const reference`,
      "Declare the source as T or In<T>"
    );
  }

  const receiver = resolveReceiver(op, dest.type, registry);
  if (!receiver.ok) return receiver;

  if (!irTypesEqual(dest.type, source.type)) {
    return invalidSignature(
      op,
      `parameter types differ ('${formatIrType(dest.type)}' and '${formatIrType(source.type)}')`,
      "Both parameters must name the same type"
    );
  }
  if (op.returnType.kind !== "voidType") {
    return invalidSignature(
      op,
      "'=' must not return a value",
      "Declare the return type as void"
    );
  }

  return ok({ decl: receiver.value });
};

const validateDestroy = (
  op: IrOperatorDeclaration,
  registry: TypeRegistry
): Result<BindingTarget, Diagnostic> => {
  const [target] = op.parameters;
  if (op.parameters.length !== 1 || !target) {
    return invalidSignature(
      op,
      `expected 1 parameter, got ${op.parameters.length}`,
      "Declare it as (x: T)"
    );
  }
  if (target.passing !== "value") {
    return invalidSignature(
      op,
      `the parameter '${target.name}' must be passed by value`,
      "Remove the Var<...>/In<...> wrapper"
    );
  }

  const receiver = resolveReceiver(op, target.type, registry);
  if (!receiver.ok) return receiver;

  if (op.returnType.kind !== "voidType") {
    return invalidSignature(
      op,
      "'=destroy' must not return a value",
      "Declare the return type as void"
    );
  }

  return ok({ decl: receiver.value });
};

const validateDeepCopy = (
  op: IrOperatorDeclaration,
  registry: TypeRegistry
): Result<BindingTarget, Diagnostic> => {
  const [source] = op.parameters;
  if (op.parameters.length !== 1 || !source) {
    return invalidSignature(
      op,
      `expected 1 parameter, got ${op.parameters.length}`,
      "Declare it as (x: Ref<T>): Ref<T> or (x: Ptr<T>): Ptr<T>"
    );
  }
  if (source.passing !== "value" || source.type.kind !== "indirectionType") {
    return invalidSignature(
      op,
      `the parameter '${source.name}' must be a Ref<T> or Ptr<T> passed by value`,
      "Declare it as (x: Ref<T>): Ref<T> or (x: Ptr<T>): Ptr<T>"
    );
  }
  if (!irTypesEqual(op.returnType, source.type)) {
    return invalidSignature(
      op,
      `return type '${formatIrType(op.returnType)}' must match the parameter type '${formatIrType(source.type)}'`,
      "Return the same indirection type the operator receives"
    );
  }

  const receiver = resolveReceiver(op, source.type.pointee, registry);
  if (!receiver.ok) return receiver;

  return ok({ decl: receiver.value, indirection: source.type.indirection });
};

const validateOperator = (
  op: IrOperatorDeclaration,
  registry: TypeRegistry
): Result<BindingTarget, Diagnostic> => {
  switch (op.operator) {
    case "=":
      return validateAssign(op, registry);
    case "=destroy":
      return validateDestroy(op, registry);
    case "=deepCopy":
      return validateDeepCopy(op, registry);
  }
};

/**
 * Check the (nominal, kind) slot is free.
 */
const checkSlot = (
  op: IrOperatorDeclaration,
  target: BindingTarget,
  registry: TypeRegistry
): Diagnostic | undefined => {
  const kind = OPERATOR_KINDS[op.operator];
  const existing = registry.lookup(target.decl.id, kind);
  if (!existing) return undefined;

  const related = existing.implementation.location
    ? [existing.implementation.location]
    : [];

  const previous = existing.signature.indirection;
  if (
    kind === "deepCopy" &&
    previous !== undefined &&
    target.indirection !== undefined &&
    previous !== target.indirection
  ) {
    return createLifecycleDiagnostic(
      "ConflictingIndirectionBinding",
      `'=deepCopy' for '${target.decl.name}' is bound through both ${previous === "ref" ? "Ref" : "Ptr"}<${target.decl.name}> (${existing.implementation.name}) and ${target.indirection === "ref" ? "Ref" : "Ptr"}<${target.decl.name}> (${op.name})`,
      op.location,
      {
        typeName: target.decl.name,
        hint: "Introduce a distinct wrapper type for one of the two indirections",
        relatedLocations: related,
      }
    );
  }

  return createLifecycleDiagnostic(
    "DuplicateBinding",
    `'${op.operator}' is already bound for '${target.decl.name}' by '${existing.implementation.name}'`,
    op.location,
    { typeName: target.decl.name, relatedLocations: related }
  );
};

/**
 * Bind every operator declaration of a unit, then seal the registry.
 */
export const runOperationBinder = (
  operators: readonly IrOperatorDeclaration[],
  registry: TypeRegistry
): OperationBinderResult => {
  const bound: BoundOperationEntry[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const op of operators) {
    const validated = validateOperator(op, registry);
    if (!validated.ok) {
      diagnostics.push(validated.error);
      continue;
    }

    const conflict = checkSlot(op, validated.value, registry);
    if (conflict) {
      diagnostics.push(conflict);
      continue;
    }

    const entry: BoundOperationEntry = {
      kind: OPERATOR_KINDS[op.operator],
      target: validated.value.decl.id,
      targetName: validated.value.decl.name,
      signature: {
        parameters: op.parameters,
        returnType: op.returnType,
        indirection: validated.value.indirection,
      },
      implementation: { name: op.name, location: op.location },
    };
    registry.bind(entry);
    bound.push(entry);
  }

  registry.seal();
  return { bound, diagnostics };
};

