/**
 * Lifting Resolver
 *
 * resolve(type, kind) computes the effective lifecycle operation of any type:
 * - "override" when the type is nominal and has a bound entry for kind
 *   (or, for deepCopy, is an indirection to such a type)
 * - "lifted" when some constituent (transitively) has an override
 * - "default" otherwise (bitwise copy, no-op destroy, structural deep copy)
 *
 * Whether a type is non-default is a reachability question over the
 * constituent graph, answered with a visited set, so cycles through
 * sequences or indirections terminate and answers do not depend on query
 * order. Results are memoized per (TypeId, kind) for the unit's lifetime;
 * the registry is sealed before the first query, so the memo never goes stale.
 *
 * A nominal type that contains itself by value has no finite layout. It is
 * reported once as UnresolvableRecursiveType and resolves to "default".
 */

import {
  Diagnostic,
  createLifecycleDiagnostic,
} from "../types/diagnostic.js";
import {
  IrType,
  bindTypeArguments,
  formatIrType,
  substituteTypeParameters,
} from "../ir/types/index.js";
import type { TypeRegistry } from "./type-registry.js";
import { TypeArena, createTypeArena } from "./type-arena.js";
import type {
  BoundOperationEntry,
  EffectiveOperation,
  EffectiveOutcome,
  LifecycleKind,
  LiftSlot,
  LiftStep,
  TypeId,
} from "./types.js";

/** Nesting limit for by-value containment (polymorphic recursion guard) */
const MAX_NESTING_DEPTH = 64;

/** Limit on distinct types visited by one reachability query */
const MAX_REACHABLE_TYPES = 10_000;

export type Constituent = {
  readonly slot: LiftSlot;
  readonly type: IrType;
};

export type LiftingResolver = {
  readonly arena: TypeArena;

  /**
   * Effective operation of `type` for `kind`.
   */
  readonly resolve: (type: IrType, kind: LifecycleKind) => EffectiveOperation;

  /**
   * Effective operation of an interned type.
   */
  readonly resolveId: (id: TypeId, kind: LifecycleKind) => EffectiveOperation;

  /**
   * Slots a lifted `kind` operation on `type` visits, in visiting order.
   */
  readonly constituents: (
    type: IrType,
    kind: LifecycleKind
  ) => readonly Constituent[];

  /**
   * True when the type has a non-default destroy.
   */
  readonly isDestructible: (type: IrType) => boolean;

  /**
   * Check every declared nominal for by-value self containment.
   */
  readonly checkDeclarations: () => void;

  /**
   * UnresolvableRecursiveType diagnostics, at most one per declaration.
   */
  readonly getDiagnostics: () => readonly Diagnostic[];
};

export const createLiftingResolver = (
  registry: TypeRegistry,
  arena: TypeArena = createTypeArena()
): LiftingResolver => {
  if (!registry.isSealed()) {
    throw new Error(
      "Lifting resolver requires a sealed type registry: the binder phase has not completed"
    );
  }

  const operations = new Map<string, EffectiveOperation>();
  const reachability = new Map<string, boolean>();
  const selfEmbedding = new Map<TypeId, boolean>();
  const reported = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  const memoKey = (id: TypeId, kind: LifecycleKind): string => `${id}:${kind}`;

  const reportUnresolvable = (type: IrType, reason: string): void => {
    const decl =
      type.kind === "nominalType" ? registry.getNominal(type.id) : undefined;
    const key = decl ? decl.id : arena.keyOf(arena.intern(type));
    if (reported.has(key)) return;
    reported.add(key);

    diagnostics.push(
      createLifecycleDiagnostic(
        "UnresolvableRecursiveType",
        `Type '${formatIrType(type)}' ${reason}`,
        decl?.location,
        {
          typeName: formatIrType(type),
          hint: "Break the cycle with a Ref<...>, Ptr<...> or Seq<...> field",
        }
      )
    );
  };

  // ==========================================================================
  // Structure
  // ==========================================================================

  /**
   * Slots a lifted operation visits, in visiting order for `kind`.
   * Undefined for leaf types.
   */
  const constituentsOf = (
    type: IrType,
    kind: LifecycleKind
  ): readonly Constituent[] | undefined => {
    const ordered = (items: readonly Constituent[]): readonly Constituent[] =>
      kind === "destroy" ? [...items].reverse() : items;

    switch (type.kind) {
      case "nominalType": {
        const decl = registry.getNominal(type.id);
        if (!decl) return undefined;

        const bindings = bindTypeArguments(
          decl.typeParameters,
          type.typeArguments
        );

        if (decl.kind === "distinctDeclaration") {
          return [
            {
              slot: { kind: "underlying" },
              type: substituteTypeParameters(decl.underlying, bindings),
            },
          ];
        }

        const fields = ordered(
          decl.fields.map((f): Constituent => ({
            slot: { kind: "field", name: f.name },
            type: substituteTypeParameters(f.type, bindings),
          }))
        );
        if (!decl.base) return fields;

        const base: Constituent = {
          slot: { kind: "base" },
          type: substituteTypeParameters(decl.base, bindings),
        };
        // Base sub-object is destroyed after the derived fields
        return kind === "destroy" ? [...fields, base] : [base, ...fields];
      }

      case "objectType":
        return ordered(
          type.fields.map((f): Constituent => ({
            slot: { kind: "field", name: f.name },
            type: f.type,
          }))
        );

      case "tupleType":
        return ordered(
          type.elementTypes.map((t, index): Constituent => ({
            slot: { kind: "tupleElement", index },
            type: t,
          }))
        );

      case "arrayType":
        return type.length > 0
          ? [
              {
                slot: { kind: "arrayElements", length: type.length },
                type: type.elementType,
              },
            ]
          : undefined;

      case "sequenceType":
        return [{ slot: { kind: "sequenceElements" }, type: type.elementType }];

      case "indirectionType":
        // Only deep copy follows indirections; heap objects are not destroyed
        // or assigned through their pointers.
        return kind === "deepCopy"
          ? [{ slot: { kind: "pointee" }, type: type.pointee }]
          : undefined;

      default:
        return undefined;
    }
  };

  /**
   * Types stored inline in a value of `type`.
   */
  const byValueConstituents = (type: IrType): readonly IrType[] => {
    switch (type.kind) {
      case "nominalType":
      case "objectType":
      case "tupleType":
        return (constituentsOf(type, "assign") ?? []).map((c) => c.type);
      case "arrayType":
        return type.length > 0 ? [type.elementType] : [];
      default:
        return [];
    }
  };

  const embedsItself = (rootId: TypeId): boolean => {
    const known = selfEmbedding.get(rootId);
    if (known !== undefined) return known;

    const visited = new Set<TypeId>();
    const visit = (type: IrType, depth: number): boolean => {
      if (depth > MAX_NESTING_DEPTH) return true;
      for (const inner of byValueConstituents(type)) {
        const innerId = arena.intern(inner);
        if (innerId === rootId) return true;
        if (visited.has(innerId)) continue;
        visited.add(innerId);
        if (visit(inner, depth + 1)) return true;
      }
      return false;
    };

    const result = visit(arena.typeOf(rootId), 0);
    selfEmbedding.set(rootId, result);
    return result;
  };

  const isUnresolvable = (type: IrType): boolean => {
    if (type.kind !== "nominalType") return false;
    if (!embedsItself(arena.intern(type))) return false;
    reportUnresolvable(type, "contains itself by value and has no finite layout");
    return true;
  };

  const overrideFor = (
    type: IrType,
    kind: LifecycleKind
  ): BoundOperationEntry | undefined => {
    // `=deepCopy` is declared on Ref<T>/Ptr<T>; the indirection itself
    // carries the pointee's binding.
    if (type.kind === "indirectionType") {
      return kind === "deepCopy" ? overrideFor(type.pointee, kind) : undefined;
    }
    return type.kind === "nominalType" && !isUnresolvable(type)
      ? registry.lookup(type.id, kind)
      : undefined;
  };

  // ==========================================================================
  // Reachability
  // ==========================================================================

  /**
   * True when an override for `kind` lies on some constituent path of rootId.
   */
  const reachesOverride = (rootId: TypeId, kind: LifecycleKind): boolean => {
    const known = reachability.get(memoKey(rootId, kind));
    if (known !== undefined) return known;

    const reachable = new Set<TypeId>([rootId]);
    const pending: TypeId[] = [rootId];
    let found = false;

    while (pending.length > 0 && !found) {
      const id = pending.pop();
      if (id === undefined) break;
      const type = arena.typeOf(id);

      if (overrideFor(type, kind)) {
        found = true;
        break;
      }
      if (isUnresolvable(type)) continue;

      if (id !== rootId) {
        const cached = reachability.get(memoKey(id, kind));
        if (cached === false) continue;
        if (cached === true) {
          found = true;
          break;
        }
      }

      for (const constituent of constituentsOf(type, kind) ?? []) {
        const constituentId = arena.intern(constituent.type);
        if (reachable.has(constituentId)) continue;
        reachable.add(constituentId);
        pending.push(constituentId);
      }

      if (reachable.size > MAX_REACHABLE_TYPES) {
        reportUnresolvable(
          arena.typeOf(rootId),
          "expands into unboundedly many distinct types"
        );
        reachability.set(memoKey(rootId, kind), false);
        return false;
      }
    }

    if (found) {
      reachability.set(memoKey(rootId, kind), true);
    } else {
      // Nothing reachable from the root has an override, so nothing
      // reachable from any visited type has one either.
      for (const id of reachable) {
        reachability.set(memoKey(id, kind), false);
      }
    }
    return found;
  };

  const outcomeOf = (id: TypeId, kind: LifecycleKind): EffectiveOutcome => {
    const type = arena.typeOf(id);
    if (isUnresolvable(type)) return "default";
    if (overrideFor(type, kind)) return "override";
    return constituentsOf(type, kind) && reachesOverride(id, kind)
      ? "lifted"
      : "default";
  };

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Base sub-object step of a destroy override: the override handles the
   * derived part only, so a destructible base still gets its own destroy.
   */
  const chainedBaseOf = (type: IrType): LiftStep | undefined => {
    const slot = (constituentsOf(type, "destroy") ?? []).find(
      (c) => c.slot.kind === "base"
    );
    if (!slot) return undefined;
    const id = arena.intern(slot.type);
    const operation = resolveId(id, "destroy");
    return operation.outcome === "default"
      ? undefined
      : { slot: slot.slot, typeId: id, type: slot.type, outcome: operation.outcome };
  };

  const computeOperation = (
    typeId: TypeId,
    kind: LifecycleKind
  ): EffectiveOperation => {
    const type = arena.typeOf(typeId);
    const base = { kind, typeId, type };

    if (isUnresolvable(type)) {
      return { ...base, outcome: "default" };
    }

    const entry = overrideFor(type, kind);
    if (entry) {
      const chainedBase = kind === "destroy" ? chainedBaseOf(type) : undefined;
      return chainedBase
        ? { ...base, outcome: "override", entry, chainedBase }
        : { ...base, outcome: "override", entry };
    }

    const constituents = constituentsOf(type, kind);
    if (!constituents || !reachesOverride(typeId, kind)) {
      return { ...base, outcome: "default" };
    }

    const steps = constituents.map((c): LiftStep => {
      const id = arena.intern(c.type);
      return { slot: c.slot, typeId: id, type: c.type, outcome: outcomeOf(id, kind) };
    });
    return { ...base, outcome: "lifted", steps };
  };

  const resolveId = (
    typeId: TypeId,
    kind: LifecycleKind
  ): EffectiveOperation => {
    const key = memoKey(typeId, kind);
    const cached = operations.get(key);
    if (cached) return cached;

    const operation = computeOperation(typeId, kind);
    operations.set(key, operation);
    return operation;
  };

  const resolve = (type: IrType, kind: LifecycleKind): EffectiveOperation =>
    resolveId(arena.intern(type), kind);

  return {
    arena,
    resolve,
    resolveId,
    constituents: (type, kind) => constituentsOf(type, kind) ?? [],
    isDestructible: (type) => resolve(type, "destroy").outcome !== "default",
    checkDeclarations: () => {
      for (const decl of registry.getAllNominals()) {
        isUnresolvable({
          kind: "nominalType",
          id: decl.id,
          name: decl.name,
          typeArguments: decl.typeParameters.map((name): IrType => ({
            kind: "typeParameterType",
            name,
          })),
        });
      }
    },
    getDiagnostics: () => [...diagnostics],
  };
};
