/**
 * Structural clone planning
 *
 * A default deep copy clones every heap location reachable from the value:
 * each indirection's pointee and each sequence's buffer. The plan lists
 * those locations by access path. Where a path leads back to a type already
 * being cloned, the owning entry is marked cyclic and the walk stops there;
 * the runtime clone keeps an identity map for cyclic entries.
 */

import type { IrType } from "../ir/types/index.js";
import type { LiftingResolver } from "./lifting-resolver.js";
import type { TypeId } from "./types.js";
import { slotPath } from "./slot-path.js";

/** Nesting limit for polymorphically recursive instantiations */
const MAX_CLONE_DEPTH = 64;

export type ClonePlanEntry = {
  readonly path: string;
  readonly kind: "indirection" | "sequence";
  readonly type: IrType;
  readonly cyclic: boolean;
};

export const planStructuralClone = (
  resolver: LiftingResolver,
  type: IrType,
  path: string
): readonly ClonePlanEntry[] => {
  const entries: ClonePlanEntry[] = [];

  const markCyclic = (owner: number | undefined): void => {
    if (owner === undefined) return;
    const entry = entries[owner];
    if (entry) entries[owner] = { ...entry, cyclic: true };
  };

  const visit = (
    current: IrType,
    currentPath: string,
    stack: readonly TypeId[],
    owner: number | undefined
  ): void => {
    if (stack.length > MAX_CLONE_DEPTH) return;

    for (const constituent of resolver.constituents(current, "deepCopy")) {
      const id = resolver.arena.intern(constituent.type);
      const childPath = slotPath(
        currentPath,
        constituent.slot,
        `i${stack.length - 1}`
      );

      if (stack.includes(id)) {
        markCyclic(owner);
        continue;
      }

      let childOwner = owner;
      if (
        constituent.type.kind === "indirectionType" ||
        constituent.type.kind === "sequenceType"
      ) {
        entries.push({
          path: childPath,
          kind:
            constituent.type.kind === "indirectionType"
              ? "indirection"
              : "sequence",
          type: constituent.type,
          cyclic: false,
        });
        childOwner = entries.length - 1;
      }

      visit(constituent.type, childPath, [...stack, id], childOwner);
    }
  };

  if (type.kind === "indirectionType" || type.kind === "sequenceType") {
    entries.push({
      path,
      kind: type.kind === "indirectionType" ? "indirection" : "sequence",
      type,
      cyclic: false,
    });
  }

  visit(
    type,
    path,
    [resolver.arena.intern(type)],
    entries.length > 0 ? 0 : undefined
  );
  return entries;
};

/**
 * True when a default deep copy of `type` must clone heap memory.
 */
export const needsStructuralClone = (
  resolver: LiftingResolver,
  type: IrType
): boolean => planStructuralClone(resolver, type, "").length > 0;
