/**
 * TypeRegistry - identity-keyed store of nominal types and their lifecycle slots
 *
 * Each nominal declaration owns one slot per lifecycle kind. Slots are
 * filled by the operation binder and are immutable once bound. After the
 * binder phase the registry is sealed; the lifting resolver only accepts a
 * sealed registry.
 */

import type { IrNominalDeclaration, NominalId } from "../ir/types/index.js";
import type { BoundOperationEntry, LifecycleKind } from "./types.js";

/**
 * TypeRegistry API
 */
export type TypeRegistry = {
  /**
   * Register a nominal declaration. Throws on a repeated identity.
   */
  readonly declare: (decl: IrNominalDeclaration) => void;

  /**
   * Resolve a nominal declaration by identity.
   */
  readonly getNominal: (id: NominalId) => IrNominalDeclaration | undefined;

  /**
   * All declarations, in declaration order.
   */
  readonly getAllNominals: () => readonly IrNominalDeclaration[];

  /**
   * Bound override for (nominal, kind), if any.
   */
  readonly lookup: (
    id: NominalId,
    kind: LifecycleKind
  ) => BoundOperationEntry | undefined;

  /**
   * Fill a slot. Throws if the registry is sealed or the slot is taken;
   * the binder checks both before calling.
   */
  readonly bind: (entry: BoundOperationEntry) => void;

  /**
   * Every bound entry, in binding order.
   */
  readonly getAllEntries: () => readonly BoundOperationEntry[];

  readonly seal: () => void;
  readonly isSealed: () => boolean;
};

const slotKey = (id: NominalId, kind: LifecycleKind): string =>
  `${id}::${kind}`;

export const createTypeRegistry = (
  declarations: readonly IrNominalDeclaration[] = []
): TypeRegistry => {
  const nominals = new Map<NominalId, IrNominalDeclaration>();
  const slots = new Map<string, BoundOperationEntry>();
  let sealed = false;

  const declare = (decl: IrNominalDeclaration): void => {
    if (sealed) {
      throw new Error(`Cannot declare '${decl.name}': type registry is sealed`);
    }
    if (nominals.has(decl.id)) {
      throw new Error(`Nominal type '${decl.id}' is already declared`);
    }
    nominals.set(decl.id, decl);
  };

  declarations.forEach(declare);

  return {
    declare,
    getNominal: (id) => nominals.get(id),
    getAllNominals: () => [...nominals.values()],
    lookup: (id, kind) => slots.get(slotKey(id, kind)),
    bind: (entry) => {
      if (sealed) {
        throw new Error(
          `Cannot bind ${entry.kind} for '${entry.targetName}': type registry is sealed`
        );
      }
      const key = slotKey(entry.target, entry.kind);
      if (slots.has(key)) {
        throw new Error(
          `Slot ${entry.kind} for '${entry.targetName}' is already bound`
        );
      }
      slots.set(key, entry);
    },
    getAllEntries: () => [...slots.values()],
    seal: () => {
      sealed = true;
    },
    isSealed: () => sealed,
  };
};
