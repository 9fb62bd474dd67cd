/**
 * Type arena - interns type expressions to stable TypeIds
 *
 * Two spellings of the same structural type (or two references to the same
 * nominal declaration) share one TypeId, so per-type results are computed
 * once per compilation unit.
 */

import { IrType, stableIrTypeKey } from "../ir/types/index.js";
import type { TypeId } from "./types.js";

export type TypeArena = {
  readonly intern: (type: IrType) => TypeId;
  readonly typeOf: (id: TypeId) => IrType;
  readonly keyOf: (id: TypeId) => string;
  readonly size: () => number;
};

export const createTypeArena = (): TypeArena => {
  const types: IrType[] = [];
  const keys: string[] = [];
  const byKey = new Map<string, TypeId>();

  const entryAt = <T>(items: readonly T[], id: TypeId): T => {
    const item = items[id];
    if (item === undefined) {
      throw new Error(`Unknown TypeId ${id}`);
    }
    return item;
  };

  return {
    intern: (type) => {
      const key = stableIrTypeKey(type);
      const existing = byKey.get(key);
      if (existing !== undefined) return existing;

      const id = types.length;
      types.push(type);
      keys.push(key);
      byKey.set(key, id);
      return id;
    },
    typeOf: (id) => entryAt(types, id),
    keyOf: (id) => entryAt(keys, id),
    size: () => types.length,
  };
};
