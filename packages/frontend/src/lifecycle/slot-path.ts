/**
 * Access paths for lifted steps
 *
 * `.field`, `.base`, `[0]` (tuple slot), `[i0]` (loop index),
 * `.value` (distinct underlying), `[]` (pointee).
 */

import type { LiftSlot } from "./types.js";

export const slotPath = (
  path: string,
  slot: LiftSlot,
  indexName: string
): string => {
  switch (slot.kind) {
    case "field":
      return `${path}.${slot.name}`;
    case "base":
      return `${path}.base`;
    case "tupleElement":
      return `${path}[${slot.index}]`;
    case "arrayElements":
    case "sequenceElements":
      return `${path}[${indexName}]`;
    case "underlying":
      return `${path}.value`;
    case "pointee":
      return `${path}[]`;
  }
};
