/**
 * Operation expansion
 *
 * Flattens an effective operation into the calls code generation emits for
 * one value: user-override invocations on access paths, loops over array
 * and sequence elements, bitwise copies of default slots (assign and deep
 * copy only), structural clones of default deep-copy slots that own heap
 * memory, and references back to a synthesized operation when a
 * self-referential type recurses into itself.
 */

import { IrType, formatIrType } from "../ir/types/index.js";
import type { LiftingResolver } from "./lifting-resolver.js";
import type { BoundOperationEntry, LifecycleKind, TypeId } from "./types.js";
import { slotPath } from "./slot-path.js";
import { needsStructuralClone } from "./structural-clone.js";

export type SynthesizedCall =
  | {
      readonly kind: "invoke";
      readonly target: string;
      readonly entry: BoundOperationEntry;
    }
  | {
      readonly kind: "bitwise";
      readonly target: string;
      readonly type: IrType;
    }
  | {
      /** Default deep copy of a slot that owns heap memory */
      readonly kind: "clone";
      readonly target: string;
      readonly type: IrType;
    }
  | {
      readonly kind: "loop";
      readonly target: string;
      readonly indexName: string;
      /** Fixed element count, or undefined for a sequence's runtime length */
      readonly count?: number;
      readonly body: readonly SynthesizedCall[];
    }
  | {
      readonly kind: "recurse";
      readonly target: string;
      readonly typeId: TypeId;
      readonly type: IrType;
    };

/**
 * Expand the effective `kind` operation of `type` applied to `path`.
 */
export const expandOperation = (
  resolver: LiftingResolver,
  type: IrType,
  kind: LifecycleKind,
  path: string
): readonly SynthesizedCall[] => {
  const expanding: TypeId[] = [];

  const expand = (
    typeId: TypeId,
    target: string,
    depth: number
  ): readonly SynthesizedCall[] => {
    const operation = resolver.resolveId(typeId, kind);

    switch (operation.outcome) {
      case "override": {
        const invoke: SynthesizedCall = {
          kind: "invoke",
          target,
          entry: operation.entry,
        };
        const chained = operation.chainedBase;
        return chained
          ? [
              invoke,
              ...expand(
                chained.typeId,
                slotPath(target, chained.slot, `i${depth}`),
                depth + 1
              ),
            ]
          : [invoke];
      }

      case "default":
        if (kind === "destroy") return [];
        return kind === "deepCopy" &&
          needsStructuralClone(resolver, operation.type)
          ? [{ kind: "clone", target, type: operation.type }]
          : [{ kind: "bitwise", target, type: operation.type }];

      case "lifted": {
        if (expanding.includes(typeId)) {
          return [
            { kind: "recurse", target, typeId, type: operation.type },
          ];
        }

        expanding.push(typeId);
        const calls = operation.steps.flatMap(
          (step): readonly SynthesizedCall[] => {
            const indexName = `i${depth}`;
            const stepTarget = slotPath(target, step.slot, indexName);
            const body = expand(step.typeId, stepTarget, depth + 1);

            if (step.slot.kind === "arrayElements") {
              return body.length > 0
                ? [
                    {
                      kind: "loop",
                      target,
                      indexName,
                      count: step.slot.length,
                      body,
                    },
                  ]
                : [];
            }
            if (step.slot.kind === "sequenceElements") {
              return body.length > 0
                ? [{ kind: "loop", target, indexName, body }]
                : [];
            }
            return body;
          }
        );
        expanding.pop();
        return calls;
      }
    }
  };

  return expand(resolver.arena.intern(type), path, 0);
};

/**
 * One concrete call in execution order.
 */
export type CallInstance =
  | { readonly kind: "invoke"; readonly target: string; readonly implementation: string }
  | { readonly kind: "bitwise"; readonly target: string }
  | { readonly kind: "clone"; readonly target: string }
  | { readonly kind: "recurse"; readonly target: string; readonly typeName: string };

/**
 * Unroll loops into the calls they execute, substituting element indices.
 * Sequences are unrolled to `sequenceLength` elements.
 */
export const enumerateCalls = (
  calls: readonly SynthesizedCall[],
  sequenceLength = 1
): readonly CallInstance[] => {
  const run = (
    items: readonly SynthesizedCall[],
    indices: ReadonlyMap<string, number>
  ): CallInstance[] =>
    items.flatMap((call): CallInstance[] => {
      const target = substituteIndices(call.target, indices);
      switch (call.kind) {
        case "invoke":
          return [
            {
              kind: "invoke",
              target,
              implementation: call.entry.implementation.name,
            },
          ];
        case "bitwise":
        case "clone":
          return [{ kind: call.kind, target }];
        case "recurse":
          return [
            { kind: "recurse", target, typeName: formatIrType(call.type) },
          ];
        case "loop": {
          const count = call.count ?? sequenceLength;
          const unrolled: CallInstance[] = [];
          for (let i = 0; i < count; i++) {
            const inner = new Map(indices);
            inner.set(call.indexName, i);
            unrolled.push(...run(call.body, inner));
          }
          return unrolled;
        }
      }
    });

  return run(calls, new Map());
};

const substituteIndices = (
  target: string,
  indices: ReadonlyMap<string, number>
): string =>
  target.replace(/\[(i\d+)\]/g, (match, name: string) => {
    const value = indices.get(name);
    return value === undefined ? match : `[${value}]`;
  });
