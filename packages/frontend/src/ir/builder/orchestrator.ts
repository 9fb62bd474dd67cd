/**
 * IR Builder orchestration - surface source file to IR unit
 */

import * as ts from "typescript";
import type { Diagnostic } from "../../types/diagnostic.js";
import type { IrUnit } from "../types/index.js";
import { createIrFactory } from "./factory.js";
import { createBuildContext } from "./context.js";
import {
  collectTypeNames,
  convertFunctions,
  convertTypeDeclarations,
} from "./declarations.js";

export type UnitBuildResult = {
  readonly unit: IrUnit;
  /** Front-end diagnostics (unknown names, unsupported syntax, bad tags) */
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Build an IR unit from surface source text. Syntax only: the TypeScript
 * parser is used without a program or type checker.
 */
export const buildUnitFromSource = (
  fileName: string,
  text: string
): UnitBuildResult => {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const ctx = createBuildContext(sourceFile, createIrFactory());

  collectTypeNames(ctx);
  const nominals = convertTypeDeclarations(ctx);
  const { operators, procedures } = convertFunctions(ctx);

  return {
    unit: {
      kind: "unit",
      filePath: fileName,
      nominals,
      operators,
      procedures,
    },
    diagnostics: ctx.diagnostics,
  };
};
