/**
 * Build context shared by the surface converters of one source file
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  SourceLocation,
  createDiagnostic,
} from "../../types/diagnostic.js";
import type {
  IrNominalDeclaration,
  IrParameter,
  IrType,
  NominalId,
} from "../types/index.js";
import type { IrFactory } from "./factory.js";

/**
 * A type name declared at the top level of the file.
 * Aliases other than `Distinct<...>` are transparent.
 */
export type DeclaredTypeName =
  | {
      readonly kind: "nominal";
      readonly id: NominalId;
      readonly name: string;
      readonly typeParameters: readonly string[];
    }
  | {
      readonly kind: "alias";
      readonly name: string;
      readonly typeParameters: readonly string[];
      readonly type: ts.TypeNode;
    };

export type ProcedureSignature = {
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
};

export type BuildContext = {
  readonly sourceFile: ts.SourceFile;
  readonly factory: IrFactory;
  readonly diagnostics: Diagnostic[];
  readonly typeNames: Map<string, DeclaredTypeName>;
  /** Converted declarations, for member lookups in bodies */
  readonly nominals: Map<NominalId, IrNominalDeclaration>;
  readonly signatures: Map<string, ProcedureSignature>;
  /** Aliases currently being expanded */
  readonly expandingAliases: Set<string>;
};

/**
 * Names in scope while converting a type: the enclosing declaration's
 * type parameters.
 */
export type TypeScope = ReadonlySet<string>;

export const createBuildContext = (
  sourceFile: ts.SourceFile,
  factory: IrFactory
): BuildContext => ({
  sourceFile,
  factory,
  diagnostics: [],
  typeNames: new Map(),
  nominals: new Map(),
  signatures: new Map(),
  expandingAliases: new Set(),
});

export const nominalIdOf = (sourceFile: ts.SourceFile, name: string): NominalId =>
  `${sourceFile.fileName}#${name}`;

export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const start = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getEnd() - start,
  };
};

export const report = (
  ctx: BuildContext,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  node: ts.Node,
  hint?: string
): void => {
  ctx.diagnostics.push(
    createDiagnostic(
      code,
      severity,
      message,
      getNodeLocation(ctx.sourceFile, node),
      hint
    )
  );
};

export const reportUnsupported = (
  ctx: BuildContext,
  node: ts.Node,
  what: string
): void =>
  report(
    ctx,
    "LHK5002",
    "warning",
    `Unsupported syntax: ${what} is ignored`,
    node
  );
