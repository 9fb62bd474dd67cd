/**
 * Diagnostic types for the lifthook compiler core
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Operation binding (LHK1001-LHK1099)
  | "LHK1001" // Duplicate lifecycle binding
  | "LHK1002" // Invalid operator signature
  | "LHK1003" // Operator receiver is not a nominal type
  | "LHK1004" // =deepCopy bound through both ref and ptr
  // Lifting (LHK2001-LHK2099)
  | "LHK2001" // Type contains itself by value
  // Context validation (LHK3001-LHK3099)
  | "LHK3001" // Destructible value outside a destructible context
  // Control flow (LHK4001-LHK4099)
  | "LHK4001" // break/continue outside of a loop
  // Surface front end (LHK5001-LHK5099)
  | "LHK5001" // Unknown type name
  | "LHK5002" // Unsupported syntax
  | "LHK5003" // Invalid @operator tag
  // Internal (LHK6001-LHK6099)
  | "LHK6001" // Scope exit edge missing from control-flow graph
  // Input (LHK7001-LHK7099)
  | "LHK7001"; // Source file cannot be read

/**
 * Error taxonomy of the lifecycle core
 */
export type LifecycleErrorKind =
  | "DuplicateBinding"
  | "InvalidSignature"
  | "NonNominalReceiver"
  | "ConflictingIndirectionBinding"
  | "UnresolvableRecursiveType"
  | "IllegalDestructibleUsage"
  | "InvalidControlFlow"
  | "MissingScopeExitEdge";

export const LIFECYCLE_ERROR_CODES: Readonly<
  Record<LifecycleErrorKind, DiagnosticCode>
> = {
  DuplicateBinding: "LHK1001",
  InvalidSignature: "LHK1002",
  NonNominalReceiver: "LHK1003",
  ConflictingIndirectionBinding: "LHK1004",
  UnresolvableRecursiveType: "LHK2001",
  IllegalDestructibleUsage: "LHK3001",
  InvalidControlFlow: "LHK4001",
  MissingScopeExitEdge: "LHK6001",
};

/**
 * Kinds that abort processing of the compilation unit.
 */
export const FATAL_ERROR_KINDS: ReadonlySet<LifecycleErrorKind> = new Set([
  "MissingScopeExitEdge",
]);

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
  /** Taxonomy entry for lifecycle errors */
  readonly kind?: LifecycleErrorKind;
  /** Printed form of the offending type */
  readonly typeName?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

/**
 * Create an error diagnostic for one of the lifecycle error kinds
 */
export const createLifecycleDiagnostic = (
  kind: LifecycleErrorKind,
  message: string,
  location: SourceLocation | undefined,
  details: {
    readonly typeName?: string;
    readonly hint?: string;
    readonly relatedLocations?: readonly SourceLocation[];
  } = {}
): Diagnostic => ({
  ...createDiagnostic(
    LIFECYCLE_ERROR_CODES[kind],
    "error",
    message,
    location,
    details.hint,
    details.relatedLocations
  ),
  kind,
  typeName: details.typeName,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const isFatal = (diagnostic: Diagnostic): boolean =>
  diagnostic.kind !== undefined && FATAL_ERROR_KINDS.has(diagnostic.kind);

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const addDiagnostics = (
  collector: DiagnosticsCollector,
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector =>
  diagnostics.reduce((acc, d) => addDiagnostic(acc, d), collector);

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
