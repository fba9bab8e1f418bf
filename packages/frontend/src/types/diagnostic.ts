/**
 * Diagnostic types for fieldgen
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Configuration errors (FG1001-FG1099)
  | "FG1001" // Required option missing
  | "FG1002" // Option must not be empty
  | "FG1003" // Option value outside the allowed set
  | "FG1004" // Capture expression given without a metadata key
  | "FG1005" // Option may only be specified once
  | "FG1006" // --gen mixed with request flags
  | "FG1007" // Unknown option
  | "FG1008" // Option value missing
  | "FG1009" // Invalid configuration file
  // Load errors (FG2001-FG2099)
  | "FG2001" // Source directory could not be read
  | "FG2002" // TypeScript reported errors in the source unit
  | "FG2003" // Zero or several candidate projects in the source directory
  | "FG2004" // No source files in the source directory
  | "FG2005" // Invalid tsconfig file
  // Resolution errors (FG3001-FG3099)
  | "FG3001" // Source unit was not loaded
  | "FG3002" // Record not found or ambiguous
  | "FG3003" // Symbol is not a record type
  | "FG3004" // Malformed field metadata
  | "FG3005" // Invalid capture expression
  | "FG3006" // Field name cannot form an identifier
  | "FG3007" // Circular or unresolvable embedding
  | "FG3008" // Two fields of one record share a constant name
  // Encoding errors (FG4001-FG4099)
  | "FG4001" // Unsupported type shape
  | "FG4002" // Named type is not exported from its module
  // Assembly errors (FG5001-FG5099)
  | "FG5001" // Conflicting module identifiers within one output file
  | "FG5002" // Enumeration helper requested with the alias style
  | "FG5003" // Name declared twice within one output file
  // Output errors (FG6001-FG6099)
  | "FG6001"; // Generated file could not be written

export type DiagnosticCategory =
  | "ConfigurationError"
  | "LoadError"
  | "ResolutionError"
  | "EncodingError"
  | "AssemblyError"
  | "OutputError";

export type SourcePosition = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourcePosition;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourcePosition,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

/**
 * Shorthand for the common case: an error without a hint
 */
export const errorDiagnostic = (
  code: DiagnosticCode,
  message: string,
  location?: SourcePosition
): Diagnostic => createDiagnostic(code, "error", message, location);

const CATEGORY_BY_PREFIX: Readonly<Record<string, DiagnosticCategory>> = {
  FG1: "ConfigurationError",
  FG2: "LoadError",
  FG3: "ResolutionError",
  FG4: "EncodingError",
  FG5: "AssemblyError",
  FG6: "OutputError",
};

export const diagnosticCategory = (code: DiagnosticCode): DiagnosticCategory =>
  CATEGORY_BY_PREFIX[code.slice(0, 3)] ?? "ConfigurationError";

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isError);

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
