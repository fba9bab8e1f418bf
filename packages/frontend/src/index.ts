/**
 * fieldgen frontend - source loading, record resolution and naming
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type DiagnosticCategory,
  type SourcePosition,
  type Diagnostic,
  createDiagnostic,
  errorDiagnostic,
  diagnosticCategory,
  formatDiagnostic,
  hasErrors,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/request.js";

export * from "./program/index.js";
export { loadCatalog, lookupUnit, type Catalog } from "./catalog.js";
export * from "./ir/types.js";
export * from "./ir/type-converter/index.js";
export * from "./resolver/index.js";
