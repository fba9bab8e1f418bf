/**
 * Program - Public API
 */

export type {
  LoadOptions,
  ProjectCandidate,
  SourceLocation,
  SourceUnit,
} from "./types.js";
export { locationKey, describeLocation } from "./types.js";
export { defaultCompilerOptions, enforcedCompilerOptions } from "./config.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourcePosition,
  nodePosition,
} from "./diagnostics.js";
export {
  findProjectCandidates,
  readProjectOptions,
  selectProject,
} from "./projects.js";
export {
  buildSymbolTable,
  createSourceUnit,
  selectRootFiles,
} from "./creation.js";
