/**
 * Emitter types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  Artifact,
  EmitterContext,
  GenerationResult,
  ImportModule,
  ResolvedField,
  TypeReference,
} from "./emitter-types/index.js";
export {
  addDiagnostic,
  addReference,
  createContext,
  localNameOf,
  mergeReferences,
  moduleKey,
  referenceKey,
  sameReference,
} from "./emitter-types/index.js";
