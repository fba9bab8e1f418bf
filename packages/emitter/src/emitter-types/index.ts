export type {
  Artifact,
  EmitterContext,
  GenerationResult,
  ImportModule,
  ResolvedField,
  TypeReference,
} from "./core.js";
export {
  addDiagnostic,
  addReference,
  createContext,
  localNameOf,
  mergeReferences,
  moduleKey,
  referenceKey,
  sameReference,
} from "./context.js";
