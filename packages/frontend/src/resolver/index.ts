/**
 * Resolver - Public API
 */

export { resolveRecordFields } from "./fields.js";
export type { ResolvedRecord, ResolvedRecordField } from "./fields.js";
export { findRecord, listFields, isRecordDeclaration } from "./records.js";
export {
  OVERRIDE_TAG,
  fieldValue,
  lookupMetadata,
  namePortion,
  parseOverride,
  readMetadata,
} from "./metadata.js";
export {
  calculateBaseName,
  capitalize,
  constantName,
  defaultOutputFileName,
} from "./naming.js";
