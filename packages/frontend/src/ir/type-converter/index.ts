/**
 * Type converter - Public API
 */

export { convertType, convertFieldType } from "./orchestrator.js";
export type { ConvertType } from "./orchestrator.js";
export {
  convertTypeReference,
  entityNameText,
  resolveReferencedDeclaration,
} from "./references.js";
export {
  moduleOriginOf,
  packageNameFromPath,
  isExportedByName,
} from "./origins.js";
