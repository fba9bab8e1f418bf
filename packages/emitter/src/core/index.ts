/**
 * Core emitter - Public API
 */

export {
  assemble,
  checkGroupModule,
  groupRequests,
  validateRequest,
  type OutputGroup,
} from "./assembler.js";
export {
  bindLocalNames,
  resolveFields,
  type BoundRecord,
} from "./resolve-fields.js";
export { assignLocalNames, bareNamesOf } from "./local-names.js";
export { moduleSpecifier, renderImports } from "./imports.js";
export {
  declaredNames,
  generateFragment,
  renderConstants,
  renderTypeDeclaration,
} from "./fragment/index.js";
export { emitArtifact } from "./module-emitter/index.js";
