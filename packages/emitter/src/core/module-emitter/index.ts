export { emitArtifact } from "./orchestrator.js";
export { assembleOutput, type AssemblyParts } from "./assembly.js";
export { generateHeader, renderModuleComment } from "./header.js";
