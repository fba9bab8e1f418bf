/**
 * fieldgen emitter - type encoding and artifact assembly
 */

export * from "./types.js";
export * from "./core/index.js";
export { encodeType, emitType, type EncodedType } from "./types/index.js";
export { TOOL_NAME, generateFileHeader } from "./constants.js";
