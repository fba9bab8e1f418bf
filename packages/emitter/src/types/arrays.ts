/**
 * Array type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitOperandType } from "./emitter.js";

/**
 * Emit `T[]` or `readonly T[]`
 */
export const emitArrayType = (
  type: Extract<FieldType, { kind: "arrayType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const [elementType, newContext] = emitOperandType(type.elementType, context);
  return [`${type.readonly ? "readonly " : ""}${elementType}[]`, newContext];
};
