/**
 * Function type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitType } from "./emitter.js";
import { emitParameters } from "./parameters.js";

/**
 * Emit `(a: A, b?: B) => R`
 */
export const emitFunctionType = (
  type: Extract<FieldType, { kind: "functionType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const [parameters, paramsContext] = emitParameters(type.parameters, context);
  const [returnType, newContext] = emitType(type.returnType, paramsContext);
  return [`(${parameters}) => ${returnType}`, newContext];
};
