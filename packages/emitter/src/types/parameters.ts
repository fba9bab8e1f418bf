/**
 * Parameter emission for function types
 */

import { FunctionParameter } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitType } from "./emitter.js";

/**
 * Emit `name: T`, `name?: T` or `...name: T`
 */
export const emitParameter = (
  parameter: FunctionParameter,
  context: EmitterContext
): [string, EmitterContext] => {
  const [type, newContext] = emitType(parameter.type, context);
  const rest = parameter.rest ? "..." : "";
  const optional = parameter.optional ? "?" : "";
  return [`${rest}${parameter.name}${optional}: ${type}`, newContext];
};

export const emitParameters = (
  parameters: readonly FunctionParameter[],
  context: EmitterContext
): [string, EmitterContext] => {
  const [texts, newContext] = parameters.reduce<
    [readonly string[], EmitterContext]
  >(
    ([emitted, current], parameter) => {
      const [text, next] = emitParameter(parameter, current);
      return [[...emitted, text], next];
    },
    [[], context]
  );
  return [texts.join(", "), newContext];
};
