/**
 * Tuple type emission
 */

import { FieldType, TupleElement } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitOperandType, emitType } from "./emitter.js";

const emitTupleElement = (
  element: TupleElement,
  context: EmitterContext
): [string, EmitterContext] => {
  const rest = element.rest ? "..." : "";

  if (element.name !== undefined) {
    const [type, newContext] = emitType(element.type, context);
    const optional = element.optional ? "?" : "";
    return [`${rest}${element.name}${optional}: ${type}`, newContext];
  }

  if (element.optional) {
    const [type, newContext] = emitOperandType(element.type, context);
    return [`${type}?`, newContext];
  }

  const [type, newContext] = emitType(element.type, context);
  return [`${rest}${type}`, newContext];
};

/**
 * Emit `[A, B?, ...C[]]`, keeping element names
 */
export const emitTupleType = (
  type: Extract<FieldType, { kind: "tupleType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const [elements, newContext] = type.elements.reduce<
    [readonly string[], EmitterContext]
  >(
    ([texts, current], element) => {
      const [text, next] = emitTupleElement(element, current);
      return [[...texts, text], next];
    },
    [[], context]
  );

  return [
    `${type.readonly ? "readonly " : ""}[${elements.join(", ")}]`,
    newContext,
  ];
};
