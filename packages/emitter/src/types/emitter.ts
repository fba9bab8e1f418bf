/**
 * Type emission main dispatcher
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitPrimitiveType } from "./primitives.js";
import { emitLiteralType } from "./literals.js";
import { emitReferenceType } from "./references.js";
import { emitArrayType } from "./arrays.js";
import { emitTupleType } from "./tuples.js";
import { emitDictionaryType } from "./dictionaries.js";
import { emitFunctionType } from "./functions.js";
import { emitUnionType } from "./unions.js";
import { emitUnsupportedType } from "./unsupported.js";

/**
 * Emit TypeScript type text for a field type
 */
export const emitType = (
  type: FieldType,
  context: EmitterContext
): [string, EmitterContext] => {
  switch (type.kind) {
    case "primitiveType":
      return emitPrimitiveType(type, context);

    case "literalType":
      return emitLiteralType(type, context);

    case "referenceType":
      return emitReferenceType(type, context);

    case "typeParameterType":
      // Type parameters of the record have no binding in generated code
      return ["unknown", context];

    case "arrayType":
      return emitArrayType(type, context);

    case "tupleType":
      return emitTupleType(type, context);

    case "dictionaryType":
      return emitDictionaryType(type, context);

    case "functionType":
      return emitFunctionType(type, context);

    case "unionType":
      return emitUnionType(type, context);

    case "unsupportedType":
      return emitUnsupportedType(type, context);
  }
};

/**
 * Emit a list of types left to right, threading the context
 */
export const emitTypes = (
  types: readonly FieldType[],
  context: EmitterContext
): [readonly string[], EmitterContext] =>
  types.reduce<[readonly string[], EmitterContext]>(
    ([texts, current], type) => {
      const [text, next] = emitType(type, current);
      return [[...texts, text], next];
    },
    [[], context]
  );

/**
 * Emit a type that sits in a position binding tighter than `|` and `=>`
 * (array elements, optional tuple elements, union members)
 */
export const emitOperandType = (
  type: FieldType,
  context: EmitterContext
): [string, EmitterContext] => {
  const [text, next] = emitType(type, context);
  return [needsParentheses(type) ? `(${text})` : text, next];
};

const needsParentheses = (type: FieldType): boolean =>
  type.kind === "unionType" ||
  type.kind === "functionType" ||
  ((type.kind === "arrayType" || type.kind === "tupleType") && type.readonly);
