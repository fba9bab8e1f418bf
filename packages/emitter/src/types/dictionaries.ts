/**
 * Dictionary type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitType } from "./emitter.js";

const GENERIC_FORMS = {
  record: "Record",
  map: "Map",
  readonlyMap: "ReadonlyMap",
} as const;

/**
 * Emit the dictionary in the form it was declared with
 */
export const emitDictionaryType = (
  type: Extract<FieldType, { kind: "dictionaryType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const [keyType, keyContext] = emitType(type.keyType, context);
  const [valueType, valueContext] = emitType(type.valueType, keyContext);

  if (type.form === "index") {
    return [`{ [key: ${keyType}]: ${valueType} }`, valueContext];
  }

  return [
    `${GENERIC_FORMS[type.form]}<${keyType}, ${valueType}>`,
    valueContext,
  ];
};
