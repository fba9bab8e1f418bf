/**
 * Type emission - Public API
 */

import {
  Diagnostic,
  FieldType,
  Result,
  error,
  ok,
} from "@fieldgen/frontend";
import { TypeReference, createContext } from "../types.js";
import { emitType } from "./emitter.js";

export { emitType, emitTypes, emitOperandType } from "./emitter.js";

export type EncodedType = {
  readonly text: string;
  readonly references: readonly TypeReference[];
};

/**
 * Render a field type as it is written in a file at `homeModule`, where
 * imports are bound to `localNames` (by default, their own names)
 */
export const encodeType = (
  type: FieldType,
  homeModule: string,
  localNames?: ReadonlyMap<string, string>
): Result<EncodedType, readonly Diagnostic[]> => {
  const [text, context] = emitType(type, createContext(homeModule, localNames));
  return context.diagnostics.length > 0
    ? error(context.diagnostics)
    : ok({ text, references: context.references });
};
