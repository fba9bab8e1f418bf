/**
 * Literal type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";

export const emitLiteralType = (
  type: Extract<FieldType, { kind: "literalType" }>,
  context: EmitterContext
): [string, EmitterContext] => [type.text, context];
