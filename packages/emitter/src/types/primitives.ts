/**
 * Primitive type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";

export const emitPrimitiveType = (
  type: Extract<FieldType, { kind: "primitiveType" }>,
  context: EmitterContext
): [string, EmitterContext] => [type.name, context];
