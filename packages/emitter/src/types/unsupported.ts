/**
 * Unsupported type shapes
 */

import { FieldType, errorDiagnostic } from "@fieldgen/frontend";
import { EmitterContext, addDiagnostic } from "../types.js";

/**
 * Record an encoding error; the placeholder text is never written out
 */
export const emitUnsupportedType = (
  type: Extract<FieldType, { kind: "unsupportedType" }>,
  context: EmitterContext
): [string, EmitterContext] => [
  "unknown",
  addDiagnostic(
    context,
    errorDiagnostic("FG4001", `Unsupported type: ${type.description}`)
  ),
];
