/**
 * Union type emission
 */

import { FieldType } from "@fieldgen/frontend";
import { EmitterContext } from "../types.js";
import { emitType } from "./emitter.js";

/**
 * Emit `A | B`; function members are parenthesized
 */
export const emitUnionType = (
  type: Extract<FieldType, { kind: "unionType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const [members, newContext] = type.types.reduce<
    [readonly string[], EmitterContext]
  >(
    ([texts, current], member) => {
      const [text, next] = emitType(member, current);
      const wrapped = member.kind === "functionType" ? `(${text})` : text;
      return [[...texts, wrapped], next];
    },
    [[], context]
  );
  return [members.join(" | "), newContext];
};
