/**
 * Object type literal conversion
 *
 * Only the pure index-signature form `{ [key: K]: V }` has a faithful
 * rendering; any other inline object shape is unsupported.
 */

import ts from "typescript";
import { FieldType } from "../types.js";
import type { ConvertType } from "./orchestrator.js";

export const convertObjectType = (
  node: ts.TypeLiteralNode,
  checker: ts.TypeChecker,
  convertType: ConvertType
): FieldType => {
  const [member] = node.members;

  if (node.members.length === 1 && member && ts.isIndexSignatureDeclaration(member)) {
    const [keyParameter] = member.parameters;
    if (keyParameter?.type) {
      return {
        kind: "dictionaryType",
        form: "index",
        keyType: convertType(keyParameter.type, checker),
        valueType: convertType(member.type, checker),
      };
    }
  }

  return {
    kind: "unsupportedType",
    description: "inline object type (declare it as a named interface)",
  };
};
