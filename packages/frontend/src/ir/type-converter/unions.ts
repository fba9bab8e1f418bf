/**
 * Union type conversion
 */

import ts from "typescript";
import { FieldType } from "../types.js";
import type { ConvertType } from "./orchestrator.js";

export const convertUnionType = (
  node: ts.UnionTypeNode,
  checker: ts.TypeChecker,
  convertType: ConvertType
): FieldType => ({
  kind: "unionType",
  types: node.types.map((t) => convertType(t, checker)),
});
