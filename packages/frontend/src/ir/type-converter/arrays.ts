/**
 * Array and tuple type conversion
 */

import ts from "typescript";
import { FieldType, TupleElement } from "../types.js";
import type { ConvertType } from "./orchestrator.js";

/**
 * Convert `T[]` (or `readonly T[]` when wrapped in a readonly operator)
 */
export const convertArrayType = (
  node: ts.ArrayTypeNode,
  checker: ts.TypeChecker,
  convertType: ConvertType,
  readonly = false
): FieldType => ({
  kind: "arrayType",
  elementType: convertType(node.elementType, checker),
  readonly,
});

const convertTupleElement = (
  element: ts.TypeNode,
  checker: ts.TypeChecker,
  convertType: ConvertType
): TupleElement => {
  if (ts.isNamedTupleMember(element)) {
    return {
      type: convertType(element.type, checker),
      name: element.name.text,
      optional: element.questionToken !== undefined,
      rest: element.dotDotDotToken !== undefined,
    };
  }

  if (ts.isOptionalTypeNode(element)) {
    return {
      type: convertType(element.type, checker),
      optional: true,
      rest: false,
    };
  }

  if (ts.isRestTypeNode(element)) {
    return {
      type: convertType(element.type, checker),
      optional: false,
      rest: true,
    };
  }

  return { type: convertType(element, checker), optional: false, rest: false };
};

/**
 * Convert `[A, B?, ...C[]]`, keeping element names and markers
 */
export const convertTupleType = (
  node: ts.TupleTypeNode,
  checker: ts.TypeChecker,
  convertType: ConvertType,
  readonly = false
): FieldType => ({
  kind: "tupleType",
  elements: node.elements.map((element) =>
    convertTupleElement(element, checker, convertType)
  ),
  readonly,
});
