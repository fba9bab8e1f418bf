/**
 * Type conversion orchestrator
 *
 * Converts the declared type node of a field, not the checker's inferred
 * type, so aliases and the written collection forms survive.
 */

import ts from "typescript";
import { FieldType } from "../types.js";
import { convertPrimitiveKeyword } from "./primitives.js";
import { convertLiteralType } from "./literals.js";
import { convertTypeReference } from "./references.js";
import { convertArrayType, convertTupleType } from "./arrays.js";
import { convertFunctionType } from "./functions.js";
import { convertObjectType } from "./objects.js";
import { convertUnionType } from "./unions.js";

export type ConvertType = (
  node: ts.TypeNode,
  checker: ts.TypeChecker
) => FieldType;

const unsupported = (description: string): FieldType => ({
  kind: "unsupportedType",
  description,
});

/**
 * Convert TypeScript type node to a field type
 */
export const convertType: ConvertType = (typeNode, checker) => {
  if (ts.isTypeReferenceNode(typeNode)) {
    return convertTypeReference(typeNode, checker, convertType);
  }

  const primitiveType = convertPrimitiveKeyword(typeNode.kind);
  if (primitiveType) {
    return primitiveType;
  }

  if (ts.isLiteralTypeNode(typeNode)) {
    return convertLiteralType(typeNode);
  }

  if (ts.isArrayTypeNode(typeNode)) {
    return convertArrayType(typeNode, checker, convertType);
  }

  if (ts.isTupleTypeNode(typeNode)) {
    return convertTupleType(typeNode, checker, convertType);
  }

  if (
    ts.isTypeOperatorNode(typeNode) &&
    typeNode.operator === ts.SyntaxKind.ReadonlyKeyword
  ) {
    if (ts.isArrayTypeNode(typeNode.type)) {
      return convertArrayType(typeNode.type, checker, convertType, true);
    }
    if (ts.isTupleTypeNode(typeNode.type)) {
      return convertTupleType(typeNode.type, checker, convertType, true);
    }
    return unsupported("readonly operator on a non-array type");
  }

  if (ts.isFunctionTypeNode(typeNode)) {
    return convertFunctionType(typeNode, checker, convertType);
  }

  if (ts.isTypeLiteralNode(typeNode)) {
    return convertObjectType(typeNode, checker, convertType);
  }

  if (ts.isUnionTypeNode(typeNode)) {
    return convertUnionType(typeNode, checker, convertType);
  }

  if (ts.isParenthesizedTypeNode(typeNode)) {
    return convertType(typeNode.type, checker);
  }

  if (ts.isIntersectionTypeNode(typeNode)) {
    return unsupported("intersection type");
  }

  if (ts.isTypeOperatorNode(typeNode)) {
    return unsupported(`${ts.tokenToString(typeNode.operator) ?? "type"} operator`);
  }

  return unsupported(describeSyntaxKind(typeNode.kind));
};

const describeSyntaxKind = (kind: ts.SyntaxKind): string => {
  switch (kind) {
    case ts.SyntaxKind.ConditionalType:
      return "conditional type";
    case ts.SyntaxKind.MappedType:
      return "mapped type";
    case ts.SyntaxKind.IndexedAccessType:
      return "indexed access type";
    case ts.SyntaxKind.TypeQuery:
      return "typeof query";
    case ts.SyntaxKind.TemplateLiteralType:
      return "template literal type";
    case ts.SyntaxKind.ConstructorType:
      return "constructor type";
    case ts.SyntaxKind.ImportType:
      return "import type";
    case ts.SyntaxKind.ThisType:
      return "this type";
    default:
      return ts.SyntaxKind[kind] ?? "type";
  }
};

/**
 * Convert the declared type of a field; a field without an annotation has
 * no type to render
 */
export const convertFieldType = (
  typeNode: ts.TypeNode | undefined,
  checker: ts.TypeChecker
): FieldType =>
  typeNode ? convertType(typeNode, checker) : unsupported("field without a type annotation");
