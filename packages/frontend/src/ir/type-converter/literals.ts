/**
 * Literal type conversion
 */

import ts from "typescript";
import { FieldType } from "../types.js";

/**
 * Convert a literal type node. `null` is a primitive, everything else
 * keeps its source text (strings normalized to double quotes).
 */
export const convertLiteralType = (node: ts.LiteralTypeNode): FieldType => {
  const literal = node.literal;

  switch (literal.kind) {
    case ts.SyntaxKind.NullKeyword:
      return { kind: "primitiveType", name: "null" };
    case ts.SyntaxKind.TrueKeyword:
      return { kind: "literalType", text: "true" };
    case ts.SyntaxKind.FalseKeyword:
      return { kind: "literalType", text: "false" };
  }

  if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) {
    return { kind: "literalType", text: JSON.stringify(literal.text) };
  }

  if (ts.isNumericLiteral(literal) || ts.isBigIntLiteral(literal)) {
    return { kind: "literalType", text: literal.text };
  }

  if (
    ts.isPrefixUnaryExpression(literal) &&
    literal.operator === ts.SyntaxKind.MinusToken &&
    (ts.isNumericLiteral(literal.operand) || ts.isBigIntLiteral(literal.operand))
  ) {
    return { kind: "literalType", text: `-${literal.operand.text}` };
  }

  return {
    kind: "unsupportedType",
    description: `literal type ${ts.SyntaxKind[literal.kind]}`,
  };
};
