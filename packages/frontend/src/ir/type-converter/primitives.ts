/**
 * Primitive type conversion
 */

import ts from "typescript";
import { FieldType, PrimitiveTypeName } from "../types.js";

const PRIMITIVE_KEYWORDS: ReadonlyMap<ts.SyntaxKind, PrimitiveTypeName> =
  new Map([
    [ts.SyntaxKind.StringKeyword, "string"],
    [ts.SyntaxKind.NumberKeyword, "number"],
    [ts.SyntaxKind.BooleanKeyword, "boolean"],
    [ts.SyntaxKind.BigIntKeyword, "bigint"],
    [ts.SyntaxKind.SymbolKeyword, "symbol"],
    [ts.SyntaxKind.ObjectKeyword, "object"],
    [ts.SyntaxKind.UnknownKeyword, "unknown"],
    [ts.SyntaxKind.AnyKeyword, "any"],
    [ts.SyntaxKind.NeverKeyword, "never"],
    [ts.SyntaxKind.VoidKeyword, "void"],
    [ts.SyntaxKind.UndefinedKeyword, "undefined"],
  ]);

/**
 * Convert a TypeScript keyword type to a primitive, or null when the
 * kind is not a primitive keyword
 */
export const convertPrimitiveKeyword = (kind: ts.SyntaxKind): FieldType | null => {
  const name = PRIMITIVE_KEYWORDS.get(kind);
  return name ? { kind: "primitiveType", name } : null;
};
