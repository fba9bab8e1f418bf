/**
 * Type reference conversion
 *
 * References resolve through import aliases to the declaring symbol. The
 * global collection types with a dedicated variant (arrays and
 * dictionaries) are recognized here; every other named type keeps its
 * name and records where it is declared.
 */

import ts from "typescript";
import { FieldType } from "../types.js";
import {
  isDefaultExport,
  isExportedByName,
  moduleOriginOf,
} from "./origins.js";
import type { ConvertType } from "./orchestrator.js";

export const entityNameText = (name: ts.EntityName): string =>
  ts.isIdentifier(name)
    ? name.text
    : `${entityNameText(name.left)}.${name.right.text}`;

const resolveSymbol = (
  node: ts.TypeReferenceNode | ts.ExpressionWithTypeArguments,
  checker: ts.TypeChecker
): ts.Symbol | undefined => {
  const location = ts.isTypeReferenceNode(node) ? node.typeName : node.expression;
  const symbol = checker.getSymbolAtLocation(location);
  if (!symbol) {
    return undefined;
  }
  return symbol.flags & ts.SymbolFlags.Alias
    ? checker.getAliasedSymbol(symbol)
    : symbol;
};

/**
 * Resolve a type reference (or heritage entry) to its declaring symbol and
 * first declaration
 */
export const resolveReferencedDeclaration = (
  node: ts.TypeReferenceNode | ts.ExpressionWithTypeArguments,
  checker: ts.TypeChecker
): { readonly symbol: ts.Symbol; readonly declaration: ts.Declaration } | undefined => {
  const symbol = resolveSymbol(node, checker);
  const declaration = symbol?.declarations?.[0];
  return symbol && declaration ? { symbol, declaration } : undefined;
};

/**
 * Name a type is written by. A default-exported declaration is known to
 * the checker as `default`, so its own name is used instead; an anonymous
 * one has none.
 */
export const declaredTypeName = (
  symbol: ts.Symbol,
  declaration: ts.Declaration
): string | undefined => {
  if (symbol.getName() !== ts.InternalSymbolName.Default) {
    return symbol.getName();
  }
  const name = ts.getNameOfDeclaration(declaration);
  return name && ts.isIdentifier(name) ? name.text : undefined;
};

const isNamespaceMember = (declaration: ts.Declaration): boolean => {
  const block = declaration.parent;
  if (!ts.isModuleBlock(block)) {
    return false;
  }
  const name = block.parent.name;
  return ts.isIdentifier(name) && name.text !== "global";
};

const convertGlobalCollection = (
  name: string,
  args: readonly FieldType[]
): FieldType | undefined => {
  const [first, second] = args;

  if ((name === "Array" || name === "ReadonlyArray") && first && args.length === 1) {
    return {
      kind: "arrayType",
      elementType: first,
      readonly: name === "ReadonlyArray",
    };
  }

  if (first && second && args.length === 2) {
    switch (name) {
      case "Record":
        return { kind: "dictionaryType", form: "record", keyType: first, valueType: second };
      case "Map":
        return { kind: "dictionaryType", form: "map", keyType: first, valueType: second };
      case "ReadonlyMap":
        return { kind: "dictionaryType", form: "readonlyMap", keyType: first, valueType: second };
    }
  }

  return undefined;
};

export const convertTypeReference = (
  node: ts.TypeReferenceNode,
  checker: ts.TypeChecker,
  convertType: ConvertType
): FieldType => {
  const writtenName = entityNameText(node.typeName);
  const resolved = resolveReferencedDeclaration(node, checker);
  if (!resolved) {
    return {
      kind: "unsupportedType",
      description: `unresolved type ${writtenName}`,
    };
  }

  const { symbol, declaration } = resolved;
  if (symbol.flags & ts.SymbolFlags.TypeParameter) {
    return { kind: "typeParameterType", name: symbol.getName() };
  }

  if (isNamespaceMember(declaration)) {
    return {
      kind: "unsupportedType",
      description: `namespaced type ${writtenName}`,
    };
  }

  const typeArguments = (node.typeArguments ?? []).map((arg) =>
    convertType(arg, checker)
  );
  const origin = moduleOriginOf(declaration);
  const name = declaredTypeName(symbol, declaration);
  if (name === undefined) {
    return {
      kind: "unsupportedType",
      description: `anonymous default export ${writtenName}`,
    };
  }

  if (origin.kind === "global") {
    const collection = convertGlobalCollection(name, typeArguments);
    return (
      collection ?? {
        kind: "referenceType",
        name,
        typeArguments,
        origin,
        exported: true,
      }
    );
  }

  const exportedByName =
    symbol.getName() !== ts.InternalSymbolName.Default &&
    (origin.kind === "package" || isExportedByName(symbol, declaration, checker));
  const defaultExport =
    !exportedByName &&
    (symbol.getName() === ts.InternalSymbolName.Default ||
      isDefaultExport(symbol, declaration, checker));

  return {
    kind: "referenceType",
    name,
    typeArguments,
    origin,
    exported: exportedByName || defaultExport,
    ...(defaultExport ? ({ defaultExport: true } as const) : {}),
  };
};
