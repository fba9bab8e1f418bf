/**
 * Module origin of a declaration
 */

import ts from "typescript";
import { ModuleOrigin } from "../types.js";

const NODE_MODULES_SEGMENT = "/node_modules/";

/**
 * Derive the importable package name from a path inside node_modules.
 * `@types/` packages map back to the package they describe.
 */
export const packageNameFromPath = (fileName: string): string | undefined => {
  const normalized = fileName.replace(/\\/g, "/");
  const index = normalized.lastIndexOf(NODE_MODULES_SEGMENT);
  if (index < 0) {
    return undefined;
  }

  const segments = normalized
    .slice(index + NODE_MODULES_SEGMENT.length)
    .split("/");
  const [first, second] = segments;
  if (!first) {
    return undefined;
  }

  const name = first.startsWith("@") && second ? `${first}/${second}` : first;
  if (!name.startsWith("@types/")) {
    return name;
  }

  const described = name.slice("@types/".length);
  return described.includes("__")
    ? `@${described.replace("__", "/")}`
    : described;
};

const enclosingAmbientModule = (
  node: ts.Node
): ts.ModuleDeclaration | undefined => {
  for (let current = node.parent; current; current = current.parent) {
    if (ts.isModuleDeclaration(current) && ts.isStringLiteral(current.name)) {
      return current;
    }
  }
  return undefined;
};

const isInGlobalAugmentation = (node: ts.Node): boolean => {
  for (let current = node.parent; current; current = current.parent) {
    if (
      ts.isModuleDeclaration(current) &&
      ts.isIdentifier(current.name) &&
      current.name.text === "global"
    ) {
      return true;
    }
  }
  return false;
};

/**
 * Classify where a declaration lives: lib and script files are global,
 * `declare module "x"` blocks and node_modules files belong to a package,
 * any other module file is a file origin.
 */
export const moduleOriginOf = (declaration: ts.Declaration): ModuleOrigin => {
  const ambient = enclosingAmbientModule(declaration);
  if (ambient && ts.isStringLiteral(ambient.name)) {
    return { kind: "package", name: ambient.name.text };
  }

  const sourceFile = declaration.getSourceFile();
  if (!ts.isExternalModule(sourceFile) || isInGlobalAugmentation(declaration)) {
    return { kind: "global" };
  }

  const packageName = packageNameFromPath(sourceFile.fileName);
  if (packageName) {
    return { kind: "package", name: packageName };
  }

  return { kind: "file", path: sourceFile.fileName };
};

const exportNamesOf = (
  symbol: ts.Symbol,
  declaration: ts.Declaration,
  checker: ts.TypeChecker
): readonly string[] | undefined => {
  const moduleSymbol = checker.getSymbolAtLocation(declaration.getSourceFile());
  if (!moduleSymbol) {
    return undefined;
  }

  return checker
    .getExportsOfModule(moduleSymbol)
    .filter(
      (exported) =>
        (exported.flags & ts.SymbolFlags.Alias
          ? checker.getAliasedSymbol(exported)
          : exported) === symbol
    )
    .map((exported) => exported.getName());
};

/**
 * Whether `symbol` can be imported by its own name from the module that
 * declares it
 */
export const isExportedByName = (
  symbol: ts.Symbol,
  declaration: ts.Declaration,
  checker: ts.TypeChecker
): boolean =>
  exportNamesOf(symbol, declaration, checker)?.includes(symbol.getName()) ??
  true;

/**
 * Whether `symbol` is the default export of the module that declares it
 */
export const isDefaultExport = (
  symbol: ts.Symbol,
  declaration: ts.Declaration,
  checker: ts.TypeChecker
): boolean =>
  exportNamesOf(symbol, declaration, checker)?.includes(
    ts.InternalSymbolName.Default
  ) ?? false;
