/**
 * TypeScript diagnostics collection and conversion
 */

import ts from "typescript";
import {
  Diagnostic,
  SourcePosition,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Collect the TypeScript diagnostics that make a source unit unusable:
 * option and global problems, plus syntax and type errors in the unit's
 * own files.
 */
export const collectTsDiagnostics = (
  program: ts.Program,
  sourceFiles: readonly ts.SourceFile[]
): readonly Diagnostic[] => {
  const tsDiagnostics = [
    ...program.getOptionsDiagnostics(),
    ...program.getGlobalDiagnostics(),
    ...sourceFiles.flatMap((sf) => [
      ...program.getSyntacticDiagnostics(sf),
      ...program.getSemanticDiagnostics(sf),
    ]),
  ];

  return tsDiagnostics
    .map(convertTsDiagnostic)
    .filter((d): d is Diagnostic => d !== null);
};

/**
 * Convert TypeScript diagnostic to a fieldgen diagnostic
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category !== ts.DiagnosticCategory.Error) {
    return null;
  }

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourcePosition(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic(
    "FG2002",
    "error",
    `TS${tsDiag.code}: ${message}`,
    location
  );
};

/**
 * Get source position information from TypeScript source file
 */
export const getSourcePosition = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourcePosition => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

export const nodePosition = (node: ts.Node): SourcePosition => {
  const sourceFile = node.getSourceFile();
  const start = node.getStart(sourceFile);
  return getSourcePosition(sourceFile, start, node.getEnd() - start);
};
