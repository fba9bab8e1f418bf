/**
 * TypeScript compiler configuration
 */

import ts from "typescript";

/**
 * Compiler options used when a source unit has no tsconfig, and the base
 * that a tsconfig project's own options are layered on.
 */
export const defaultCompilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  esModuleInterop: true,
  skipLibCheck: true,
  forceConsistentCasingInFileNames: true,
  allowJs: false,
  resolveJsonModule: false,
  noEmit: true,
};

/**
 * Options that always apply: fieldgen only reads programs, it never emits.
 */
export const enforcedCompilerOptions: ts.CompilerOptions = {
  noEmit: true,
  declaration: false,
  composite: false,
  incremental: false,
};
