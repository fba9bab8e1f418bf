/**
 * Context creation and manipulation functions
 */

import type { Diagnostic } from "@fieldgen/frontend";
import { EmitterContext, ImportModule, TypeReference } from "./core.js";

export const createContext = (
  homeModule: string,
  localNames: ReadonlyMap<string, string> = new Map()
): EmitterContext => ({
  homeModule,
  localNames,
  references: [],
  diagnostics: [],
});

export const moduleKey = (module: ImportModule): string =>
  module.kind === "file" ? `file:${module.path}` : `package:${module.name}`;

/**
 * Identity of an imported binding: its module and the name it is
 * exported under
 */
export const referenceKey = (reference: TypeReference): string =>
  `${moduleKey(reference.module)}#${reference.defaultExport ? "default" : reference.name}`;

export const sameReference = (a: TypeReference, b: TypeReference): boolean =>
  referenceKey(a) === referenceKey(b);

/**
 * Name a reference is written by in the generated file
 */
export const localNameOf = (
  context: EmitterContext,
  reference: TypeReference
): string => context.localNames.get(referenceKey(reference)) ?? reference.name;

/**
 * Add a reference unless the same binding is present
 */
export const addReference = (
  context: EmitterContext,
  reference: TypeReference
): EmitterContext =>
  context.references.some((existing) => sameReference(existing, reference))
    ? context
    : { ...context, references: [...context.references, reference] };

export const addDiagnostic = (
  context: EmitterContext,
  diagnostic: Diagnostic
): EmitterContext => ({
  ...context,
  diagnostics: [...context.diagnostics, diagnostic],
});

/**
 * Union of reference lists, first occurrence wins the position
 */
export const mergeReferences = (
  lists: readonly (readonly TypeReference[])[]
): readonly TypeReference[] =>
  lists
    .flat()
    .reduce<readonly TypeReference[]>(
      (merged, reference) =>
        merged.some((existing) => sameReference(existing, reference))
          ? merged
          : [...merged, reference],
      []
    );
