/**
 * Core emitter types
 */

import type {
  Diagnostic,
  FieldType,
  GenerationRequest,
} from "@fieldgen/frontend";

/**
 * Module a generated file imports a named type from
 */
export type ImportModule =
  | { readonly kind: "file"; readonly path: string }
  | { readonly kind: "package"; readonly name: string };

/**
 * A named type the generated text uses, and the module it comes from
 */
export type TypeReference = {
  readonly name: string;
  readonly module: ImportModule;
  /** Imported as the module's default export */
  readonly defaultExport?: boolean;
};

/**
 * Context threaded through type emission. Each emit returns a new
 * context; references and diagnostics only ever grow.
 */
export type EmitterContext = {
  /** Absolute path of the file being generated */
  readonly homeModule: string;
  /** Names imports are bound to in the file, keyed by `referenceKey` */
  readonly localNames: ReadonlyMap<string, string>;
  readonly references: readonly TypeReference[];
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * A field bound to its constant name, value and rendered type
 */
export type ResolvedField = {
  readonly identifier: string;
  readonly constantName: string;
  readonly constantValue: string;
  readonly type: FieldType;
  /** Rendered type, present when the style uses field types */
  readonly typeText?: string;
  readonly references: readonly TypeReference[];
};

/**
 * Rendered text of one request
 */
export type GenerationResult = {
  readonly recordName: string;
  readonly text: string;
  readonly references: readonly TypeReference[];
};

/**
 * One generated file
 */
export type Artifact = {
  readonly file: string;
  readonly module: string;
  readonly text: string;
  readonly references: readonly TypeReference[];
  readonly requests: readonly GenerationRequest[];
};
