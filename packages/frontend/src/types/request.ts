/**
 * Generation request types
 */

import type { SourceLocation } from "../program/types.js";

/**
 * How the constants are typed:
 *
 * - none: plain string constants
 * - alias: `type Base = string` and constants annotated with it
 * - typed: a class wrapping the value
 * - generic: a class with a phantom parameter carrying each field's type
 */
export type Style = "none" | "alias" | "typed" | "generic";

export const STYLES: readonly Style[] = ["none", "alias", "typed", "generic"];

export type NamingOptions = {
  /** Replaces the derived prefix entirely */
  readonly prefix?: string;
  readonly includeRecordName: boolean;
  readonly exported: boolean;
  /** Emit an `all()` helper listing every value */
  readonly enumerate: boolean;
};

export type OutputTarget = {
  /** Absolute path of the generated file */
  readonly file: string;
  /** Module identifier written into the generated file */
  readonly module: string;
};

export type GenerationRequest = {
  readonly sourceLocation: SourceLocation;
  readonly recordName: string;
  readonly metadataKey?: string;
  readonly metadataCapture?: string;
  readonly naming: NamingOptions;
  readonly style: Style;
  readonly includeUnexportedFields: boolean;
  readonly outputTarget: OutputTarget;
};
