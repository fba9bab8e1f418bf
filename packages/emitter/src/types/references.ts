/**
 * Reference type emission
 *
 * Named types are written by the name their import is bound to. A type
 * declared in another module adds a reference, which becomes a type-only
 * import.
 */

import { FieldType, ModuleOrigin, errorDiagnostic } from "@fieldgen/frontend";
import {
  EmitterContext,
  ImportModule,
  TypeReference,
  addDiagnostic,
  addReference,
  localNameOf,
} from "../types.js";
import { emitTypes } from "./emitter.js";

/**
 * Module to import from, or undefined when no import is needed
 */
const importModuleFor = (
  origin: ModuleOrigin,
  homeModule: string
): ImportModule | undefined => {
  switch (origin.kind) {
    case "global":
      return undefined;
    case "file":
      return origin.path === homeModule
        ? undefined
        : { kind: "file", path: origin.path };
    case "package":
      return { kind: "package", name: origin.name };
  }
};

const referenceFor = (
  type: Extract<FieldType, { kind: "referenceType" }>,
  module: ImportModule
): TypeReference =>
  type.defaultExport
    ? { name: type.name, module, defaultExport: true }
    : { name: type.name, module };

const describeModule = (module: ImportModule): string =>
  module.kind === "file" ? module.path : module.name;

export const emitReferenceType = (
  type: Extract<FieldType, { kind: "referenceType" }>,
  context: EmitterContext
): [string, EmitterContext] => {
  const module = importModuleFor(type.origin, context.homeModule);
  const reference = module && referenceFor(type, module);

  const ownContext = !reference
    ? context
    : type.exported
      ? addReference(context, reference)
      : addDiagnostic(
          context,
          errorDiagnostic(
            "FG4002",
            `Type ${type.name} is not exported from ${describeModule(reference.module)}`
          )
        );

  const [typeArgs, newContext] = emitTypes(type.typeArguments, ownContext);
  const name = reference ? localNameOf(context, reference) : type.name;
  const text = typeArgs.length > 0 ? `${name}<${typeArgs.join(", ")}>` : name;
  return [text, newContext];
};
