/**
 * Local names of imported types
 *
 * Every import of a generated file needs a binding no other import or
 * declaration of that file uses. The first reference to a name keeps it;
 * later ones are aliased `Name_1`, `Name_2`, ...
 */

import { FieldType } from "@fieldgen/frontend";
import { TypeReference, referenceKey } from "../types.js";

const DICTIONARY_NAMES = {
  record: "Record",
  map: "Map",
  readonlyMap: "ReadonlyMap",
} as const;

/**
 * Names a type is written with that need no import: global types and
 * types declared in the generated file itself
 */
export const bareNamesOf = (
  type: FieldType,
  homeModule: string
): readonly string[] => {
  switch (type.kind) {
    case "referenceType": {
      const bare =
        type.origin.kind === "global" ||
        (type.origin.kind === "file" && type.origin.path === homeModule);
      return [
        ...(bare ? [type.name] : []),
        ...type.typeArguments.flatMap((arg) => bareNamesOf(arg, homeModule)),
      ];
    }
    case "arrayType":
      return bareNamesOf(type.elementType, homeModule);
    case "tupleType":
      return type.elements.flatMap((element) =>
        bareNamesOf(element.type, homeModule)
      );
    case "dictionaryType":
      return [
        ...(type.form === "index" ? [] : [DICTIONARY_NAMES[type.form]]),
        ...bareNamesOf(type.keyType, homeModule),
        ...bareNamesOf(type.valueType, homeModule),
      ];
    case "functionType":
      return [
        ...type.parameters.flatMap((parameter) =>
          bareNamesOf(parameter.type, homeModule)
        ),
        ...bareNamesOf(type.returnType, homeModule),
      ];
    case "unionType":
      return type.types.flatMap((member) => bareNamesOf(member, homeModule));
    case "primitiveType":
    case "literalType":
    case "typeParameterType":
    case "unsupportedType":
      return [];
  }
};

/**
 * Bind each reference to a local name, avoiding `reserved` and each other.
 * Keyed by `referenceKey`.
 */
export const assignLocalNames = (
  references: readonly TypeReference[],
  reserved: Iterable<string>
): ReadonlyMap<string, string> => {
  const taken = new Set(reserved);
  const names = new Map<string, string>();

  for (const reference of references) {
    let local = reference.name;
    for (let suffix = 1; taken.has(local); suffix++) {
      local = `${reference.name}_${suffix}`;
    }
    taken.add(local);
    names.set(referenceKey(reference), local);
  }

  return names;
};
