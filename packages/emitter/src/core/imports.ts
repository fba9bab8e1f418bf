/**
 * Import rendering
 *
 * References are grouped by module in first-seen order and written as
 * type-only imports. A default export gets its own line, since a
 * type-only import cannot bind a default and named members together.
 */

import * as path from "node:path";
import {
  ImportModule,
  TypeReference,
  moduleKey,
  referenceKey,
} from "../types.js";

const EMITTED_EXTENSIONS: ReadonlyMap<string, string> = new Map([
  [".ts", ".js"],
  [".tsx", ".js"],
  [".mts", ".mjs"],
  [".cts", ".cjs"],
]);

const toEmittedPath = (filePath: string): string => {
  const extension = path.extname(filePath);
  const emitted = EMITTED_EXTENSIONS.get(extension);
  if (emitted === undefined) {
    return filePath;
  }
  const source = filePath.endsWith(`.d${extension}`)
    ? `.d${extension}`
    : extension;
  return filePath.slice(0, -source.length) + emitted;
};

/**
 * Module specifier for an import written in `fromFile`
 */
export const moduleSpecifier = (
  module: ImportModule,
  fromFile: string
): string => {
  if (module.kind === "package") {
    return module.name;
  }

  const relative = path
    .relative(path.dirname(fromFile), toEmittedPath(module.path))
    .split(path.sep)
    .join("/");
  return relative.startsWith("../") ? relative : `./${relative}`;
};

type ImportGroup = {
  readonly module: ImportModule;
  defaultName?: string;
  readonly names: string[];
};

const bindingText = (
  reference: TypeReference,
  localNames: ReadonlyMap<string, string>
): string => {
  const local = localNames.get(referenceKey(reference)) ?? reference.name;
  return local === reference.name || reference.defaultExport
    ? local
    : `${reference.name} as ${local}`;
};

/**
 * `import type` lines per module, binding each reference to its local
 * name
 */
export const renderImports = (
  references: readonly TypeReference[],
  fromFile: string,
  localNames: ReadonlyMap<string, string> = new Map()
): readonly string[] => {
  const groups = new Map<string, ImportGroup>();

  for (const reference of references) {
    const key = moduleKey(reference.module);
    const group: ImportGroup = groups.get(key) ?? {
      module: reference.module,
      names: [],
    };
    groups.set(key, group);

    const binding = bindingText(reference, localNames);
    if (reference.defaultExport) {
      group.defaultName = group.defaultName ?? binding;
    } else if (!group.names.includes(binding)) {
      group.names.push(binding);
    }
  }

  return [...groups.values()].flatMap(({ module, defaultName, names }) => {
    const specifier = moduleSpecifier(module, fromFile);
    return [
      ...(defaultName ? [`import type ${defaultName} from "${specifier}";`] : []),
      ...(names.length > 0
        ? [`import type { ${names.join(", ")} } from "${specifier}";`]
        : []),
    ];
  });
};
