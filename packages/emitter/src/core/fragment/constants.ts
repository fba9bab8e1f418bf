/**
 * Constant block rendering
 */

import type { Style } from "@fieldgen/frontend";
import { ResolvedField } from "../../types.js";

export type ConstantOptions = {
  readonly baseName: string;
  readonly recordName: string;
  readonly style: Style;
  readonly exported: boolean;
};

const renderConstant = (
  field: ResolvedField,
  options: ConstantOptions
): string => {
  const declare = `${options.exported ? "export " : ""}const ${field.constantName}`;
  const value = JSON.stringify(field.constantValue);
  const base = options.baseName;

  switch (options.style) {
    case "none":
      return `${declare} = ${value};`;
    case "alias":
      return `${declare}: ${base} = ${value};`;
    case "typed":
      return `${declare}: ${base} = new ${base}(${value});`;
    case "generic": {
      const type = `${base}<${field.typeText ?? "unknown"}>`;
      return `${declare}: ${type} = new ${type}(${value});`;
    }
  }
};

export const renderConstants = (
  fields: readonly ResolvedField[],
  options: ConstantOptions
): readonly string[] => [
  `// Constants generated from the ${options.recordName} record fields`,
  ...fields.map((field) => renderConstant(field, options)),
];
