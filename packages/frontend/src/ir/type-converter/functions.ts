/**
 * Function type conversion
 */

import ts from "typescript";
import { FieldType, FunctionParameter } from "../types.js";
import type { ConvertType } from "./orchestrator.js";

const parameterName = (
  parameter: ts.ParameterDeclaration,
  index: number
): string =>
  ts.isIdentifier(parameter.name) ? parameter.name.text : `arg${index}`;

/**
 * Convert `(a: A, b?: B, ...rest: C[]) => R`
 */
export const convertFunctionType = (
  node: ts.FunctionTypeNode,
  checker: ts.TypeChecker,
  convertType: ConvertType
): FieldType => {
  const parameters = node.parameters.map(
    (parameter, index): FunctionParameter => ({
      name: parameterName(parameter, index),
      type: parameter.type
        ? convertType(parameter.type, checker)
        : { kind: "primitiveType", name: "any" },
      optional: parameter.questionToken !== undefined,
      rest: parameter.dotDotDotToken !== undefined,
    })
  );

  return {
    kind: "functionType",
    parameters,
    returnType: convertType(node.type, checker),
  };
};
