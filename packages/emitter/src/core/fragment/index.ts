/**
 * Fragment generation: the text one request contributes to its file
 */

import { GenerationRequest, Result, ok } from "@fieldgen/frontend";
import { GenerationResult, mergeReferences } from "../../types.js";
import { BoundRecord, bindLocalNames } from "../resolve-fields.js";
import { renderConstants } from "./constants.js";
import { renderTypeDeclaration, renderValueList } from "./declaration.js";

export { renderTypeDeclaration, renderValueList } from "./declaration.js";
export { renderConstants } from "./constants.js";

const helperName = (baseName: string): string => `${baseName}All`;

/**
 * Names a request declares in its output file
 */
export const declaredNames = (
  bound: BoundRecord,
  request: GenerationRequest
): readonly string[] => [
  ...(request.style === "none" ? [] : [bound.record.baseName]),
  ...bound.fields.map((field) => field.constantName),
  ...(request.style === "none" && request.naming.enumerate
    ? [helperName(bound.record.baseName)]
    : []),
];

/**
 * Render one resolved request, writing field types with the local names
 * of the file's imports. Only the generic style needs the fields' type
 * references.
 */
export const generateFragment = (
  bound: BoundRecord,
  request: GenerationRequest,
  localNames: ReadonlyMap<string, string> = new Map()
): Result<GenerationResult> => {
  const named = bindLocalNames(
    bound.fields,
    request.outputTarget.file,
    localNames
  );
  if (!named.ok) {
    return named;
  }

  const fields = named.value;
  const { record } = bound;
  const recordName = record.record.name;
  const { baseName } = record;
  const { exported, enumerate } = request.naming;
  const values = fields.map((field) => field.constantValue);

  const lines: string[] = [];

  if (request.style !== "none") {
    lines.push(
      ...renderTypeDeclaration({
        baseName,
        recordName,
        style: request.style,
        exported,
        values: enumerate ? values : undefined,
      }),
      ""
    );
  }

  lines.push(
    ...renderConstants(fields, {
      baseName,
      recordName,
      style: request.style,
      exported,
    })
  );

  if (request.style === "none" && enumerate) {
    lines.push(
      "",
      `/** Every value generated from ${recordName}, in field order */`,
      `${exported ? "export " : ""}const ${helperName(baseName)}: readonly string[] = ${renderValueList(values)};`
    );
  }

  return ok({
    recordName,
    text: `${lines.join("\n")}\n`,
    references:
      request.style === "generic"
        ? mergeReferences(fields.map((field) => field.references))
        : [],
  });
};
