/**
 * Artifact emission orchestrator
 */

import {
  Catalog,
  Diagnostic,
  GenerationRequest,
  Result,
  collectResults,
  error,
  errorDiagnostic,
  map,
  ok,
} from "@fieldgen/frontend";
import { Artifact, mergeReferences } from "../../types.js";
import { declaredNames, generateFragment } from "../fragment/index.js";
import { renderImports } from "../imports.js";
import { assignLocalNames, bareNamesOf } from "../local-names.js";
import { BoundRecord, resolveFields } from "../resolve-fields.js";
import { generateHeader, renderModuleComment } from "./header.js";
import { assembleOutput } from "./assembly.js";

type ResolvedRequest = {
  readonly request: GenerationRequest;
  readonly bound: BoundRecord;
};

/**
 * Every declared name of a file must be unique
 */
const checkDeclarations = (
  file: string,
  parts: readonly ResolvedRequest[]
): readonly Diagnostic[] => {
  const owners = new Map<string, string>();
  const diagnostics: Diagnostic[] = [];

  for (const { request, bound } of parts) {
    const recordName = bound.record.record.name;
    for (const name of declaredNames(bound, request)) {
      const owner = owners.get(name);
      if (owner === undefined) {
        owners.set(name, recordName);
      } else {
        diagnostics.push(
          errorDiagnostic(
            "FG5003",
            owner === recordName
              ? `${name} is declared twice by ${recordName} in ${file}`
              : `${name} is declared by both ${owner} and ${recordName} in ${file}`
          )
        );
      }
    }
  }

  return diagnostics;
};

/**
 * Emit one output file from the requests that target it, in request
 * order. All requests share the file's module identifier.
 *
 * Requests are resolved first so that imports can be bound to names no
 * other import or declaration of the file uses; fragments are rendered
 * with those names.
 */
export const emitArtifact = (
  catalog: Catalog,
  file: string,
  module: string,
  requests: readonly GenerationRequest[]
): Result<Artifact> => {
  const resolved = collectResults(
    requests.map((request) =>
      map(resolveFields(catalog, request), (bound) => ({ request, bound }))
    )
  );
  if (!resolved.ok) {
    return resolved;
  }
  const parts = resolved.value;

  const duplicates = checkDeclarations(file, parts);
  if (duplicates.length > 0) {
    return error(duplicates);
  }

  const fields = parts.flatMap(({ bound }) => bound.fields);
  const references = mergeReferences(fields.map((field) => field.references));
  const localNames = assignLocalNames(references, [
    ...parts.flatMap(({ request, bound }) => declaredNames(bound, request)),
    ...fields.flatMap((field) =>
      field.typeText === undefined ? [] : bareNamesOf(field.type, file)
    ),
  ]);

  const results = collectResults(
    parts.map(({ request, bound }) =>
      generateFragment(bound, request, localNames)
    )
  );
  if (!results.ok) {
    return results;
  }

  const text = assembleOutput({
    header: generateHeader(results.value),
    moduleComment: renderModuleComment(module),
    imports: renderImports(references, file, localNames),
    fragments: results.value.map((result) => result.text),
  });

  return ok({ file, module, text, references, requests });
};
