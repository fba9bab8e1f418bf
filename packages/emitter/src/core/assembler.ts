/**
 * Output assembler
 *
 * Groups requests by output file, checks each group before any field is
 * resolved, then emits one artifact per group. Groups share nothing but
 * the read-only catalog.
 */

import * as path from "node:path";
import {
  Catalog,
  Diagnostic,
  GenerationRequest,
  Result,
  collectResults,
  error,
  errorDiagnostic,
  ok,
} from "@fieldgen/frontend";
import { Artifact } from "../types.js";
import { emitArtifact } from "./module-emitter/index.js";

export type OutputGroup = {
  readonly file: string;
  readonly requests: readonly GenerationRequest[];
};

/**
 * An enumeration helper needs a class to live on
 */
export const validateRequest = (
  request: GenerationRequest
): readonly Diagnostic[] =>
  request.naming.enumerate && request.style === "alias"
    ? [
        {
          ...errorDiagnostic(
            "FG5002",
            `Invalid style alias for ${request.recordName}: only the typed and generic styles may enumerate their values`
          ),
          hint: "Use --style typed or --style generic with --iter",
        },
      ]
    : [];

/**
 * Group requests by absolute output file, keeping first-seen order
 */
export const groupRequests = (
  requests: readonly GenerationRequest[]
): readonly OutputGroup[] => {
  const groups = new Map<string, GenerationRequest[]>();

  for (const request of requests) {
    const file = path.resolve(request.outputTarget.file);
    const group = groups.get(file);
    if (group) {
      group.push(request);
    } else {
      groups.set(file, [request]);
    }
  }

  return [...groups.entries()].map(([file, grouped]) => ({
    file,
    requests: grouped,
  }));
};

/**
 * Every request of a group must name the same module
 */
export const checkGroupModule = (
  group: OutputGroup
): Result<string> => {
  const modules = [
    ...new Set(group.requests.map((request) => request.outputTarget.module)),
  ];
  const [first, second] = modules;

  if (first === undefined) {
    return error([
      errorDiagnostic("FG5001", `No requests target ${group.file}`),
    ]);
  }
  if (second !== undefined) {
    return error([
      errorDiagnostic(
        "FG5001",
        `Cannot use both "${first}" and "${second}" module identifiers within output file ${group.file}`
      ),
    ]);
  }
  return ok(first);
};

export const assemble = (
  catalog: Catalog,
  requests: readonly GenerationRequest[]
): Result<readonly Artifact[]> => {
  const invalid = requests.flatMap(validateRequest);
  if (invalid.length > 0) {
    return error(invalid);
  }

  const groups = groupRequests(requests);
  const modules = collectResults(groups.map(checkGroupModule));
  if (!modules.ok) {
    return modules;
  }

  return collectResults(
    groups.map((group, index) =>
      emitArtifact(catalog, group.file, modules.value[index] ?? "", group.requests)
    )
  );
};
