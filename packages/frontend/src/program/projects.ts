/**
 * tsconfig project discovery for a source directory
 */

import ts from "typescript";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import { errorDiagnostic } from "../types/diagnostic.js";
import { defaultCompilerOptions, enforcedCompilerOptions } from "./config.js";
import { ProjectCandidate } from "./types.js";

const TSCONFIG_PATTERN = /^tsconfig(?:\.(.+))?\.json$/;

/**
 * Find the candidate projects for a directory.
 *
 * Every tsconfig file in the directory is a candidate. A directory without
 * one belongs to the nearest tsconfig.json above it, or to no config.
 */
export const findProjectCandidates = (
  directory: string,
  entries: readonly string[]
): readonly ProjectCandidate[] => {
  const local = entries
    .map((entry) => ({ entry, match: TSCONFIG_PATTERN.exec(entry) }))
    .filter(({ match }) => match !== null)
    .map(({ entry, match }) => ({
      name: match?.[1] ?? "default",
      configPath: path.join(directory, entry),
    }))
    .sort((a, b) => a.name.localeCompare(b.name));

  if (local.length > 0) {
    return local;
  }

  const inherited = ts.findConfigFile(
    path.dirname(directory),
    ts.sys.fileExists,
    "tsconfig.json"
  );
  return [{ name: "default", configPath: inherited }];
};

/**
 * Pick exactly one project. When several were found and a name was asked
 * for, only projects with that name are kept.
 */
export const selectProject = (
  directory: string,
  candidates: readonly ProjectCandidate[],
  requested: string | undefined
): Result<ProjectCandidate> => {
  const filtered =
    candidates.length !== 1 && requested
      ? candidates.filter((c) => c.name === requested)
      : candidates;

  const [selected] = filtered;
  if (filtered.length === 1 && selected) {
    return ok(selected);
  }

  for (const candidate of candidates) {
    console.error(
      `Found project ${directory}#${candidate.name}${candidate.configPath ? ` (${candidate.configPath})` : ""}`
    );
  }

  return error([
    {
      ...errorDiagnostic(
        "FG2003",
        `Failed to load ${directory}: expected to find 1 project, found ${filtered.length}`
      ),
      hint: requested
        ? `No project named "${requested}" among ${candidates.map((c) => c.name).join(", ")}`
        : "Select one with --project",
    },
  ]);
};

/**
 * Read the compiler options of a project, layered over the defaults.
 */
export const readProjectOptions = (
  project: ProjectCandidate
): Result<ts.CompilerOptions> => {
  if (!project.configPath) {
    return ok({ ...defaultCompilerOptions, ...enforcedCompilerOptions });
  }

  const configPath = project.configPath;
  const read = ts.readConfigFile(configPath, ts.sys.readFile);
  if (read.error) {
    return error([
      errorDiagnostic(
        "FG2005",
        `Invalid tsconfig ${configPath}: ${ts.flattenDiagnosticMessageText(read.error.messageText, "\n")}`
      ),
    ]);
  }

  const parsed = ts.parseJsonConfigFileContent(
    read.config,
    ts.sys,
    path.dirname(configPath),
    undefined,
    configPath
  );

  // 18003: "No inputs were found". The unit picks its own root files.
  const problems = parsed.errors.filter(
    (d) => d.category === ts.DiagnosticCategory.Error && d.code !== 18003
  );
  if (problems.length > 0) {
    return error(
      problems.map((d) =>
        errorDiagnostic(
          "FG2005",
          `Invalid tsconfig ${configPath}: ${ts.flattenDiagnosticMessageText(d.messageText, "\n")}`
        )
      )
    );
  }

  return ok({
    ...defaultCompilerOptions,
    ...parsed.options,
    ...enforcedCompilerOptions,
  });
};
