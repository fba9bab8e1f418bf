/**
 * fieldgen generate - load, assemble and write every requested file
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  Result,
  collectResults,
  error,
  errorDiagnostic,
  loadCatalog,
  ok,
} from "@fieldgen/frontend";
import { type Artifact, assemble } from "@fieldgen/emitter";
import type { CliRequest } from "../types.js";

export type GenerateOptions = {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  /** Receives dry-run output; stdout by default */
  readonly print?: (text: string) => void;
};

const writeArtifact = async (
  artifact: Artifact,
  verbose: boolean
): Promise<Result<Artifact>> => {
  try {
    await mkdir(dirname(artifact.file), { recursive: true });
    await writeFile(artifact.file, artifact.text, "utf-8");
  } catch (e) {
    return error([
      errorDiagnostic(
        "FG6001",
        `Failed to write ${artifact.file}: ${e instanceof Error ? e.message : String(e)}`
      ),
    ]);
  }

  if (verbose) {
    console.log(`Wrote ${artifact.file}`);
  }
  return ok(artifact);
};

/**
 * Run every request. Files are written only once every output group has
 * been generated; a group whose requests include a dry run is printed
 * instead.
 */
export const generateCommand = async (
  requests: readonly CliRequest[],
  options: GenerateOptions = {}
): Promise<Result<readonly Artifact[]>> => {
  const verbose = options.verbose === true && options.quiet !== true;
  const print =
    options.print ??
    ((text: string): void => {
      process.stdout.write(text);
    });

  const catalog = await loadCatalog(
    requests.map(({ request }) => request.sourceLocation),
    { verbose }
  );
  if (!catalog.ok) {
    return catalog;
  }

  const artifacts = assemble(
    catalog.value,
    requests.map(({ request }) => request)
  );
  if (!artifacts.ok) {
    return artifacts;
  }

  const dryRuns = new Set(
    requests.filter(({ dryRun }) => dryRun).map(({ request }) => request)
  );

  const written = await Promise.all(
    artifacts.value.map((artifact): Promise<Result<Artifact>> => {
      if (artifact.requests.some((request) => dryRuns.has(request))) {
        print(artifact.text);
        return Promise.resolve(ok(artifact));
      }
      return writeArtifact(artifact, verbose);
    })
  );

  return collectResults(written);
};
