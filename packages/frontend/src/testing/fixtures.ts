/**
 * Test fixtures: source units written to a temporary directory
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Catalog, loadCatalog } from "../catalog.js";
import type { SourceLocation } from "../program/types.js";
import { formatDiagnostic } from "../types/diagnostic.js";
import type { GenerationRequest, NamingOptions, Style } from "../types/request.js";

export type Fixture = {
  readonly directory: string;
  readonly location: (
    options?: Partial<Omit<SourceLocation, "directory">>
  ) => SourceLocation;
  readonly cleanup: () => void;
};

/**
 * Write `files` (relative path to contents) below a fresh temp directory
 */
export const createFixture = (
  files: Readonly<Record<string, string>>
): Fixture => {
  const directory = fs.mkdtempSync(path.join(os.tmpdir(), "fieldgen-test-"));

  for (const [name, contents] of Object.entries(files)) {
    const filePath = path.join(directory, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents);
  }

  return {
    directory,
    location: (options = {}) => ({
      directory,
      includeTests: options.includeTests ?? false,
      ...(options.project !== undefined ? { project: options.project } : {}),
    }),
    cleanup: () => fs.rmSync(directory, { recursive: true, force: true }),
  };
};

/**
 * Load the fixture's root directory; throws with the formatted diagnostics
 * when loading fails
 */
export const loadFixtureCatalog = async (
  fixture: Fixture,
  location: SourceLocation = fixture.location()
): Promise<Catalog> => {
  const result = await loadCatalog([location]);
  if (!result.ok) {
    throw new Error(result.error.map(formatDiagnostic).join("\n"));
  }
  return result.value;
};

const DEFAULT_NAMING: NamingOptions = {
  includeRecordName: false,
  exported: false,
  enumerate: false,
};

export type RequestOverrides = Partial<
  Omit<GenerationRequest, "naming" | "sourceLocation">
> & {
  readonly naming?: Partial<NamingOptions>;
  readonly style?: Style;
};

/**
 * A request for `recordName` in the fixture, writing next to the sources
 */
export const fixtureRequest = (
  fixture: Fixture,
  recordName: string,
  overrides: RequestOverrides = {}
): GenerationRequest => {
  const { naming, ...rest } = overrides;
  return {
    sourceLocation: fixture.location(),
    recordName,
    style: "none",
    includeUnexportedFields: false,
    outputTarget: {
      file: path.join(fixture.directory, "out", "fields.generated.ts"),
      module: "out",
    },
    ...rest,
    naming: { ...DEFAULT_NAMING, ...naming },
  };
};
