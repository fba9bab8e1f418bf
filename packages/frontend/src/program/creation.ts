/**
 * Source unit creation
 */

import ts from "typescript";
import * as path from "node:path";
import { readdir } from "node:fs/promises";
import { Result, ok, error, flatMap } from "../types/result.js";
import { errorDiagnostic } from "../types/diagnostic.js";
import { collectTsDiagnostics } from "./diagnostics.js";
import {
  findProjectCandidates,
  readProjectOptions,
  selectProject,
} from "./projects.js";
import {
  LoadOptions,
  ProjectCandidate,
  SourceLocation,
  SourceUnit,
  describeLocation,
} from "./types.js";

const SOURCE_FILE_PATTERN = /\.(?:ts|tsx|mts|cts)$/;
const DECLARATION_FILE_PATTERN = /\.d\.(?:ts|mts|cts)$/;
const TEST_FILE_PATTERN = /\.(?:test|spec)\.(?:ts|tsx|mts|cts)$/;

/**
 * Pick the unit's root files from a directory listing
 */
export const selectRootFiles = (
  directory: string,
  files: readonly string[],
  includeTests: boolean
): readonly string[] =>
  files
    .filter(
      (name) =>
        SOURCE_FILE_PATTERN.test(name) && !DECLARATION_FILE_PATTERN.test(name)
    )
    .filter((name) => includeTests || !TEST_FILE_PATTERN.test(name))
    .sort()
    .map((name) => path.join(directory, name));

/**
 * Index the top-level declarations of the unit's files by name
 */
export const buildSymbolTable = (
  sourceFiles: readonly ts.SourceFile[]
): ReadonlyMap<string, readonly ts.Declaration[]> => {
  const symbols = new Map<string, ts.Declaration[]>();
  const add = (name: string, declaration: ts.Declaration): void => {
    const existing = symbols.get(name);
    if (existing) {
      existing.push(declaration);
    } else {
      symbols.set(name, [declaration]);
    }
  };

  for (const sourceFile of sourceFiles) {
    for (const statement of sourceFile.statements) {
      if (
        (ts.isInterfaceDeclaration(statement) ||
          ts.isClassDeclaration(statement) ||
          ts.isTypeAliasDeclaration(statement) ||
          ts.isEnumDeclaration(statement) ||
          ts.isFunctionDeclaration(statement)) &&
        statement.name
      ) {
        add(statement.name.text, statement);
      } else if (ts.isVariableStatement(statement)) {
        for (const declaration of statement.declarationList.declarations) {
          if (ts.isIdentifier(declaration.name)) {
            add(declaration.name.text, declaration);
          }
        }
      }
    }
  }

  return symbols;
};

const readDirectory = async (
  directory: string
): Promise<Result<readonly string[]>> => {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return ok(entries.filter((e) => e.isFile()).map((e) => e.name));
  } catch (e) {
    return error([
      errorDiagnostic(
        "FG2001",
        `Failed to read source directory ${directory}: ${e instanceof Error ? e.message : String(e)}`
      ),
    ]);
  }
};

const compileUnit = (
  location: SourceLocation,
  project: ProjectCandidate,
  files: readonly string[]
): Result<SourceUnit> =>
  flatMap(readProjectOptions(project), (options): Result<SourceUnit> => {
    const rootNames = selectRootFiles(
      location.directory,
      files,
      location.includeTests
    );
    if (rootNames.length === 0) {
      return error([
        errorDiagnostic(
          "FG2004",
          `No TypeScript sources found in ${describeLocation(location)}`
        ),
      ]);
    }

    const program = ts.createProgram({ rootNames, options });
    const sourceFiles = rootNames
      .map((name) => program.getSourceFile(name))
      .filter((sf): sf is ts.SourceFile => sf !== undefined);

    const diagnostics = collectTsDiagnostics(program, sourceFiles);
    if (diagnostics.length > 0) {
      return error([
        errorDiagnostic(
          "FG2002",
          `Failed to load ${describeLocation(location)}: ${diagnostics.length} TypeScript error(s)`
        ),
        ...diagnostics,
      ]);
    }

    return ok({
      location,
      project,
      program,
      checker: program.getTypeChecker(),
      sourceFiles,
      symbols: buildSymbolTable(sourceFiles),
    });
  });

/**
 * Load and type-check the source unit at a location
 */
export const createSourceUnit = async (
  location: SourceLocation,
  options: LoadOptions = {}
): Promise<Result<SourceUnit>> => {
  if (options.verbose) {
    console.log(`Loading ${describeLocation(location)}`);
  }

  const listing = await readDirectory(location.directory);
  if (!listing.ok) {
    return listing;
  }

  const candidates = findProjectCandidates(location.directory, listing.value);
  const selected = selectProject(
    location.directory,
    candidates,
    location.project
  );
  if (!selected.ok) {
    return selected;
  }

  if (options.verbose) {
    console.log(
      `  Using project ${selected.value.name}${selected.value.configPath ? ` (${selected.value.configPath})` : ""}`
    );
  }

  return compileUnit(location, selected.value, listing.value);
};
