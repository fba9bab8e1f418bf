/**
 * Program type definitions
 */

import type ts from "typescript";

/**
 * Identity of one load unit: the TypeScript sources of a directory,
 * optionally narrowed to one tsconfig project and optionally with tests.
 */
export type SourceLocation = {
  readonly directory: string;
  /** Name of the tsconfig project to use when the directory has several */
  readonly project?: string;
  readonly includeTests: boolean;
};

/**
 * A tsconfig project found for a directory.
 *
 * `tsconfig.json` is named "default", `tsconfig.<name>.json` is named
 * `<name>`. A candidate without a config path compiles with the defaults.
 */
export type ProjectCandidate = {
  readonly name: string;
  readonly configPath?: string;
};

export type LoadOptions = {
  readonly verbose?: boolean;
};

/**
 * A loaded, type-checked source unit. Never mutated after loading.
 */
export type SourceUnit = {
  readonly location: SourceLocation;
  readonly project: ProjectCandidate;
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** The unit's own files, in directory order */
  readonly sourceFiles: readonly ts.SourceFile[];
  /** Top-level declarations of the unit's files, by name */
  readonly symbols: ReadonlyMap<string, readonly ts.Declaration[]>;
};

export const locationKey = (location: SourceLocation): string =>
  `${location.directory}#${location.project ?? ""}#${location.includeTests}`;

export const describeLocation = (location: SourceLocation): string =>
  location.project
    ? `${location.directory} (project ${location.project})`
    : location.directory;
