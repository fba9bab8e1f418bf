/**
 * CLI type definitions
 */

import type { GenerationRequest } from "@fieldgen/frontend";

/**
 * Options of one generation request, as given on the command line or in
 * a `generate` entry of fieldgen.json. Paths are relative until resolved.
 */
export type RequestOptions = {
  record?: string;
  srcDir?: string;
  project?: string;
  tests?: boolean;
  tag?: string;
  tagRegex?: string;
  prefix?: string;
  style?: string;
  export?: boolean;
  includeRecordName?: boolean;
  includeUnexportedFields?: boolean;
  iter?: boolean;
  outDir?: string;
  outFile?: string;
  outModule?: string;
  dryRun?: boolean;
};

export type StringOptionName = {
  [K in keyof RequestOptions]-?: RequestOptions[K] extends string | undefined
    ? K
    : never;
}[keyof RequestOptions];

export type BooleanOptionName = {
  [K in keyof RequestOptions]-?: RequestOptions[K] extends boolean | undefined
    ? K
    : never;
}[keyof RequestOptions];

export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  /** Each `--gen` value, unsplit */
  gen: string[];
};

/**
 * A validated request and whether its output goes to stdout
 */
export type CliRequest = {
  readonly request: GenerationRequest;
  readonly dryRun: boolean;
};

/**
 * fieldgen.json
 */
export type FieldgenConfig = {
  readonly generate: readonly RequestOptions[];
};
