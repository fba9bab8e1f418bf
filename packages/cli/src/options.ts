/**
 * Request option tables shared by the argument parser and fieldgen.json
 */

import type { BooleanOptionName, StringOptionName } from "./types.js";

export const STRING_FLAGS: ReadonlyMap<string, StringOptionName> = new Map<
  string,
  StringOptionName
>([
  ["--record", "record"],
  ["--src-dir", "srcDir"],
  ["--project", "project"],
  ["--tag", "tag"],
  ["--tag-regex", "tagRegex"],
  ["--prefix", "prefix"],
  ["--style", "style"],
  ["--out-dir", "outDir"],
  ["--out-file", "outFile"],
  ["--out-module", "outModule"],
]);

export const BOOLEAN_FLAGS: ReadonlyMap<string, BooleanOptionName> = new Map<
  string,
  BooleanOptionName
>([
  ["--tests", "tests"],
  ["--export", "export"],
  ["--include-record-name", "includeRecordName"],
  ["--include-unexported-fields", "includeUnexportedFields"],
  ["--iter", "iter"],
  ["--dry-run", "dryRun"],
]);

const STRING_OPTIONS: ReadonlySet<string> = new Set<string>(STRING_FLAGS.values());
const BOOLEAN_OPTIONS: ReadonlySet<string> = new Set<string>(BOOLEAN_FLAGS.values());

export const isStringOption = (name: string): name is StringOptionName =>
  STRING_OPTIONS.has(name);

export const isBooleanOption = (name: string): name is BooleanOptionName =>
  BOOLEAN_OPTIONS.has(name);
