/**
 * Configuration loading and request resolution
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, basename } from "node:path";
import {
  Diagnostic,
  NamingOptions,
  Result,
  STYLES,
  Style,
  calculateBaseName,
  defaultOutputFileName,
  error,
  errorDiagnostic,
  ok,
} from "@fieldgen/frontend";
import { isBooleanOption, isStringOption } from "./options.js";
import type { CliRequest, FieldgenConfig, RequestOptions } from "./types.js";

export const CONFIG_FILE_NAME = "fieldgen.json";

/** Styles that may be asked for by name; leaving the style out means "none" */
export const REQUEST_STYLES: readonly Style[] = STYLES.filter(
  (style) => style !== "none"
);

const isRequestStyle = (value: string): value is Style =>
  REQUEST_STYLES.some((style) => style === value);

const isObject = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const configError = (configPath: string, message: string): Diagnostic =>
  errorDiagnostic("FG1009", `${configPath}: ${message}`);

const parseEntry = (
  configPath: string,
  entry: unknown,
  index: number
): Result<RequestOptions> => {
  const where = `generate[${index}]`;
  if (!isObject(entry)) {
    return error([configError(configPath, `${where} must be an object`)]);
  }

  const options: RequestOptions = {};
  const problems: Diagnostic[] = [];

  for (const [name, value] of Object.entries(entry)) {
    if (isStringOption(name)) {
      if (typeof value === "string") {
        options[name] = value;
      } else {
        problems.push(configError(configPath, `${where}.${name} must be a string`));
      }
    } else if (isBooleanOption(name)) {
      if (typeof value === "boolean") {
        options[name] = value;
      } else {
        problems.push(
          configError(configPath, `${where}.${name} must be a boolean`)
        );
      }
    } else {
      problems.push(
        configError(configPath, `${where} has unknown option "${name}"`)
      );
    }
  }

  return problems.length > 0 ? error(problems) : ok(options);
};

/**
 * Parse the contents of a fieldgen.json
 */
export const parseConfig = (
  content: string,
  configPath: string
): Result<FieldgenConfig> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    return error([
      configError(
        configPath,
        `invalid JSON: ${e instanceof Error ? e.message : String(e)}`
      ),
    ]);
  }

  const generate = isObject(parsed) ? parsed["generate"] : undefined;
  if (!Array.isArray(generate) || generate.length === 0) {
    return error([
      configError(configPath, "'generate' must be a non-empty array of requests"),
    ]);
  }

  const entries: RequestOptions[] = [];
  const problems: Diagnostic[] = [];
  generate.forEach((entry: unknown, index) => {
    const result = parseEntry(configPath, entry, index);
    if (result.ok) {
      entries.push(result.value);
    } else {
      problems.push(...result.error);
    }
  });

  return problems.length > 0 ? error(problems) : ok({ generate: entries });
};

/**
 * Load fieldgen.json
 */
export const loadConfig = (configPath: string): Result<FieldgenConfig> => {
  if (!existsSync(configPath)) {
    return error([
      errorDiagnostic("FG1009", `Config file not found: ${configPath}`),
    ]);
  }

  try {
    return parseConfig(readFileSync(configPath, "utf-8"), configPath);
  } catch (e) {
    return error([
      configError(
        configPath,
        `cannot be read: ${e instanceof Error ? e.message : String(e)}`
      ),
    ]);
  }
};

/**
 * Find fieldgen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Check one request's options. Every problem is reported.
 */
export const validateRequestOptions = (
  options: RequestOptions
): readonly Diagnostic[] => {
  const problems: Diagnostic[] = [];

  if (!options.record) {
    problems.push(
      errorDiagnostic("FG1001", "Missing required option --record")
    );
  }
  if (options.srcDir === "") {
    problems.push(
      errorDiagnostic("FG1002", "Option --src-dir must not be empty")
    );
  }
  if (options.outModule === "") {
    problems.push(
      errorDiagnostic("FG1002", "Option --out-module must not be empty")
    );
  }
  if (options.prefix === "") {
    problems.push(
      errorDiagnostic("FG1002", "Option --prefix must not be empty")
    );
  }
  if (options.style !== undefined && !isRequestStyle(options.style)) {
    problems.push(
      errorDiagnostic(
        "FG1003",
        `Invalid --style "${options.style}": expected one of ${REQUEST_STYLES.join(", ")}`
      )
    );
  }
  if (options.tagRegex && !options.tag) {
    problems.push(
      errorDiagnostic(
        "FG1004",
        `Cannot use --tag-regex "${options.tagRegex}" without --tag`
      )
    );
  }

  return problems;
};

/**
 * `geo.Point` is looked up as `Point` when no `geo.Point` exists, so names
 * derived from the record use the unqualified part
 */
const unqualifiedName = (recordName: string): string =>
  recordName.slice(recordName.indexOf(".") + 1);

/**
 * Build a generation request from validated options. Relative paths are
 * taken from `baseDir`.
 */
export const resolveRequest = (
  options: RequestOptions,
  baseDir: string
): Result<CliRequest> => {
  const problems = validateRequestOptions(options);
  const record = options.record;
  if (problems.length > 0 || !record) {
    return error(problems);
  }

  const metadataKey = options.tag || undefined;
  const naming: NamingOptions = {
    prefix: options.prefix,
    includeRecordName: options.includeRecordName ?? false,
    exported: options.export ?? false,
    enumerate: options.iter ?? false,
  };

  const recordName = unqualifiedName(record);
  const baseName = calculateBaseName(naming, recordName, metadataKey);
  const outDir = resolve(baseDir, options.outDir ?? ".");

  return ok({
    request: {
      sourceLocation: {
        directory: resolve(baseDir, options.srcDir ?? "."),
        project: options.project || undefined,
        includeTests: options.tests ?? false,
      },
      recordName: record,
      metadataKey,
      metadataCapture: metadataKey ? options.tagRegex || undefined : undefined,
      naming,
      style:
        options.style !== undefined && isRequestStyle(options.style)
          ? options.style
          : "none",
      includeUnexportedFields: options.includeUnexportedFields ?? false,
      outputTarget: {
        file: resolve(
          outDir,
          options.outFile ?? defaultOutputFileName(recordName, baseName)
        ),
        module: options.outModule ?? basename(outDir),
      },
    },
    dryRun: options.dryRun ?? false,
  });
};
