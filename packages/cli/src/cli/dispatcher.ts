/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  Diagnostic,
  DiagnosticCategory,
  Result,
  collectResults,
  diagnosticCategory,
  error,
  errorDiagnostic,
  flatMap,
  formatDiagnostic,
} from "@fieldgen/frontend";
import { findConfig, loadConfig, resolveRequest } from "../config.js";
import { generateCommand, type GenerateOptions } from "../commands/generate.js";
import type { CliRequest } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import {
  ParsedArgs,
  parseArgs,
  parseRequestArgs,
  splitFlagString,
} from "./parser.js";

const EXIT_CODES: Readonly<Record<DiagnosticCategory, number>> = {
  ConfigurationError: 1,
  LoadError: 2,
  ResolutionError: 3,
  EncodingError: 3,
  AssemblyError: 3,
  OutputError: 4,
};

/**
 * Exit code of a failed run, from its first diagnostic
 */
export const exitCodeFor = (diagnostics: readonly Diagnostic[]): number => {
  const [first] = diagnostics;
  return first ? EXIT_CODES[diagnosticCategory(first.code)] : 1;
};

const inContext = (
  label: string,
  diagnostics: readonly Diagnostic[]
): readonly Diagnostic[] =>
  diagnostics.map((d) => ({ ...d, message: `${label}: ${d.message}` }));

const requestsFromConfig = (
  configPath: string
): Result<readonly CliRequest[]> =>
  flatMap(
    loadConfig(configPath),
    (config): Result<readonly CliRequest[]> =>
      collectResults(
        config.generate.map((options, index): Result<CliRequest> => {
          const result = resolveRequest(options, dirname(configPath));
          return result.ok
            ? result
            : error(inContext(`${configPath} generate[${index}]`, result.error));
        })
      )
  );

const requestsFromGen = (
  gen: readonly string[],
  cwd: string
): Result<readonly CliRequest[]> =>
  collectResults(
    gen.map((text, index): Result<CliRequest> => {
      const resolved = flatMap(
        splitFlagString(text),
        (words): Result<CliRequest> => {
          const parsed = parseRequestArgs(words);
          return parsed.diagnostics.length > 0
            ? error(parsed.diagnostics)
            : resolveRequest(parsed.request, cwd);
        }
      );
      return resolved.ok
        ? resolved
        : error(inContext(`--gen ${index + 1}`, resolved.error));
    })
  );

/**
 * Turn the parsed arguments into requests: `--gen` strings, a config file,
 * or the request flags themselves. Without any of them the nearest
 * fieldgen.json is used.
 */
export const collectRequests = (
  parsed: ParsedArgs,
  cwd: string
): Result<readonly CliRequest[]> => {
  if (parsed.diagnostics.length > 0) {
    return error(parsed.diagnostics);
  }

  const { options } = parsed;
  if (options.gen.length > 0 && (parsed.count > 0 || options.config)) {
    return error([
      {
        ...errorDiagnostic(
          "FG1006",
          `Cannot combine --gen with ${parsed.count > 0 ? "request flags" : "--config"}`
        ),
        hint: "Move every request into its own --gen string",
      },
    ]);
  }
  if (options.config && parsed.count > 0) {
    return error([
      errorDiagnostic("FG1006", "Cannot combine --config with request flags"),
    ]);
  }

  if (options.gen.length > 0) {
    return requestsFromGen(options.gen, cwd);
  }
  if (options.config) {
    return requestsFromConfig(resolve(cwd, options.config));
  }

  const found = parsed.count === 0 ? findConfig(cwd) : null;
  if (found) {
    return requestsFromConfig(found);
  }

  return collectResults([resolveRequest(parsed.request, cwd)]);
};

const report = (diagnostics: readonly Diagnostic[]): number => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
  return exitCodeFor(diagnostics);
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd(),
  generateOptions: Pick<GenerateOptions, "print"> = {}
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`fieldgen v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help") {
    showHelp();
    return 0;
  }

  const requests = collectRequests(parsed, cwd);
  if (!requests.ok) {
    return report(requests.error);
  }

  const result = await generateCommand(requests.value, {
    ...generateOptions,
    verbose: parsed.options.verbose,
    quiet: parsed.options.quiet,
  });
  if (!result.ok) {
    return report(result.error);
  }

  return 0;
};
