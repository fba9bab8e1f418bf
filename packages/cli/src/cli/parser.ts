/**
 * CLI argument parser
 */

import { parse } from "shell-quote";
import {
  Diagnostic,
  Result,
  error,
  errorDiagnostic,
  ok,
} from "@fieldgen/frontend";
import { BOOLEAN_FLAGS, STRING_FLAGS } from "../options.js";
import type { CliOptions, RequestOptions } from "../types.js";

export type RequestArgs = {
  readonly request: RequestOptions;
  /** How many request flags were given */
  readonly count: number;
  readonly diagnostics: readonly Diagnostic[];
};

export type ParsedArgs = RequestArgs & {
  readonly command: "generate" | "help" | "version";
  readonly options: CliOptions;
};

type FlagState = {
  request: RequestOptions;
  count: number;
  diagnostics: Diagnostic[];
};

const BOOLEAN_VALUES: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["false", false],
]);

/**
 * `--name=value` carries its value inline
 */
const splitFlag = (arg: string): { name: string; inline?: string } => {
  const equals = arg.indexOf("=");
  return arg.startsWith("--") && equals > 2
    ? { name: arg.slice(0, equals), inline: arg.slice(equals + 1) }
    : { name: arg };
};

const missingValue = (name: string): Diagnostic =>
  errorDiagnostic("FG1008", `Option ${name} requires a value`);

const unknownArgument = (arg: string): Diagnostic =>
  arg.startsWith("-")
    ? errorDiagnostic("FG1007", `Unknown option ${splitFlag(arg).name}`)
    : errorDiagnostic("FG1007", `Unexpected argument "${arg}"`);

/**
 * Apply the request flag at `args[index]`. Returns the index of the last
 * argument it consumed, or undefined when it is not a request flag.
 */
const readRequestFlag = (
  args: readonly string[],
  index: number,
  state: FlagState
): number | undefined => {
  const { name, inline } = splitFlag(args[index] ?? "");

  const stringOption = STRING_FLAGS.get(name);
  if (stringOption !== undefined) {
    state.count++;
    const last = inline === undefined ? index + 1 : index;
    const value = inline ?? args[index + 1];
    if (value === undefined) {
      state.diagnostics.push(missingValue(name));
    } else if (stringOption === "prefix" && state.request.prefix !== undefined) {
      state.diagnostics.push(
        errorDiagnostic("FG1005", "Option --prefix may only be specified once")
      );
    } else {
      state.request[stringOption] = value;
    }
    return last;
  }

  const booleanOption = BOOLEAN_FLAGS.get(name);
  if (booleanOption !== undefined) {
    state.count++;
    const value =
      inline === undefined ? true : BOOLEAN_VALUES.get(inline.toLowerCase());
    if (value === undefined) {
      state.diagnostics.push(
        errorDiagnostic(
          "FG1003",
          `Invalid value "${inline}" for ${name}: expected true or false`
        )
      );
    } else {
      state.request[booleanOption] = value;
    }
    return index;
  }

  return undefined;
};

/**
 * Parse the flags of one request, as given to --gen
 */
export const parseRequestArgs = (args: readonly string[]): RequestArgs => {
  const state: FlagState = { request: {}, count: 0, diagnostics: [] };

  for (let i = 0; i < args.length; i++) {
    const last = readRequestFlag(args, i, state);
    if (last === undefined) {
      state.diagnostics.push(unknownArgument(args[i] ?? ""));
    } else {
      i = last;
    }
  }

  return state;
};

/**
 * Split a --gen value into arguments with shell quoting rules.
 * Variables are kept as written.
 */
export const splitFlagString = (text: string): Result<readonly string[]> => {
  const words: string[] = [];

  for (const entry of parse(text.trim(), (key) => `$${key}`)) {
    if (typeof entry === "string") {
      words.push(entry);
    } else if ("pattern" in entry) {
      words.push(entry.pattern);
    } else {
      return error([
        errorDiagnostic("FG1007", `Unsupported shell syntax in --gen "${text}"`),
      ]);
    }
  }

  return ok(words);
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = { gen: [] };
  const state: FlagState = { request: {}, count: 0, diagnostics: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const { name, inline } = splitFlag(arg);

    const takeValue = (): string | undefined => {
      if (inline !== undefined) {
        return inline;
      }
      i++;
      const value = args[i];
      if (value === undefined) {
        state.diagnostics.push(missingValue(name));
      }
      return value;
    };

    switch (name) {
      case "-h":
      case "--help":
        return { ...state, command: "help", options };
      case "-v":
      case "--version":
        return { ...state, command: "version", options };
      case "-V":
      case "--verbose":
        options.verbose = true;
        continue;
      case "-q":
      case "--quiet":
        options.quiet = true;
        continue;
      case "-c":
      case "--config": {
        const value = takeValue();
        if (value !== undefined) {
          options.config = value;
        }
        continue;
      }
      case "--gen": {
        const value = takeValue();
        if (value !== undefined) {
          options.gen.push(value);
        }
        continue;
      }
    }

    const last = readRequestFlag(args, i, state);
    if (last === undefined) {
      state.diagnostics.push(unknownArgument(arg));
    } else {
      i = last;
    }
  }

  return { ...state, command: "generate", options };
};
