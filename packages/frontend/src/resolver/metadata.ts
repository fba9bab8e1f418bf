/**
 * Field metadata
 *
 * Metadata lives in the JSDoc tags of a member: `@db full_name,omitempty`
 * is key `db` with value `full_name,omitempty`. The `@fieldgen` tag
 * overrides the constant value:
 *
 *   @fieldgen token
 *   @fieldgen token, db:user_id json:userId
 *
 * A `key:value` pair whose key is the requested metadata key wins over
 * the token.
 */

import ts from "typescript";
import { MetadataTag } from "../ir/types.js";
import { SourcePosition, errorDiagnostic } from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";

export const OVERRIDE_TAG = "fieldgen";

/**
 * Read the JSDoc tags attached to a member, in source order
 */
export const readMetadata = (node: ts.Node): readonly MetadataTag[] =>
  ts.getJSDocTags(node).map((tag) => ({
    key: tag.tagName.text,
    value: (ts.getTextOfJSDocComment(tag.comment) ?? "").trim(),
  }));

/**
 * Value of `key`, or undefined when the member has no such tag
 */
export const lookupMetadata = (
  tags: readonly MetadataTag[],
  key: string,
  position?: SourcePosition
): Result<string | undefined> => {
  const matches = tags.filter((tag) => tag.key === key);
  const [first] = matches;
  if (matches.length > 1) {
    return error([
      errorDiagnostic(
        "FG3004",
        `Malformed metadata: @${key} given ${matches.length} times`,
        position
      ),
    ]);
  }
  return ok(first?.value);
};

/**
 * The text before the first comma: `full_name,omitempty` names `full_name`
 */
export const namePortion = (value: string): string => {
  const comma = value.indexOf(",");
  return (comma < 0 ? value : value.slice(0, comma)).trim();
};

/**
 * Parse an override tag value. An empty result means no override.
 */
export const parseOverride = (
  value: string,
  metadataKey: string | undefined
): string | undefined => {
  const trimmed = value.trim();
  const comma = trimmed.indexOf(",");
  if (comma < 0) {
    return trimmed === "" ? undefined : trimmed;
  }

  const token = trimmed.slice(0, comma);
  const pairs = trimmed
    .slice(comma + 1)
    .split(" ")
    .map((pair) => pair.trim())
    .filter((pair) => pair !== "");

  for (const pair of pairs) {
    const colon = pair.indexOf(":");
    if (colon < 0 || pair.slice(0, colon) !== metadataKey) {
      continue;
    }
    const pairValue = pair.slice(colon + 1);
    if (pairValue !== "") {
      return pairValue;
    }
  }

  return token === "" ? undefined : token;
};

export type ValueOptions = {
  readonly metadataKey?: string;
  readonly capture?: RegExp;
};

/**
 * Constant value of a field: the override, else the captured or named
 * metadata value, else the identifier itself
 */
export const fieldValue = (
  identifier: string,
  tags: readonly MetadataTag[],
  options: ValueOptions,
  position?: SourcePosition
): Result<string> => {
  const override = lookupMetadata(tags, OVERRIDE_TAG, position);
  if (!override.ok) {
    return override;
  }
  if (override.value !== undefined) {
    const value = parseOverride(override.value, options.metadataKey);
    if (value !== undefined) {
      return ok(value);
    }
  }

  if (options.metadataKey === undefined || options.metadataKey === "") {
    return ok(identifier);
  }

  const found = lookupMetadata(tags, options.metadataKey, position);
  if (!found.ok) {
    return found;
  }
  const value = found.value;
  if (value === undefined || value === "") {
    return ok(identifier);
  }

  if (options.capture) {
    const match = options.capture.exec(value);
    return ok(match && match.length >= 2 ? match[1] ?? "" : identifier);
  }

  const name = namePortion(value);
  return ok(name === "" ? identifier : name);
};
