/**
 * Shared constants for the fieldgen emitter
 */

export const TOOL_NAME = "fieldgen";

export const INDENT = "  ";

/**
 * Generated-code header naming the tool and the records a file was
 * generated from
 */
export const generateFileHeader = (recordNames: readonly string[]): string => {
  const lines = [`// Code generated by ${TOOL_NAME}; DO NOT EDIT.`];

  if (recordNames.length > 0) {
    lines.push(`// Source records: ${recordNames.join(", ")}`);
  }

  return lines.join("\n");
};
