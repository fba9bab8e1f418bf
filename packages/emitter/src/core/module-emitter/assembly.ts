/**
 * Final output assembly
 */

export type AssemblyParts = {
  readonly header: string;
  readonly moduleComment: string;
  readonly imports: readonly string[];
  readonly fragments: readonly string[];
};

/**
 * Join the parts of a generated file. Fragments end in a newline, so
 * the file does too.
 */
export const assembleOutput = (parts: AssemblyParts): string => {
  const result: string[] = [parts.header, "", parts.moduleComment, ""];

  if (parts.imports.length > 0) {
    result.push(...parts.imports, "");
  }

  result.push(parts.fragments.join("\n"));

  return result.join("\n");
};
