/**
 * Naming of generated constants and types
 */

import type { NamingOptions } from "../types/request.js";

const withFirstCase = (text: string, upper: boolean): string => {
  const [first] = text;
  if (first === undefined) {
    return text;
  }
  return (upper ? first.toUpperCase() : first.toLowerCase()) + text.slice(1);
};

export const capitalize = (text: string): string => withFirstCase(text, true);

/**
 * Base name shared by the generated type and every constant.
 *
 * Without an explicit prefix it is `[Record]<KEY>Field`, the key upper-cased
 * when the record name is included or the names are exported. The first
 * letter follows the export flag.
 */
export const calculateBaseName = (
  naming: NamingOptions,
  recordName: string,
  metadataKey = ""
): string => {
  const casedKey =
    naming.includeRecordName || naming.exported
      ? metadataKey.toUpperCase()
      : metadataKey.toLowerCase();

  const prefix =
    naming.prefix ??
    `${naming.includeRecordName ? recordName : ""}${casedKey}Field`;

  return withFirstCase(prefix, naming.exported);
};

/**
 * `#` private names lose their marker; the identifier is capitalized so
 * `fullName` under `DBCol` reads `DBColFullName`.
 */
export const constantName = (baseName: string, identifier: string): string =>
  baseName + capitalize(identifier.replace(/^#/, ""));

export const defaultOutputFileName = (
  recordName: string,
  baseName: string
): string =>
  `${recordName.toLowerCase()}_${baseName.toLowerCase()}.generated.ts`;
