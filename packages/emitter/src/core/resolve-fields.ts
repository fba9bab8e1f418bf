/**
 * Binding resolved fields to their rendered types
 */

import {
  Catalog,
  Diagnostic,
  GenerationRequest,
  ResolvedRecord,
  Result,
  collectResults,
  error,
  map,
  ok,
  resolveRecordFields,
} from "@fieldgen/frontend";
import { ResolvedField } from "../types.js";
import { encodeType } from "../types/index.js";

export type BoundRecord = {
  readonly record: ResolvedRecord;
  readonly fields: readonly ResolvedField[];
};

/**
 * Only the generic style writes field types, so only it encodes them.
 */
const usesFieldTypes = (request: GenerationRequest): boolean =>
  request.style === "generic";

/**
 * Resolve a request's fields and render each field's type for the
 * request's output file
 */
export const resolveFields = (
  catalog: Catalog,
  request: GenerationRequest
): Result<BoundRecord> => {
  const resolved = resolveRecordFields(catalog, request);
  if (!resolved.ok) {
    return resolved;
  }

  const record = resolved.value;
  const fields: ResolvedField[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const field of record.fields) {
    if (!usesFieldTypes(request)) {
      fields.push({
        identifier: field.identifier,
        constantName: field.constantName,
        constantValue: field.constantValue,
        type: field.type,
        references: [],
      });
      continue;
    }

    const encoded = encodeType(field.type, request.outputTarget.file);
    if (!encoded.ok) {
      diagnostics.push(
        ...encoded.error.map(
          (diagnostic): Diagnostic => ({
            ...diagnostic,
            message: `Field ${field.identifier} of ${record.record.name}: ${diagnostic.message}`,
            location: diagnostic.location ?? field.position,
          })
        )
      );
      continue;
    }

    fields.push({
      identifier: field.identifier,
      constantName: field.constantName,
      constantValue: field.constantValue,
      type: field.type,
      typeText: encoded.value.text,
      references: encoded.value.references,
    });
  }

  return diagnostics.length > 0 ? error(diagnostics) : ok({ record, fields });
};

/**
 * Re-render the field types of a bound record with the local names its
 * output file binds imports to
 */
export const bindLocalNames = (
  fields: readonly ResolvedField[],
  homeModule: string,
  localNames: ReadonlyMap<string, string>
): Result<readonly ResolvedField[]> =>
  collectResults(
    fields.map((field) =>
      field.typeText === undefined
        ? ok(field)
        : map(
            encodeType(field.type, homeModule, localNames),
            (encoded): ResolvedField => ({ ...field, typeText: encoded.text })
          )
    )
  );
