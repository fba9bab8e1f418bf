/**
 * Field resolution
 *
 * Flattens a record and its embedded records into the ordered list of
 * fields that become constants.
 */

import ts from "typescript";
import type { Catalog } from "../catalog.js";
import { lookupUnit } from "../catalog.js";
import { FieldType, RecordField, RecordType } from "../ir/types.js";
import { convertFieldType } from "../ir/type-converter/index.js";
import {
  declaredTypeName,
  resolveReferencedDeclaration,
} from "../ir/type-converter/references.js";
import { describeLocation } from "../program/types.js";
import {
  Diagnostic,
  SourcePosition,
  errorDiagnostic,
} from "../types/diagnostic.js";
import type { GenerationRequest } from "../types/request.js";
import { Result, ok, error } from "../types/result.js";
import { ValueOptions, fieldValue } from "./metadata.js";
import { calculateBaseName, constantName } from "./naming.js";
import { findRecord, recordFromDeclarations } from "./records.js";

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export type ResolvedRecordField = {
  readonly identifier: string;
  readonly constantName: string;
  readonly constantValue: string;
  readonly type: FieldType;
  readonly position: SourcePosition;
};

export type ResolvedRecord = {
  readonly record: RecordType;
  readonly baseName: string;
  readonly fields: readonly ResolvedRecordField[];
};

type WalkContext = {
  readonly request: GenerationRequest;
  readonly checker: ts.TypeChecker;
  readonly baseName: string;
  readonly values: ValueOptions;
};

const compileCapture = (
  capture: string | undefined
): Result<RegExp | undefined> => {
  if (capture === undefined || capture === "") {
    return ok(undefined);
  }
  try {
    return ok(new RegExp(capture));
  } catch (e) {
    return error([
      errorDiagnostic(
        "FG3005",
        `Invalid capture expression ${JSON.stringify(capture)}: ${e instanceof Error ? e.message : String(e)}`
      ),
    ]);
  }
};

const resolveEmbedded = (
  field: RecordField,
  checker: ts.TypeChecker
): Result<RecordType> => {
  const node = field.typeNode;
  const resolved =
    node && (ts.isTypeReferenceNode(node) || ts.isExpressionWithTypeArguments(node))
      ? resolveReferencedDeclaration(node, checker)
      : undefined;

  if (!resolved) {
    return error([
      errorDiagnostic(
        "FG3007",
        `Cannot resolve embedded type ${field.identifier}`,
        field.position
      ),
    ]);
  }

  const records = recordFromDeclarations(
    declaredTypeName(resolved.symbol, resolved.declaration) ?? field.identifier,
    resolved.symbol.declarations ?? [resolved.declaration]
  );
  if (!records.ok) {
    return error([
      errorDiagnostic(
        "FG3007",
        `Embedded type ${field.identifier} is not a record`,
        field.position
      ),
    ]);
  }
  return records;
};

/**
 * Resolve one record level. `visiting` holds the records on the current
 * embedding path.
 */
const walkRecord = (
  record: RecordType,
  context: WalkContext,
  visiting: ReadonlySet<ts.Node>
): Result<readonly ResolvedRecordField[]> => {
  const topLevel: ResolvedRecordField[] = [];
  const embedded: ResolvedRecordField[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const field of record.fields) {
    if (!context.request.includeUnexportedFields && !field.isExported) {
      continue;
    }

    const value = fieldValue(
      field.identifier,
      field.metadata,
      context.values,
      field.position
    );
    if (!value.ok) {
      diagnostics.push(...value.error);
      continue;
    }
    if (value.value === "-") {
      continue;
    }

    if (field.isEmbedded) {
      const inner = resolveEmbedded(field, context.checker);
      if (!inner.ok) {
        diagnostics.push(...inner.error);
        continue;
      }
      if (visiting.has(inner.value.declaration)) {
        diagnostics.push(
          errorDiagnostic(
            "FG3007",
            `Circular embedding: ${record.name} embeds ${inner.value.name}`,
            field.position
          )
        );
        continue;
      }

      const innerFields = walkRecord(
        inner.value,
        context,
        new Set([...visiting, inner.value.declaration])
      );
      if (innerFields.ok) {
        embedded.push(...innerFields.value);
      } else {
        diagnostics.push(...innerFields.error);
      }
      continue;
    }

    const identifier = field.identifier.replace(/^#/, "");
    if (!IDENTIFIER_PATTERN.test(identifier)) {
      diagnostics.push(
        errorDiagnostic(
          "FG3006",
          `Field name ${JSON.stringify(field.identifier)} of ${record.name} cannot form an identifier`,
          field.position
        )
      );
      continue;
    }

    const name = constantName(context.baseName, identifier);
    const clash = topLevel.find((other) => other.constantName === name);
    if (clash) {
      diagnostics.push(
        errorDiagnostic(
          "FG3008",
          `Fields ${clash.identifier} and ${field.identifier} of ${record.name} both generate ${name}`,
          field.position
        )
      );
      continue;
    }

    topLevel.push({
      identifier: field.identifier,
      constantName: name,
      constantValue: value.value,
      type: convertFieldType(field.typeNode, context.checker),
      position: field.position,
    });
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  // Outer fields shadow embedded ones; among embeddings the first wins.
  const seen = new Set(topLevel.map((field) => field.constantName));
  const fields = [...topLevel];
  for (const field of embedded) {
    if (!seen.has(field.constantName)) {
      seen.add(field.constantName);
      fields.push(field);
    }
  }

  return ok(fields);
};

/**
 * Resolve the fields a request generates constants for
 */
export const resolveRecordFields = (
  catalog: Catalog,
  request: GenerationRequest
): Result<ResolvedRecord> => {
  const unit = lookupUnit(catalog, request.sourceLocation);
  if (!unit) {
    return error([
      errorDiagnostic(
        "FG3001",
        `Source unit ${describeLocation(request.sourceLocation)} was not loaded`
      ),
    ]);
  }

  const record = findRecord(unit, request.recordName);
  if (!record.ok) {
    return record;
  }

  const capture = compileCapture(request.metadataCapture);
  if (!capture.ok) {
    return capture;
  }

  const baseName = calculateBaseName(
    request.naming,
    record.value.name,
    request.metadataKey
  );

  const fields = walkRecord(
    record.value,
    {
      request,
      checker: unit.checker,
      baseName,
      values: { metadataKey: request.metadataKey, capture: capture.value },
    },
    new Set([record.value.declaration])
  );
  if (!fields.ok) {
    return fields;
  }

  return ok({ record: record.value, baseName, fields: fields.value });
};
