/**
 * Record and field types (FieldType and its variants)
 */

import type ts from "typescript";
import type { SourcePosition } from "../types/diagnostic.js";

export type FieldType =
  | PrimitiveFieldType
  | LiteralFieldType
  | ReferenceFieldType
  | TypeParameterFieldType
  | ArrayFieldType
  | TupleFieldType
  | DictionaryFieldType
  | FunctionFieldType
  | UnionFieldType
  | UnsupportedFieldType;

export type PrimitiveTypeName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "object"
  | "unknown"
  | "any"
  | "never"
  | "void"
  | "null"
  | "undefined";

export type PrimitiveFieldType = {
  readonly kind: "primitiveType";
  readonly name: PrimitiveTypeName;
};

/**
 * A literal type. `text` is the literal as written in source,
 * e.g. `"active"`, `42`, `true`, `-1`.
 */
export type LiteralFieldType = {
  readonly kind: "literalType";
  readonly text: string;
};

/**
 * Where a named type is declared.
 *
 * - global: lib files and ambient declarations, usable without an import
 * - file: a module source file, imported by relative path
 * - package: a module inside node_modules, imported by package name
 */
export type ModuleOrigin =
  | { readonly kind: "global" }
  | { readonly kind: "file"; readonly path: string }
  | { readonly kind: "package"; readonly name: string };

export type ReferenceFieldType = {
  readonly kind: "referenceType";
  readonly name: string;
  readonly typeArguments: readonly FieldType[];
  readonly origin: ModuleOrigin;
  /** False when the declaring module does not export the name */
  readonly exported: boolean;
  /** Set when the type is imported as its module's default export */
  readonly defaultExport?: true;
};

/**
 * Reference to a type parameter (e.g., T in Page<T>)
 */
export type TypeParameterFieldType = {
  readonly kind: "typeParameterType";
  readonly name: string;
};

export type ArrayFieldType = {
  readonly kind: "arrayType";
  readonly elementType: FieldType;
  readonly readonly: boolean;
};

export type TupleElement = {
  readonly type: FieldType;
  readonly name?: string;
  readonly optional: boolean;
  readonly rest: boolean;
};

/**
 * Fixed-length array with per-position element types
 */
export type TupleFieldType = {
  readonly kind: "tupleType";
  readonly elements: readonly TupleElement[];
  readonly readonly: boolean;
};

/**
 * Keyed collection.
 *
 * - record: `Record<K, V>`
 * - map: `Map<K, V>`
 * - readonlyMap: `ReadonlyMap<K, V>`
 * - index: `{ [key: K]: V }`
 */
export type DictionaryFieldType = {
  readonly kind: "dictionaryType";
  readonly form: "record" | "map" | "readonlyMap" | "index";
  readonly keyType: FieldType;
  readonly valueType: FieldType;
};

export type FunctionParameter = {
  readonly name: string;
  readonly type: FieldType;
  readonly optional: boolean;
  readonly rest: boolean;
};

export type FunctionFieldType = {
  readonly kind: "functionType";
  readonly parameters: readonly FunctionParameter[];
  readonly returnType: FieldType;
};

export type UnionFieldType = {
  readonly kind: "unionType";
  readonly types: readonly FieldType[];
};

/**
 * A type shape fieldgen cannot render faithfully. Encoding fails on it.
 */
export type UnsupportedFieldType = {
  readonly kind: "unsupportedType";
  readonly description: string;
};

/**
 * One member of a record, in declaration order.
 *
 * Embedded entries stand for an `extends` heritage type or an
 * intersection member; their fields are flattened into the record.
 */
export type RecordField = {
  readonly identifier: string;
  readonly typeNode: ts.TypeNode | undefined;
  readonly metadata: readonly MetadataTag[];
  readonly isEmbedded: boolean;
  readonly isExported: boolean;
  readonly position: SourcePosition;
};

/**
 * A JSDoc tag on a field: `@db full_name` is `{ key: "db", value: "full_name" }`
 */
export type MetadataTag = {
  readonly key: string;
  readonly value: string;
};

export type RecordDeclaration =
  | ts.InterfaceDeclaration
  | ts.ClassDeclaration
  | ts.TypeAliasDeclaration;

export type RecordType = {
  readonly name: string;
  readonly declaration: RecordDeclaration;
  readonly sourceFile: ts.SourceFile;
  readonly fields: readonly RecordField[];
};
