/**
 * Tests for field type conversion
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import type ts from "typescript";
import { lookupUnit } from "../../catalog.js";
import { findRecord } from "../../resolver/records.js";
import {
  Fixture,
  createFixture,
  loadFixtureCatalog,
} from "../../testing/fixtures.js";
import { FieldType } from "../types.js";
import { convertFieldType } from "./orchestrator.js";
import { packageNameFromPath } from "./origins.js";

const SHAPES = `
import type { Address, Status } from "./address.js";
import type Tag from "./tag.js";
import type Label from "./label.js";
import type Anonymous from "./anonymous.js";

interface Hidden {
  note: string;
}

namespace Geo {
  export interface Point {
    x: number;
  }
}

export interface Shapes<T> {
  text: string;
  count: number | null;
  tags: string[];
  scores: readonly number[];
  addresses: Array<Address>;
  names: ReadonlyArray<string>;
  entry: [name: string, age?: number, ...flags: boolean[]];
  pair: readonly [string, number];
  totals: Record<string, number>;
  byId: Map<string, Address[]>;
  flags: { [key: string]: boolean };
  callback: (a: string, b?: number, ...rest: boolean[]) => void;
  kind: "x";
  offset: -1;
  big: 10n;
  home: Address;
  status: Status;
  hidden: Hidden;
  created: Date;
  value: T;
  point: Geo.Point;
  inline: { a: string };
  both: Address & Hidden;
  keys: keyof Address;
  grouped: (string | number)[];
  tag: Tag;
  label: Label;
  anonymous: Anonymous;
}
`;

const ADDRESS = `
export interface Address {
  street: string;
}

export type Status = "active" | "inactive";
`;

describe("Type conversion", () => {
  let fixture: Fixture;
  let types: ReadonlyMap<string, FieldType>;
  let checker: ts.TypeChecker;

  before(async () => {
    fixture = createFixture({
      "shapes.ts": SHAPES,
      "address.ts": ADDRESS,
      "tag.ts": "export default interface Tag {\n  name: string;\n}\n",
      "label.ts": "interface Label {\n  text: string;\n}\nexport default Label;\n",
      "anonymous.ts": "export default class {\n  id = 0;\n}\n",
    });
    const catalog = await loadFixtureCatalog(fixture);
    const unit = lookupUnit(catalog, fixture.location());
    if (!unit) throw new Error("unit not loaded");

    checker = unit.checker;
    const record = findRecord(unit, "Shapes");
    if (!record.ok) throw new Error(record.error[0]?.message);

    types = new Map(
      record.value.fields.map((field) => [
        field.identifier,
        convertFieldType(field.typeNode, unit.checker),
      ])
    );
  });

  after(() => fixture.cleanup());

  const typeOf = (name: string): FieldType | undefined => types.get(name);
  const addressFile = (): string => path.join(fixture.directory, "address.ts");

  it("should convert keywords and nullable unions", () => {
    expect(typeOf("text")).to.deep.equal({ kind: "primitiveType", name: "string" });
    expect(typeOf("count")).to.deep.equal({
      kind: "unionType",
      types: [
        { kind: "primitiveType", name: "number" },
        { kind: "primitiveType", name: "null" },
      ],
    });
  });

  it("should convert every array form", () => {
    expect(typeOf("tags")).to.deep.equal({
      kind: "arrayType",
      elementType: { kind: "primitiveType", name: "string" },
      readonly: false,
    });
    expect(typeOf("scores")).to.deep.equal({
      kind: "arrayType",
      elementType: { kind: "primitiveType", name: "number" },
      readonly: true,
    });
    expect(typeOf("names")).to.deep.equal({
      kind: "arrayType",
      elementType: { kind: "primitiveType", name: "string" },
      readonly: true,
    });

    const addresses = typeOf("addresses");
    expect(addresses?.kind).to.equal("arrayType");
    if (addresses?.kind !== "arrayType") return;
    expect(addresses.elementType).to.deep.equal({
      kind: "referenceType",
      name: "Address",
      typeArguments: [],
      origin: { kind: "file", path: addressFile() },
      exported: true,
    });
  });

  it("should keep tuple element names and markers", () => {
    expect(typeOf("entry")).to.deep.equal({
      kind: "tupleType",
      elements: [
        {
          type: { kind: "primitiveType", name: "string" },
          name: "name",
          optional: false,
          rest: false,
        },
        {
          type: { kind: "primitiveType", name: "number" },
          name: "age",
          optional: true,
          rest: false,
        },
        {
          type: {
            kind: "arrayType",
            elementType: { kind: "primitiveType", name: "boolean" },
            readonly: false,
          },
          name: "flags",
          optional: false,
          rest: true,
        },
      ],
      readonly: false,
    });

    const pair = typeOf("pair");
    expect(pair?.kind).to.equal("tupleType");
    if (pair?.kind !== "tupleType") return;
    expect(pair.readonly).to.equal(true);
    expect(pair.elements).to.have.length(2);
  });

  it("should convert dictionaries by form", () => {
    expect(typeOf("totals")).to.deep.equal({
      kind: "dictionaryType",
      form: "record",
      keyType: { kind: "primitiveType", name: "string" },
      valueType: { kind: "primitiveType", name: "number" },
    });
    expect(typeOf("flags")).to.deep.equal({
      kind: "dictionaryType",
      form: "index",
      keyType: { kind: "primitiveType", name: "string" },
      valueType: { kind: "primitiveType", name: "boolean" },
    });

    const byId = typeOf("byId");
    expect(byId?.kind).to.equal("dictionaryType");
    if (byId?.kind !== "dictionaryType") return;
    expect(byId.form).to.equal("map");
    expect(byId.valueType.kind).to.equal("arrayType");
  });

  it("should convert function types", () => {
    expect(typeOf("callback")).to.deep.equal({
      kind: "functionType",
      parameters: [
        {
          name: "a",
          type: { kind: "primitiveType", name: "string" },
          optional: false,
          rest: false,
        },
        {
          name: "b",
          type: { kind: "primitiveType", name: "number" },
          optional: true,
          rest: false,
        },
        {
          name: "rest",
          type: {
            kind: "arrayType",
            elementType: { kind: "primitiveType", name: "boolean" },
            readonly: false,
          },
          optional: false,
          rest: true,
        },
      ],
      returnType: { kind: "primitiveType", name: "void" },
    });
  });

  it("should keep literal text", () => {
    expect(typeOf("kind")).to.deep.equal({ kind: "literalType", text: '"x"' });
    expect(typeOf("offset")).to.deep.equal({ kind: "literalType", text: "-1" });
    expect(typeOf("big")).to.deep.equal({ kind: "literalType", text: "10n" });
  });

  it("should resolve named types through imports", () => {
    expect(typeOf("status")).to.deep.equal({
      kind: "referenceType",
      name: "Status",
      typeArguments: [],
      origin: { kind: "file", path: addressFile() },
      exported: true,
    });
  });

  it("should mark types their module does not export", () => {
    expect(typeOf("hidden")).to.deep.equal({
      kind: "referenceType",
      name: "Hidden",
      typeArguments: [],
      origin: { kind: "file", path: path.join(fixture.directory, "shapes.ts") },
      exported: false,
    });
  });

  it("should name default exports after their declaration", () => {
    expect(typeOf("tag")).to.deep.equal({
      kind: "referenceType",
      name: "Tag",
      typeArguments: [],
      origin: { kind: "file", path: path.join(fixture.directory, "tag.ts") },
      exported: true,
      defaultExport: true,
    });
    expect(typeOf("label")).to.deep.equal({
      kind: "referenceType",
      name: "Label",
      typeArguments: [],
      origin: { kind: "file", path: path.join(fixture.directory, "label.ts") },
      exported: true,
      defaultExport: true,
    });
  });

  it("should not name an anonymous default export", () => {
    expect(typeOf("anonymous")).to.deep.equal({
      kind: "unsupportedType",
      description: "anonymous default export Anonymous",
    });
  });

  it("should treat lib types as global", () => {
    expect(typeOf("created")).to.deep.equal({
      kind: "referenceType",
      name: "Date",
      typeArguments: [],
      origin: { kind: "global" },
      exported: true,
    });
  });

  it("should convert type parameters", () => {
    expect(typeOf("value")).to.deep.equal({ kind: "typeParameterType", name: "T" });
  });

  it("should unwrap parenthesized element types", () => {
    expect(typeOf("grouped")).to.deep.equal({
      kind: "arrayType",
      elementType: {
        kind: "unionType",
        types: [
          { kind: "primitiveType", name: "string" },
          { kind: "primitiveType", name: "number" },
        ],
      },
      readonly: false,
    });
  });

  it("should describe shapes it cannot render", () => {
    expect(typeOf("point")).to.deep.equal({
      kind: "unsupportedType",
      description: "namespaced type Geo.Point",
    });
    expect(typeOf("inline")).to.deep.equal({
      kind: "unsupportedType",
      description: "inline object type (declare it as a named interface)",
    });
    expect(typeOf("both")).to.deep.equal({
      kind: "unsupportedType",
      description: "intersection type",
    });
    expect(typeOf("keys")).to.deep.equal({
      kind: "unsupportedType",
      description: "keyof operator",
    });
  });

  it("should report a missing annotation", () => {
    expect(convertFieldType(undefined, checker)).to.deep.equal({
      kind: "unsupportedType",
      description: "field without a type annotation",
    });
  });
});

describe("packageNameFromPath", () => {
  it("should read plain and scoped package names", () => {
    expect(packageNameFromPath("/p/node_modules/zod/lib/index.d.ts")).to.equal("zod");
    expect(
      packageNameFromPath("/p/node_modules/@scope/pkg/dist/types.d.ts")
    ).to.equal("@scope/pkg");
  });

  it("should map @types packages to the package they describe", () => {
    expect(packageNameFromPath("/p/node_modules/@types/node/fs.d.ts")).to.equal(
      "node"
    );
    expect(
      packageNameFromPath("/p/node_modules/@types/babel__core/index.d.ts")
    ).to.equal("@babel/core");
  });

  it("should use the innermost node_modules directory", () => {
    expect(
      packageNameFromPath("/p/node_modules/a/node_modules/b/index.d.ts")
    ).to.equal("b");
  });

  it("should return undefined outside node_modules", () => {
    expect(packageNameFromPath("/p/src/types.ts")).to.equal(undefined);
  });
});
