/**
 * Tests for output assembly
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import ts from "typescript";
import type { Catalog, GenerationRequest } from "@fieldgen/frontend";
import {
  Fixture,
  RequestOverrides,
  createFixture,
  fixtureRequest,
  loadFixtureCatalog,
} from "@fieldgen/frontend/testing";
import { assemble } from "./assembler.js";

const PERSON = `
import type { Address } from "./address.js";

export interface Person {
  /** @db full_name */
  FullName: string;
  /** @db age */
  Age: number;
  /** @db - */
  Password: string;
}

export interface Resident {
  /** @db full_name */
  FullName: string;
  /** @db home */
  Home: Address | null;
}
`;

const ADDRESS = `
export interface Address {
  street: string;
}
`;

const HEADER = [
  "// Code generated by fieldgen; DO NOT EDIT.",
  "// Source records: Person",
  "",
  "/** @module out */",
  "",
];

const DB_COL: RequestOverrides = {
  metadataKey: "db",
  naming: { prefix: "DBCol", exported: true },
};

const parseErrors = (text: string): readonly string[] =>
  (
    ts.transpileModule(text, {
      reportDiagnostics: true,
      compilerOptions: { target: ts.ScriptTarget.ES2022 },
    }).diagnostics ?? []
  ).map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));

describe("Assembler", () => {
  let fixture: Fixture;
  let catalog: Catalog;

  before(async () => {
    fixture = createFixture({ "person.ts": PERSON, "address.ts": ADDRESS });
    catalog = await loadFixtureCatalog(fixture);
  });

  after(() => fixture.cleanup());

  const request = (
    recordName: string,
    overrides: RequestOverrides = {}
  ): GenerationRequest => fixtureRequest(fixture, recordName, overrides);

  const textOf = (requests: readonly GenerationRequest[]): string => {
    const result = assemble(catalog, requests);
    if (!result.ok) {
      throw new Error(result.error.map((d) => d.message).join("\n"));
    }
    const [artifact] = result.value;
    if (!artifact) {
      throw new Error("no artifact");
    }
    return artifact.text;
  };

  it("should emit plain constants without a type declaration", () => {
    const text = textOf([request("Person", DB_COL)]);

    expect(text).to.equal(
      [
        ...HEADER,
        "// Constants generated from the Person record fields",
        'export const DBColFullName = "full_name";',
        'export const DBColAge = "age";',
        "",
      ].join("\n")
    );
    expect(parseErrors(text)).to.deep.equal([]);
  });

  it("should emit a typed class with an enumeration helper", () => {
    const text = textOf([
      request("Person", {
        ...DB_COL,
        style: "typed",
        naming: { prefix: "DBCol", exported: true, enumerate: true },
      }),
    ]);

    expect(text).to.equal(
      [
        ...HEADER,
        "/** DBCol is a strong type generated from Person. Its related constants use it. */",
        "export class DBCol {",
        "  constructor(readonly value: string) {}",
        "",
        "  toString(): string {",
        "    return this.value;",
        "  }",
        "",
        "  /** Every value generated from Person, in field order */",
        "  all(): readonly string[] {",
        '    return ["full_name", "age"];',
        "  }",
        "}",
        "",
        "// Constants generated from the Person record fields",
        'export const DBColFullName: DBCol = new DBCol("full_name");',
        'export const DBColAge: DBCol = new DBCol("age");',
        "",
      ].join("\n")
    );
    expect(parseErrors(text)).to.deep.equal([]);
  });

  it("should emit an alias without export when not exported", () => {
    const text = textOf([
      request("Person", { metadataKey: "db", style: "alias" }),
    ]);

    expect(text).to.equal(
      [
        ...HEADER,
        "/** dbField is a strong type generated from Person. Its related constants use it. */",
        "type dbField = string;",
        "",
        "// Constants generated from the Person record fields",
        'const dbFieldFullName: dbField = "full_name";',
        'const dbFieldAge: dbField = "age";',
        "",
      ].join("\n")
    );
  });

  it("should list values in a constant when enumerating without a style", () => {
    const text = textOf([
      request("Person", {
        ...DB_COL,
        naming: { prefix: "DBCol", exported: true, enumerate: true },
      }),
    ]);

    expect(text.endsWith(
      [
        'export const DBColAge = "age";',
        "",
        "/** Every value generated from Person, in field order */",
        'export const DBColAll: readonly string[] = ["full_name", "age"];',
        "",
      ].join("\n")
    )).to.equal(true);
  });

  it("should import field types for the generic style", () => {
    const text = textOf([
      request("Resident", { ...DB_COL, style: "generic" }),
    ]);

    expect(text).to.equal(
      [
        "// Code generated by fieldgen; DO NOT EDIT.",
        "// Source records: Resident",
        "",
        "/** @module out */",
        "",
        'import type { Address } from "../address.js";',
        "",
        "/** DBCol is a strong type generated from Resident. Its related constants use it. */",
        "export class DBCol<T> {",
        "  protected declare readonly __type?: T;",
        "",
        "  constructor(readonly value: string) {}",
        "",
        "  toString(): string {",
        "    return this.value;",
        "  }",
        "}",
        "",
        "// Constants generated from the Resident record fields",
        'export const DBColFullName: DBCol<string> = new DBCol<string>("full_name");',
        'export const DBColHome: DBCol<Address | null> = new DBCol<Address | null>("home");',
        "",
      ].join("\n")
    );
    expect(parseErrors(text)).to.deep.equal([]);
  });

  it("should merge requests that target one file in request order", () => {
    const result = assemble(catalog, [
      request("Person", DB_COL),
      request("Address"),
    ]);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    expect(result.value).to.have.length(1);
    const [artifact] = result.value;
    expect(artifact?.file).to.equal(
      path.join(fixture.directory, "out", "fields.generated.ts")
    );
    expect(artifact?.module).to.equal("out");
    expect(artifact?.text).to.equal(
      [
        "// Code generated by fieldgen; DO NOT EDIT.",
        "// Source records: Person, Address",
        "",
        "/** @module out */",
        "",
        "// Constants generated from the Person record fields",
        'export const DBColFullName = "full_name";',
        'export const DBColAge = "age";',
        "",
        "// Constants generated from the Address record fields",
        'const fieldStreet = "street";',
        "",
      ].join("\n")
    );
  });

  it("should emit one artifact per output file", () => {
    const other = path.join(fixture.directory, "other", "address.generated.ts");
    const result = assemble(catalog, [
      request("Person", DB_COL),
      request("Address", { outputTarget: { file: other, module: "other" } }),
    ]);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.map((a) => [a.file, a.module])).to.deep.equal([
      [path.join(fixture.directory, "out", "fields.generated.ts"), "out"],
      [other, "other"],
    ]);
  });

  it("should produce identical text on every run", () => {
    const requests = [
      request("Resident", { ...DB_COL, style: "generic" }),
      request("Person", { metadataKey: "db", style: "typed" }),
    ];
    expect(textOf(requests)).to.equal(textOf(requests));
  });

  it("should reject conflicting modules before resolving anything", () => {
    const file = path.join(fixture.directory, "out", "shared.generated.ts");
    const result = assemble(catalog, [
      request("Person", { outputTarget: { file, module: "alpha" } }),
      request("Missing", { outputTarget: { file, module: "beta" } }),
    ]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "FG5001",
        `Cannot use both "alpha" and "beta" module identifiers within output file ${file}`,
      ],
    ]);
  });

  it("should reject two records declaring the same constant in one file", () => {
    const result = assemble(catalog, [
      request("Person", DB_COL),
      request("Resident", DB_COL),
    ]);
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "FG5003",
        `DBColFullName is declared by both Person and Resident in ${path.join(fixture.directory, "out", "fields.generated.ts")}`,
      ],
    ]);
  });

  it("should reject enumeration with the alias style", () => {
    const result = assemble(catalog, [
      request("Person", {
        style: "alias",
        naming: { enumerate: true },
      }),
    ]);
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.code)).to.deep.equal(["FG5002"]);
  });

  it("should report fields whose types cannot be written", async () => {
    const broken = createFixture({
      "shape.ts": `
interface Hidden {
  note: string;
}

export interface Shape {
  visible: string;
  hidden: Hidden;
  meta: { a: string };
}
`,
    });

    try {
      const brokenCatalog = await loadFixtureCatalog(broken);
      const generic = assemble(brokenCatalog, [
        fixtureRequest(broken, "Shape", { style: "generic" }),
      ]);
      expect(generic.ok).to.equal(false);
      if (!generic.ok) {
        expect(generic.error.map((d) => [d.code, d.message])).to.deep.equal([
          [
            "FG4002",
            `Field hidden of Shape: Type Hidden is not exported from ${path.join(broken.directory, "shape.ts")}`,
          ],
          [
            "FG4001",
            "Field meta of Shape: Unsupported type: inline object type (declare it as a named interface)",
          ],
        ]);
      }

      const typed = assemble(brokenCatalog, [
        fixtureRequest(broken, "Shape", { style: "typed" }),
      ]);
      expect(typed.ok).to.equal(true);
    } finally {
      broken.cleanup();
    }
  });
});

describe("Assembler imports", () => {
  let fixture: Fixture;
  let catalog: Catalog;

  before(async () => {
    fixture = createFixture({
      "tag.ts": "export default interface Tag {\n  name: string;\n}\n",
      "a.ts": "export interface Id {\n  a: string;\n}\n",
      "b.ts": "export interface Id {\n  b: number;\n}\n",
      "records.ts": `
import type Tag from "./tag.js";
import type { Id as AId } from "./a.js";
import type { Id as BId } from "./b.js";

export interface Tagged {
  tag: Tag;
}

export interface Two {
  first: AId;
  second: BId;
}

export interface Listed {
  all: string;
}
`,
    });
    catalog = await loadFixtureCatalog(fixture);
  });

  after(() => fixture.cleanup());

  const genericText = (recordName: string): string => {
    const result = assemble(catalog, [
      fixtureRequest(fixture, recordName, { style: "generic" }),
    ]);
    if (!result.ok) {
      throw new Error(result.error.map((d) => d.message).join("\n"));
    }
    return result.value[0]?.text ?? "";
  };

  const GENERIC_FIELD = [
    "class field<T> {",
    "  protected declare readonly __type?: T;",
    "",
    "  constructor(readonly value: string) {}",
    "",
    "  toString(): string {",
    "    return this.value;",
    "  }",
    "}",
  ];

  it("should import a default-exported type by its declared name", () => {
    const text = genericText("Tagged");

    expect(text).to.equal(
      [
        "// Code generated by fieldgen; DO NOT EDIT.",
        "// Source records: Tagged",
        "",
        "/** @module out */",
        "",
        'import type Tag from "../tag.js";',
        "",
        "/** field is a strong type generated from Tagged. Its related constants use it. */",
        ...GENERIC_FIELD,
        "",
        "// Constants generated from the Tagged record fields",
        'const fieldTag: field<Tag> = new field<Tag>("tag");',
        "",
      ].join("\n")
    );
    expect(parseErrors(text)).to.deep.equal([]);
  });

  it("should alias same-named types from different modules", () => {
    const text = genericText("Two");

    expect(text).to.equal(
      [
        "// Code generated by fieldgen; DO NOT EDIT.",
        "// Source records: Two",
        "",
        "/** @module out */",
        "",
        'import type { Id } from "../a.js";',
        'import type { Id as Id_1 } from "../b.js";',
        "",
        "/** field is a strong type generated from Two. Its related constants use it. */",
        ...GENERIC_FIELD,
        "",
        "// Constants generated from the Two record fields",
        'const fieldFirst: field<Id> = new field<Id>("first");',
        'const fieldSecond: field<Id_1> = new field<Id_1>("second");',
        "",
      ].join("\n")
    );
    expect(parseErrors(text)).to.deep.equal([]);
  });

  it("should reject a field named like the enumeration helper", () => {
    const result = assemble(catalog, [
      fixtureRequest(fixture, "Listed", { naming: { enumerate: true } }),
    ]);
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "FG5003",
        `fieldAll is declared twice by Listed in ${path.join(fixture.directory, "out", "fields.generated.ts")}`,
      ],
    ]);
  });
});
