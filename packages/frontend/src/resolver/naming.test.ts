/**
 * Tests for constant and type naming
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  calculateBaseName,
  constantName,
  defaultOutputFileName,
} from "./naming.js";
import type { NamingOptions } from "../types/request.js";

const naming = (overrides: Partial<NamingOptions> = {}): NamingOptions => ({
  includeRecordName: false,
  exported: false,
  enumerate: false,
  ...overrides,
});

describe("Naming", () => {
  describe("calculateBaseName", () => {
    it("should upper-case the key and the first letter when exported", () => {
      expect(calculateBaseName(naming({ exported: true }), "Person", "db")).to.equal(
        "DBField"
      );
    });

    it("should lower-case the key when neither exported nor qualified", () => {
      expect(calculateBaseName(naming(), "Person", "DB")).to.equal("dbField");
    });

    it("should include the record name with an upper-cased key", () => {
      expect(
        calculateBaseName(naming({ includeRecordName: true }), "Person", "db")
      ).to.equal("personDBField");
      expect(
        calculateBaseName(
          naming({ includeRecordName: true, exported: true }),
          "person",
          "json"
        )
      ).to.equal("PersonJSONField");
    });

    it("should use an explicit prefix as given, fixing only the first letter", () => {
      expect(
        calculateBaseName(naming({ prefix: "DBCol", exported: true }), "Person", "db")
      ).to.equal("DBCol");
      expect(
        calculateBaseName(naming({ prefix: "DBCol" }), "Person", "db")
      ).to.equal("dBCol");
    });

    it("should fall back to Field without a metadata key", () => {
      expect(calculateBaseName(naming({ exported: true }), "Person")).to.equal(
        "Field"
      );
      expect(calculateBaseName(naming(), "Person")).to.equal("field");
    });
  });

  describe("constantName", () => {
    it("should capitalize the identifier after the base name", () => {
      expect(constantName("DBCol", "fullName")).to.equal("DBColFullName");
      expect(constantName("DBCol", "FullName")).to.equal("DBColFullName");
    });

    it("should drop the private name marker", () => {
      expect(constantName("field", "#secret")).to.equal("fieldSecret");
    });
  });

  describe("defaultOutputFileName", () => {
    it("should join the lower-cased record and base names", () => {
      expect(defaultOutputFileName("Person", "DBCol")).to.equal(
        "person_dbcol.generated.ts"
      );
    });
  });
});
