/**
 * Tests for tsconfig project discovery
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import { findProjectCandidates, selectProject } from "./projects.js";
import { selectRootFiles } from "./creation.js";

const DIR = path.join("/work", "models");

describe("Projects", () => {
  describe("findProjectCandidates", () => {
    it("should name every tsconfig in the directory", () => {
      const candidates = findProjectCandidates(DIR, [
        "tsconfig.test.json",
        "person.ts",
        "tsconfig.json",
      ]);
      expect(candidates).to.deep.equal([
        { name: "default", configPath: path.join(DIR, "tsconfig.json") },
        { name: "test", configPath: path.join(DIR, "tsconfig.test.json") },
      ]);
    });
  });

  describe("selectProject", () => {
    const candidates = [
      { name: "default", configPath: path.join(DIR, "tsconfig.json") },
      { name: "test", configPath: path.join(DIR, "tsconfig.test.json") },
    ];

    it("should use a single candidate whatever name was asked for", () => {
      const [only] = candidates;
      if (!only) return;
      expect(selectProject(DIR, [only], "other")).to.deep.equal({
        ok: true,
        value: only,
      });
    });

    it("should narrow several candidates by name", () => {
      expect(selectProject(DIR, candidates, "test")).to.deep.equal({
        ok: true,
        value: candidates[1],
      });
    });

    it("should fail when the name matches nothing", () => {
      const result = selectProject(DIR, candidates, "lib");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FG2003");
      expect(result.error[0]?.message).to.equal(
        `Failed to load ${DIR}: expected to find 1 project, found 0`
      );
      expect(result.error[0]?.hint).to.equal(
        'No project named "lib" among default, test'
      );
    });
  });

  describe("selectRootFiles", () => {
    const files = [
      "b.ts",
      "a.tsx",
      "types.d.ts",
      "a.test.ts",
      "c.spec.mts",
      "readme.md",
      "tool.cts",
    ];

    it("should keep sources and drop declarations and tests", () => {
      expect(selectRootFiles(DIR, files, false)).to.deep.equal([
        path.join(DIR, "a.tsx"),
        path.join(DIR, "b.ts"),
        path.join(DIR, "tool.cts"),
      ]);
    });

    it("should add tests when asked", () => {
      expect(selectRootFiles(DIR, files, true)).to.deep.equal([
        path.join(DIR, "a.test.ts"),
        path.join(DIR, "a.tsx"),
        path.join(DIR, "b.ts"),
        path.join(DIR, "c.spec.mts"),
        path.join(DIR, "tool.cts"),
      ]);
    });
  });
});
