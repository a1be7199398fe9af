/**
 * Unit tests for priority table validation and loading
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  PriorityConfigValidationError,
  validatePriorityConfigRaw,
} from "@/utils";
import { loadPriorityTable } from "@/config";
import { DEFAULT_PRIORITY_TABLE } from "@/constants";

const VALID = {
  version: "1",
  projectTypes: ["MGX", "OPS"],
  solutionTypes: ["FIN", "RAP"],
};

describe("validatePriorityConfigRaw", () => {
  it("should accept a valid table", () => {
    expect(validatePriorityConfigRaw(VALID)).toEqual(VALID);
  });

  it("should reject a non-object", () => {
    expect(() => validatePriorityConfigRaw(["MGX"])).toThrow(
      "Priority config validation failed: Priority config must be an object",
    );
  });

  it("should reject a missing version", () => {
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, version: undefined }),
    ).toThrow("version must be a string, got undefined");
  });

  it("should reject an empty list", () => {
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, solutionTypes: [] }),
    ).toThrow("solutionTypes cannot be empty");
  });

  it("should reject a list that is not an array", () => {
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, projectTypes: "MGX" }),
    ).toThrow("projectTypes must be an array, got string");
  });

  it("should reject malformed codes", () => {
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, projectTypes: ["MGX", "mgx"] }),
    ).toThrow(PriorityConfigValidationError);
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, solutionTypes: ["FINAL"] }),
    ).toThrow('solutionTypes[0] must be 3 upper-case letters or digits, got "FINAL"');
  });

  it("should reject duplicate codes", () => {
    expect(() =>
      validatePriorityConfigRaw({ ...VALID, projectTypes: ["MGX", "MGX"] }),
    ).toThrow('Duplicate code in projectTypes: "MGX"');
  });
});

describe("loadPriorityTable", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("should load the bundled table", () => {
    expect(loadPriorityTable()).toEqual(DEFAULT_PRIORITY_TABLE);
  });

  it("should load a table from an absolute path", () => {
    tempDir = mkdtempSync(join(tmpdir(), "priorities-"));
    const filePath = join(tempDir, "priorities.json");
    writeFileSync(filePath, JSON.stringify({ ...VALID, version: "2" }));

    expect(loadPriorityTable(filePath)).toEqual({
      projectTypes: ["MGX", "OPS"],
      solutionTypes: ["FIN", "RAP"],
    });
  });

  it("should fail on malformed JSON", () => {
    tempDir = mkdtempSync(join(tmpdir(), "priorities-"));
    const filePath = join(tempDir, "priorities.json");
    writeFileSync(filePath, "{ not json");

    expect(() => loadPriorityTable(filePath)).toThrow(SyntaxError);
  });

  it("should fail on a missing file", () => {
    expect(() => loadPriorityTable("data/does-not-exist.json")).toThrow();
  });
});
