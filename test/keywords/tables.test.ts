/**
 * Tests for keyword table loading and lookup
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import { KeywordTables, loadKeywordTables } from "../../src/keywords/tables";
import { TEST_KEYWORDS, testTables } from "../utils/keywords";

describe("KeywordTables", () => {
  test("should order entries longest keyword first", () => {
    const keywords = testTables()
      .entries("ref_genome")
      .map((entry) => entry.keyword);

    expect(keywords[0]).toBe("grch38noalt");
    expect(keywords[keywords.length - 1]).toBe("hg38");
  });

  test("should lower-case keywords", () => {
    const tables = KeywordTables.fromJSON(
      { ...TEST_KEYWORDS, categories: { ...TEST_KEYWORDS.categories, center: { NIST: ["NIST"] } } },
      "inline"
    );

    expect(tables.entries("center").map((entry) => entry.keyword)).toEqual(["nist"]);
  });

  test("should report the categories each file type uses", () => {
    expect(testTables().categoriesFor("vcf")).toEqual([
      "technology",
      "center",
      "sample",
      "trio",
      "ref_genome",
      "variant_caller",
    ]);
  });

  describe("canonicalFor", () => {
    test("should map keywords and canonical names case-insensitively", () => {
      const tables = testTables();

      expect(tables.canonicalFor("sample", "NA24385")).toBe("HG002");
      expect(tables.canonicalFor("sample", "hg002")).toBe("HG002");
      expect(tables.canonicalFor("aligner", " BWA ")).toBe("bwa");
    });

    test("should return undefined for unknown or empty values", () => {
      const tables = testTables();

      expect(tables.canonicalFor("sample", "NA99999")).toBeUndefined();
      expect(tables.canonicalFor("sample", "")).toBeUndefined();
    });
  });

  describe("fromJSON", () => {
    test("should reject an unknown category", () => {
      const data = {
        ...TEST_KEYWORDS,
        categories: { ...TEST_KEYWORDS.categories, tissue: { Blood: ["blood"] } },
      };

      expect(() => KeywordTables.fromJSON(data, "inline")).toThrow(ValidationError);
    });

    test("should reject an empty keyword", () => {
      const data = {
        ...TEST_KEYWORDS,
        categories: { ...TEST_KEYWORDS.categories, center: { NIST: [" "] } },
      };

      expect(() => KeywordTables.fromJSON(data, "inline")).toThrow(ValidationError);
    });

    test("should reject a file type naming an undefined category", () => {
      const categories = Object.fromEntries(
        Object.entries(TEST_KEYWORDS.categories).filter(([name]) => name !== "aligner")
      );

      expect(() => KeywordTables.fromJSON({ ...TEST_KEYWORDS, categories }, "inline")).toThrow(
        ValidationError
      );
    });

    test("should reject data of the wrong shape", () => {
      expect(() => KeywordTables.fromJSON({ categories: [] }, "inline")).toThrow(ValidationError);
    });
  });
});

describe("loadKeywordTables", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "readtrail-keywords-"));
    await writeFile(join(dir, "custom.json"), JSON.stringify(TEST_KEYWORDS));
    await writeFile(join(dir, "broken.json"), "{ not json");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("should load the bundled tables", async () => {
    const tables = await loadKeywordTables();

    expect(tables.canonicalFor("sample", "NA12878")).toBe("HG001");
    expect(tables.canonicalFor("technology", "PromethION")).toBe("OxfordNanopore");
    expect(tables.categoriesFor("fastq")).toEqual(["technology", "center", "sample", "trio"]);
  });

  test("should load a custom file", async () => {
    const tables = await loadKeywordTables(join(dir, "custom.json"));

    expect(tables.canonicalFor("ref_genome", "grch38noalt")).toBe("GRCh38-noalt");
  });

  test("should fail on a missing file", async () => {
    await expect(loadKeywordTables(join(dir, "absent.json"))).rejects.toBeInstanceOf(FileError);
  });

  test("should fail on invalid JSON", async () => {
    await expect(loadKeywordTables(join(dir, "broken.json"))).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
