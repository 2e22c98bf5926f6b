/**
 * Tests for metadata record construction
 */

import { describe, expect, test } from "vitest";
import { UnreadableFileError } from "../../src/errors";
import { formatRecords } from "../../src/pipeline/output";
import { buildRecord } from "../../src/pipeline/record";
import { classify } from "../../src/platforms";
import { RECORD_COLUMNS } from "../../src/types";

const entry = Object.freeze({
  index: 0,
  fileType: "bam" as const,
  filename: "HG002_NIST.bam",
  filepath: "HG002",
});

describe("buildRecord", () => {
  test("should fill every column, absent values as empty strings", () => {
    const record = buildRecord({
      entry,
      location: "https://example.org/HG002/HG002_NIST.bam",
      filename: {},
      technology: { technology: "unknown", source: "" },
    });

    expect(Object.keys(record)).toEqual([...RECORD_COLUMNS]);
    expect(record.file_type).toBe("bam");
    expect(record.filepath).toBe("HG002");
    expect(record.url).toBe("https://example.org/HG002/HG002_NIST.bam");
    expect(record.status).toBe("ok");
    expect(record.instrument).toBe("");
    expect(Object.isFrozen(record)).toBe(true);
  });

  test("should prefer header values over filename values", () => {
    const record = buildRecord({
      entry,
      location: "HG002/HG002_NIST.bam",
      filename: { sample: "HG002", center: "NIST", ref_genome: "GRCh37", trio: "AshkenazimTrio" },
      header: { sample: "HG003", ref_genome: "GRCh38", read_group: "rg1" },
      technology: { technology: "Illumina", source: "header" },
    });

    expect(record.sample).toBe("HG003");
    expect(record.center).toBe("NIST");
    expect(record.ref_genome).toBe("GRCh38");
    expect(record.trio).toBe("AshkenazimTrio");
    expect(record.read_group).toBe("rg1");
    expect(record.technology).toBe("Illumina");
    expect(record.technology_source).toBe("header");
  });

  test("should carry classification evidence and read fields", () => {
    const classification = classify(["@m64011_190830_220126/101/ccs", "@read7"]);

    const record = buildRecord({
      entry,
      location: "HG002_NIST.bam",
      filename: {},
      classification,
      technology: { technology: "PacBio", source: "content" },
    });

    expect(record.grammar).toBe("pacbio-ccs");
    expect(record.reads_sampled).toBe("2");
    expect(record.reads_matched).toBe("1");
    expect(record.zmw).toBe("101");
    expect(record.run_date).toBe("2019-08-30");
    expect(record.read_type).toBe("CCS");
  });

  test("should record the error kind and message of a failed entry", () => {
    const record = buildRecord({
      entry,
      location: "HG002_NIST.bam",
      filename: {},
      technology: { technology: "unknown", source: "" },
      error: new UnreadableFileError("HTTP 404 Not Found", "HG002_NIST.bam"),
    });

    expect(record.status).toBe("failed");
    expect(record.error_kind).toBe("UnreadableFile");
    expect(record.error).toBe("HTTP 404 Not Found");
  });
});

describe("formatRecords", () => {
  test("should quote values that need it", () => {
    const record = buildRecord({
      entry: { ...entry, filename: "odd,name.bam" },
      location: "odd,name.bam",
      filename: {},
      technology: { technology: "unknown", source: "" },
    });

    const lines = formatRecords([record]).split("\r\n");

    expect(lines).toHaveLength(3);
    expect(lines[1]?.startsWith('bam,"odd,name.bam",HG002,"odd,name.bam",ok,')).toBe(true);
    expect(lines[2]).toBe("");
  });
});
