/**
 * Tests for the BAM header and read-name reader
 */

import { describe, expect, test } from "vitest";
import { BamError } from "../../src/errors";
import {
  deriveHeaderFields,
  parseSamHeaderText,
  readBam,
  refGenomeFromReferences,
  technologyFromPlatform,
} from "../../src/formats/bam";
import { rechunk } from "../../src/io/stream-utils";
import { alignmentRecord, encodeBam } from "../utils/bam";
import { testTables } from "../utils/keywords";
import { chunkedStream } from "../utils/streams";

const HEADER = [
  "@HD\tVN:1.6\tSO:coordinate",
  "@SQ\tSN:chr1\tLN:248956422",
  "@RG\tID:rg1\tSM:NA24385\tPL:ILLUMINA\tCN:NIST\tPM:HiSeq2500\tLB:lib1\tDT:2016-05-01",
  "@RG\tID:rg2\tSM:NA24385\tPL:ILLUMINA",
  "@PG\tID:samtools\tPN:samtools",
  "@PG\tID:bwa\tPN:bwa\tVN:0.7.17",
  "@CO\tfree text\there",
  "",
].join("\n");

const REFERENCES = [
  { name: "chr1", length: 248956422 },
  { name: "chr2", length: 242193529 },
];

const NAMES = [
  "A00123:8:HFWT2DSXX:1:1101:10004:1000",
  "A00123:8:HFWT2DSXX:1:1101:10022:1000",
  "A00123:8:HFWT2DSXX:1:1101:10040:1016",
];

describe("readBam", () => {
  test("should read the header, references and the first read names", async () => {
    const { stream, state } = chunkedStream([
      encodeBam(HEADER, REFERENCES, []),
      ...NAMES.map(alignmentRecord),
    ]);

    const bam = await readBam(stream, { maxReads: 2 });

    expect(bam.headerText).toBe(HEADER);
    expect(bam.references).toEqual(REFERENCES);
    expect(bam.readNames).toEqual([`@${NAMES[0]}`, `@${NAMES[1]}`]);
    expect(bam.header.map((line) => line.type)).toEqual(["HD", "SQ", "RG", "RG", "PG", "PG", "CO"]);
    expect(state.cancelled).toBe(true);
  });

  test("should read every name when maxReads is -1", async () => {
    const { stream, state } = chunkedStream([encodeBam(HEADER, REFERENCES, NAMES)]);

    const bam = await readBam(stream, { maxReads: -1 });

    expect(bam.readNames).toHaveLength(3);
    expect(state.cancelled).toBe(false);
  });

  test("should read values split across small chunks", async () => {
    const { stream } = chunkedStream([encodeBam(HEADER, REFERENCES, NAMES)]);

    const bam = await readBam(stream.pipeThrough(rechunk(5)), { maxReads: -1 });

    expect(bam.references).toEqual(REFERENCES);
    expect(bam.readNames).toEqual(NAMES.map((name) => `@${name}`));
  });

  test("should accept a file with no alignments", async () => {
    const { stream } = chunkedStream([encodeBam("@HD\tVN:1.6\n", [], [])]);

    const bam = await readBam(stream, { maxReads: 5 });

    expect(bam.readNames).toEqual([]);
    expect(bam.references).toEqual([]);
  });

  test("should reject a bad magic number", async () => {
    const { stream } = chunkedStream(["@r1\nACGT\n+\nIIII\n"]);

    await expect(readBam(stream, { maxReads: 1 })).rejects.toBeInstanceOf(BamError);
  });

  test("should reject a truncated header", async () => {
    const bytes = encodeBam(HEADER, REFERENCES, []);
    const { stream } = chunkedStream([bytes.subarray(0, 20)]);

    await expect(readBam(stream, { maxReads: 1 })).rejects.toBeInstanceOf(BamError);
  });

  test("should reject an impossible alignment block size", async () => {
    const bytes = encodeBam("", [], []);
    const { stream } = chunkedStream([bytes, new Uint8Array([4, 0, 0, 0])]);

    await expect(readBam(stream, { maxReads: 1 })).rejects.toBeInstanceOf(BamError);
  });
});

describe("parseSamHeaderText", () => {
  test("should keep the first value of a repeated tag", () => {
    const [line] = parseSamHeaderText("@RG\tID:a\tSM:first\tSM:second");

    expect(line).toEqual({ type: "RG", tags: { ID: "a", SM: "first" } });
  });

  test("should keep comment text whole", () => {
    expect(parseSamHeaderText("@CO\tfree text\there")).toEqual([
      { type: "CO", tags: { comment: "free text\there" } },
    ]);
  });

  test("should skip unknown record types and stray lines", () => {
    expect(parseSamHeaderText("@XY\tID:1\nnot a header\r\n@HD\tVN:1.6")).toEqual([
      { type: "HD", tags: { VN: "1.6" } },
    ]);
  });
});

describe("technologyFromPlatform", () => {
  test("should normalize platform names", () => {
    expect(technologyFromPlatform("illumina")).toBe("Illumina");
    expect(technologyFromPlatform("Oxford Nanopore")).toBe("OxfordNanopore");
    expect(technologyFromPlatform("ion-torrent")).toBe("IonTorrent");
    expect(technologyFromPlatform("DNBSEQ")).toBe("BGI");
  });

  test("should return undefined for platforms it does not know", () => {
    expect(technologyFromPlatform("CAPILLARY")).toBeUndefined();
  });
});

describe("refGenomeFromReferences", () => {
  test("should name the assembly from the length of chromosome 1", () => {
    expect(refGenomeFromReferences([{ name: "1", length: 249250621 }])).toBe("GRCh37");
    expect(refGenomeFromReferences([{ name: "chr1", length: 248387328 }])).toBe("CHM13");
    expect(refGenomeFromReferences([{ name: "chr1", length: 1000 }])).toBeUndefined();
    expect(refGenomeFromReferences([])).toBeUndefined();
  });
});

describe("deriveHeaderFields", () => {
  const tables = testTables();

  test("should derive every header field", () => {
    const fields = deriveHeaderFields(parseSamHeaderText(HEADER), REFERENCES, tables);

    expect(fields).toEqual({
      sample: "HG002",
      center: "NIST",
      technology: "Illumina",
      platform_model: "HiSeq2500",
      library: "lib1",
      date: "2016-05-01",
      read_group: "rg1;rg2",
      aligner: "bwa",
      ref_genome: "GRCh38",
    });
  });

  test("should fall back to assembly names on @SQ lines", () => {
    const byName = parseSamHeaderText("@SQ\tSN:1\tLN:1000\tAS:hs37d5");
    const byUrl = parseSamHeaderText("@SQ\tSN:chr1\tLN:1000\tUR:file:/refs/GRCh38_full_analysis_set.fa");

    expect(deriveHeaderFields(byName, [], tables).ref_genome).toBe("GRCh37");
    expect(deriveHeaderFields(byUrl, [], tables).ref_genome).toBe("GRCh38");
  });

  test("should keep unknown samples and aligners as written", () => {
    const lines = parseSamHeaderText("@RG\tID:x\tSM:patient7\n@PG\tID:align\tPN:myaligner");

    expect(deriveHeaderFields(lines, [], tables)).toEqual({
      sample: "patient7",
      read_group: "x",
      aligner: "myaligner",
    });
  });

  test("should write a read group timestamp as a date", () => {
    const lines = parseSamHeaderText("@RG\tID:x\tDT:2016-05-01T14:30:00+0200");

    expect(deriveHeaderFields(lines, [], tables).date).toBe("2016-05-01");
  });

  test("should return no fields for an empty header", () => {
    expect(deriveHeaderFields([], [], tables)).toEqual({});
  });
});
