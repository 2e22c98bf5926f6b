/**
 * Tests for the technology classifier
 */

import { describe, expect, test } from "vitest";
import { ExtractionFailureError } from "../../src/errors";
import { classify, GRAMMARS, patternGrammar } from "../../src/platforms";
import type { Grammar } from "../../src/types";

const CASAVA = [
  "@A00123:8:HFWT2DSXX:1:1101:10004:1000 1:N:0:ACGTACGT",
  "@A00123:8:HFWT2DSXX:1:1101:10022:1000 1:N:0:ACGTACGT",
  "@A00123:8:HFWT2DSXX:1:1101:10040:1016 1:N:0:ACGTACGT",
  "@A00123:8:HFWT2DSXX:2:1102:10058:1016 1:N:0:ACGTACGT",
];

describe("classify", () => {
  test("should pick the grammar matching most lines and extract only from its lines", () => {
    const result = classify([...CASAVA, "@ZX9QA:00012:00034"]);

    expect(result.technology).toBe("Illumina");
    expect(result.grammar).toBe("illumina-casava");
    expect(result.evidence.sampled).toBe(5);
    expect(result.evidence.matched).toBe(4);
    expect(result.evidence.tallies["illumina-casava"]).toBe(4);
    expect(result.evidence.tallies["ion-torrent"]).toBe(1);
    expect(result.fields.run).toBe("8");
    expect(result.fields.lane).toBe("1");
    expect(result.fields.x).toBe("10004");
    expect(result.fields.row).toBeUndefined();
  });

  test("should classify an empty sample as unknown", () => {
    const result = classify([]);

    expect(result.technology).toBe("unknown");
    expect(result.grammar).toBeNull();
    expect(result.fields).toEqual({});
    expect(result.evidence.sampled).toBe(0);
    expect(result.evidence.matched).toBe(0);
  });

  test("should classify a sample no grammar recognizes as unknown", () => {
    const result = classify(["@read1", "@read2 some comment", ">contig_7"]);

    expect(result.technology).toBe("unknown");
    expect(result.fields).toEqual({});
    expect(result.evidence.sampled).toBe(3);
    expect(Object.values(result.evidence.tallies).every((count) => count === 0)).toBe(true);
  });

  test("should break ties toward the earlier grammar", () => {
    const result = classify(["@ZX9QA:00012:00034", "@m64011_190830_220126/4194373/ccs"]);

    expect(result.grammar).toBe("pacbio-ccs");
    expect(result.technology).toBe("PacBio");
    expect(result.evidence.matched).toBe(1);
  });

  test("should fill fields from later lines without overwriting earlier ones", () => {
    const result = classify([
      "@0a1b2c3d-4e5f-6789-abcd-ef0123456789 read=1 ch=7",
      "@1a1b2c3d-4e5f-6789-abcd-ef0123456789 read=2 ch=9 flow_cell_id=FAH00001",
    ]);

    expect(result.technology).toBe("OxfordNanopore");
    expect(result.fields).toEqual({ read_number: "1", channel: "7", flowcell: "FAH00001" });
  });

  test("should credit a line to the first grammar that recognizes it", () => {
    const loose = patternGrammar({
      id: "ion-torrent",
      technology: "IonTorrent",
      fields: ["run"],
      pattern: /^(\S+)$/,
      fieldsFrom: (m) => ({ run: m[1] }),
    });
    const grammars: readonly Grammar[] = [...GRAMMARS.slice(0, 1), loose];

    const result = classify(CASAVA.map((line) => line.split(" ")[0] ?? ""), grammars);

    expect(result.grammar).toBe("illumina-casava");
    expect(result.evidence.tallies["ion-torrent"]).toBe(0);
  });

  test("should raise ExtractionFailure when an extractor throws on a recognized line", () => {
    const broken: Grammar = {
      id: "ion-torrent",
      technology: "IonTorrent",
      fields: [],
      recognize: () => true,
      extract: () => {
        throw new Error("boom");
      },
    };

    let caught: unknown;
    try {
      classify(["@anything"], [broken]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionFailureError);
    if (caught instanceof ExtractionFailureError) {
      expect(caught.kind).toBe("ExtractionFailure");
      expect(caught.grammarId).toBe("ion-torrent");
      expect(caught.line).toBe("@anything");
    }
  });

  test("should report the earliest start_time date as the ONT run date", () => {
    const result = classify([
      "@0a1b2c3d-4e5f-6789-abcd-ef0123456789 read=1 ch=7 start_time=2021-03-02T10:00:00Z",
      "@1a1b2c3d-4e5f-6789-abcd-ef0123456789 read=2 ch=8 start_time=2021-03-01T23:59:00Z",
      "@2a1b2c3d-4e5f-6789-abcd-ef0123456789 read=3 ch=9",
    ]);

    expect(result.technology).toBe("OxfordNanopore");
    expect(result.fields.start_time).toBe("2021-03-02T10:00:00Z");
    expect(result.fields.run_date).toBe("2021-03-01");
  });

  test("should leave the ONT run date empty without start times", () => {
    const result = classify(["@0a1b2c3d-4e5f-6789-abcd-ef0123456789 read=1 ch=7"]);

    expect(result.fields.run_date).toBeUndefined();
  });

  test("should return a frozen result", () => {
    const result = classify(CASAVA);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.fields)).toBe(true);
    expect(Object.isFrozen(result.evidence)).toBe(true);
  });
});
