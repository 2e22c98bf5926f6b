/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("should detect gzip from .gz, .bgz and .bam", () => {
      expect(CompressionDetector.fromExtension("reads/HG002.fastq.gz")).toBe("gzip");
      expect(CompressionDetector.fromExtension("calls.vcf.bgz")).toBe("gzip");
      expect(CompressionDetector.fromExtension("aln.bam")).toBe("gzip");
    });

    test("should detect zstd from .zst", () => {
      expect(CompressionDetector.fromExtension("reads.fastq.zst")).toBe("zstd");
    });

    test("should ignore case, query strings and Windows separators", () => {
      expect(CompressionDetector.fromExtension("READS.FASTQ.GZ")).toBe("gzip");
      expect(CompressionDetector.fromExtension("https://example.org/r.fq.gz?sig=abc")).toBe("gzip");
      expect(CompressionDetector.fromExtension("C:\\data\\reads.fq.gz")).toBe("gzip");
    });

    test("should return none for plain files", () => {
      expect(CompressionDetector.fromExtension("reads.fastq")).toBe("none");
    });
  });

  describe("fromMagicBytes", () => {
    test("should detect gzip and zstd", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08, 0x04]))).toBe("gzip");
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]))).toBe("zstd");
    });

    test("should return none for text", () => {
      expect(CompressionDetector.fromMagicBytes(new TextEncoder().encode("@r1\n"))).toBe("none");
    });
  });

  describe("detect", () => {
    test("should trust bytes over a misleading extension", () => {
      const text = new TextEncoder().encode("@r1\nACGT\n");
      expect(CompressionDetector.detect(text, "reads.fastq.gz")).toBe("none");
      expect(CompressionDetector.detect(new Uint8Array([0x1f, 0x8b, 0x08, 0x00]), "reads.fastq")).toBe(
        "gzip"
      );
    });

    test("should fall back to the extension when there are too few bytes", () => {
      expect(CompressionDetector.detect(new Uint8Array([0x40, 0x72]), "reads.fastq.gz")).toBe("gzip");
    });

    test("should treat an empty file as uncompressed", () => {
      expect(CompressionDetector.detect(new Uint8Array(0), "reads.fastq.gz")).toBe("none");
    });
  });
});
