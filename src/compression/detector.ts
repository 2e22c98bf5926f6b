/**
 * Compression format detection for sequencing files
 *
 * Magic bytes are authoritative; the extension is a hint used only when
 * there are too few bytes to look at.
 */

import type { CompressionFormat } from "../types";

// Magic number constants for compression formats
const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const ZSTD_MAGIC_FIRST_BYTE = 0x28;
const ZSTD_MAGIC_SECOND_BYTE = 0xb5;
const ZSTD_MAGIC_THIRD_BYTE = 0x2f;
const ZSTD_MAGIC_FOURTH_BYTE = 0xfd;

const COMPRESSION_MAGIC_BYTES = {
  gzip: new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]),
  zstd: new Uint8Array([
    ZSTD_MAGIC_FIRST_BYTE,
    ZSTD_MAGIC_SECOND_BYTE,
    ZSTD_MAGIC_THIRD_BYTE,
    ZSTD_MAGIC_FOURTH_BYTE,
  ]),
} as const;

/**
 * File extensions for compressed files; `.bam` is BGZF, a gzip variant
 */
const COMPRESSION_EXTENSIONS = {
  gzip: [".gz", ".gzip", ".bgz", ".bam"],
  zstd: [".zst", ".zstd"],
} as const;

/**
 * Bytes needed to tell every supported format apart
 */
export const MAGIC_BYTES_NEEDED = 4;

function startsWith(bytes: Uint8Array, magic: Uint8Array): boolean {
  if (bytes.length < magic.length) return false;
  return magic.every((byte, i) => bytes[i] === byte);
}

/**
 * Compression format detector
 *
 * @example Detection from magic bytes
 * ```typescript
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // "gzip"
 * ```
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension("reads/HG002.fastq.gz"); // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression from the first bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.gzip)) return "gzip";
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.zstd)) return "zstd";
    return "none";
  }

  /**
   * Detect compression from a file name, path or URL
   */
  static fromExtension(location: string): CompressionFormat {
    const normalized = location.toLowerCase().replace(/\\/g, "/").replace(/[?#].*$/, "");

    if (COMPRESSION_EXTENSIONS.gzip.some((ext) => normalized.endsWith(ext))) return "gzip";
    if (COMPRESSION_EXTENSIONS.zstd.some((ext) => normalized.endsWith(ext))) return "zstd";
    return "none";
  }

  /**
   * Combine both signals: bytes decide whenever there are enough of them
   */
  static detect(bytes: Uint8Array, location: string): CompressionFormat {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    if (fromBytes !== "none" || bytes.length >= MAGIC_BYTES_NEEDED) {
      return fromBytes;
    }
    return bytes.length === 0 ? "none" : CompressionDetector.fromExtension(location);
  }
}
