/**
 * Compression detection and decompression for sampled sources
 *
 * @example
 * ```typescript
 * const format = CompressionDetector.fromMagicBytes(firstBytes);
 * const plain = decompressStream(stream, format);
 * ```
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { wrapStream } from "./gzip";

export { CompressionDetector, MAGIC_BYTES_NEEDED } from "./detector";
export { createGunzipStream, wrapStream } from "./gzip";
export type { GunzipStreamOptions } from "./gzip";

/**
 * Return a stream of decompressed bytes for the given format
 *
 * @throws {CompressionError} For formats that are detected but not decoded (zstd)
 */
export function decompressStream(
  stream: ReadableStream<Uint8Array>,
  format: CompressionFormat,
  onProgress?: (bytesProcessed: number) => void
): ReadableStream<Uint8Array> {
  switch (format) {
    case "none":
      return stream;
    case "gzip":
      return wrapStream(stream, onProgress !== undefined ? { onProgress } : {});
    case "zstd":
      throw new CompressionError(
        "Zstandard-compressed input is not supported; recompress with gzip or bgzip",
        "zstd",
        "decompress"
      );
  }
}
