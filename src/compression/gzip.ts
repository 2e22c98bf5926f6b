/**
 * Streaming gzip decompression
 *
 * Handles plain gzip and BGZF (a series of gzip members) so both
 * `.fastq.gz` and `.bam` inputs decompress on the fly without buffering
 * the whole file.
 */

import { Gunzip } from "fflate";
import { CompressionError } from "../errors";

export interface GunzipStreamOptions {
  /** Called with the running count of compressed bytes consumed */
  readonly onProgress?: (bytesProcessed: number) => void;
}

/**
 * Create gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const text = compressed.pipeThrough(createGunzipStream());
 * ```
 */
export function createGunzipStream(
  options: GunzipStreamOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  let bytesProcessed = 0;
  let decompressor: Gunzip | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      decompressor = new Gunzip((data) => {
        if (data.length > 0) controller.enqueue(data);
      });
    },
    transform(chunk, controller): void {
      if (decompressor === undefined) {
        controller.error(new CompressionError("Decompressor not initialized", "gzip", "stream"));
        return;
      }
      bytesProcessed += chunk.length;
      options.onProgress?.(bytesProcessed);
      try {
        decompressor.push(chunk);
      } catch (err) {
        controller.error(CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed));
      }
    },
    flush(controller): void {
      if (decompressor === undefined) return;
      try {
        decompressor.push(new Uint8Array(0), true);
      } catch (err) {
        controller.error(CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed));
      }
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: GunzipStreamOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createGunzipStream(options));
}
