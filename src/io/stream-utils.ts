/**
 * Stream processing utilities for text and binary data
 *
 * Line splitting with carry-over across chunk boundaries, bounded chunk
 * sizes, peeking at leading bytes, and idle timeouts for remote bodies.
 */

import { BufferError, ReadtrailError, StreamError, messageOf } from "../errors";

// Constants for stream processing
const MAX_LINE_LENGTH = 1_000_000; // 1MB max line length

/**
 * Result of splitting a text buffer into lines
 */
export interface LineProcessingResult {
  /** Complete lines, terminators removed */
  readonly lines: string[];
  /** Trailing partial line to prefix onto the next chunk */
  readonly remainder: string;
}

export interface ProcessBufferOptions {
  /** Longest line or remainder accepted; Infinity disables the check */
  readonly maxLineLength?: number;
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles different line ending styles (\n, \r\n, \r) and preserves
 * incomplete lines for the next processing cycle. A `\r` at the very end
 * of the buffer stays in the remainder, since the next chunk may start
 * with the matching `\n`.
 *
 * @throws {BufferError} If a single line exceeds `maxLineLength`
 */
export function processBuffer(
  buffer: string,
  options: ProcessBufferOptions = {}
): LineProcessingResult {
  const { maxLineLength = MAX_LINE_LENGTH } = options;
  const checkLength = (line: string): string => {
    if (line.length > maxLineLength) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
        line.length,
        "overflow",
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }
    return line;
  };
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // Mac classic line ending (\r not followed by \n)
      lines.push(checkLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Lines are reconstructed across chunk boundaries. Stopping iteration
 * early cancels the stream.
 *
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line is too long
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("#CHROM")) break;
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  // cancelled on early exit only; a finished or errored stream just releases
  let open = true;

  try {
    while (true) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await readChunk(reader, totalBytesProcessed);
      } catch (error) {
        open = false;
        throw error;
      }

      if (chunk.done) {
        open = false;
        buffer += decoder.decode();
        const { lines, remainder } = processBuffer(buffer);
        yield* lines;
        if (remainder !== "") {
          yield remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
        }
        return;
      }

      totalBytesProcessed += chunk.value.length;
      buffer += decoder.decode(chunk.value, { stream: true });
      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }
  } finally {
    if (open) {
      await reader.cancel();
    } else {
      reader.releaseLock();
    }
  }
}

/**
 * Read one chunk, wrapping transport failures in StreamError
 */
export async function readChunk(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  bytesProcessed: number
): Promise<ReadableStreamReadResult<Uint8Array>> {
  try {
    return await reader.read();
  } catch (error) {
    if (error instanceof ReadtrailError) throw error;
    throw new StreamError(`Stream read failed: ${messageOf(error)}`, "read", bytesProcessed);
  }
}

/**
 * Split chunks larger than `maxChunkSize` so downstream code never holds
 * more than one bounded chunk at a time
 */
export function rechunk(maxChunkSize: number): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller): void {
      for (let offset = 0; offset < chunk.length; offset += maxChunkSize) {
        controller.enqueue(chunk.subarray(offset, Math.min(offset + maxChunkSize, chunk.length)));
      }
    },
  });
}

/**
 * Error a stream when no chunk arrives within `timeoutMs`
 *
 * `onTimeout` builds the error and may abort the transport behind the
 * stream.
 */
export function withIdleTimeout(
  stream: ReadableStream<Uint8Array>,
  timeoutMs: number,
  onTimeout: () => Error
): ReadableStream<Uint8Array> {
  const reader = stream.getReader();

  return new ReadableStream<Uint8Array>({
    async pull(controller): Promise<void> {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), timeoutMs);
      });

      try {
        const { done, value } = await Promise.race([reader.read(), timeout]);
        if (done) {
          controller.close();
        } else {
          controller.enqueue(value);
        }
      } finally {
        clearTimeout(timer);
      }
    },
    cancel(reason): Promise<void> {
      return reader.cancel(reason);
    },
  });
}

/**
 * Peek at the leading bytes of a stream without losing them
 *
 * @example
 * ```typescript
 * const buffered = new BufferedStreamReader(stream);
 * const magic = await buffered.peek(4);
 * const whole = buffered.stream(); // starts from byte 0 again
 * ```
 */
export class BufferedStreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private exhausted = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  async peek(bytes: number): Promise<Uint8Array> {
    while (this.buffer.length < bytes && !this.exhausted) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.exhausted = true;
      } else {
        const newBuffer = new Uint8Array(this.buffer.length + value.length);
        newBuffer.set(this.buffer);
        newBuffer.set(value, this.buffer.length);
        this.buffer = newBuffer;
      }
    }
    return this.buffer.slice(0, bytes);
  }

  /**
   * The whole stream, peeked bytes first
   */
  stream(): ReadableStream<Uint8Array> {
    const reader = this.reader;
    let pending: Uint8Array | undefined = this.buffer.length > 0 ? this.buffer : undefined;
    let exhausted = this.exhausted;

    return new ReadableStream<Uint8Array>({
      async pull(controller): Promise<void> {
        if (pending !== undefined) {
          controller.enqueue(pending);
          pending = undefined;
          return;
        }
        if (exhausted) {
          controller.close();
          return;
        }
        const { value, done } = await reader.read();
        if (done) {
          exhausted = true;
          controller.close();
        } else {
          controller.enqueue(value);
        }
      },
      cancel(reason): Promise<void> {
        return reader.cancel(reason);
      },
    });
  }
}
