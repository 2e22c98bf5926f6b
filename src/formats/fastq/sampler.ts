/**
 * Chunked identifier-line sampler for FASTQ and FASTA streams
 *
 * Record boundaries are found by matching quality length against sequence
 * length rather than by line markers, since '@' and '+' are valid quality
 * characters. A stream whose first record starts with '>' is read as
 * FASTA, where every '>' line is an identifier.
 *
 * Only identifier lines are kept whole. Sequence and quality lines are
 * counted piece by piece as they arrive, so read length is unbounded.
 */

import { processBuffer, readChunk, rechunk } from "../../io/stream-utils";
import type { ReadIdentifierLine } from "../../types";

/**
 * Default upper bound on bytes decoded at once
 */
export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;

const UNBOUNDED = { maxLineLength: Number.POSITIVE_INFINITY } as const;

export interface SamplerOptions {
  /** Stop after this many identifier lines; -1 reads to the end */
  readonly maxReads: number;
  /** Chunks larger than this are split before decoding */
  readonly chunkSize?: number;
}

/**
 * Parsing states for the record tracker
 */
export const SamplerState = {
  /** Before the first record; the format is not known yet */
  DETECTING: "DETECTING",
  WAITING_HEADER: "WAITING_HEADER",
  READING_SEQUENCE: "READING_SEQUENCE",
  READING_QUALITY: "READING_QUALITY",
  FASTA: "FASTA",
} as const;

export type SamplerState = (typeof SamplerState)[keyof typeof SamplerState];

/**
 * Feeds lines through the FASTQ/FASTA record state machine and reports
 * which of them are identifier lines
 */
export class IdentifierLineTracker {
  private state: SamplerState = SamplerState.DETECTING;
  private sequenceLength = 0;
  private qualityLength = 0;
  /** The previous input was a fragment; the next line finishes it */
  private midLine = false;

  get currentState(): SamplerState {
    return this.state;
  }

  /**
   * Advance over one line (terminator removed); true when it is an
   * identifier line
   */
  accept(line: string): boolean {
    if (this.midLine) {
      this.midLine = false;
      if (this.state === SamplerState.READING_SEQUENCE) {
        this.sequenceLength += line.length;
        return false;
      }
      if (this.state === SamplerState.FASTA) return false;
    }

    switch (this.state) {
      case SamplerState.DETECTING:
        if (line.startsWith(">")) {
          this.state = SamplerState.FASTA;
          return true;
        }
        if (line.startsWith("@")) {
          this.beginRecord();
          return true;
        }
        return false;

      case SamplerState.FASTA:
        return line.startsWith(">");

      case SamplerState.WAITING_HEADER:
        if (line.startsWith("@")) {
          this.beginRecord();
          return true;
        }
        return false;

      case SamplerState.READING_SEQUENCE:
        if (line.startsWith("+")) {
          this.qualityLength = 0;
          this.state =
            this.sequenceLength === 0 ? SamplerState.WAITING_HEADER : SamplerState.READING_QUALITY;
        } else {
          this.sequenceLength += line.length;
        }
        return false;

      case SamplerState.READING_QUALITY:
        this.qualityLength += line.length;
        if (this.qualityLength >= this.sequenceLength) {
          this.state = SamplerState.WAITING_HEADER;
        }
        return false;
    }
  }

  /**
   * Count the start of a line whose end has not arrived yet
   *
   * Returns false when the fragment could be an identifier or separator
   * line, which must stay buffered until it is complete.
   */
  absorbFragment(fragment: string): boolean {
    if (fragment === "" || fragment.endsWith("\r")) return false;

    switch (this.state) {
      case SamplerState.READING_SEQUENCE:
        if (!this.midLine && fragment.startsWith("+")) return false;
        this.sequenceLength += fragment.length;
        break;
      case SamplerState.READING_QUALITY:
        this.qualityLength += fragment.length;
        break;
      case SamplerState.FASTA:
        if (!this.midLine && fragment.startsWith(">")) return false;
        break;
      default:
        return false;
    }
    this.midLine = true;
    return true;
  }

  private beginRecord(): void {
    this.sequenceLength = 0;
    this.state = SamplerState.READING_SEQUENCE;
  }
}

/**
 * Yield identifier lines from a decompressed FASTQ or FASTA stream
 *
 * Lazy, finite and non-restartable. Lines split across chunk boundaries
 * are reassembled and yielded once. Stopping early, either by reaching
 * `maxReads` or by the caller breaking out, cancels the stream.
 *
 * @example
 * ```typescript
 * for await (const line of sampleIdentifierLines(stream, { maxReads: 5 })) {
 *   lines.push(line);
 * }
 * ```
 */
export async function* sampleIdentifierLines(
  stream: ReadableStream<Uint8Array>,
  options: SamplerOptions
): AsyncGenerator<ReadIdentifierLine> {
  const { maxReads, chunkSize = DEFAULT_CHUNK_SIZE } = options;
  if (maxReads === 0) {
    await stream.cancel();
    return;
  }

  const reader = stream.pipeThrough(rechunk(chunkSize)).getReader();
  const decoder = new TextDecoder("utf-8");
  const tracker = new IdentifierLineTracker();
  let buffer = "";
  let bytesProcessed = 0;
  let yielded = 0;
  let open = true;

  const take = (line: string): boolean => {
    if (!tracker.accept(line)) return false;
    yielded++;
    return true;
  };
  const limitReached = (): boolean => maxReads >= 0 && yielded >= maxReads;

  try {
    while (open) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await readChunk(reader, bytesProcessed);
      } catch (error) {
        open = false;
        throw error;
      }

      let lines: string[];
      if (chunk.done) {
        open = false;
        buffer += decoder.decode();
        const result = processBuffer(buffer, UNBOUNDED);
        const last = result.remainder.replace(/\r$/, "");
        lines = last !== "" ? [...result.lines, last] : result.lines;
        buffer = "";
      } else {
        bytesProcessed += chunk.value.length;
        buffer += decoder.decode(chunk.value, { stream: true });
        const result = processBuffer(buffer, UNBOUNDED);
        lines = result.lines;
        buffer = result.remainder;
      }

      for (const line of lines) {
        if (take(line)) {
          yield line;
          if (limitReached()) return;
        }
      }
      if (tracker.absorbFragment(buffer)) buffer = "";
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
 * Collect a sample into an array
 */
export async function collectIdentifierLines(
  stream: ReadableStream<Uint8Array>,
  options: SamplerOptions
): Promise<ReadIdentifierLine[]> {
  const lines: ReadIdentifierLine[] = [];
  for await (const line of sampleIdentifierLines(stream, options)) {
    lines.push(line);
  }
  return lines;
}
