/**
 * Binary data parsing utilities for BAM format
 *
 * Little-endian integer reads with bounds checking, NUL-terminated strings,
 * and a pull reader that takes exact byte counts from a decompressed stream.
 */

import { BamError } from "../../errors";
import { readChunk } from "../../io/stream-utils";

export const BAM_MAGIC_BYTES = new Uint8Array([0x42, 0x41, 0x4d, 0x01]); // "BAM\1"

/**
 * Fixed-size part of an alignment record after block_size
 */
export const ALIGNMENT_FIXED_SIZE = 32;

const latin1 = new TextDecoder("latin1");
const utf8 = new TextDecoder("utf-8");

/**
 * Read a 32-bit signed integer in little-endian format
 * @throws {BamError} If offset is out of bounds
 */
export function readInt32LE(view: DataView, offset: number): number {
  if (offset + 4 > view.byteLength) {
    throw new BamError(
      `Cannot read int32 at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "alignment",
      offset
    );
  }
  return view.getInt32(offset, true);
}

/**
 * Read an 8-bit unsigned integer
 * @throws {BamError} If offset is out of bounds
 */
export function readUInt8(view: DataView, offset: number): number {
  if (offset >= view.byteLength) {
    throw new BamError(
      `Cannot read uint8 at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "alignment",
      offset
    );
  }
  return view.getUint8(offset);
}

/**
 * Read a NUL-terminated string of at most `maxLength` bytes (terminator included)
 */
export function readCString(bytes: Uint8Array, offset: number, maxLength: number): string {
  const end = Math.min(bytes.length, offset + maxLength);
  let stop = offset;
  while (stop < end && bytes[stop] !== 0) stop++;
  return latin1.decode(bytes.subarray(offset, stop));
}

/**
 * Decode header text; SAM headers are UTF-8 and may be NUL padded
 */
export function decodeHeaderText(bytes: Uint8Array): string {
  const nul = bytes.indexOf(0);
  return utf8.decode(nul >= 0 ? bytes.subarray(0, nul) : bytes);
}

export function isValidBAMMagic(magicBytes: Uint8Array): boolean {
  return magicBytes.length >= 4 && BAM_MAGIC_BYTES.every((byte, i) => magicBytes[i] === byte);
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Pulls exact byte counts from a stream of arbitrarily sized chunks
 */
export class ByteStreamReader {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private pending: Uint8Array[] = [];
  private pendingLength = 0;
  // set once the stream has ended or errored; nothing left to cancel
  private done = false;
  private consumed = 0;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /** Bytes handed out so far */
  get offset(): number {
    return this.consumed;
  }

  /**
   * Read exactly `length` bytes; null when the stream ends first
   */
  async read(length: number): Promise<Uint8Array | null> {
    while (this.pendingLength < length && !this.done) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await readChunk(this.reader, this.consumed + this.pendingLength);
      } catch (error) {
        this.done = true;
        throw error;
      }
      const { done, value } = chunk;
      if (done) {
        this.done = true;
      } else if (value.length > 0) {
        this.pending.push(value);
        this.pendingLength += value.length;
      }
    }
    if (this.pendingLength < length) return null;

    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const head = this.pending[0];
      if (head === undefined) break;
      const take = Math.min(head.length, length - filled);
      out.set(head.subarray(0, take), filled);
      filled += take;
      if (take === head.length) {
        this.pending.shift();
      } else {
        this.pending[0] = head.subarray(take);
      }
    }
    this.pendingLength -= length;
    this.consumed += length;
    return out;
  }

  /**
   * Read exactly `length` bytes or fail with a truncation error
   */
  async readRequired(length: number, section: BamError["section"]): Promise<Uint8Array> {
    const bytes = await this.read(length);
    if (bytes === null) {
      throw new BamError(
        `Unexpected end of data: needed ${length} bytes in ${section}`,
        section,
        this.consumed
      );
    }
    return bytes;
  }

  /**
   * Stop reading; cancels the stream unless it already ended
   */
  async close(): Promise<void> {
    if (this.done) {
      this.reader.releaseLock();
    } else {
      await this.reader.cancel();
    }
  }
}
