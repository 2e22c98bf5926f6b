/**
 * BAM header and read-name reader
 *
 * Works on the decompressed byte stream (BGZF blocks are gzip members, so
 * the gunzip stage already joined them). Reads the magic, the header text,
 * the reference dictionary and then only as many alignment records as
 * needed to collect read names; everything after that is never pulled.
 */

import { BamError } from "../../errors";
import {
  ALIGNMENT_FIXED_SIZE,
  ByteStreamReader,
  decodeHeaderText,
  isValidBAMMagic,
  readCString,
  readInt32LE,
  readUInt8,
  viewOf,
} from "./binary";
import type { ReferenceSequence, SamHeaderLine } from "./header";
import { parseSamHeaderText } from "./header";

/**
 * Upper bounds on header sizes; larger values mean a corrupt file
 */
const MAX_HEADER_TEXT = 256 * 1024 * 1024;
const MAX_REFERENCES = 10_000_000;
const MAX_BLOCK_SIZE = 64 * 1024 * 1024;

export interface BamReadOptions {
  /** Read names to collect; -1 reads every alignment */
  readonly maxReads: number;
}

export interface BamContents {
  readonly headerText: string;
  readonly header: readonly SamHeaderLine[];
  readonly references: readonly ReferenceSequence[];
  /** Read names prefixed with "@", ready for the classifier */
  readonly readNames: readonly string[];
}

async function readInt(reader: ByteStreamReader, section: BamError["section"]): Promise<number> {
  const bytes = await reader.readRequired(4, section);
  return readInt32LE(viewOf(bytes), 0);
}

function checkLength(value: number, max: number, what: string, offset: number): void {
  if (value < 0 || value > max) {
    throw new BamError(`Invalid ${what}: ${value}`, "header", offset);
  }
}

/**
 * Read a BAM header and the first read names from a decompressed stream
 *
 * The stream is cancelled once enough names are collected.
 *
 * @throws {BamError} On a bad magic number, truncated header or corrupt record
 */
export async function readBam(
  stream: ReadableStream<Uint8Array>,
  options: BamReadOptions
): Promise<BamContents> {
  const reader = new ByteStreamReader(stream);

  try {
    const magic = await reader.readRequired(4, "magic");
    if (!isValidBAMMagic(magic)) {
      throw new BamError("Not a BAM file: bad magic number", "magic", 0);
    }

    const textLength = await readInt(reader, "header");
    checkLength(textLength, MAX_HEADER_TEXT, "header text length", reader.offset);
    const headerText = decodeHeaderText(await reader.readRequired(textLength, "header"));

    const referenceCount = await readInt(reader, "references");
    checkLength(referenceCount, MAX_REFERENCES, "reference count", reader.offset);
    const references: ReferenceSequence[] = [];
    for (let i = 0; i < referenceCount; i++) {
      const nameLength = await readInt(reader, "references");
      checkLength(nameLength, MAX_HEADER_TEXT, "reference name length", reader.offset);
      const name = readCString(await reader.readRequired(nameLength, "references"), 0, nameLength);
      const length = await readInt(reader, "references");
      references.push({ name, length });
    }

    const readNames: string[] = [];
    while (options.maxReads < 0 || readNames.length < options.maxReads) {
      const sizeBytes = await reader.read(4);
      if (sizeBytes === null) break;
      const blockSize = readInt32LE(viewOf(sizeBytes), 0);
      if (blockSize < ALIGNMENT_FIXED_SIZE || blockSize > MAX_BLOCK_SIZE) {
        throw new BamError(`Invalid alignment block size: ${blockSize}`, "alignment", reader.offset);
      }

      const block = await reader.readRequired(blockSize, "alignment");
      // l_read_name follows refID (4) and pos (4)
      const nameLength = readUInt8(viewOf(block), 8);
      if (ALIGNMENT_FIXED_SIZE + nameLength > blockSize) {
        throw new BamError(
          `Read name runs past its alignment block (${nameLength} bytes)`,
          "alignment",
          reader.offset
        );
      }
      readNames.push(`@${readCString(block, ALIGNMENT_FIXED_SIZE, nameLength)}`);
    }

    return {
      headerText,
      header: parseSamHeaderText(headerText),
      references,
      readNames,
    };
  } finally {
    await reader.close();
  }
}
