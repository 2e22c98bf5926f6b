/**
 * Metadata CSV output
 */

import { toCSV } from "../formats/dsv";
import { writeString } from "../io/file-writer";
import type { MetadataRecord } from "../types";
import { RECORD_COLUMNS } from "../types";

export function formatRecords(records: readonly MetadataRecord[]): string {
  return toCSV(RECORD_COLUMNS, records);
}

/**
 * Write records, header first, in the order given
 *
 * @throws {FileError} If the output cannot be written
 */
export async function writeRecords(path: string, records: readonly MetadataRecord[]): Promise<void> {
  await writeString(path, formatRecords(records));
}
