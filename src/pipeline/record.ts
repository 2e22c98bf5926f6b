/**
 * Metadata record construction
 *
 * Every record has every column of RECORD_COLUMNS; absent values are "".
 * Header values, read from the file, take precedence over values guessed
 * from its name.
 */

import type { EntryError } from "../errors";
import type { ResolvedTechnology } from "../keywords/filename";
import type {
  ClassificationResult,
  FileManifestEntry,
  FilenameFields,
  HeaderFields,
  MetadataRecord,
  RecordColumn,
} from "../types";
import { READ_FIELDS, RECORD_COLUMNS } from "../types";

export interface RecordParts {
  readonly entry: FileManifestEntry;
  readonly location: string;
  readonly filename: FilenameFields;
  readonly header?: HeaderFields;
  readonly classification?: ClassificationResult | null;
  readonly technology: ResolvedTechnology;
  readonly error?: EntryError;
}

function isCompleteRecord(
  values: Partial<Record<RecordColumn, string>>
): values is Record<RecordColumn, string> {
  return RECORD_COLUMNS.every((column) => typeof values[column] === "string");
}

function firstOf(...values: (string | undefined)[]): string {
  return values.find((value) => value !== undefined && value !== "") ?? "";
}

/**
 * Build the frozen output row for one entry
 */
export function buildRecord(parts: RecordParts): MetadataRecord {
  const { entry, filename, technology, error } = parts;
  const header = parts.header ?? {};
  const classification = parts.classification ?? null;

  const fixed: Partial<Record<RecordColumn, string>> = {
    file_type: entry.fileType,
    filename: entry.filename,
    filepath: entry.filepath,
    url: parts.location,
    status: error === undefined ? "ok" : "failed",
    center: firstOf(header.center, filename.center),
    sample: firstOf(header.sample, filename.sample),
    trio: firstOf(filename.trio),
    technology: technology.technology,
    technology_source: technology.source,
    grammar: classification?.grammar ?? "",
    reads_sampled: classification === null ? "" : String(classification.evidence.sampled),
    reads_matched: classification === null ? "" : String(classification.evidence.matched),
    platform_model: firstOf(header.platform_model),
    read_group: firstOf(header.read_group),
    library: firstOf(header.library),
    aligner: firstOf(header.aligner, filename.aligner),
    variant_caller: firstOf(header.variant_caller, filename.variant_caller),
    ref_genome: firstOf(header.ref_genome, filename.ref_genome),
    file_format: firstOf(header.file_format),
    source: firstOf(header.source),
    samples: firstOf(header.samples),
    date: firstOf(header.date, filename.date),
    error_kind: error?.kind ?? "",
    error: error?.message ?? "",
  };

  const values: Partial<Record<RecordColumn, string>> = {};
  for (const column of RECORD_COLUMNS) {
    values[column] = fixed[column] ?? "";
  }
  for (const field of READ_FIELDS) {
    values[field] = classification?.fields[field] ?? "";
  }

  if (!isCompleteRecord(values)) {
    throw new Error("Metadata record is missing columns");
  }
  return Object.freeze(values);
}
