/**
 * VCF header reader
 *
 * Reads `##key=value` meta lines up to the `#CHROM` column line and stops
 * there; no variant record is read.
 */

import { readLines } from "../../io/stream-utils";
import { isoDate } from "../../keywords/filename";
import type { KeywordTables } from "../../keywords/tables";
import type { HeaderFields } from "../../types";

/**
 * Fixed columns before the first sample column
 */
const FIXED_COLUMNS = ["CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO", "FORMAT"];

export interface VcfHeader {
  /** Meta lines keyed by name; only the first value of each key is kept */
  readonly meta: Readonly<Record<string, string>>;
  readonly samples: readonly string[];
}

/**
 * Read the meta lines and sample names of a decompressed VCF stream
 */
export async function readVcfHeader(stream: ReadableStream<Uint8Array>): Promise<VcfHeader> {
  const meta: Record<string, string> = {};
  let samples: string[] = [];

  for await (const line of readLines(stream)) {
    if (line.startsWith("##")) {
      const eq = line.indexOf("=");
      if (eq <= 2) continue;
      const key = line.slice(2, eq);
      if (!(key in meta)) meta[key] = line.slice(eq + 1);
      continue;
    }
    if (line.startsWith("#")) {
      samples = line.slice(1).split("\t").slice(FIXED_COLUMNS.length);
    }
    // the column line, or a record in a file that has none, ends the header
    break;
  }

  return { meta, samples };
}

/**
 * ISO date from a `##fileDate` value (`20180101` or `2018-01-01`)
 */
/**
 * Derive metadata fields from a VCF header
 */
export function deriveVcfFields(header: VcfHeader, tables: KeywordTables): HeaderFields {
  const fields: HeaderFields = {};
  const set = (key: keyof HeaderFields, value: string | undefined): void => {
    if (value !== undefined && value !== "") fields[key] = value;
  };

  set("file_format", header.meta.fileformat);
  const source = header.meta.source;
  set("source", source);
  if (source !== undefined) {
    set("variant_caller", tables.canonicalFor("variant_caller", source.split(/[\s_-]/)[0] ?? ""));
  }

  const reference = header.meta.reference;
  if (reference !== undefined) {
    const lower = reference.toLowerCase();
    set(
      "ref_genome",
      tables.entries("ref_genome").find((entry) => lower.includes(entry.keyword))?.canonical
    );
  }

  const fileDate = header.meta.fileDate;
  set("date", fileDate === undefined ? undefined : isoDate(fileDate));

  set("samples", header.samples.join(";"));
  if (header.samples.length === 1) {
    const only = header.samples[0] ?? "";
    set("sample", tables.canonicalFor("sample", only) ?? only);
  }

  return fields;
}
