/**
 * SAM header text parsing and metadata derivation
 *
 * Header lines are `@XX` records of tab-separated `TAG:value` pairs; `@CO`
 * carries free text. Lines that do not fit are skipped, since only a few
 * tags feed the metadata record.
 */

import { isoDate } from "../../keywords/filename";
import type { KeywordTables } from "../../keywords/tables";
import type { HeaderFields } from "../../types";
import { Technology } from "../../types";

export type SamHeaderType = "HD" | "SQ" | "RG" | "PG" | "CO";

export interface SamHeaderLine {
  readonly type: SamHeaderType;
  readonly tags: Readonly<Record<string, string>>;
}

export interface ReferenceSequence {
  readonly name: string;
  readonly length: number;
}

const HEADER_TYPES: ReadonlySet<string> = new Set(["HD", "SQ", "RG", "PG", "CO"]);

function isHeaderType(value: string): value is SamHeaderType {
  return HEADER_TYPES.has(value);
}

/**
 * chr1 length of each reference assembly
 */
const CHR1_LENGTHS: ReadonlyMap<number, string> = new Map([
  [248956422, "GRCh38"],
  [249250621, "GRCh37"],
  [248387328, "CHM13"],
]);

/**
 * @RG PL values, upper-cased
 */
const PLATFORM_TECHNOLOGY: Readonly<Record<string, Technology>> = {
  ILLUMINA: Technology.ILLUMINA,
  SOLEXA: Technology.ILLUMINA,
  PACBIO: Technology.PACBIO,
  ONT: Technology.OXFORD_NANOPORE,
  NANOPORE: Technology.OXFORD_NANOPORE,
  OXFORDNANOPORE: Technology.OXFORD_NANOPORE,
  IONTORRENT: Technology.ION_TORRENT,
  ION_TORRENT: Technology.ION_TORRENT,
  BGI: Technology.BGI,
  MGI: Technology.BGI,
  DNBSEQ: Technology.BGI,
};

/**
 * Parse SAM header text into typed lines
 */
export function parseSamHeaderText(text: string): SamHeaderLine[] {
  const lines: SamHeaderLine[] = [];

  for (const raw of text.split(/\r?\n/)) {
    if (!raw.startsWith("@")) continue;
    const parts = raw.slice(1).split("\t");
    const type = parts[0] ?? "";
    if (!isHeaderType(type)) continue;

    if (type === "CO") {
      lines.push({ type, tags: { comment: parts.slice(1).join("\t") } });
      continue;
    }

    const tags: Record<string, string> = {};
    for (const field of parts.slice(1)) {
      const colon = field.indexOf(":");
      if (colon <= 0) continue;
      const key = field.slice(0, colon);
      // first occurrence of a repeated tag wins
      if (!(key in tags)) tags[key] = field.slice(colon + 1);
    }
    lines.push({ type, tags });
  }

  return lines;
}

function firstTag(lines: readonly SamHeaderLine[], type: SamHeaderType, tag: string): string {
  for (const line of lines) {
    if (line.type !== type) continue;
    const value = line.tags[tag];
    if (value !== undefined && value !== "") return value;
  }
  return "";
}

/**
 * Map an @RG PL value to a technology
 */
export function technologyFromPlatform(platform: string): Technology | undefined {
  return PLATFORM_TECHNOLOGY[platform.trim().toUpperCase().replace(/[\s-]/g, "")];
}

/**
 * Reference assembly from the length of chromosome 1
 */
export function refGenomeFromReferences(
  references: readonly ReferenceSequence[]
): string | undefined {
  const chr1 = references.find((ref) => ref.name === "chr1" || ref.name === "1");
  return chr1 === undefined ? undefined : CHR1_LENGTHS.get(chr1.length);
}

/**
 * Derive metadata fields from header lines and the reference dictionary
 *
 * Samples, aligners and assemblies are normalized through the keyword
 * tables; values the tables do not know are kept as written.
 */
export function deriveHeaderFields(
  lines: readonly SamHeaderLine[],
  references: readonly ReferenceSequence[],
  tables: KeywordTables
): HeaderFields {
  const fields: HeaderFields = {};
  const set = (key: keyof HeaderFields, value: string | undefined): void => {
    if (value !== undefined && value !== "") fields[key] = value;
  };

  const sample = firstTag(lines, "RG", "SM");
  set("sample", tables.canonicalFor("sample", sample) ?? sample);
  set("center", firstTag(lines, "RG", "CN"));

  const platform = firstTag(lines, "RG", "PL");
  set("technology", platform === "" ? undefined : technologyFromPlatform(platform));
  set("platform_model", firstTag(lines, "RG", "PM"));
  set("library", firstTag(lines, "RG", "LB"));
  set("date", isoDate(firstTag(lines, "RG", "DT")));

  const groups = lines
    .filter((line) => line.type === "RG")
    .map((line) => line.tags.ID ?? "")
    .filter((id) => id !== "");
  set("read_group", groups.join(";"));

  set("aligner", alignerOf(lines, tables));

  let refGenome = refGenomeFromReferences(references);
  if (refGenome === undefined) {
    for (const line of lines) {
      if (line.type !== "SQ") continue;
      for (const tag of ["AS", "UR"]) {
        const value = line.tags[tag];
        if (value === undefined) continue;
        refGenome = tables.canonicalFor("ref_genome", value) ?? keywordIn(value, tables);
        if (refGenome !== undefined) break;
      }
      if (refGenome !== undefined) break;
    }
  }
  set("ref_genome", refGenome);

  return fields;
}

function alignerOf(lines: readonly SamHeaderLine[], tables: KeywordTables): string | undefined {
  let fallback: string | undefined;
  for (const line of lines) {
    if (line.type !== "PG") continue;
    for (const tag of ["ID", "PN"]) {
      const value = line.tags[tag];
      if (value === undefined || value === "") continue;
      const known = tables.canonicalFor("aligner", value);
      if (known !== undefined) return known;
    }
    const name = line.tags.PN;
    if (fallback === undefined && name !== undefined && name !== "") fallback = name;
  }
  return fallback;
}

function keywordIn(value: string, tables: KeywordTables): string | undefined {
  const lower = value.toLowerCase();
  return tables.entries("ref_genome").find((entry) => lower.includes(entry.keyword))?.canonical;
}
