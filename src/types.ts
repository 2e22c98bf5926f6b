/**
 * Core type definitions for sequencing-file metadata extraction
 *
 * Read identifier lines, the grammars that recognize them, and the
 * per-file records the pipeline builds from them.
 */

import { type } from "arktype";

/**
 * Sequencing technologies a grammar or keyword can name
 */
export const Technology = {
  ILLUMINA: "Illumina",
  PACBIO: "PacBio",
  OXFORD_NANOPORE: "OxfordNanopore",
  BGI: "BGI",
  ION_TORRENT: "IonTorrent",
} as const;

export type Technology = (typeof Technology)[keyof typeof Technology];

/**
 * Outcome of classification when no grammar matched
 */
export const UNKNOWN_TECHNOLOGY = "unknown";

/**
 * Fixed vocabulary of fields a grammar may extract
 */
export const READ_FIELDS = [
  "instrument",
  "run",
  "run_date",
  "flowcell",
  "lane",
  "tile",
  "x",
  "y",
  "column",
  "row",
  "read_number",
  "filtered",
  "control_number",
  "barcode",
  "umi",
  "movie",
  "zmw",
  "read_type",
  "strand",
  "channel",
  "start_time",
  "basecall_model",
] as const;

export type ReadField = (typeof READ_FIELDS)[number];

/**
 * Partial field map. Fields a grammar does not define are absent, and an
 * empty string is never stored.
 */
export type FieldMap = Partial<Record<ReadField, string>>;

/**
 * One record's identifier line, record-separator character included
 * (`@` for FASTQ, `>` for FASTA)
 */
export type ReadIdentifierLine = string;

export type GrammarId =
  | "illumina-casava"
  | "illumina-legacy"
  | "mgi-dnbseq"
  | "pacbio-ccs"
  | "pacbio-subread"
  | "ont"
  | "ion-torrent";

/**
 * Recognizer and field extractor for one platform's identifier-line shape
 *
 * `recognize` is total: it returns false for any input it does not accept.
 * `extract` is only called on lines `recognize` accepted.
 */
export interface Grammar {
  readonly id: GrammarId;
  readonly technology: Technology;
  /** Fields this grammar can produce */
  readonly fields: readonly ReadField[];
  recognize(line: string): boolean;
  extract(line: string): FieldMap;
  /**
   * Fields computed over every matched line's extraction; they replace
   * the merged per-line values
   */
  summarize?(extracted: readonly FieldMap[]): FieldMap;
}

export interface ClassificationEvidence {
  /** Lines offered to the classifier */
  readonly sampled: number;
  /** Lines matched by the winning grammar */
  readonly matched: number;
  /** Match count for every grammar tried */
  readonly tallies: Readonly<Record<GrammarId, number>>;
}

export interface ClassificationResult {
  readonly technology: Technology | typeof UNKNOWN_TECHNOLOGY;
  readonly grammar: GrammarId | null;
  readonly fields: Readonly<FieldMap>;
  readonly evidence: ClassificationEvidence;
}

export const FILE_TYPES = ["fastq", "bam", "vcf"] as const;
export type FileType = (typeof FILE_TYPES)[number];

/**
 * Manifest entry schema
 */
export const FileManifestEntrySchema = type({
  index: "number.integer>=0",
  fileType: '"fastq"|"bam"|"vcf"',
  filename: "string>0",
  filepath: "string",
});

export type FileManifestEntry = Readonly<typeof FileManifestEntrySchema.infer>;

/**
 * Fields the filename/path keyword parser may produce
 */
export const FILENAME_FIELDS = [
  "technology",
  "center",
  "sample",
  "trio",
  "ref_genome",
  "aligner",
  "variant_caller",
  "date",
] as const;

export type FilenameField = (typeof FILENAME_FIELDS)[number];
export type FilenameFields = Partial<Record<FilenameField, string>>;

/**
 * Fields read from alignment and variant file headers
 */
export const HEADER_FIELDS = [
  "center",
  "sample",
  "technology",
  "platform_model",
  "read_group",
  "library",
  "aligner",
  "variant_caller",
  "ref_genome",
  "file_format",
  "source",
  "samples",
  "date",
] as const;

export type HeaderField = (typeof HEADER_FIELDS)[number];
export type HeaderFields = Partial<Record<HeaderField, string>>;

/**
 * Where the technology value of a record came from
 */
export type TechnologySource = "content" | "header" | "filename" | "";

/**
 * Per-entry pipeline state
 */
export type EntryStage = "Pending" | "Sampling" | "Classifying" | "Merging" | "Done" | "Failed";

/**
 * Output columns, in order
 */
export const RECORD_COLUMNS = [
  "file_type",
  "filename",
  "filepath",
  "url",
  "status",
  "center",
  "sample",
  "trio",
  "technology",
  "technology_source",
  "grammar",
  "reads_sampled",
  "reads_matched",
  ...READ_FIELDS,
  "platform_model",
  "read_group",
  "library",
  "aligner",
  "variant_caller",
  "ref_genome",
  "file_format",
  "source",
  "samples",
  "date",
  "error_kind",
  "error",
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

/**
 * One output row. Every column is present; missing values are "".
 */
export type MetadataRecord = Readonly<Record<RecordColumn, string>>;

export interface EntryOutcome {
  readonly entry: FileManifestEntry;
  readonly record: MetadataRecord;
  /** Final state: Done or Failed */
  readonly stage: Extract<EntryStage, "Done" | "Failed">;
  /** Stage the entry was in when it failed */
  readonly failedAt?: EntryStage;
}

/**
 * Compression formats recognized by magic bytes
 */
export type CompressionFormat = "gzip" | "zstd" | "none";
