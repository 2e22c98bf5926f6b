/**
 * readtrail: per-file sequencing metadata from a manifest
 *
 * Samples read names from FASTQ and BAM files, classifies the sequencing
 * platform from their shape, and merges that with header fields and
 * keywords found in file names and paths.
 */

// Errors
export {
  BamError,
  BufferError,
  CompressionError,
  DSVParseError,
  type EntryError,
  type ErrorKind,
  ExtractionFailureError,
  FileError,
  MalformedManifestError,
  NetworkError,
  ParseError,
  ReadtrailError,
  StreamError,
  TimeoutError,
  UnreadableFileError,
  ValidationError,
} from "./errors";
// Data model
export {
  type ClassificationEvidence,
  type ClassificationResult,
  type EntryOutcome,
  type EntryStage,
  type FieldMap,
  FILE_TYPES,
  type FileManifestEntry,
  FileManifestEntrySchema,
  type FilenameFields,
  type FileType,
  type Grammar,
  type GrammarId,
  type HeaderFields,
  type MetadataRecord,
  READ_FIELDS,
  type ReadField,
  type ReadIdentifierLine,
  RECORD_COLUMNS,
  Technology,
  UNKNOWN_TECHNOLOGY,
} from "./types";
// Configuration and logging
export {
  DEFAULT_BASE_URL,
  DEFAULT_OPTIONS,
  type ExtractionOptions,
  type FetchLike,
  resolveOptions,
  resolveWorkers,
} from "./config";
export { type LoggingOptions, loggingLayer } from "./logging";
// Grammars and classification
export {
  classify,
  GRAMMAR_IDS,
  GRAMMARS,
  illuminaCasava,
  illuminaLegacy,
  ionTorrent,
  mgiDnbseq,
  nanopore,
  pacbioCcs,
  pacbioSubread,
  patternGrammar,
} from "./platforms";
// Keywords
export { parseFilename, resolveTechnology, type ResolvedTechnology } from "./keywords/filename";
export { KeywordTables, loadKeywordTables } from "./keywords/tables";
// Sources and formats
export { openReadSource, type ReadSource, type ReadSourceOptions } from "./io/source";
export { collectIdentifierLines, sampleIdentifierLines } from "./formats/fastq/sampler";
export { type BamContents, deriveHeaderFields, parseSamHeaderText, readBam } from "./formats/bam";
export { deriveVcfFields, readVcfHeader, type VcfHeader } from "./formats/vcf/header";
// Pipeline
export { extractEntry } from "./pipeline/extract";
export { type LocatedEntry, parseManifest, readManifest, resolveLocation } from "./pipeline/manifest";
export { buildRecord } from "./pipeline/record";
export { outputPathFor, pipelineProgram, runFromManifest, runPipeline } from "./pipeline/run";
export { writeRecords } from "./pipeline/output";
