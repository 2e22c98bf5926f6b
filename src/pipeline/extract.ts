/**
 * Per-entry extraction
 *
 * Each entry moves Pending → Sampling → Classifying → Merging → Done. Any
 * failure moves it to Failed and still produces a row: file identity,
 * filename fields, and the error kind and message.
 */

import { Duration, Effect, Schedule } from "effect";
import type { ExtractionOptions } from "../config";
import type { EntryError } from "../errors";
import { ExtractionFailureError, UnreadableFileError, messageOf } from "../errors";
import { deriveHeaderFields } from "../formats/bam/header";
import { readBam } from "../formats/bam/reader";
import { collectIdentifierLines } from "../formats/fastq/sampler";
import { deriveVcfFields, readVcfHeader } from "../formats/vcf/header";
import { isRemoteLocation, openReadSource } from "../io/source";
import { parseFilename, resolveTechnology } from "../keywords/filename";
import type { KeywordTables } from "../keywords/tables";
import { classify } from "../platforms/classifier";
import type {
  ClassificationResult,
  EntryOutcome,
  EntryStage,
  FileType,
  HeaderFields,
  ReadIdentifierLine,
} from "../types";
import type { LocatedEntry } from "./manifest";
import { buildRecord } from "./record";

/**
 * What sampling a file yields: identifier lines to classify (none for
 * variant files) and fields read from its header
 */
export interface SampledContent {
  readonly lines: readonly ReadIdentifierLine[] | null;
  readonly header: HeaderFields;
}

/**
 * Open a file and read what its type calls for
 */
export async function sampleContent(
  fileType: FileType,
  location: string,
  tables: KeywordTables,
  options: ExtractionOptions
): Promise<SampledContent> {
  const { stream } = await openReadSource(location, options);

  switch (fileType) {
    case "fastq":
      return {
        lines: await collectIdentifierLines(stream, {
          maxReads: options.maxReads,
          chunkSize: options.chunkSize,
        }),
        header: {},
      };

    case "bam": {
      const bam = await readBam(stream, { maxReads: options.maxReads });
      return {
        lines: bam.readNames,
        header: deriveHeaderFields(bam.header, bam.references, tables),
      };
    }

    case "vcf":
      return { lines: null, header: deriveVcfFields(await readVcfHeader(stream), tables) };
  }
}

/**
 * Failures while reading a source are UnreadableFile, whatever layer
 * raised them
 */
function toEntryError(location: string, error: unknown): EntryError {
  return error instanceof ExtractionFailureError ? error : UnreadableFileError.from(location, error);
}

/**
 * Backoff for re-reading a remote file: exponential from `retryDelayMs`,
 * at most `retries` more attempts
 */
export function retrySchedule(
  options: Pick<ExtractionOptions, "retries" | "retryDelayMs">
): Schedule.Schedule<unknown> {
  return Schedule.exponential(Duration.millis(options.retryDelayMs)).pipe(
    Schedule.intersect(Schedule.recurs(options.retries)),
    Schedule.asVoid
  );
}

/**
 * Run one entry through the extraction stages
 *
 * Never fails: errors become a Failed outcome.
 */
export function extractEntry(
  located: LocatedEntry,
  tables: KeywordTables,
  options: ExtractionOptions
): Effect.Effect<EntryOutcome> {
  const { entry, location } = located;
  const filename = parseFilename(location, tables, entry.fileType);
  let stage: EntryStage = "Pending";

  const enter = (next: EntryStage): Effect.Effect<void> =>
    Effect.sync(() => {
      stage = next;
    }).pipe(
      Effect.zipRight(Effect.logDebug(`entering ${next}`)),
      Effect.annotateLogs("stage", next)
    );

  const program = Effect.gen(function* () {
    yield* enter("Sampling");
    const remote = isRemoteLocation(location);
    const content = yield* Effect.tryPromise({
      try: () => sampleContent(entry.fileType, location, tables, options),
      catch: (error) => toEntryError(location, error),
    }).pipe(
      Effect.tapError((error) =>
        remote ? Effect.logDebug(`read failed: ${error.message}`) : Effect.void
      ),
      Effect.retry({
        schedule: retrySchedule(options),
        while: (error) => remote && error instanceof UnreadableFileError,
      })
    );

    yield* enter("Classifying");
    let classification: ClassificationResult | null = null;
    const lines = content.lines;
    if (lines !== null) {
      classification = yield* Effect.try({
        try: () => classify(lines, options.grammars),
        catch: (error) =>
          error instanceof ExtractionFailureError
            ? error
            : new ExtractionFailureError(messageOf(error), "", "", error),
      });
      yield* Effect.logDebug(
        `classified as ${classification.technology} (${classification.evidence.matched}/${classification.evidence.sampled} lines)`
      );
    }

    yield* enter("Merging");
    const record = buildRecord({
      entry,
      location,
      filename,
      header: content.header,
      classification,
      technology: resolveTechnology(
        classification,
        content.header.technology,
        filename.technology
      ),
    });

    yield* enter("Done");
    const outcome: EntryOutcome = { entry, record, stage: "Done" };
    return outcome;
  });

  return program.pipe(
    Effect.catchAll((error) => {
      const failedAt = stage;
      const record = buildRecord({
        entry,
        location,
        filename,
        technology: resolveTechnology(null, undefined, filename.technology),
        error,
      });
      const outcome: EntryOutcome = { entry, record, stage: "Failed", failedAt };
      return Effect.logWarning(`${error.kind} during ${failedAt}: ${error.message}`).pipe(
        Effect.annotateLogs("stage", "Failed"),
        Effect.as(outcome)
      );
    }),
    Effect.annotateLogs({ file: entry.filename, index: entry.index })
  );
}
