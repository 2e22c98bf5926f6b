/**
 * Run a manifest through the extraction pipeline
 *
 * Entries are processed by a bounded pool of `workers` fibers. Results
 * land in a slot per manifest row, so output order is manifest order
 * whatever order entries finish in.
 */

import { basename, extname, join } from "node:path";
import { Effect } from "effect";
import type { ExtractionOptions } from "../config";
import { resolveOptions, resolveWorkers } from "../config";
import type { KeywordTables } from "../keywords/tables";
import { loadKeywordTables } from "../keywords/tables";
import type { LoggingOptions } from "../logging";
import { loggingLayer } from "../logging";
import type { EntryOutcome } from "../types";
import { extractEntry } from "./extract";
import type { LocatedEntry } from "./manifest";
import { readManifest } from "./manifest";
import { writeRecords } from "./output";

export interface RunSummary {
  readonly outputPath: string;
  readonly outcomes: readonly EntryOutcome[];
  readonly failed: number;
}

/**
 * Effect running every entry; outcomes come back in manifest order
 */
export function pipelineProgram(
  entries: readonly LocatedEntry[],
  tables: KeywordTables,
  options: ExtractionOptions
): Effect.Effect<EntryOutcome[]> {
  const total = entries.length;
  const workers = resolveWorkers(options.workers);
  let completed = 0;

  const reportProgress = Effect.suspend(() => {
    completed++;
    const message = `progress ${completed}/${total}`;
    return options.progress ? Effect.logInfo(message) : Effect.logDebug(message);
  });

  return Effect.logDebug(`processing ${total} entries with ${workers} workers`).pipe(
    Effect.zipRight(
      Effect.forEach(
        entries,
        (located) => extractEntry(located, tables, options).pipe(Effect.tap(() => reportProgress)),
        { concurrency: workers }
      )
    )
  );
}

/**
 * Process entries and return their outcomes in manifest order
 */
export async function runPipeline(
  entries: readonly LocatedEntry[],
  tables: KeywordTables,
  options: ExtractionOptions,
  logging: LoggingOptions = {}
): Promise<EntryOutcome[]> {
  return Effect.runPromise(
    pipelineProgram(entries, tables, options).pipe(Effect.provide(loggingLayer(logging)))
  );
}

/**
 * Output file for a manifest: `<dir>/<manifest basename>_metadata.csv`
 */
export function outputPathFor(manifestPath: string, outputDir: string): string {
  const name = basename(manifestPath, extname(manifestPath));
  return join(outputDir, `${name}_metadata.csv`);
}

/**
 * Read a manifest, extract metadata for every entry and write the CSV
 *
 * Per-entry failures are recorded in their rows. The manifest and keyword
 * tables are loaded before any entry starts, so nothing is written when
 * either is bad.
 *
 * @throws {MalformedManifestError} If the manifest cannot be read or parsed
 * @throws {ValidationError} If the options or keyword tables are invalid
 */
export async function runFromManifest(
  manifestPath: string,
  outputDir: string,
  overrides: Partial<ExtractionOptions> = {},
  logging: LoggingOptions = {}
): Promise<RunSummary> {
  const options = resolveOptions(overrides);
  const entries = await readManifest(manifestPath, options.baseUrl);
  const tables = await loadKeywordTables(options.keywordsPath);

  const outcomes = await runPipeline(entries, tables, options, logging);
  const outputPath = outputPathFor(manifestPath, outputDir);
  await writeRecords(
    outputPath,
    outcomes.map((outcome) => outcome.record)
  );

  return {
    outputPath,
    outcomes,
    failed: outcomes.filter((outcome) => outcome.stage === "Failed").length,
  };
}
