/**
 * Extraction options, defaults and validation
 */

import { availableParallelism } from "node:os";
import { type } from "arktype";
import { ValidationError } from "./errors";
import { GRAMMARS } from "./platforms/registry";
import type { Grammar } from "./types";

/**
 * Minimal fetch signature used for remote sources; tests pass a stand-in
 */
export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface ExtractionOptions {
  /** Identifier lines sampled per file; -1 samples every read */
  readonly maxReads: number;
  /** Concurrent entries; "all" uses every available core */
  readonly workers: number | "all";
  /** Upper bound on bytes handed to the line splitter at once */
  readonly chunkSize: number;
  /** Remote reads fail after this long without a chunk */
  readonly timeoutMs: number;
  /** Further attempts at a remote file that could not be read */
  readonly retries: number;
  /** Delay before the first retry; doubles on each one after */
  readonly retryDelayMs: number;
  /** Base for relative manifest locations; null resolves them as local paths */
  readonly baseUrl: string | null;
  /** Keyword table file; null uses the bundled tables */
  readonly keywordsPath: string | null;
  /** Log completed/total after each entry at info level */
  readonly progress: boolean;
  readonly fetch: FetchLike;
  /** Identifier-line grammars in priority order */
  readonly grammars: readonly Grammar[];
}

export const DEFAULT_BASE_URL = "https://ftp-trace.ncbi.nlm.nih.gov/ReferenceSamples/giab/";

export const DEFAULT_OPTIONS: ExtractionOptions = Object.freeze({
  maxReads: 5,
  workers: 4,
  chunkSize: 4 * 1024 * 1024,
  timeoutMs: 30_000,
  retries: 2,
  retryDelayMs: 250,
  baseUrl: DEFAULT_BASE_URL,
  keywordsPath: null,
  progress: false,
  fetch: (url: string, init: { signal: AbortSignal }) => fetch(url, init),
  grammars: GRAMMARS,
});

/**
 * Options validation schema
 */
export const ExtractionOptionsSchema = type({
  maxReads: "number.integer>=-1",
  workers: type('"all"').or("number.integer>=1"),
  chunkSize: "number.integer>=1",
  timeoutMs: "number.integer>=1",
  retries: "number.integer>=0",
  retryDelayMs: "number.integer>=0",
  baseUrl: "string|null",
  keywordsPath: "string|null",
  progress: "boolean",
}).narrow((options, ctx) => {
  if (options.maxReads === 0) {
    return ctx.reject({
      path: ["maxReads"],
      expected: "a positive read count, or -1 for every read",
      actual: "0",
    });
  }

  if (options.baseUrl !== null && !/^(https?|file):\/\//i.test(options.baseUrl)) {
    return ctx.reject({
      path: ["baseUrl"],
      expected: "an http(s):// or file:// URL",
      actual: options.baseUrl,
    });
  }

  return true;
});

/**
 * Merge user options over the defaults and validate the result
 *
 * @throws {ValidationError} If any option is out of range
 */
export function resolveOptions(overrides: Partial<ExtractionOptions> = {}): ExtractionOptions {
  const merged: ExtractionOptions = {
    maxReads: overrides.maxReads ?? DEFAULT_OPTIONS.maxReads,
    workers: overrides.workers ?? DEFAULT_OPTIONS.workers,
    chunkSize: overrides.chunkSize ?? DEFAULT_OPTIONS.chunkSize,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
    retries: overrides.retries ?? DEFAULT_OPTIONS.retries,
    retryDelayMs: overrides.retryDelayMs ?? DEFAULT_OPTIONS.retryDelayMs,
    // null is meaningful for both of these
    baseUrl: overrides.baseUrl !== undefined ? overrides.baseUrl : DEFAULT_OPTIONS.baseUrl,
    keywordsPath:
      overrides.keywordsPath !== undefined ? overrides.keywordsPath : DEFAULT_OPTIONS.keywordsPath,
    progress: overrides.progress ?? DEFAULT_OPTIONS.progress,
    fetch: overrides.fetch ?? DEFAULT_OPTIONS.fetch,
    grammars: overrides.grammars ?? DEFAULT_OPTIONS.grammars,
  };

  const result = ExtractionOptionsSchema({
    maxReads: merged.maxReads,
    workers: merged.workers,
    chunkSize: merged.chunkSize,
    timeoutMs: merged.timeoutMs,
    retries: merged.retries,
    retryDelayMs: merged.retryDelayMs,
    baseUrl: merged.baseUrl,
    keywordsPath: merged.keywordsPath,
    progress: merged.progress,
  });
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid options: ${result.summary}`);
  }

  return Object.freeze(merged);
}

/**
 * Pool size for a workers setting
 */
export function resolveWorkers(workers: ExtractionOptions["workers"]): number {
  return workers === "all" ? Math.max(1, availableParallelism()) : workers;
}
