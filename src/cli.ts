/**
 * readtrail command line
 *
 * Exit codes: 0 when the run completes (per-file failures are in the
 * output), 1 when the manifest is malformed or the output cannot be
 * written, 2 on invalid options.
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { ExtractionOptions } from "./config";
import { DEFAULT_OPTIONS } from "./config";
import { MalformedManifestError, ValidationError, messageOf } from "./errors";
import { runFromManifest } from "./pipeline/run";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

interface CliOptions {
  numReads: number;
  workers: number | "all";
  outputDir: string;
  verbose?: boolean;
  progress?: boolean;
  chunkSize: number;
  timeout: number;
  retries: number;
  baseUrl?: string;
  local?: boolean;
  keywords?: string;
}

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function packageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

function parseInteger(value: string, what: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${what} must be an integer.`);
  }
  return Number.parseInt(value, 10);
}

export function parseNumReads(value: string): number {
  const reads = parseInteger(value, "Read count");
  if (reads === 0 || reads < -1) {
    throw new InvalidArgumentError("Read count must be positive, or -1 for every read.");
  }
  return reads;
}

export function parseWorkers(value: string): number | "all" {
  if (value.trim().toLowerCase() === "all") return "all";
  const workers = parseInteger(value, "Worker count");
  if (workers < 1) {
    throw new InvalidArgumentError('Worker count must be at least 1, or "all".');
  }
  return workers;
}

function positive(what: string): (value: string) => number {
  return (value) => {
    const n = parseInteger(value, what);
    if (n < 1) throw new InvalidArgumentError(`${what} must be at least 1.`);
    return n;
  };
}

function nonNegative(what: string): (value: string) => number {
  return (value) => {
    const n = parseInteger(value, what);
    if (n < 0) throw new InvalidArgumentError(`${what} must not be negative.`);
    return n;
  };
}

/**
 * Build the command; `onRun` receives the manifest path and parsed options
 */
export function buildProgram(
  io: CliIO,
  onRun: (manifest: string, options: CliOptions) => Promise<void>
): Command {
  return new Command()
    .name("readtrail")
    .description(
      "Extract center, sample and sequencing technology metadata for every file in a manifest"
    )
    .version(packageVersion(), "-V, --version")
    .argument("<file_list>", "CSV manifest with file_type, filename and filepath columns")
    .option(
      "-n, --num-reads <n>",
      "reads sampled per file; -1 samples every read",
      parseNumReads,
      DEFAULT_OPTIONS.maxReads
    )
    .option("-w, --workers <n|all>", "files processed at once", parseWorkers, DEFAULT_OPTIONS.workers)
    .option("-o, --output-dir <dir>", "directory for the metadata CSV", ".")
    .option("-v, --verbose", "log every stage of every file")
    .option("-p, --progress", "log progress after each file")
    .option(
      "--chunk-size <bytes>",
      "largest block of data split into lines at once",
      positive("Chunk size"),
      DEFAULT_OPTIONS.chunkSize
    )
    .option(
      "--timeout <ms>",
      "give up on a remote file after this long without data",
      positive("Timeout"),
      DEFAULT_OPTIONS.timeoutMs
    )
    .option(
      "--retries <n>",
      "further attempts at a remote file that could not be read",
      nonNegative("Retry count"),
      DEFAULT_OPTIONS.retries
    )
    .option("--base-url <url>", "base URL for relative manifest paths")
    .option("--local", "resolve relative manifest paths on the local filesystem")
    .option("--keywords <file>", "keyword table file to use instead of the bundled one")
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .exitOverride()
    .action(onRun);
}

/**
 * Translate parsed flags into extraction options
 */
export function toExtractionOptions(options: CliOptions): Partial<ExtractionOptions> {
  let baseUrl: string | null | undefined = options.baseUrl;
  if (options.local === true) baseUrl = null;

  return {
    maxReads: options.numReads,
    workers: options.workers,
    chunkSize: options.chunkSize,
    timeoutMs: options.timeout,
    retries: options.retries,
    progress: options.progress === true,
    keywordsPath: options.keywords ?? null,
    ...(baseUrl !== undefined ? { baseUrl } : {}),
  };
}

/**
 * Run the CLI on arguments without the node and script entries
 *
 * @returns The process exit code
 */
export async function run(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode = EXIT_OK;

  const program = buildProgram(io, async (manifest, options) => {
    if (options.local === true && options.baseUrl !== undefined) {
      throw new ValidationError("--local and --base-url cannot be used together");
    }
    const summary = await runFromManifest(manifest, options.outputDir, toExtractionOptions(options), {
      verbose: options.verbose === true,
    });
    io.stdout(
      `Wrote ${summary.outcomes.length} rows to ${summary.outputPath}` +
        (summary.failed > 0 ? ` (${summary.failed} failed)` : "") +
        "\n"
    );
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0; anything else commander rejects is a usage error
      exitCode = error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    } else if (error instanceof ValidationError) {
      io.stderr(`error: ${error.message}\n`);
      exitCode = EXIT_USAGE;
    } else if (error instanceof MalformedManifestError) {
      io.stderr(`error: ${error.message} (${error.manifestPath})\n`);
      exitCode = EXIT_FATAL;
    } else {
      io.stderr(`error: ${messageOf(error)}\n`);
      exitCode = EXIT_FATAL;
    }
  }

  return exitCode;
}
