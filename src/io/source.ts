/**
 * Open local or remote sequencing files as decompressed byte streams
 *
 * Local paths go through the Effect platform FileSystem; http(s) URLs go
 * through fetch with a connect timeout and an idle-read timeout. The
 * first bytes decide the compression format. Every failure to get at the
 * bytes is reported as UnreadableFileError.
 */

import { fileURLToPath } from "node:url";
import { FileSystem } from "@effect/platform";
import { Effect, Either, Stream } from "effect";
import { CompressionDetector, MAGIC_BYTES_NEEDED, decompressStream } from "../compression";
import type { FetchLike } from "../config";
import {
  FileError,
  NetworkError,
  TimeoutError,
  UnreadableFileError,
  messageOf,
} from "../errors";
import type { CompressionFormat } from "../types";
import { getPlatform } from "./runtime";
import { BufferedStreamReader, withIdleTimeout } from "./stream-utils";

export interface ReadSourceOptions {
  /** Read size for local files */
  readonly chunkSize: number;
  /** Connect and idle-read timeout for remote sources */
  readonly timeoutMs: number;
  readonly fetch: FetchLike;
}

export interface ReadSource {
  /** Decompressed bytes */
  readonly stream: ReadableStream<Uint8Array>;
  readonly compression: CompressionFormat;
}

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/**
 * Open a file for sampling
 *
 * @throws {UnreadableFileError} If the file is missing, the request fails
 * or times out, or the compression format cannot be decoded
 *
 * @example
 * ```typescript
 * const { stream } = await openReadSource("reads/HG002.fastq.gz", resolveOptions());
 * for await (const line of readLines(stream)) { ... }
 * ```
 */
export async function openReadSource(
  location: string,
  options: ReadSourceOptions
): Promise<ReadSource> {
  const raw = isRemoteLocation(location)
    ? await openRemote(location, options)
    : await openLocal(toLocalPath(location), options.chunkSize);

  const buffered = new BufferedStreamReader(raw);
  let magic: Uint8Array;
  try {
    magic = await buffered.peek(MAGIC_BYTES_NEEDED);
  } catch (error) {
    throw UnreadableFileError.from(location, error);
  }

  const compression = CompressionDetector.detect(magic, location);
  const whole = buffered.stream();
  let stream: ReadableStream<Uint8Array>;
  try {
    stream = decompressStream(whole, compression);
  } catch (error) {
    await whole.cancel();
    throw new UnreadableFileError(messageOf(error), location, error);
  }

  return { stream, compression };
}

function toLocalPath(location: string): string {
  return /^file:\/\//i.test(location) ? fileURLToPath(location) : location;
}

/**
 * Stream a local file through the platform FileSystem
 */
async function openLocal(path: string, chunkSize: number): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs
      .stat(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(`Not a regular file: ${path}`, path, "open", undefined, `type ${info.type}`)
      );
    }

    const effectStream = fs.stream(path, { chunkSize }).pipe(
      Stream.mapError((error) => FileError.fromSystemError("read", path, error))
    );
    return Stream.toReadableStream(effectStream);
  });

  const result = await Effect.runPromise(
    Effect.either(program.pipe(Effect.provide(getPlatform())))
  );
  if (Either.isLeft(result)) {
    throw new UnreadableFileError(result.left.message, path, result.left);
  }
  return result.right;
}

/**
 * Fetch a remote file, bounding both the wait for a response and every
 * wait for the next body chunk
 */
async function openRemote(
  url: string,
  options: ReadSourceOptions
): Promise<ReadableStream<Uint8Array>> {
  const controller = new AbortController();
  const timedOut = (operation: TimeoutError["operation"]): UnreadableFileError => {
    controller.abort();
    const cause = new TimeoutError(
      `No ${operation === "connect" ? "response" : "data"} within ${options.timeoutMs}ms`,
      options.timeoutMs,
      operation
    );
    return new UnreadableFileError(cause.message, url, cause);
  };

  let timer: ReturnType<typeof setTimeout> | undefined;
  const connectTimeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(timedOut("connect")), options.timeoutMs);
  });

  let response: Response;
  try {
    response = await Promise.race([options.fetch(url, { signal: controller.signal }), connectTimeout]);
  } catch (error) {
    throw UnreadableFileError.from(url, error);
  } finally {
    clearTimeout(timer);
  }

  if (!response.ok) {
    await response.body?.cancel();
    const cause = new NetworkError(
      `HTTP ${response.status}${response.statusText !== "" ? ` ${response.statusText}` : ""}`,
      url,
      response.status
    );
    throw new UnreadableFileError(cause.message, url, cause);
  }

  if (response.body === null) {
    const cause = new NetworkError("Response has no body", url, response.status);
    throw new UnreadableFileError(cause.message, url, cause);
  }

  return withIdleTimeout(response.body, options.timeoutMs, () => timedOut("read"));
}
