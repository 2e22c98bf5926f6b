/**
 * Tests for opening local and remote sources
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { gzipSync } from "fflate";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import type { FetchLike } from "../../src/config";
import { UnreadableFileError } from "../../src/errors";
import { openReadSource } from "../../src/io/source";
import { bytes, chunkedStream, readAll, stalledStream } from "../utils/streams";

const TEXT = "@r1\nACGT\n+\nIIII\n";

const unusedFetch: FetchLike = () => Promise.reject(new Error("no network in tests"));

function options(fetch: FetchLike = unusedFetch, timeoutMs = 1_000) {
  return { chunkSize: 1024, timeoutMs, fetch };
}

async function openError(location: string, fetch?: FetchLike, timeoutMs?: number): Promise<unknown> {
  try {
    await openReadSource(location, options(fetch, timeoutMs));
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("openReadSource", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "readtrail-source-"));
    await writeFile(join(dir, "plain.fastq"), TEXT);
    await writeFile(join(dir, "packed.fastq.gz"), gzipSync(bytes(TEXT)));
    await writeFile(join(dir, "packed.fastq.zst"), new Uint8Array([0x28, 0xb5, 0x2f, 0xfd, 0x00]));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("local files", () => {
    test("should stream a plain file", async () => {
      const source = await openReadSource(join(dir, "plain.fastq"), options());

      expect(source.compression).toBe("none");
      expect(await readAll(source.stream)).toBe(TEXT);
    });

    test("should decompress a gzip file", async () => {
      const source = await openReadSource(join(dir, "packed.fastq.gz"), options());

      expect(source.compression).toBe("gzip");
      expect(await readAll(source.stream)).toBe(TEXT);
    });

    test("should accept file:// URLs", async () => {
      const source = await openReadSource(pathToFileURL(join(dir, "plain.fastq")).href, options());

      expect(await readAll(source.stream)).toBe(TEXT);
    });

    test("should report a missing file as unreadable", async () => {
      const error = await openError(join(dir, "absent.fastq"));

      expect(error).toBeInstanceOf(UnreadableFileError);
    });

    test("should report a directory as unreadable", async () => {
      const error = await openError(dir);

      expect(error).toBeInstanceOf(UnreadableFileError);
    });

    test("should report zstd input as unreadable", async () => {
      const error = await openError(join(dir, "packed.fastq.zst"));

      expect(error).toBeInstanceOf(UnreadableFileError);
      if (error instanceof UnreadableFileError) {
        expect(error.message).toBe(
          "Zstandard-compressed input is not supported; recompress with gzip or bgzip"
        );
      }
    });
  });

  describe("remote files", () => {
    const url = "https://example.test/reads/HG002.fastq.gz";

    test("should fetch and decompress a remote body", async () => {
      const requested: string[] = [];
      const fetch: FetchLike = (target) => {
        requested.push(target);
        return Promise.resolve(new Response(chunkedStream([gzipSync(bytes(TEXT))]).stream));
      };

      const source = await openReadSource(url, options(fetch));

      expect(requested).toEqual([url]);
      expect(source.compression).toBe("gzip");
      expect(await readAll(source.stream)).toBe(TEXT);
    });

    test("should report an HTTP error status as unreadable", async () => {
      const fetch: FetchLike = () =>
        Promise.resolve(new Response("missing", { status: 404, statusText: "Not Found" }));

      const error = await openError(url, fetch);

      expect(error).toBeInstanceOf(UnreadableFileError);
      if (error instanceof UnreadableFileError) {
        expect(error.message).toBe("HTTP 404 Not Found");
        expect(error.location).toBe(url);
      }
    });

    test("should report a failed request as unreadable", async () => {
      const error = await openError(url, () => Promise.reject(new Error("connection refused")));

      expect(error).toBeInstanceOf(UnreadableFileError);
      if (error instanceof UnreadableFileError) {
        expect(error.message).toBe("connection refused");
      }
    });

    test("should time out when no response arrives", async () => {
      const error = await openError(url, () => new Promise<Response>(() => {}), 30);

      expect(error).toBeInstanceOf(UnreadableFileError);
      if (error instanceof UnreadableFileError) {
        expect(error.message).toBe("No response within 30ms");
      }
    });

    test("should time out when the body stalls", async () => {
      const fetch: FetchLike = () => Promise.resolve(new Response(stalledStream()));

      const error = await openError(url, fetch, 30);

      expect(error).toBeInstanceOf(UnreadableFileError);
      if (error instanceof UnreadableFileError) {
        expect(error.message).toBe("No data within 30ms");
      }
    });

    test("should abort the request on timeout", async () => {
      let signal: AbortSignal | undefined;
      const fetch: FetchLike = (_url, init) => {
        signal = init.signal;
        return new Promise<Response>(() => {});
      };

      await openError(url, fetch, 30);

      expect(signal?.aborted).toBe(true);
    });
  });
});
