/**
 * Manifest reading and location resolution
 *
 * A manifest is a CSV file with a header row naming at least `file_type`,
 * `filename` and `filepath`. Anything wrong with the manifest itself is a
 * MalformedManifestError, raised before any entry is processed.
 */

import { dirname, isAbsolute, resolve } from "node:path";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { DSVParseError, MalformedManifestError, messageOf } from "../errors";
import { parseCSV } from "../formats/dsv";
import { getPlatform } from "../io/runtime";
import type { FileManifestEntry } from "../types";
import { FILE_TYPES, FileManifestEntrySchema } from "../types";

export const REQUIRED_COLUMNS = ["file_type", "filename", "filepath"] as const;

/**
 * A manifest entry with the location it will be read from
 */
export interface LocatedEntry {
  readonly entry: FileManifestEntry;
  readonly location: string;
}

const FILE_TYPE_SET: ReadonlySet<string> = new Set(FILE_TYPES);

function isAbsoluteUrl(location: string): boolean {
  return /^(https?|file):\/\//i.test(location);
}

/**
 * Join `filepath` and `filename`, unless `filepath` already ends with the
 * filename
 */
export function joinEntryPath(entry: Pick<FileManifestEntry, "filename" | "filepath">): string {
  const { filename, filepath } = entry;
  if (filepath === "") return filename;
  if (filepath === filename || filepath.endsWith(`/${filename}`)) return filepath;
  return `${filepath.replace(/\/+$/, "")}/${filename}`;
}

/**
 * Where an entry is read from
 *
 * Absolute URLs are kept. Other locations are resolved against `baseUrl`
 * with each path segment percent-encoded, or, when it is null, as
 * filesystem paths relative to `root`.
 *
 * @example
 * ```typescript
 * resolveLocation(entry, "https://example.org/data/", "/tmp");
 * // "https://example.org/data/HG002/reads.fastq.gz"
 * ```
 */
export function resolveLocation(
  entry: Pick<FileManifestEntry, "filename" | "filepath">,
  baseUrl: string | null,
  root: string
): string {
  const joined = joinEntryPath(entry);
  if (isAbsoluteUrl(joined)) return joined;
  if (baseUrl === null) {
    return isAbsolute(joined) ? joined : resolve(root, joined);
  }
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const escaped = joined
    .replace(/^\/+/, "")
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return new URL(escaped, base).href;
}

/**
 * Turn parsed manifest text into entries
 *
 * @throws {MalformedManifestError} On missing columns, an unknown file type
 * or a row that does not validate
 */
export function parseManifest(text: string, manifestPath: string): FileManifestEntry[] {
  let rows: ReturnType<typeof parseCSV>;
  try {
    rows = parseCSV(text.replace(/^\uFEFF/, ""));
  } catch (error) {
    const line = error instanceof DSVParseError ? error.line : undefined;
    throw new MalformedManifestError(
      `Manifest is not valid CSV: ${messageOf(error)}`,
      manifestPath,
      line,
      error
    );
  }

  const [header, ...body] = rows;
  if (header === undefined) {
    throw new MalformedManifestError("Manifest is empty", manifestPath);
  }

  const columns = header.fields.map((name) => name.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    throw new MalformedManifestError(
      `Manifest is missing required column${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
      manifestPath,
      header.line
    );
  }
  const indexOf = (name: (typeof REQUIRED_COLUMNS)[number]): number => columns.indexOf(name);
  const fileTypeAt = indexOf("file_type");
  const filenameAt = indexOf("filename");
  const filepathAt = indexOf("filepath");

  return body.map((row, index) => {
    const fileType = (row.fields[fileTypeAt] ?? "").trim().toLowerCase();
    if (!FILE_TYPE_SET.has(fileType)) {
      throw new MalformedManifestError(
        `Unknown file_type "${row.fields[fileTypeAt] ?? ""}"; expected one of ${FILE_TYPES.join(", ")}`,
        manifestPath,
        row.line
      );
    }

    const entry = FileManifestEntrySchema({
      index,
      fileType,
      filename: (row.fields[filenameAt] ?? "").trim(),
      filepath: (row.fields[filepathAt] ?? "").trim(),
    });
    if (entry instanceof type.errors) {
      throw new MalformedManifestError(`Invalid manifest row: ${entry.summary}`, manifestPath, row.line);
    }
    return Object.freeze(entry);
  });
}

/**
 * Read a manifest and resolve where each entry lives
 *
 * @throws {MalformedManifestError} If the manifest cannot be read or parsed
 */
export async function readManifest(
  manifestPath: string,
  baseUrl: string | null
): Promise<LocatedEntry[]> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs
      .readFileString(manifestPath)
      .pipe(
        Effect.mapError(
          (error) =>
            new MalformedManifestError(
              `Cannot read manifest: ${error.message}`,
              manifestPath,
              undefined,
              error
            )
        )
      );
  });

  const text = await Effect.runPromise(Effect.either(program.pipe(Effect.provide(getPlatform()))));
  if (Either.isLeft(text)) {
    throw text.left;
  }

  const root = dirname(resolve(manifestPath));
  return parseManifest(text.right, manifestPath).map((entry) => ({
    entry,
    location: resolveLocation(entry, baseUrl, root),
  }));
}
