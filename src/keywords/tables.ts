/**
 * Keyword tables: substrings mapped to canonical values per category
 *
 * Loaded once, validated, frozen, and shared by every worker.
 */

import { fileURLToPath } from "node:url";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError, ValidationError } from "../errors";
import { getPlatform } from "../io/runtime";
import type { FileType } from "../types";

export const KEYWORD_CATEGORIES = [
  "technology",
  "center",
  "sample",
  "trio",
  "ref_genome",
  "aligner",
  "variant_caller",
] as const;

export type KeywordCategory = (typeof KEYWORD_CATEGORIES)[number];

const KNOWN_CATEGORIES: ReadonlySet<string> = new Set(KEYWORD_CATEGORIES);

function isKeywordCategory(name: string): name is KeywordCategory {
  return KNOWN_CATEGORIES.has(name);
}

/**
 * Keyword file schema
 */
export const KeywordFileSchema = type({
  categories: {
    "[string]": { "[string]": "string[]" },
  },
  fileTypes: {
    fastq: "string[]",
    bam: "string[]",
    vcf: "string[]",
  },
}).narrow((file, ctx) => {
  for (const [name, mapping] of Object.entries(file.categories)) {
    if (!isKeywordCategory(name)) {
      return ctx.reject({
        path: ["categories", name],
        expected: `one of ${KEYWORD_CATEGORIES.join(", ")}`,
        actual: name,
      });
    }
    for (const [canonical, keywords] of Object.entries(mapping)) {
      if (keywords.some((keyword) => keyword.trim() === "")) {
        return ctx.reject({
          path: ["categories", name, canonical],
          expected: "non-empty keywords",
          actual: "an empty keyword",
        });
      }
    }
  }

  for (const [fileType, categories] of Object.entries(file.fileTypes)) {
    const missing = categories.find((category) => !(category in file.categories));
    if (missing !== undefined) {
      return ctx.reject({
        path: ["fileTypes", fileType],
        expected: "categories defined under categories",
        actual: missing,
      });
    }
  }

  return true;
});

export interface KeywordEntry {
  /** Lower-cased keyword */
  readonly keyword: string;
  readonly canonical: string;
  readonly category: KeywordCategory;
}

/**
 * Validated, frozen keyword tables
 *
 * @example
 * ```typescript
 * const tables = KeywordTables.fromJSON(JSON.parse(text), "keywords.json");
 * tables.canonicalFor("sample", "NA24385"); // "HG002"
 * ```
 */
export class KeywordTables {
  private readonly byCategory: ReadonlyMap<KeywordCategory, readonly KeywordEntry[]>;
  private readonly fileTypeCategories: Readonly<Record<FileType, readonly KeywordCategory[]>>;

  private constructor(
    byCategory: Map<KeywordCategory, readonly KeywordEntry[]>,
    fileTypeCategories: Record<FileType, readonly KeywordCategory[]>
  ) {
    this.byCategory = byCategory;
    this.fileTypeCategories = Object.freeze(fileTypeCategories);
    Object.freeze(this);
  }

  /**
   * Validate parsed keyword JSON and build the tables
   *
   * @throws {ValidationError} If the data does not match the keyword file shape
   */
  static fromJSON(data: unknown, source: string): KeywordTables {
    const file = KeywordFileSchema(data);
    if (file instanceof type.errors) {
      throw new ValidationError(`Invalid keyword file: ${file.summary}`, undefined, source);
    }

    const byCategory = new Map<KeywordCategory, readonly KeywordEntry[]>();
    for (const [name, mapping] of Object.entries(file.categories)) {
      if (!isKeywordCategory(name)) continue;
      const entries: KeywordEntry[] = [];
      for (const [canonical, keywords] of Object.entries(mapping)) {
        for (const keyword of keywords) {
          entries.push(Object.freeze({ keyword: keyword.toLowerCase(), canonical, category: name }));
        }
      }
      // longest first so scans can stop at the first hit per position
      entries.sort((a, b) => b.keyword.length - a.keyword.length);
      byCategory.set(name, Object.freeze(entries));
    }

    const categoriesOf = (names: readonly string[]): readonly KeywordCategory[] =>
      Object.freeze(names.filter(isKeywordCategory));

    return new KeywordTables(byCategory, {
      fastq: categoriesOf(file.fileTypes.fastq),
      bam: categoriesOf(file.fileTypes.bam),
      vcf: categoriesOf(file.fileTypes.vcf),
    });
  }

  /**
   * Categories the filename parser applies to a file type
   */
  categoriesFor(fileType: FileType): readonly KeywordCategory[] {
    return this.fileTypeCategories[fileType];
  }

  /**
   * Entries of one category, longest keyword first
   */
  entries(category: KeywordCategory): readonly KeywordEntry[] {
    return this.byCategory.get(category) ?? [];
  }

  /**
   * Canonical value for a whole value (a header tag, say), matched
   * case-insensitively against keywords and canonical names
   */
  canonicalFor(category: KeywordCategory, value: string): string | undefined {
    const needle = value.trim().toLowerCase();
    if (needle === "") return undefined;
    for (const entry of this.entries(category)) {
      if (entry.keyword === needle || entry.canonical.toLowerCase() === needle) {
        return entry.canonical;
      }
    }
    return undefined;
  }
}

/**
 * Location of the bundled keyword tables
 */
export function defaultKeywordsPath(): string {
  return fileURLToPath(new URL("../../data/keywords.json", import.meta.url));
}

/**
 * Read and validate a keyword file
 *
 * @throws {FileError} If the file cannot be read
 * @throws {ValidationError} If it is not valid JSON of the keyword file shape
 */
export async function loadKeywordTables(path: string | null = null): Promise<KeywordTables> {
  const location = path ?? defaultKeywordsPath();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs
      .readFileString(location)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", location, error)));
  });

  const text = await Effect.runPromise(Effect.either(program.pipe(Effect.provide(getPlatform()))));
  if (Either.isLeft(text)) {
    throw text.left;
  }

  let data: unknown;
  try {
    data = JSON.parse(text.right);
  } catch (error) {
    throw new ValidationError(
      `Keyword file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      location
    );
  }

  return KeywordTables.fromJSON(data, location);
}
