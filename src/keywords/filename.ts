/**
 * Filename and path keyword parser
 *
 * Scans the filename first, then each directory from the deepest up, for
 * keywords from the tables. Within a component matching is
 * case-insensitive and leftmost-longest: at each position the longest
 * keyword of any active category wins and the scan resumes after it, so a
 * short keyword inside a longer one never matches. Keywords of three
 * characters or fewer must stand between non-alphanumeric characters.
 */

import type { ClassificationResult, FileType, FilenameFields, TechnologySource } from "../types";
import { UNKNOWN_TECHNOLOGY } from "../types";
import type { KeywordCategory, KeywordEntry, KeywordTables } from "./tables";

const SHORT_KEYWORD_LENGTH = 3;

const DATE_PATTERNS: ReadonlyArray<{
  readonly pattern: RegExp;
  readonly toIso: (m: RegExpExecArray) => string;
}> = [
  {
    // 2023-01-31
    pattern: /(?<!\d)((?:19|20)\d{2})-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])(?!\d)/,
    toIso: (m) => `${m[1]}-${m[2]}-${m[3]}`,
  },
  {
    // 01-31-2023
    pattern: /(?<!\d)(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])-((?:19|20)\d{2})(?!\d)/,
    toIso: (m) => `${m[3]}-${m[1]}-${m[2]}`,
  },
  {
    // 20230131
    pattern: /(?<!\d)((?:19|20)\d{2})(0[1-9]|1[0-2])(0[1-9]|[12]\d|3[01])(?!\d)/,
    toIso: (m) => `${m[1]}-${m[2]}-${m[3]}`,
  },
];

/**
 * Split a location into path components, filename first, then the
 * directories from deepest to shallowest
 */
export function pathComponents(location: string): string[] {
  let path = location;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(location)) {
    try {
      path = new URL(location).pathname;
    } catch {
      path = location.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, "");
    }
  }

  return path
    .split(/[/\\]+/)
    .filter((part) => part !== "")
    .map(decodeComponent)
    .reverse();
}

function decodeComponent(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}

function isAlphanumeric(char: string | undefined): boolean {
  return char !== undefined && /[a-z0-9]/i.test(char);
}

function standsAlone(text: string, start: number, length: number): boolean {
  return !isAlphanumeric(text[start - 1]) && !isAlphanumeric(text[start + length]);
}

export interface KeywordHit {
  readonly category: KeywordCategory;
  readonly canonical: string;
  readonly keyword: string;
  /** Offset within the component */
  readonly position: number;
}

/**
 * Leftmost-longest, non-overlapping keyword scan of one component
 */
export function scanComponent(
  component: string,
  tables: KeywordTables,
  categories: readonly KeywordCategory[]
): KeywordHit[] {
  const text = component.toLowerCase();
  const hits: KeywordHit[] = [];
  let position = 0;

  while (position < text.length) {
    let longest = 0;
    let atPosition: KeywordEntry[] = [];

    for (const category of categories) {
      for (const entry of tables.entries(category)) {
        const length = entry.keyword.length;
        if (length < longest) break;
        if (!text.startsWith(entry.keyword, position)) continue;
        if (length <= SHORT_KEYWORD_LENGTH && !standsAlone(text, position, length)) continue;

        if (length > longest) {
          longest = length;
          atPosition = [entry];
        } else if (!atPosition.some((e) => e.category === entry.category)) {
          atPosition.push(entry);
        }
        // entries are longest first; nothing later in this category is longer
        break;
      }
    }

    if (longest === 0) {
      position++;
      continue;
    }

    for (const entry of atPosition) {
      hits.push({
        category: entry.category,
        canonical: entry.canonical,
        keyword: entry.keyword,
        position,
      });
    }
    position += longest;
  }

  return hits;
}

/**
 * First date-shaped token, as YYYY-MM-DD
 */
export function findDate(component: string): string | undefined {
  for (const { pattern, toIso } of DATE_PATTERNS) {
    const match = pattern.exec(component);
    if (match !== null) return toIso(match);
  }
  return undefined;
}

/**
 * Normalize a header date (`YYYYMMDD`, or ISO-8601 with or without a
 * time) to YYYY-MM-DD; other values are returned unchanged
 */
export function isoDate(value: string): string {
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (compact !== null) return `${compact[1]}-${compact[2]}-${compact[3]}`;
  const iso = /^(\d{4}-\d{2}-\d{2})(?:[T ]|$)/.exec(value);
  return iso?.[1] ?? value;
}

/**
 * Extract keyword fields from a file's name and path
 *
 * @example
 * ```typescript
 * parseFilename("giab/HG002_PacBio_CCS.fastq.gz", tables, "fastq");
 * // { sample: "HG002", technology: "PacBio", center: "PacBio" }
 * ```
 */
export function parseFilename(
  location: string,
  tables: KeywordTables,
  fileType: FileType
): FilenameFields {
  const categories = tables.categoriesFor(fileType);
  const fields: FilenameFields = {};
  const decided = new Set<KeywordCategory>();

  for (const component of pathComponents(location)) {
    const lastHit = new Map<KeywordCategory, string>();
    for (const hit of scanComponent(component, tables, categories)) {
      if (!decided.has(hit.category)) {
        lastHit.set(hit.category, hit.canonical);
      }
    }
    for (const [category, canonical] of lastHit) {
      fields[category] = canonical;
      decided.add(category);
    }

    if (fields.date === undefined) {
      const date = findDate(component);
      if (date !== undefined) fields.date = date;
    }
  }

  return fields;
}

export interface ResolvedTechnology {
  readonly technology: string;
  readonly source: TechnologySource;
}

/**
 * Reconcile technology evidence: read content, then file header, then
 * filename keywords
 */
export function resolveTechnology(
  classification: ClassificationResult | null,
  headerTechnology: string | undefined,
  filenameTechnology: string | undefined
): ResolvedTechnology {
  if (classification !== null && classification.technology !== UNKNOWN_TECHNOLOGY) {
    return { technology: classification.technology, source: "content" };
  }
  if (headerTechnology !== undefined && headerTechnology !== "") {
    return { technology: headerTechnology, source: "header" };
  }
  if (filenameTechnology !== undefined && filenameTechnology !== "") {
    return { technology: filenameTechnology, source: "filename" };
  }
  return { technology: UNKNOWN_TECHNOLOGY, source: "" };
}
