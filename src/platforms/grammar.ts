/**
 * Building blocks for identifier-line grammars
 */

import { READ_FIELDS } from "../types";
import type { FieldMap, Grammar, GrammarId, ReadField, Technology } from "../types";

/**
 * Record-separator characters stripped before matching
 */
const RECORD_SEPARATORS = new Set(["@", ">"]);

/**
 * Remove one leading record separator and any trailing whitespace
 */
export function stripSeparator(line: string): string {
  const trimmed = line.trimEnd();
  const first = trimmed.charAt(0);
  return RECORD_SEPARATORS.has(first) ? trimmed.slice(1) : trimmed;
}

/**
 * Build a FieldMap keeping only non-empty values
 */
export function compactFields(values: Partial<Record<ReadField, string | undefined>>): FieldMap {
  const fields: FieldMap = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== "" && isReadField(key)) {
      fields[key] = value;
    }
  }
  return fields;
}

const READ_FIELD_SET: ReadonlySet<string> = new Set(READ_FIELDS);

function isReadField(key: string): key is ReadField {
  return READ_FIELD_SET.has(key);
}

interface PatternGrammarDefinition {
  readonly id: GrammarId;
  readonly technology: Technology;
  readonly fields: readonly ReadField[];
  /** Anchored pattern matched against the line without its separator */
  readonly pattern: RegExp;
  /** Map a successful match to field values */
  readonly fieldsFrom: (match: RegExpExecArray) => Partial<Record<ReadField, string | undefined>>;
  readonly summarize?: Grammar["summarize"];
}

/**
 * Create a grammar whose shape is a single anchored regular expression
 *
 * @example
 * ```typescript
 * const ionTorrent = patternGrammar({
 *   id: "ion-torrent",
 *   technology: Technology.ION_TORRENT,
 *   fields: ["run", "row", "column"],
 *   pattern: /^([A-Z0-9]{5}):(\d{5}):(\d{5})$/,
 *   fieldsFrom: (m) => ({ run: m[1], row: m[2], column: m[3] }),
 * });
 * ```
 */
export function patternGrammar(definition: PatternGrammarDefinition): Grammar {
  const { id, technology, fields, pattern, fieldsFrom, summarize } = definition;

  return Object.freeze({
    id,
    technology,
    fields: Object.freeze([...fields]),
    ...(summarize !== undefined ? { summarize } : {}),
    recognize(line: string): boolean {
      return pattern.test(stripSeparator(line));
    },
    extract(line: string): FieldMap {
      const match = pattern.exec(stripSeparator(line));
      if (match === null) {
        throw new Error(`line does not match the ${id} shape`);
      }
      return compactFields(fieldsFrom(match));
    },
  });
}
