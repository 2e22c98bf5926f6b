/**
 * Oxford Nanopore identifier lines
 *
 * A read UUID followed by whitespace-separated key=value pairs written by
 * the basecaller, e.g.
 *   @0a1b2c3d-... runid=<40 hex> read=12 ch=345 start_time=2018-08-10T09:15:00Z flow_cell_id=FAH12345
 * Lines with the UUID alone are accepted too. `run_date` is the earliest
 * start_time date across the sample.
 */

import type { FieldMap, ReadField } from "../types";
import { Technology } from "../types";
import { patternGrammar } from "./grammar";

const UUID_SOURCE = "[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}";
const NANOPORE_PATTERN = new RegExp(`^${UUID_SOURCE}((?:\\s+[A-Za-z_]+=\\S*)*)$`);

/**
 * Comment keys mapped to read fields, in the order they are preferred
 */
const COMMENT_KEYS: ReadonlyArray<readonly [string, ReadField]> = [
  ["runid", "run"],
  ["flow_cell_id", "flowcell"],
  ["ch", "channel"],
  ["read", "read_number"],
  ["start_time", "start_time"],
  ["basecall_model_version_id", "basecall_model"],
  ["model_version_id", "basecall_model"],
];

/**
 * Parse `key=value` tokens; the first occurrence of a key wins
 */
export function parseCommentPairs(comment: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const token of comment.trim().split(/\s+/)) {
    const eq = token.indexOf("=");
    if (eq <= 0) continue;
    const key = token.slice(0, eq);
    if (!pairs.has(key)) {
      pairs.set(key, token.slice(eq + 1));
    }
  }
  return pairs;
}

/**
 * Date part of the earliest ISO-8601 start_time
 */
export function earliestStartDate(extracted: readonly FieldMap[]): FieldMap {
  let earliest: string | undefined;
  for (const fields of extracted) {
    const date = /^(\d{4}-\d{2}-\d{2})/.exec(fields.start_time ?? "")?.[1];
    if (date !== undefined && (earliest === undefined || date < earliest)) {
      earliest = date;
    }
  }
  return earliest === undefined ? {} : { run_date: earliest };
}

export const nanopore = patternGrammar({
  id: "ont",
  technology: Technology.OXFORD_NANOPORE,
  fields: ["run", "flowcell", "channel", "read_number", "start_time", "run_date", "basecall_model"],
  pattern: NANOPORE_PATTERN,
  summarize: earliestStartDate,
  fieldsFrom: (m) => {
    const pairs = parseCommentPairs(m[1] ?? "");
    const fields: Partial<Record<ReadField, string>> = {};
    for (const [key, field] of COMMENT_KEYS) {
      const value = pairs.get(key);
      if (value !== undefined && value !== "" && fields[field] === undefined) {
        fields[field] = value;
      }
    }
    return fields;
  },
});
