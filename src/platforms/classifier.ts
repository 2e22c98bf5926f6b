/**
 * Technology classifier over sampled identifier lines
 */

import { ExtractionFailureError, messageOf } from "../errors";
import type { ClassificationResult, FieldMap, Grammar, GrammarId } from "../types";
import { READ_FIELDS, UNKNOWN_TECHNOLOGY } from "../types";
import { GRAMMARS } from "./registry";

/**
 * Pick the grammar that best explains a sample of identifier lines and
 * extract its fields
 *
 * Each line is credited to the first grammar, in priority order, that
 * recognizes it. The grammar with the most lines wins; ties go to the
 * earlier grammar. Fields are merged across the winner's lines, first
 * non-empty value per field. A sample nobody recognizes, including an
 * empty one, classifies as "unknown" with no fields.
 *
 * @throws {ExtractionFailureError} If the winner's extractor throws on a
 * line its recognizer accepted
 *
 * @example
 * ```typescript
 * const result = classify(["@m64011_190830_220126/4194373/ccs"]);
 * result.technology; // "PacBio"
 * result.fields.zmw; // "4194373"
 * ```
 */
export function classify(
  lines: Iterable<string>,
  grammars: readonly Grammar[] = GRAMMARS
): ClassificationResult {
  const matchedBy: Array<number> = [];
  const counts = grammars.map(() => 0);
  const sample: string[] = [];

  for (const line of lines) {
    sample.push(line);
    const index = grammars.findIndex((grammar) => grammar.recognize(line));
    matchedBy.push(index);
    if (index >= 0) {
      counts[index] = (counts[index] ?? 0) + 1;
    }
  }

  const tallies = tallyByGrammarId(grammars, counts);

  let winner = -1;
  let best = 0;
  counts.forEach((count, index) => {
    // strict comparison keeps the earlier grammar on ties
    if (count > best) {
      best = count;
      winner = index;
    }
  });

  const grammar = grammars[winner];
  if (grammar === undefined) {
    return freezeResult({
      technology: UNKNOWN_TECHNOLOGY,
      grammar: null,
      fields: {},
      evidence: { sampled: sample.length, matched: 0, tallies },
    });
  }

  const fields: FieldMap = {};
  const extracted: FieldMap[] = [];
  sample.forEach((line, position) => {
    if (matchedBy[position] !== winner) return;
    const lineFields = extractOrFail(grammar, line);
    extracted.push(lineFields);
    mergeFirstNonEmpty(fields, lineFields);
  });
  if (grammar.summarize !== undefined) {
    Object.assign(fields, summarizeOrFail(grammar, grammar.summarize, extracted));
  }

  return freezeResult({
    technology: grammar.technology,
    grammar: grammar.id,
    fields,
    evidence: { sampled: sample.length, matched: best, tallies },
  });
}

function extractOrFail(grammar: Grammar, line: string): FieldMap {
  try {
    return grammar.extract(line);
  } catch (error) {
    throw new ExtractionFailureError(
      `Grammar ${grammar.id} failed to extract a line it recognized: ${messageOf(error)}`,
      grammar.id,
      line,
      error
    );
  }
}

function summarizeOrFail(
  grammar: Grammar,
  summarize: (extracted: readonly FieldMap[]) => FieldMap,
  extracted: readonly FieldMap[]
): FieldMap {
  try {
    return summarize(extracted);
  } catch (error) {
    throw new ExtractionFailureError(
      `Grammar ${grammar.id} failed to summarize its lines: ${messageOf(error)}`,
      grammar.id,
      "",
      error
    );
  }
}

function mergeFirstNonEmpty(target: FieldMap, source: FieldMap): void {
  for (const key of READ_FIELDS) {
    const value = source[key];
    if (value !== undefined && value !== "" && target[key] === undefined) {
      target[key] = value;
    }
  }
}

function tallyByGrammarId(
  grammars: readonly Grammar[],
  counts: readonly number[]
): Record<GrammarId, number> {
  const tallies: Record<GrammarId, number> = {
    "illumina-casava": 0,
    "illumina-legacy": 0,
    "mgi-dnbseq": 0,
    "pacbio-ccs": 0,
    "pacbio-subread": 0,
    ont: 0,
    "ion-torrent": 0,
  };
  grammars.forEach((grammar, index) => {
    tallies[grammar.id] += counts[index] ?? 0;
  });
  return tallies;
}

function freezeResult(result: ClassificationResult): ClassificationResult {
  Object.freeze(result.fields);
  Object.freeze(result.evidence.tallies);
  Object.freeze(result.evidence);
  return Object.freeze(result);
}
