/**
 * PacBio identifier-line grammars
 *
 * Read names are `<movie>/<zmw>/ccs[/fwd|/rev]` for consensus reads and
 * `<movie>/<zmw>/<start>_<end>` for subreads. Movie names encode the
 * instrument and the run start:
 *   Sequel, Sequel II, Revio:  m64011_190830_220126[_s1]
 *   RS II:                     m140415_143853_42175_c1006..._s1_p0
 */

import { Technology } from "../types";
import { patternGrammar } from "./grammar";

const SEQUEL_MOVIE = /^m([A-Za-z]?\d+[A-Za-z]?)_(\d{2})(\d{2})(\d{2})_\d{6}(?:_s\d+)?$/;
const RSII_MOVIE = /^m(\d{2})(\d{2})(\d{2})_\d{6}_([A-Za-z0-9]+)_c\d+_s\d+_p\d+$/;

const MOVIE_SOURCE = `(m\\d{6}_\\d{6}_[A-Za-z0-9]+_c\\d+_s\\d+_p\\d+|m[A-Za-z]?\\d+[A-Za-z]?_\\d{6}_\\d{6}(?:_s\\d+)?)`;
const COMMENT_SOURCE = `(?:\\s+\\S.*)?`;

const CCS_PATTERN = new RegExp(`^${MOVIE_SOURCE}/(\\d+)/ccs(?:/(fwd|rev))?${COMMENT_SOURCE}$`);
const SUBREAD_PATTERN = new RegExp(`^${MOVIE_SOURCE}/(\\d+)/(\\d+)_(\\d+)${COMMENT_SOURCE}$`);

export interface MovieInfo {
  readonly instrument?: string;
  /** ISO date (YYYY-MM-DD) of the run start */
  readonly runDate?: string;
}

/**
 * Split a movie name into instrument serial and run date
 *
 * @example
 * ```typescript
 * parseMovieName("m64011_190830_220126");
 * // { instrument: "64011", runDate: "2019-08-30" }
 * ```
 */
export function parseMovieName(movie: string): MovieInfo {
  const rs = RSII_MOVIE.exec(movie);
  if (rs !== null) {
    return { instrument: rs[4], runDate: `20${rs[1]}-${rs[2]}-${rs[3]}` };
  }

  const sequel = SEQUEL_MOVIE.exec(movie);
  if (sequel !== null) {
    return { instrument: sequel[1], runDate: `20${sequel[2]}-${sequel[3]}-${sequel[4]}` };
  }

  return {};
}

export const pacbioCcs = patternGrammar({
  id: "pacbio-ccs",
  technology: Technology.PACBIO,
  fields: ["movie", "instrument", "run_date", "zmw", "read_type", "strand"],
  pattern: CCS_PATTERN,
  fieldsFrom: (m) => {
    const movie = m[1] ?? "";
    const { instrument, runDate } = parseMovieName(movie);
    return {
      movie,
      instrument,
      run_date: runDate,
      zmw: m[2],
      read_type: "CCS",
      strand: m[3],
    };
  },
});

export const pacbioSubread = patternGrammar({
  id: "pacbio-subread",
  technology: Technology.PACBIO,
  fields: ["movie", "instrument", "run_date", "zmw", "read_type"],
  pattern: SUBREAD_PATTERN,
  fieldsFrom: (m) => {
    const movie = m[1] ?? "";
    const { instrument, runDate } = parseMovieName(movie);
    return {
      movie,
      instrument,
      run_date: runDate,
      zmw: m[2],
      read_type: "CLR",
    };
  },
});
