/**
 * Illumina identifier-line grammars
 *
 * CASAVA 1.8+:
 *   @<instrument>:<run>:<flowcell>:<lane>:<tile>:<x>:<y>[:<umi>] <read>:<filtered>:<control>:<index>
 * Pre-1.8:
 *   @<instrument>:<lane>:<tile>:<x>:<y>[#<index>][/<read>]
 */

import { Technology } from "../types";
import { patternGrammar } from "./grammar";

const CASAVA_PATTERN =
  /^([A-Za-z0-9_-]+):(\d+):([A-Za-z0-9_-]+):(\d+):(\d+):(\d+):(\d+)(?::([ACGTN+]+))?(?:\s+([123]):([YN]):(\d+):([A-Za-z0-9+_-]*))?$/;

const LEGACY_PATTERN = /^([A-Za-z0-9_.-]+):(\d+):(\d+):(-?\d+):(-?\d+)(?:#([A-Za-z0-9]+))?(?:\/([123]))?$/;

export const illuminaCasava = patternGrammar({
  id: "illumina-casava",
  technology: Technology.ILLUMINA,
  fields: [
    "instrument",
    "run",
    "flowcell",
    "lane",
    "tile",
    "x",
    "y",
    "umi",
    "read_number",
    "filtered",
    "control_number",
    "barcode",
  ],
  pattern: CASAVA_PATTERN,
  fieldsFrom: (m) => ({
    instrument: m[1],
    run: m[2],
    flowcell: m[3],
    lane: m[4],
    tile: m[5],
    x: m[6],
    y: m[7],
    umi: m[8],
    read_number: m[9],
    filtered: m[10],
    control_number: m[11],
    barcode: m[12],
  }),
});

export const illuminaLegacy = patternGrammar({
  id: "illumina-legacy",
  technology: Technology.ILLUMINA,
  fields: ["instrument", "lane", "tile", "x", "y", "barcode", "read_number"],
  pattern: LEGACY_PATTERN,
  fieldsFrom: (m) => ({
    instrument: m[1],
    lane: m[2],
    tile: m[3],
    x: m[4],
    y: m[5],
    barcode: m[6],
    read_number: m[7],
  }),
});
