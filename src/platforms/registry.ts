/**
 * Identifier-line grammars in priority order
 *
 * Order matters: a line is credited to the first grammar that recognizes
 * it, and ties between grammars resolve to the earlier one. More
 * constrained shapes come first.
 */

import type { Grammar, GrammarId } from "../types";
import { illuminaCasava, illuminaLegacy } from "./illumina";
import { ionTorrent } from "./ion-torrent";
import { mgiDnbseq } from "./mgi";
import { nanopore } from "./nanopore";
import { pacbioCcs, pacbioSubread } from "./pacbio";

export const GRAMMARS: readonly Grammar[] = Object.freeze([
  illuminaCasava,
  illuminaLegacy,
  mgiDnbseq,
  pacbioCcs,
  pacbioSubread,
  nanopore,
  ionTorrent,
]);

export const GRAMMAR_IDS: readonly GrammarId[] = Object.freeze(GRAMMARS.map((g) => g.id));
