/**
 * Platform identifier-line grammars and the technology classifier
 */

export { classify } from "./classifier";
export { compactFields, patternGrammar, stripSeparator } from "./grammar";
export { illuminaCasava, illuminaLegacy } from "./illumina";
export { ionTorrent } from "./ion-torrent";
export { mgiDnbseq } from "./mgi";
export { nanopore, parseCommentPairs } from "./nanopore";
export { pacbioCcs, pacbioSubread, parseMovieName } from "./pacbio";
export type { MovieInfo } from "./pacbio";
export { GRAMMAR_IDS, GRAMMARS } from "./registry";
