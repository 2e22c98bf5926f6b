/**
 * MGI / DNBSEQ identifier lines
 *
 *   @<flowcell>L<lane>C<column>R<row><index>[/<read>]
 */

import { Technology } from "../types";
import { patternGrammar } from "./grammar";

export const mgiDnbseq = patternGrammar({
  id: "mgi-dnbseq",
  technology: Technology.BGI,
  fields: ["flowcell", "lane", "column", "row", "read_number"],
  pattern: /^([A-Z]+\d+)L(\d)C(\d{3})R(\d{3})\d+(?:\/([123]))?(?:\s+\S.*)?$/,
  fieldsFrom: (m) => ({
    flowcell: m[1],
    lane: m[2],
    column: m[3],
    row: m[4],
    read_number: m[5],
  }),
});
