/**
 * Ion Torrent identifier lines: `@<run>:<row>:<column>`
 */

import { Technology } from "../types";
import { patternGrammar } from "./grammar";

export const ionTorrent = patternGrammar({
  id: "ion-torrent",
  technology: Technology.ION_TORRENT,
  fields: ["run", "row", "column"],
  pattern: /^([A-Z0-9]{5}):(\d{5}):(\d{5})(?:\s+\S.*)?$/,
  fieldsFrom: (m) => ({ run: m[1], row: m[2], column: m[3] }),
});
