/**
 * CSV State Machine Module
 *
 * RFC 4180 parsing over whole documents: quoted fields, doubled quotes and
 * line breaks inside quoted fields.
 */

import { DSVParseError } from "../../errors";

export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

export interface CSVRow {
  /** 1-based line on which the row starts */
  readonly line: number;
  readonly fields: readonly string[];
}

/**
 * Parse a single CSV row
 *
 * @throws {DSVParseError} On an unclosed quote or a line break outside quotes
 */
export function parseCSVRow(line: string, delimiter = ",", quote = '"'): string[] {
  const rows = parseCSV(line, delimiter, quote);
  const first = rows[0];
  if (rows.length > 1) {
    throw new DSVParseError("Row contains an unquoted line break", 1, undefined, line);
  }
  return first === undefined ? [] : [...first.fields];
}

/**
 * Split CSV text into rows of fields
 *
 * Blank lines are skipped. A `\r\n`, `\n` or `\r` ends a row unless it sits
 * inside a quoted field.
 *
 * @example
 * ```typescript
 * parseCSV('a,"b\nc"\n1,2\n');
 * // [{ line: 1, fields: ["a", "b\nc"] }, { line: 3, fields: ["1", "2"] }]
 * ```
 * @throws {DSVParseError} On a quote left open at the end of the text
 */
export function parseCSV(text: string, delimiter = ",", quote = '"'): CSVRow[] {
  const rows: CSVRow[] = [];
  let fields: string[] = [];
  let current = "";
  let state = CSVParseState.FIELD_START;
  let line = 1;
  let rowLine = 1;
  // a row with no characters at all is a blank line
  let rowHasContent = false;

  const endField = (): void => {
    fields.push(current);
    current = "";
    state = CSVParseState.FIELD_START;
  };

  const endRow = (): void => {
    if (rowHasContent) {
      endField();
      rows.push(Object.freeze({ line: rowLine, fields: Object.freeze(fields) }));
    }
    fields = [];
    current = "";
    state = CSVParseState.FIELD_START;
    rowHasContent = false;
  };

  let i = 0;
  while (i < text.length) {
    const char = text.charAt(i);
    const isBreak = char === "\n" || char === "\r";
    const breakLength = char === "\r" && text.charAt(i + 1) === "\n" ? 2 : 1;

    switch (state) {
      case CSVParseState.FIELD_START:
      case CSVParseState.UNQUOTED_FIELD:
      case CSVParseState.QUOTE_IN_QUOTED:
        if (isBreak) {
          endRow();
          line++;
          rowLine = line;
          i += breakLength;
          continue;
        }
        rowHasContent = true;
        if (char === delimiter) {
          endField();
        } else if (char === quote && state === CSVParseState.FIELD_START) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === quote && state === CSVParseState.QUOTE_IN_QUOTED) {
          current += quote;
          state = CSVParseState.QUOTED_FIELD;
        } else {
          // text after a closing quote is kept as part of the field
          current += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        i++;
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
          i++;
        } else {
          if (isBreak) line++;
          current += text.slice(i, i + (isBreak ? breakLength : 1));
          i += isBreak ? breakLength : 1;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", rowLine, fields.length + 1, current);
  }
  endRow();

  return rows;
}
