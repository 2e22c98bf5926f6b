/**
 * @module formats/dsv
 * @description Comma-separated manifest parsing and metadata CSV output
 */

export { CSVParseState, type CSVRow, parseCSV, parseCSVRow } from "./state-machine";
export { type CSVWriterOptions, formatField, formatRow, toCSV } from "./writer";
