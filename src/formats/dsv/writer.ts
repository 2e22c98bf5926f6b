/**
 * @module formats/dsv/writer
 * @description RFC 4180 CSV formatting
 */

export interface CSVWriterOptions {
  readonly delimiter?: string;
  readonly quote?: string;
  readonly lineEnding?: string;
}

/**
 * Format one field, quoting it when it holds the delimiter, a quote or a
 * line break
 */
export function formatField(
  value: string | number | null | undefined,
  delimiter = ",",
  quote = '"'
): string {
  if (value == null) return "";
  const field = String(value);

  const needsQuoting =
    field.includes(delimiter) ||
    field.includes(quote) ||
    field.includes("\n") ||
    field.includes("\r");
  if (!needsQuoting) return field;

  return quote + field.split(quote).join(quote + quote) + quote;
}

export function formatRow(
  values: readonly (string | number | null | undefined)[],
  options: CSVWriterOptions = {}
): string {
  const { delimiter = ",", quote = '"' } = options;
  return values.map((value) => formatField(value, delimiter, quote)).join(delimiter);
}

/**
 * Render records as CSV with a header row, columns in the given order
 *
 * Every line, the last included, ends with the line ending.
 */
export function toCSV<C extends string>(
  columns: readonly C[],
  records: Iterable<Readonly<Record<C, string>>>,
  options: CSVWriterOptions = {}
): string {
  const lineEnding = options.lineEnding ?? "\r\n";
  const lines = [formatRow(columns, options)];
  for (const record of records) {
    lines.push(formatRow(columns.map((column) => record[column]), options));
  }
  return lines.join(lineEnding) + lineEnding;
}
