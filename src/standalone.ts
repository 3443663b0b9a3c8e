/**
 * @fileoverview Standalone functions for one-shot reading and formatting,
 * for callers that do not need to hold on to a reader.
 */

import RecordReader, { CSVError, type CsvRecord, type CSVReadOptions } from './index';
import { CsvLineFormatter, type CsvDialect, type FieldValue } from './engine';

/**
 * Read every accepted record of a CSV string.
 *
 * @param content - CSV text
 * @param options - Reader and dialect options
 * @returns All records the transform accepted, in input order
 * @example
 * ```typescript
 * readRecords('id,name\n1,Ann\n2,Bob');
 * // [{ id: '1', name: 'Ann' }, { id: '2', name: 'Bob' }]
 * ```
 */
export function readRecords(content: string, options: CSVReadOptions = {}): CsvRecord[] {
  return [...RecordReader.fromString(content, options)];
}

/**
 * Read only the header row of a CSV string.
 * Returns an empty list for empty input.
 */
export function readColumnNames(content: string, options: CsvDialect = {}): string[] {
  return RecordReader.fromString(content, { ...options, columns: 'auto' }).getColumnNames();
}

/**
 * Format one row of values as a delimited line.
 *
 * @param values - Field values in order
 * @param options - Dialect options; `eol` is appended when set
 * @returns The formatted line
 * @throws {CSVError} If the values cannot be formatted
 * @example
 * ```typescript
 * formatRow(['Hurtig', 'Hugo', 'a;b'], { delimiter: ';' });
 * // 'Hurtig;Hugo;"a;b"'
 * ```
 */
export function formatRow(values: readonly FieldValue[], options: CsvDialect = {}): string {
  const formatter = new CsvLineFormatter(options);
  const line = formatter.combine(values) ? formatter.string() : undefined;
  if (line === undefined) {
    throw formatter.lastError ?? new CSVError('Failed to format CSV row');
  }
  return line;
}
