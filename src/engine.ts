/**
 * @fileoverview Adapters between the record reader and the `csv` package:
 * tokenizing input into raw rows and formatting values back into lines.
 */

import { parse as parseCSV, stringify as stringifyCSV } from 'csv/sync';
import { parse as parseCSVAsync } from 'csv';
import { pipeline as streamPipeline } from 'node:stream';
import { promisify } from 'node:util';
import { CSVError } from './index';

const pipelineAsync = promisify(streamPipeline);

/**
 * A tokenized row: field strings in their positional order
 */
export type RawRow = string[];

/**
 * Values accepted by the formatter. Anything else should be stringified by the caller.
 */
export type FieldValue = string | number | bigint | boolean | Date | null | undefined;

/**
 * Anything with a `write` method, e.g. `process.stdout` or a `Writable`
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Supplies tokenized rows one at a time.
 */
export interface RowParser {
  /** Returns the next row, or `null` once the input is exhausted */
  nextRow(): RawRow | null;
}

/**
 * Formats ordered values into a delimited line.
 */
export interface LineFormatter {
  /** The failure of the last `combine` or `print` call, if it failed */
  readonly lastError: CSVError | undefined;
  combine(values: readonly FieldValue[]): boolean;
  string(): string | undefined;
  print(sink: OutputSink, values: readonly FieldValue[]): boolean;
}

/**
 * Dialect settings shared by tokenizing and formatting
 */
export interface CsvDialect {
  /** Field separator (default: `,`) */
  delimiter?: string;
  /** Quote character (default: `"`) */
  quote?: string;
  /** Escape character inside quoted fields (default: `"`) */
  escape?: string;
  /**
   * Allow any character in fields (default: true).
   * When false, fields may hold only printable ASCII and tab.
   */
  binary?: boolean;
  /** Skip blank lines while tokenizing (default: true) */
  skipEmptyLines?: boolean;
  /** Trim whitespace around unquoted fields (default: false) */
  trim?: boolean;
  /** Line terminator appended to formatted lines. None when unset. */
  eol?: string;
}

const BINARY_UNSAFE = /[^\t\x20-\x7e]/;

function parserOptions(dialect: CsvDialect) {
  return {
    delimiter: dialect.delimiter ?? ',',
    quote: dialect.quote ?? '"',
    escape: dialect.escape ?? '"',
    trim: dialect.trim ?? false,
    skip_empty_lines: dialect.skipEmptyLines ?? true,
    // Rows may be shorter or longer than the column names
    relax_column_count: true,
    bom: true,
  };
}

function toRows(output: unknown): RawRow[] {
  if (!Array.isArray(output)) {
    throw new CSVError('CSV parser did not return a list of rows');
  }

  return output.map((row: unknown, index) => {
    if (!Array.isArray(row)) {
      throw new CSVError(`CSV parser returned a non-array row at position ${index + 1}`);
    }
    return row.map(field => String(field));
  });
}

/**
 * Throws if any field holds a character outside printable ASCII and tab
 * @param rows - Tokenized rows
 * @throws {CSVError} Naming the first offending row and field (1-based)
 */
export function assertBinarySafe(rows: readonly RawRow[]): void {
  rows.forEach((row, rowIndex) => {
    const fieldIndex = row.findIndex(field => BINARY_UNSAFE.test(field));
    if (fieldIndex !== -1) {
      throw new CSVError(
        `Row ${rowIndex + 1}, field ${fieldIndex + 1} contains a non-ASCII or control character and binary mode is off`
      );
    }
  });
}

/**
 * Tokenize delimited text into raw rows
 * @param content - CSV text or buffer
 * @param dialect - Delimiter, quoting and related settings
 * @returns Rows in input order, each an array of field strings
 * @throws {CSVError} If the input is malformed
 * @example
 * ```typescript
 * tokenize('Name;Age\nHugo;5', { delimiter: ';' });
 * // [['Name', 'Age'], ['Hugo', '5']]
 * ```
 */
export function tokenize(content: string | Buffer, dialect: CsvDialect = {}): RawRow[] {
  let output: unknown;
  try {
    output = parseCSV(content, parserOptions(dialect));
  } catch (error) {
    throw new CSVError('Failed to parse CSV input', error instanceof Error ? error : new Error(String(error)));
  }

  const rows = toRows(output);
  if (dialect.binary === false) {
    assertBinarySafe(rows);
  }
  return rows;
}

/**
 * Tokenize a readable stream into raw rows using the streaming parser.
 * The source is destroyed if the stream fails or its content is malformed.
 * @param stream - Readable stream of CSV text
 * @param dialect - Delimiter, quoting and related settings
 * @returns Promise resolving to all rows of the stream
 * @throws {CSVError} If the stream fails or its content is malformed
 */
export async function tokenizeStream(
  stream: NodeJS.ReadableStream,
  dialect: CsvDialect = {}
): Promise<RawRow[]> {
  const parser = parseCSVAsync(parserOptions(dialect));
  const output: unknown[] = [];
  parser.on('data', (record: unknown) => output.push(record));

  // pipeline destroys the source as well when parsing fails
  try {
    await pipelineAsync(stream, parser);
  } catch (error) {
    throw new CSVError('Failed to parse CSV stream', error instanceof Error ? error : new Error(String(error)));
  }

  const rows = toRows(output);
  if (dialect.binary === false) {
    assertBinarySafe(rows);
  }
  return rows;
}

/**
 * Row parser over rows that are already tokenized.
 * Each call hands out a copy, so callers may mutate what they receive.
 */
export class BufferedRowParser implements RowParser {
  private position = 0;

  constructor(private readonly rows: readonly RawRow[]) {}

  nextRow(): RawRow | null {
    if (this.position >= this.rows.length) {
      return null;
    }
    const row = this.rows[this.position];
    this.position++;
    return [...row];
  }
}

/**
 * Line formatter backed by csv-stringify.
 *
 * Status is reported the way a line-combining CSV engine does it: `combine` and
 * `print` return `false` on failure and keep the reason in `lastError`.
 */
export class CsvLineFormatter implements LineFormatter {
  private line: string | undefined;
  private error: CSVError | undefined;

  constructor(private readonly dialect: CsvDialect = {}) {}

  get lastError(): CSVError | undefined {
    return this.error;
  }

  /**
   * Format values into the internal line buffer
   * @returns Whether formatting succeeded. On failure the buffer is cleared.
   */
  combine(values: readonly FieldValue[]): boolean {
    this.line = this.format(values);
    return this.line !== undefined;
  }

  /**
   * The line built by the last successful `combine`
   */
  string(): string | undefined {
    return this.line;
  }

  /**
   * Format values and write them to a sink in one step.
   * Leaves the `combine` buffer untouched.
   */
  print(sink: OutputSink, values: readonly FieldValue[]): boolean {
    const formatted = this.format(values);
    if (formatted === undefined) {
      return false;
    }

    try {
      sink.write(formatted);
      return true;
    } catch (error) {
      this.error = new CSVError('Failed to write CSV line', error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  private format(values: readonly FieldValue[]): string | undefined {
    this.error = undefined;

    if (this.dialect.binary === false) {
      const index = values.findIndex(value => typeof value === 'string' && BINARY_UNSAFE.test(value));
      if (index !== -1) {
        this.error = new CSVError(
          `Field ${index + 1} contains a non-ASCII or control character and binary mode is off`
        );
        return undefined;
      }
    }

    try {
      return stringifyCSV([[...values]], {
        delimiter: this.dialect.delimiter ?? ',',
        quote: this.dialect.quote ?? '"',
        escape: this.dialect.escape ?? '"',
        record_delimiter: this.dialect.eol ?? 'unix',
        eof: this.dialect.eol !== undefined,
      });
    } catch (error) {
      this.error = new CSVError('Failed to format CSV line', error instanceof Error ? error : new Error(String(error)));
      return undefined;
    }
  }
}
