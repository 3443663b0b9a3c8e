/**
 * @fileoverview Record-by-record CSV reading with an explicit, mutable list of
 * column names that keys every tokenized row.
 */

import path from 'node:path';
import fs from 'node:fs';
import { suggestColumnName, zipRow } from './headers'
import { formatIssues, tryValidateStandardSchemaSync, type StandardSchemaV1 } from './schema'
import {
  BufferedRowParser,
  CsvLineFormatter,
  tokenize,
  tokenizeStream,
  type CsvDialect,
  type FieldValue,
  type LineFormatter,
  type OutputSink,
  type RawRow,
  type RowParser,
} from './engine'

export * from './headers'
export * from './schema'
export * from './engine'
export * from './standalone'

/**
 * Error class for CSV-related operations
 */
export class CSVError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'CSVError';

    // Maintains proper stack trace for where the error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CSVError);
    }
  }
}

/**
 * A keyed record. Values start out as field strings; a transform may store anything.
 */
export type CsvRecord = Record<string, unknown>;

/**
 * Row details passed to a transform alongside the record
 */
export interface RowContext {
  /** Rows pulled from the parser so far, header row included (1-based) */
  rowNumber: number;
  /** The row exactly as tokenized */
  rawFields: readonly string[];
  /** Column names the record was built from */
  columnNames: readonly string[];
}

/**
 * Per-record transform and filter.
 * Return the record (mutated or replaced) to accept it, or `null`/`undefined` to skip the row.
 */
export type RecordTransform = (record: CsvRecord, context: RowContext) => CsvRecord | null | undefined;

/**
 * Options for retry logic
 */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Whether to log retry attempts */
  logRetries?: boolean;
}

/**
 * Options understood by the RecordReader itself
 */
export interface RecordReaderOptions {
  /**
   * Where column names come from (default: 'auto').
   * - `'auto'`: the first row of the input
   * - an array: these names, and every row is data
   */
  columns?: 'auto' | readonly string[];
  /** Transform and filter applied to each record before it is returned */
  transform?: RecordTransform;
}

/**
 * Options for the reading factories. Dialect settings are forwarded to the
 * tokenizer and to the line formatter.
 */
export interface CSVReadOptions extends RecordReaderOptions, CsvDialect {
  /** File system options for reading the file */
  fsOptions?: {
    encoding?: BufferEncoding;
  };
  /** Options for retrying a failed file read */
  retry?: RetryOptions;
}

/**
 * Reads records one at a time, keying each tokenized row by a column-name list
 * the caller can read and rewrite at any point.
 *
 * @example
 * ```typescript
 * const reader = RecordReader.fromString(
 *   'Name;Given Name;factor1;factor2\nHurtig;Hugo;5.4;4.6',
 *   {
 *     delimiter: ';',
 *     transform: record => {
 *       record.product = Number(record.factor1) * Number(record.factor2);
 *       return Number(record.product) > 0 ? record : null;
 *     },
 *   }
 * );
 * reader.appendColumnNames(['product']);
 * reader.mapColumnNames(name => name.toLowerCase().replace(/\s+/g, ''));
 *
 * for (const record of reader) {
 *   console.log(record.givenname, record.product);
 * }
 * ```
 */
export class RecordReader implements Iterable<CsvRecord> {
  private columnNames: string[];
  private currentRow: RawRow = [];
  private rowCount = 0;
  private exhausted = false;
  private readonly transform: RecordTransform | undefined;

  /**
   * @param parser - Source of tokenized rows
   * @param formatter - Engine behind `combine`, `string` and `print`
   * @param options - Column-name source and transform
   */
  constructor(
    private readonly parser: RowParser,
    private readonly formatter: LineFormatter,
    options: RecordReaderOptions = {}
  ) {
    this.transform = options.transform;

    const columns = options.columns ?? 'auto';
    if (columns === 'auto') {
      const header = this.pull();
      this.columnNames = header ? [...header] : [];
    } else {
      this.columnNames = [...columns];
    }
  }

  /**
   * Helper function to implement retry logic
   * @param operation - Function to retry
   * @param errorMessage - Error message if all retries fail
   * @param retryOptions - Retry configuration
   * @returns Result of the operation
   * @throws {CSVError} If operation fails after all retries
   */
  private static retryOperationSync<R>(
    operation: () => R,
    errorMessage: string,
    retryOptions: RetryOptions
  ): R {
    const maxRetries = retryOptions.maxRetries ?? 3;
    const logRetries = retryOptions.logRetries ?? false;

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < maxRetries && logRetries) {
          console.warn(`Retry attempt ${attempt + 1}/${maxRetries}: ${lastError.message}`);
        }
      }
    }

    throw new CSVError(`${errorMessage} after ${maxRetries + 1} attempts`, lastError);
  }

  /**
   * Create a reader over rows that are already tokenized
   * @param rows - Raw rows, header row first when `columns` is 'auto'
   * @param options - Reader and dialect options
   */
  static fromRows(rows: readonly RawRow[], options: CSVReadOptions = {}): RecordReader {
    return new RecordReader(new BufferedRowParser(rows), new CsvLineFormatter(options), options);
  }

  /**
   * Create a reader from CSV text
   * @param content - CSV text or buffer
   * @param options - Reader and dialect options
   * @throws {CSVError} If the input is malformed
   */
  static fromString(content: string | Buffer, options: CSVReadOptions = {}): RecordReader {
    return RecordReader.fromRows(tokenize(content, options), options);
  }

  /**
   * Create a reader from a CSV file
   * @param filename - Path to the CSV file
   * @param options - Reader, dialect, file system and retry options
   * @throws {CSVError} If the file cannot be read (after retries) or is malformed
   * @example
   * ```typescript
   * const reader = RecordReader.fromFile('people.csv', {
   *   delimiter: ';',
   *   retry: { maxRetries: 2, logRetries: true },
   * });
   * ```
   */
  static fromFile(filename: string, options: CSVReadOptions = {}): RecordReader {
    const operation = () => fs.readFileSync(path.resolve(filename), options.fsOptions?.encoding ?? 'utf-8');
    const errorMessage = `Failed to read CSV file: ${filename}`;

    let content: string;
    if (options.retry) {
      content = RecordReader.retryOperationSync(operation, errorMessage, options.retry);
    } else {
      try {
        content = operation();
      } catch (error) {
        throw new CSVError(errorMessage, error instanceof Error ? error : new Error(String(error)));
      }
    }

    return RecordReader.fromString(content, options);
  }

  /**
   * Create a reader from a readable stream. The stream is read to its end first.
   * @param stream - Readable stream containing CSV data
   * @param options - Reader and dialect options
   * @returns Promise resolving to a reader positioned before the first record
   * @throws {CSVError} If the stream fails or is malformed
   */
  static async fromStream(stream: NodeJS.ReadableStream, options: CSVReadOptions = {}): Promise<RecordReader> {
    const rows = await tokenizeStream(stream, options);
    return RecordReader.fromRows(rows, options);
  }

  private pull(): RawRow | null {
    if (this.exhausted) {
      return null;
    }

    const row = this.parser.nextRow();
    if (row === null) {
      this.exhausted = true;
      return null;
    }

    this.rowCount++;
    this.currentRow = row;
    return row;
  }

  /**
   * Get the current column names
   * @returns A copy of the list, in order
   */
  getColumnNames(): string[] {
    return [...this.columnNames];
  }

  /**
   * Replace the column names. An empty list clears them.
   * @returns The resulting list
   */
  setColumnNames(names: readonly string[]): string[] {
    this.columnNames = [...names];
    return this.getColumnNames();
  }

  /**
   * Append column names, typically for fields a transform adds that the raw rows lack
   * @returns The resulting list
   */
  appendColumnNames(names: readonly string[]): string[] {
    this.columnNames.push(...names);
    return this.getColumnNames();
  }

  /**
   * Rename every occurrence of a column name
   * @param from - Existing column name
   * @param to - New column name
   * @returns The resulting list
   * @throws {CSVError} If `from` is not a column name, suggesting the closest one
   */
  renameColumn(from: string, to: string): string[] {
    if (!this.columnNames.includes(from)) {
      const suggestion = suggestColumnName(this.columnNames, from);
      throw new CSVError(
        suggestion === undefined
          ? `Unknown column "${from}"`
          : `Unknown column "${from}". Did you mean "${suggestion}"?`
      );
    }

    this.columnNames = this.columnNames.map(name => (name === from ? to : name));
    return this.getColumnNames();
  }

  /**
   * Replace each column name with the result of a function
   * @returns The resulting list
   * @example
   * ```typescript
   * reader.mapColumnNames(name => name.toLowerCase());
   * ```
   */
  mapColumnNames(fn: (name: string, index: number) => string): string[] {
    this.columnNames = this.columnNames.map((name, index) => fn(name, index));
    return this.getColumnNames();
  }

  /**
   * Fetch the next accepted record.
   *
   * Rows the transform rejects are skipped. Once the input is exhausted every
   * call returns `null`.
   *
   * @returns The record, or null at end of input
   * @throws {CSVError} If the transform throws
   */
  fetch(): CsvRecord | null {
    const transform = this.transform;

    let row: RawRow | null;
    while ((row = this.pull()) !== null) {
      const record: CsvRecord = zipRow(this.columnNames, row);
      if (!transform) {
        return record;
      }

      let accepted: CsvRecord | null | undefined;
      try {
        accepted = transform(record, {
          rowNumber: this.rowCount,
          rawFields: [...row],
          columnNames: this.getColumnNames(),
        });
      } catch (error) {
        throw new CSVError(`Transform failed at row ${this.rowCount}`, error);
      }

      if (accepted !== null && accepted !== undefined) {
        return accepted;
      }
    }

    return null;
  }

  /**
   * Fetch the next accepted record and validate it against a Standard Schema
   * @param schema - Synchronous Standard Schema validator (zod, valibot, ...)
   * @returns The validated output, or null at end of input
   * @throws {CSVError} If validation reports issues or the validator is asynchronous
   * @example
   * ```typescript
   * const Person = z.object({ name: z.string(), age: z.coerce.number() });
   * const person = reader.fetchAs(Person); // { name: string; age: number } | null
   * ```
   */
  fetchAs<Output>(schema: StandardSchemaV1<unknown, Output>): Output | null {
    const record = this.fetch();
    if (record === null) {
      return null;
    }

    const result = tryValidateStandardSchemaSync(schema, record);
    if (result.issues !== undefined) {
      throw new CSVError(`Row ${this.rowCount} failed validation: ${formatIssues(result.issues)}`, result.issues);
    }
    return result.value;
  }

  /**
   * The most recently pulled row, as tokenized and untouched by any transform
   */
  rawFields(): string[] {
    return [...this.currentRow];
  }

  /**
   * Number of rows pulled from the parser so far, header row included
   */
  get rowNumber(): number {
    return this.rowCount;
  }

  /**
   * Why the last `combine` or `print` failed, if it did
   */
  get lastError(): CSVError | undefined {
    return this.formatter.lastError;
  }

  /**
   * Format values into the formatter's line buffer
   * @returns Whether formatting succeeded
   */
  combine(values: readonly FieldValue[]): boolean {
    return this.formatter.combine(values);
  }

  /**
   * The line built by the last successful `combine`
   */
  string(): string | undefined {
    return this.formatter.string();
  }

  /**
   * Format values and write them to a sink
   * @returns Whether formatting and writing succeeded
   */
  print(sink: OutputSink, values: readonly FieldValue[]): boolean {
    return this.formatter.print(sink, values);
  }

  *[Symbol.iterator](): Generator<CsvRecord, void, undefined> {
    let record: CsvRecord | null;
    while ((record = this.fetch()) !== null) {
      yield record;
    }
  }
}

export default RecordReader;
