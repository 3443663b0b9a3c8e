/**
 * @fileoverview Column-name utilities: keying raw rows by name, normalizing
 * names and suggesting the closest known name for a misspelled one.
 */

import { zipObject } from 'lodash';
import { distance as levenshteinDistance } from 'fastest-levenshtein';

/**
 * Options for normalizing column names. Steps run in the order listed.
 */
export interface ColumnNameNormalization {
  /** Trim leading and trailing whitespace */
  trim?: boolean;
  /** Remove all whitespace, e.g. `Given Name` becomes `GivenName` */
  stripWhitespace?: boolean;
  /** Convert to lower case */
  lowerCase?: boolean;
}

/**
 * Key a raw row by column name.
 *
 * Names past the end of the row produce no key, and fields past the end of the
 * name list are left out. When a name repeats, the later position wins.
 *
 * @param columnNames - Ordered column names
 * @param row - Field strings of one row
 * @returns A record mapping each name to its positional field
 * @example
 * ```typescript
 * zipRow(['Name', 'Given Name'], ['Hurtig', 'Hugo', '5.4']);
 * // { Name: 'Hurtig', 'Given Name': 'Hugo' }
 * ```
 */
export function zipRow(columnNames: readonly string[], row: readonly string[]): Record<string, string> {
  const width = Math.min(columnNames.length, row.length);
  return zipObject(columnNames.slice(0, width), row.slice(0, width));
}

/**
 * Normalize a list of column names
 * @param names - Column names to normalize
 * @param options - Which normalization steps to apply
 * @returns A new array of names, same length and order as the input
 * @example
 * ```typescript
 * normalizeColumnNames(['Name', 'Given Name'], { lowerCase: true, stripWhitespace: true });
 * // ['name', 'givenname']
 * ```
 */
export function normalizeColumnNames(
  names: readonly string[],
  options: ColumnNameNormalization = {}
): string[] {
  return names.map(name => {
    let normalized = name;
    if (options.trim) {
      normalized = normalized.trim();
    }
    if (options.stripWhitespace) {
      normalized = normalized.replace(/\s+/g, '');
    }
    if (options.lowerCase) {
      normalized = normalized.toLowerCase();
    }
    return normalized;
  });
}

/**
 * Find the known column name closest to a given one.
 * Only names within half the query's length (rounded up) in edit distance count as a match.
 *
 * @param names - Known column names
 * @param name - The name to look up
 * @returns The closest name, or undefined if none is close enough
 */
export function suggestColumnName(names: readonly string[], name: string): string | undefined {
  let best: string | undefined;
  let bestDistance = Infinity;

  for (const candidate of names) {
    const dist = levenshteinDistance(name, candidate);
    if (dist < bestDistance) {
      best = candidate;
      bestDistance = dist;
    }
  }

  return bestDistance <= Math.ceil(name.length / 2) ? best : undefined;
}
