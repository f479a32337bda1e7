/**
 * CSV Serializer
 * ==============
 * Pipe-delimited, fully quoted text with a header row. Embedded quotes are
 * doubled; every record ends with CRLF.
 */

import { stringify } from 'csv-stringify/sync';
import type { ResultSet } from '@wexport/core';
import { SerializationError } from '@wexport/utils';

export const CSV_DELIMITER = '|';
export const CSV_QUOTE = '"';
export const CSV_RECORD_DELIMITER = '\r\n';

const encoder = new TextEncoder();

/**
 * Render one opaque warehouse value as field text
 */
export function renderValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex');
  }
  const json = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

/**
 * Serialize to text. Throws SerializationError on a row of the wrong width.
 */
export function serializeResultSetToString(resultSet: ResultSet): string {
  const width = resultSet.columns.length;
  const records: string[][] = [resultSet.columns.map((column) => String(column))];

  resultSet.rows.forEach((row, index) => {
    if (row.length !== width) {
      throw new SerializationError(
        `Row ${index + 1} has ${row.length} values but the result has ${width} columns`,
        { row: index + 1, expected: width, actual: row.length }
      );
    }
    records.push(row.map(renderValue));
  });

  return stringify(records, {
    delimiter: CSV_DELIMITER,
    quote: CSV_QUOTE,
    escape: CSV_QUOTE,
    quoted: true,
    quoted_empty: true,
    record_delimiter: CSV_RECORD_DELIMITER,
  });
}

export function serializeResultSet(resultSet: ResultSet): Uint8Array {
  return encoder.encode(serializeResultSetToString(resultSet));
}
