import type { TableValue } from '@uplang/core';
import { table, UpSyntaxError } from '@uplang/core';
import { TABLE_CLOSE, TABLE_FIELD_SEPARATOR } from './constants.js';
import type { LineReader } from './line-reader.js';

/** Rows containing `|` are split on it; all others on runs of whitespace. */
export function splitFields(trimmed: string): string[] {
  if (trimmed.includes(TABLE_FIELD_SEPARATOR)) {
    return trimmed.split(TABLE_FIELD_SEPARATOR).map((field) => field.trim());
  }
  return trimmed.split(/\s+/);
}

function readColumns(trimmed: string, lineNumber: number): string[] {
  const columns = splitFields(trimmed);
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length === 0) {
      throw new UpSyntaxError(lineNumber, 'empty column name in table header');
    }
    if (seen.has(column)) {
      throw new UpSyntaxError(lineNumber, `duplicate column '${column}' in table header`);
    }
    seen.add(column);
  }
  return columns;
}

function isClose(trimmed: string, lineNumber: number): boolean {
  if (!trimmed.startsWith(TABLE_CLOSE)) return false;
  if (trimmed !== TABLE_CLOSE) {
    throw new UpSyntaxError(lineNumber, `unexpected content after '${TABLE_CLOSE}'`);
  }
  return true;
}

/**
 * Reads a table. The reader must be positioned on the `{|` line; it is left
 * on the line after `|}`.
 */
export function readTable(reader: LineReader): TableValue {
  const openedAt = reader.lineNumber;
  reader.advance();
  reader.skipIgnorable();

  if (reader.atEnd) {
    throw new UpSyntaxError(openedAt, 'unterminated table');
  }

  const header = reader.current().trim();
  if (isClose(header, reader.lineNumber)) {
    throw new UpSyntaxError(reader.lineNumber, 'table has no column header');
  }
  const columns = readColumns(header, reader.lineNumber);
  reader.advance();

  const rows: string[][] = [];
  for (reader.skipIgnorable(); !reader.atEnd; reader.skipIgnorable()) {
    const trimmed = reader.current().trim();
    if (isClose(trimmed, reader.lineNumber)) {
      reader.advance();
      return table(columns, rows);
    }

    const fields = splitFields(trimmed);
    if (fields.length !== columns.length) {
      throw new UpSyntaxError(
        reader.lineNumber,
        `table row has ${fields.length} field(s), expected ${columns.length} (${columns.join(' ')})`,
      );
    }
    rows.push(fields);
    reader.advance();
  }

  throw new UpSyntaxError(openedAt, 'unterminated table');
}
