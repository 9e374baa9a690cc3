/**
 * A1-style cell addressing.
 */

import { CellRange } from './types';

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = 'A'.charCodeAt(0);
const CELL_REFERENCE = /^([A-Za-z]+)([1-9][0-9]*)$/;

/**
 * Column letters for a zero-based column index: 0 → A, 25 → Z, 26 → AA.
 */
export function columnName(column: number): string {
  if (!Number.isInteger(column) || column < 0) {
    throw new RangeError(`Invalid column index: ${column}`);
  }
  let name = '';
  let remaining = column + 1;
  while (remaining > 0) {
    const digit = (remaining - 1) % ALPHABET_SIZE;
    name = String.fromCharCode(CHAR_CODE_A + digit) + name;
    remaining = Math.floor((remaining - 1) / ALPHABET_SIZE);
  }
  return name;
}

/**
 * Zero-based column index for column letters (case-insensitive).
 */
export function columnIndex(name: string): number {
  let index = 0;
  for (const letter of name.toUpperCase()) {
    index = index * ALPHABET_SIZE + (letter.charCodeAt(0) - CHAR_CODE_A + 1);
  }
  return index - 1;
}

export function formatCellReference(row: number, column: number): string {
  return `${columnName(column)}${row + 1}`;
}

/**
 * Parse `B3` into zero-based coordinates, or null when malformed.
 */
export function parseCellReference(reference: string): { row: number; column: number } | null {
  const match = CELL_REFERENCE.exec(reference.trim());
  if (!match) return null;
  return { row: Number(match[2]) - 1, column: columnIndex(match[1]) };
}

/**
 * Format a range as `A1:B2`.
 */
export function formatRange(range: CellRange): string {
  return `${formatCellReference(range.firstRow, range.firstColumn)}:${formatCellReference(range.lastRow, range.lastColumn)}`;
}

/**
 * Parse `A1:B2` (corners in any order), or null when malformed.
 */
export function parseRange(text: string): CellRange | null {
  const corners = text.split(':');
  if (corners.length !== 2) return null;

  const start = parseCellReference(corners[0]);
  const end = parseCellReference(corners[1]);
  if (!start || !end) return null;

  return {
    firstRow: Math.min(start.row, end.row),
    lastRow: Math.max(start.row, end.row),
    firstColumn: Math.min(start.column, end.column),
    lastColumn: Math.max(start.column, end.column)
  };
}

export function isInRange(range: CellRange, row: number, column: number): boolean {
  return row >= range.firstRow && row <= range.lastRow &&
    column >= range.firstColumn && column <= range.lastColumn;
}
