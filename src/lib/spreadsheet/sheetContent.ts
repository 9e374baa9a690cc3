/**
 * Traversal and line formatting shared by the PDF and text outputs.
 */

import { formatCellReference, formatRange, isInRange } from './cellReference';
import { CellRange, Sheet, SheetCell } from './types';

export const SHEET_SEPARATOR = '--------';

/**
 * Display text of a cell, or null when it has none.
 */
export function cellText(cell: SheetCell): string | null {
  let text: string;
  if (cell.formatted !== undefined) {
    text = cell.formatted;
  } else if (cell.value === null) {
    return null;
  } else if (typeof cell.value === 'boolean') {
    text = cell.value ? 'TRUE' : 'FALSE';
  } else {
    text = String(cell.value);
  }
  return text === '' ? null : text;
}

/**
 * Visit every cell in row order. A cell inside a merged region is visited
 * only when it is the region's top-left cell, together with the region;
 * cells outside any region are visited with null.
 */
export function eachCell(
  sheet: Sheet,
  consumer: (cell: SheetCell, range: CellRange | null) => void
): void {
  for (const row of sheet.rows) {
    for (const cell of row.cells) {
      const region = sheet.mergedRegions.find(range => isInRange(range, cell.row, cell.column));
      if (!region) {
        consumer(cell, null);
      } else if (region.firstRow === cell.row && region.firstColumn === cell.column) {
        consumer(cell, region);
      }
    }
  }
}

/**
 * Index of the last row, or -1 for a sheet without rows.
 */
export function lastRowIndex(sheet: Sheet): number {
  return sheet.rows.reduce((last, row) => Math.max(last, row.index), -1);
}

/**
 * One past the largest column index used by any row; 0 without cells.
 */
export function columnCount(sheet: Sheet): number {
  let count = 0;
  for (const row of sheet.rows) {
    for (const cell of row.cells) {
      count = Math.max(count, cell.column + 1);
    }
  }
  return count;
}

export interface SheetLineOptions {
  includeComments: boolean;
}

/**
 * The report lines for one sheet.
 */
export function sheetLines(sheet: Sheet, options: SheetLineOptions): string[] {
  const lines = [
    `sheet name: ${sheet.name}`,
    `max row index: ${lastRowIndex(sheet)}`,
    `max column index: ${columnCount(sheet)}`
  ];

  eachCell(sheet, (cell, range) => {
    const text = cellText(cell);
    if (text !== null) {
      const address = range ? formatRange(range) : formatCellReference(cell.row, cell.column);
      lines.push(`[${address}] ${text}`);
    }
  });

  if (options.includeComments) {
    for (const row of sheet.rows) {
      for (const cell of row.cells) {
        if (cell.comment !== undefined) {
          lines.push(`[comment ${formatCellReference(cell.row, cell.column)}] ${cell.comment}`);
        }
      }
    }
  }

  for (const shape of sheet.shapes) {
    if (shape.text) {
      lines.push(`[shape text] ${shape.text}`);
    }
  }

  return lines;
}
