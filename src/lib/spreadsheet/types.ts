/**
 * Read-only view of a workbook: sheets, rows and cells.
 * Row and column indexes are zero-based.
 */

export type CellValue = string | number | boolean | null;

export interface SheetCell {
  row: number;
  column: number;
  value: CellValue;
  /** Display text as the workbook formats it; preferred over `value` */
  formatted?: string;
  comment?: string;
}

export interface SheetRow {
  index: number;
  /** Cells ordered by column */
  cells: SheetCell[];
}

/**
 * Inclusive rectangular block of cells.
 */
export interface CellRange {
  firstRow: number;
  lastRow: number;
  firstColumn: number;
  lastColumn: number;
}

export interface SheetShape {
  text?: string;
}

export interface Sheet {
  name: string;
  /** Rows that exist in the sheet, ordered by index */
  rows: SheetRow[];
  mergedRegions: CellRange[];
  shapes: SheetShape[];
}

export interface SpreadsheetSource {
  getSheets(): Sheet[];
}
