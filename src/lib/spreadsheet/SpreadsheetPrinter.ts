/**
 * Sheet-by-sheet reports of a workbook: laid out through the engine for
 * PDF output, or collected as a plain-text dump.
 */

import { LayoutEngine } from '../layout/LayoutEngine';
import { createLogger } from '../utils/logger';
import { SHEET_SEPARATOR, sheetLines } from './sheetContent';
import { Sheet, SpreadsheetSource } from './types';

const logger = createLogger('SpreadsheetPrinter');

type LinePrinter = Pick<LayoutEngine, 'println' | 'newPage'>;

function printableSheets(source: SpreadsheetSource): Sheet[] {
  return source.getSheets().filter(sheet => {
    if (sheet.rows.length <= 0) {
      logger.info(`${sheet.name}: empty`);
      return false;
    }
    logger.info(`${sheet.name}: ${sheet.rows.length} rows`);
    return true;
  });
}

/**
 * Print every non-empty sheet, one sheet per page run.
 */
export function printWorkbook(source: SpreadsheetSource, printer: LinePrinter): void {
  for (const sheet of printableSheets(source)) {
    for (const line of sheetLines(sheet, { includeComments: false })) {
      printer.println(line);
    }
    printer.newPage();
  }
}

/**
 * Plain-text dump of every non-empty sheet, each followed by a separator.
 */
export function writeWorkbookText(source: SpreadsheetSource): string {
  const lines: string[] = [];
  for (const sheet of printableSheets(source)) {
    lines.push(...sheetLines(sheet, { includeComments: true }), SHEET_SEPARATOR);
  }
  return lines.map(line => `${line}\n`).join('');
}
