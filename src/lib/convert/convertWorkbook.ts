/**
 * Workbook → PDF and text conversion.
 */

import { writeFile } from 'node:fs/promises';
import { ConversionOptions, DEFAULT_SHEET_OPTIONS, toLayoutSettings } from '../config/options';
import { LayoutEngine } from '../layout/LayoutEngine';
import { PdfPageSink } from '../rendering/PdfPageSink';
import { JsonWorkbookSource } from '../spreadsheet/JsonWorkbookSource';
import { printWorkbook, writeWorkbookText } from '../spreadsheet/SpreadsheetPrinter';
import { SpreadsheetSource } from '../spreadsheet/types';
import { createLogger } from '../utils/logger';
import { changeExtension } from '../utils/paths';

const logger = createLogger('convertWorkbook');

export async function renderWorkbookToPdf(
  source: SpreadsheetSource,
  options: Partial<ConversionOptions> = {}
): Promise<Uint8Array> {
  const settings = toLayoutSettings({ ...DEFAULT_SHEET_OPTIONS, ...options });
  const sink = await PdfPageSink.create();
  new LayoutEngine(sink, sink, settings).run(engine => printWorkbook(source, engine));
  return sink.save();
}

/**
 * Convert one workbook file into sibling `.pdf` and `.txt` files.
 * Returns the paths written.
 */
export async function convertWorkbookFile(
  filePath: string,
  options: Partial<ConversionOptions> = {}
): Promise<string[]> {
  const source = await JsonWorkbookSource.fromFile(filePath, { password: options.password });

  const pdfPath = changeExtension(filePath, '.pdf');
  await writeFile(pdfPath, await renderWorkbookToPdf(source, options));

  const textPath = changeExtension(filePath, '.txt');
  await writeFile(textPath, writeWorkbookText(source));

  logger.info(`${filePath} -> ${pdfPath}, ${textPath}`);
  return [pdfPath, textPath];
}
