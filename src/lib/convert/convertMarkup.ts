/**
 * Markup → PDF / text conversion.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { ConversionOptions, DEFAULT_MARKUP_OPTIONS, toLayoutSettings } from '../config/options';
import { LayoutEngine } from '../layout/LayoutEngine';
import { interpretMarkup } from '../markup/MarkupInterpreter';
import { PdfPageSink } from '../rendering/PdfPageSink';
import { TextPageSink } from '../rendering/TextPageSink';
import { createLogger } from '../utils/logger';
import { changeExtension } from '../utils/paths';

const logger = createLogger('convertMarkup');

export async function renderMarkupToPdf(
  source: string,
  options: Partial<ConversionOptions> = {}
): Promise<Uint8Array> {
  const settings = toLayoutSettings({ ...DEFAULT_MARKUP_OPTIONS, ...options });
  const sink = await PdfPageSink.create();
  new LayoutEngine(sink, sink, settings).run(engine => interpretMarkup(source, engine));
  return sink.save();
}

export function renderMarkupToText(
  source: string,
  options: Partial<ConversionOptions> = {}
): string {
  const settings = toLayoutSettings({ ...DEFAULT_MARKUP_OPTIONS, ...options });
  const sink = new TextPageSink();
  new LayoutEngine(sink, sink, settings).run(engine => interpretMarkup(source, engine));
  return `${sink.toString()}\n`;
}

/**
 * Convert one markup file into a sibling `.pdf` (or `.txt`) file.
 * Returns the path written.
 */
export async function convertMarkupFile(
  filePath: string,
  options: Partial<ConversionOptions> = {}
): Promise<string> {
  const format = options.format ?? DEFAULT_MARKUP_OPTIONS.format;
  const source = await readFile(filePath, 'utf8');

  const outputPath = changeExtension(filePath, format === 'pdf' ? '.pdf' : '.txt');
  const output = format === 'pdf'
    ? await renderMarkupToPdf(source, options)
    : renderMarkupToText(source, options);

  await writeFile(outputPath, output);
  logger.info(`${filePath} -> ${outputPath}`);
  return outputPath;
}
