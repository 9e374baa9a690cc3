/**
 * PdfPageSink - writes laid-out pages into a pdf-lib document.
 *
 * Also acts as the engine's FontMetricsProvider, so measurement and
 * drawing use the same embedded standard fonts.
 */

import { PDFDocument, PDFFont, PDFPage, StandardFonts } from 'pdf-lib';
import { DocumentError, DocumentErrorCode, wrapFailure } from '../errors/DocumentError';
import { FontMetrics, FontMetricsProvider, PageSink } from '../layout/types';
import { Point, Rect, StrokeStyle } from '../types';
import { createLogger } from '../utils/logger';
import { PdfFontMetrics } from './PdfFontMetrics';
import {
  BLACK,
  drawLine,
  drawStrokedRect,
  expandTabs,
  resolveStandardFont,
  transformY
} from './pdf-utils';

export interface PdfDocumentInfo {
  title?: string;
  author?: string;
}

interface OpenPdfPage {
  page: PDFPage;
  height: number;
}

const logger = createLogger('PdfPageSink');

export class PdfPageSink implements PageSink, FontMetricsProvider {
  private readonly fontCache = new Map<StandardFonts, PDFFont>();
  private current: OpenPdfPage | null = null;
  private font: PDFFont | null = null;
  private fontSize = 0;
  private finalized = false;

  private constructor(private readonly pdfDoc: PDFDocument) {}

  /**
   * Create a sink over a new, empty PDF document.
   */
  static async create(info: PdfDocumentInfo = {}): Promise<PdfPageSink> {
    const pdfDoc = await PDFDocument.create();
    pdfDoc.setProducer('leafpress');
    if (info.title) pdfDoc.setTitle(info.title);
    if (info.author) pdfDoc.setAuthor(info.author);
    return new PdfPageSink(pdfDoc);
  }

  get pageCount(): number {
    return this.pdfDoc.getPageCount();
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  getMetrics(fontName: string): FontMetrics {
    return new PdfFontMetrics(this.embed(fontName));
  }

  openPage(width: number, height: number): void {
    if (this.current) {
      throw new Error('Previous page is still open');
    }
    this.current = { page: this.pdfDoc.addPage([width, height]), height };
  }

  setFont(fontName: string, size: number): void {
    this.font = this.embed(fontName);
    this.fontSize = size;
  }

  placeRun(text: string, x: number, y: number): void {
    const { page, height } = this.requirePage();
    if (!this.font) {
      throw new Error('No font selected');
    }
    page.drawText(expandTabs(text), {
      x,
      y: transformY(y, height),
      font: this.font,
      size: this.fontSize,
      color: BLACK
    });
  }

  strokeRect(rect: Rect, style: StrokeStyle): void {
    const { page, height } = this.requirePage();
    drawStrokedRect(page, rect, style, height);
  }

  strokeLine(from: Point, to: Point, style: StrokeStyle): void {
    const { page, height } = this.requirePage();
    drawLine(page, from, to, style, height);
  }

  closePage(): void {
    this.current = null;
  }

  finalizeDocument(): void {
    this.current = null;
    this.finalized = true;
    logger.debug(`finalized with ${this.pageCount} page(s)`);
  }

  /**
   * Serialize the finished document. Only valid after finalizeDocument().
   */
  async save(): Promise<Uint8Array> {
    if (!this.finalized) {
      throw new DocumentError(
        'Cannot save a document that has not been finalized',
        DocumentErrorCode.SINK_FAILURE
      );
    }
    try {
      return await this.pdfDoc.save();
    } catch (error) {
      throw new DocumentError(
        'Failed to serialize PDF',
        DocumentErrorCode.SINK_FAILURE,
        error
      );
    }
  }

  private embed(fontName: string): PDFFont {
    const standard = resolveStandardFont(fontName);
    const cached = this.fontCache.get(standard);
    if (cached) {
      return cached;
    }
    const font = wrapFailure(
      DocumentErrorCode.LOOKUP_FAILURE,
      `Failed to embed font ${fontName}`,
      () => this.pdfDoc.embedStandardFont(standard)
    );
    this.fontCache.set(standard, font);
    return font;
  }

  private requirePage(): OpenPdfPage {
    if (!this.current) {
      throw new Error('No page is open');
    }
    return this.current;
  }
}
