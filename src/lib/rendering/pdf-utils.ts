/**
 * PDF utility functions for coordinate transformation and font mapping.
 */

import { StandardFonts, PDFPage, rgb, Color } from 'pdf-lib';
import { DocumentError, DocumentErrorCode } from '../errors/DocumentError';
import { Point, Rect, StrokeStyle } from '../types';

export const BLACK: Color = rgb(0, 0, 0);

/**
 * PDF uses bottom-left origin, the layout uses top-left.
 * Transform Y coordinate from layout space to PDF space.
 */
export function transformY(y: number, pageHeight: number): number {
  return pageHeight - y;
}

/**
 * Transform a rectangle from layout coordinates to PDF coordinates.
 * Layout: (x, y) is top-left corner
 * PDF: (x, y) is bottom-left corner
 */
export function transformRect(rect: Rect, pageHeight: number): Rect {
  return {
    x: rect.x,
    y: pageHeight - rect.y - rect.height,
    width: rect.width,
    height: rect.height
  };
}

/**
 * Font families mapped to their regular standard font.
 */
const FAMILY_MAP: Record<string, StandardFonts> = {
  // Sans-serif fonts -> Helvetica
  'arial': StandardFonts.Helvetica,
  'helvetica': StandardFonts.Helvetica,
  'sans-serif': StandardFonts.Helvetica,
  // Serif fonts -> Times
  'times': StandardFonts.TimesRoman,
  'times new roman': StandardFonts.TimesRoman,
  'serif': StandardFonts.TimesRoman,
  'georgia': StandardFonts.TimesRoman,
  // Monospace fonts -> Courier
  'courier': StandardFonts.Courier,
  'courier new': StandardFonts.Courier,
  'monospace': StandardFonts.Courier
};

/**
 * Resolve a font name to one of the 14 standard PDF fonts.
 * Accepts the standard names themselves (`Times-Bold`, case-insensitive)
 * and common family names (`Arial`, `serif`, `monospace`).
 */
export function resolveStandardFont(fontName: string): StandardFonts {
  const wanted = fontName.toLowerCase().trim();

  for (const standard of Object.values(StandardFonts)) {
    if (standard.toLowerCase() === wanted) {
      return standard;
    }
  }

  const family = FAMILY_MAP[wanted];
  if (family) {
    return family;
  }

  throw new DocumentError(
    `Unknown font: ${fontName}`,
    DocumentErrorCode.LOOKUP_FAILURE,
    { fontName }
  );
}

/**
 * Standard fonts cannot encode a tab; lay it out as four spaces.
 */
export function expandTabs(text: string): string {
  return text.includes('\t') ? text.replace(/\t/g, '    ') : text;
}

/**
 * Draw a stroked (unfilled) rectangle on a PDF page.
 */
export function drawStrokedRect(
  page: PDFPage,
  rect: Rect,
  style: StrokeStyle,
  pageHeight: number
): void {
  const transformed = transformRect(rect, pageHeight);
  page.drawRectangle({
    x: transformed.x,
    y: transformed.y,
    width: transformed.width,
    height: transformed.height,
    borderColor: BLACK,
    borderWidth: style.thickness,
    borderDashArray: style.dashArray
  });
}

/**
 * Draw a line on a PDF page.
 */
export function drawLine(
  page: PDFPage,
  from: Point,
  to: Point,
  style: StrokeStyle,
  pageHeight: number
): void {
  page.drawLine({
    start: { x: from.x, y: transformY(from.y, pageHeight) },
    end: { x: to.x, y: transformY(to.y, pageHeight) },
    color: BLACK,
    thickness: style.thickness,
    dashArray: style.dashArray
  });
}
