import { PDFFont } from 'pdf-lib';
import { FontMetrics } from '../layout/types';
import { expandTabs } from './pdf-utils';

/**
 * FontMetrics backed by an embedded pdf-lib font.
 * Text the font cannot encode makes `measure` throw.
 */
export class PdfFontMetrics implements FontMetrics {
  constructor(private readonly font: PDFFont) {}

  get name(): string {
    return this.font.name;
  }

  measure(text: string, size: number): number {
    return this.font.widthOfTextAtSize(expandTabs(text), size);
  }

  descent(size: number): number {
    const withDescender = this.font.heightAtSize(size, { descender: true });
    const withoutDescender = this.font.heightAtSize(size, { descender: false });
    return withoutDescender - withDescender;
  }
}
