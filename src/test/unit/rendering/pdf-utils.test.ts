/**
 * Unit tests for PDF helpers
 */
import { describe, it, expect } from 'vitest';
import { StandardFonts } from 'pdf-lib';
import { DocumentError } from '../../../lib/errors/DocumentError';
import {
  expandTabs,
  resolveStandardFont,
  transformRect,
  transformY
} from '../../../lib/rendering/pdf-utils';

describe('pdf-utils', () => {
  describe('transformY()', () => {
    it('should flip from a top-left to a bottom-left origin', () => {
      expect(transformY(20, 100)).toBe(80);
      expect(transformY(0, 841.89)).toBe(841.89);
    });
  });

  describe('transformRect()', () => {
    it('should move the anchor to the bottom-left corner', () => {
      expect(transformRect({ x: 10, y: 10, width: 80, height: 30 }, 100)).toEqual({
        x: 10,
        y: 60,
        width: 80,
        height: 30
      });
    });
  });

  describe('resolveStandardFont()', () => {
    it('should accept standard font names in any case', () => {
      expect(resolveStandardFont('Times-Bold')).toBe(StandardFonts.TimesRomanBold);
      expect(resolveStandardFont('courier-oblique')).toBe(StandardFonts.CourierOblique);
      expect(resolveStandardFont('Helvetica')).toBe(StandardFonts.Helvetica);
    });

    it('should map common families', () => {
      expect(resolveStandardFont('Arial')).toBe(StandardFonts.Helvetica);
      expect(resolveStandardFont('serif')).toBe(StandardFonts.TimesRoman);
      expect(resolveStandardFont('monospace')).toBe(StandardFonts.Courier);
    });

    it('should reject unknown fonts', () => {
      expect(() => resolveStandardFont('Comic Sans')).toThrow(DocumentError);
    });
  });

  describe('expandTabs()', () => {
    it('should replace tabs with four spaces', () => {
      expect(expandTabs('a\tb')).toBe('a    b');
      expect(expandTabs('plain')).toBe('plain');
    });
  });
});
