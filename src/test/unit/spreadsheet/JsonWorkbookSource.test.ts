/**
 * Unit tests for JsonWorkbookSource
 */
import { describe, it, expect } from 'vitest';
import { DocumentError, DocumentErrorCode } from '../../../lib/errors/DocumentError';
import { JsonWorkbookSource } from '../../../lib/spreadsheet/JsonWorkbookSource';
import { budgetWorkbook, protectedWorkbook } from '../../helpers/workbookFixtures';

function errorCode(operation: () => unknown): DocumentErrorCode | null {
  try {
    operation();
  } catch (error) {
    return error instanceof DocumentError ? error.code : null;
  }
  return null;
}

describe('JsonWorkbookSource', () => {
  describe('fromData()', () => {
    it('should group cells into rows ordered by index and column', () => {
      const source = JsonWorkbookSource.fromData({
        sheets: [
          {
            name: 'Data',
            cells: [
              { ref: 'B2', value: 'b2' },
              { ref: 'A2', value: 'a2' },
              { ref: 'C1', value: 'c1' }
            ]
          }
        ]
      });

      const [sheet] = source.getSheets();
      expect(sheet.rows.map(row => row.index)).toEqual([0, 1]);
      expect(sheet.rows[1].cells.map(cell => cell.value)).toEqual(['a2', 'b2']);
      expect(sheet.rows[0].cells[0]).toEqual({ row: 0, column: 2, value: 'c1' });
    });

    it('should keep formatting, comments, merged regions and shapes', () => {
      const [budget, empty] = JsonWorkbookSource.fromData(budgetWorkbook).getSheets();

      expect(budget.rows[0].cells[0]).toEqual({
        row: 0,
        column: 0,
        value: 'Quarterly budget',
        comment: 'Draft figures'
      });
      expect(budget.rows[1].cells[1].formatted).toBe('1,200.00');
      expect(budget.mergedRegions).toEqual([{ firstRow: 0, lastRow: 0, firstColumn: 0, lastColumn: 1 }]);
      expect(budget.shapes).toEqual([{ text: 'Approved' }, {}]);
      expect(empty).toEqual({ name: 'Empty', rows: [], mergedRegions: [], shapes: [] });
    });

    it('should let a repeated reference replace the earlier cell', () => {
      const [sheet] = JsonWorkbookSource.fromData({
        sheets: [{ name: 'S', cells: [{ ref: 'A1', value: 1 }, { ref: 'a1', value: 2 }] }]
      }).getSheets();

      expect(sheet.rows[0].cells).toEqual([{ row: 0, column: 0, value: 2 }]);
    });

    it('should default a missing value to null', () => {
      const [sheet] = JsonWorkbookSource.fromData({
        sheets: [{ name: 'S', cells: [{ ref: 'A1', comment: 'note only' }] }]
      }).getSheets();

      expect(sheet.rows[0].cells[0].value).toBeNull();
    });
  });

  describe('validation', () => {
    it('should reject a document that does not match the schema', () => {
      expect(errorCode(() => JsonWorkbookSource.fromData({ sheets: [{ cells: [] }] })))
        .toBe(DocumentErrorCode.INVALID_SOURCE);
      expect(errorCode(() => JsonWorkbookSource.fromData([]))).toBe(DocumentErrorCode.INVALID_SOURCE);
    });

    it('should reject malformed cell references and ranges', () => {
      expect(errorCode(() =>
        JsonWorkbookSource.fromData({ sheets: [{ name: 'S', cells: [{ ref: '1A', value: 1 }] }] })
      )).toBe(DocumentErrorCode.INVALID_SOURCE);
      expect(errorCode(() =>
        JsonWorkbookSource.fromData({ sheets: [{ name: 'S', merged: ['A1-B2'] }] })
      )).toBe(DocumentErrorCode.INVALID_SOURCE);
    });

    it('should reject text that is not JSON', () => {
      expect(errorCode(() => JsonWorkbookSource.parse('{ sheets'))).toBe(DocumentErrorCode.INVALID_SOURCE);
    });
  });

  describe('password protection', () => {
    const json = JSON.stringify(protectedWorkbook);

    it('should require a password', () => {
      expect(errorCode(() => JsonWorkbookSource.parse(json))).toBe(DocumentErrorCode.PASSWORD_REQUIRED);
    });

    it('should reject a wrong password', () => {
      expect(errorCode(() => JsonWorkbookSource.parse(json, { password: 'wrong' })))
        .toBe(DocumentErrorCode.INCORRECT_PASSWORD);
    });

    it('should open with the right password', () => {
      const source = JsonWorkbookSource.parse(json, { password: 'test-secret' });

      expect(source.getSheets().map(sheet => sheet.name)).toEqual(['Private']);
    });

    it('should ignore a password for an unprotected workbook', () => {
      const source = JsonWorkbookSource.fromData(budgetWorkbook, { password: 'test-secret' });

      expect(source.getSheets()).toHaveLength(3);
    });
  });
});
