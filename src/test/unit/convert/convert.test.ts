/**
 * Unit tests for the file conversion pipelines
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { convertEach } from '../../../lib/convert/batch';
import { convertMarkupFile, renderMarkupToText } from '../../../lib/convert/convertMarkup';
import { convertWorkbookFile } from '../../../lib/convert/convertWorkbook';
import { budgetWorkbook, protectedWorkbook } from '../../helpers/workbookFixtures';

describe('conversion', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'leafpress-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('renderMarkupToText()', () => {
    it('should lay out markup as text columns', () => {
      const text = renderMarkupToText('first line\n:right end\n', {
        fontName: 'Courier',
        fontSize: 10,
        margins: { top: 0, right: 0, bottom: 0, left: 0 },
        pageSize: 'A4'
      });

      const lines = text.split('\n');
      expect(lines[0]).toBe('first line');
      expect(lines[1].trimStart()).toBe('end');
      expect(lines[2]).toBe('');
    });
  });

  describe('convertMarkupFile()', () => {
    it('should write a sibling PDF', async () => {
      const input = path.join(dir, 'notes.md');
      await writeFile(input, ':::page-A5\n:center:150% Notes\nbody\n');

      const output = await convertMarkupFile(input);

      expect(output).toBe(path.join(dir, 'notes.pdf'));
      const pdf = await PDFDocument.load(await readFile(output));
      expect(pdf.getPageCount()).toBe(1);
      expect(pdf.getPage(0).getSize()).toEqual({ width: 419.53, height: 595.28 });
    });

    it('should write a sibling text file for the text format', async () => {
      const input = path.join(dir, 'notes.md');
      await writeFile(input, 'hello\n');

      const output = await convertMarkupFile(input, { format: 'text' });

      expect(output).toBe(path.join(dir, 'notes.txt'));
      // Default 10.5 pt margin is two 6.3 pt columns
      expect(await readFile(output, 'utf8')).toBe('  hello\n');
    });
  });

  describe('convertWorkbookFile()', () => {
    it('should write a PDF and a text dump', async () => {
      const input = path.join(dir, 'budget.json');
      await writeFile(input, JSON.stringify(budgetWorkbook));

      const outputs = await convertWorkbookFile(input);

      expect(outputs).toEqual([path.join(dir, 'budget.pdf'), path.join(dir, 'budget.txt')]);
      const pdf = await PDFDocument.load(await readFile(outputs[0]));
      expect(pdf.getPageCount()).toBe(2);
      const text = await readFile(outputs[1], 'utf8');
      expect(text.split('\n').filter(line => line === '--------')).toHaveLength(2);
    });

    it('should open a protected workbook with its password', async () => {
      const input = path.join(dir, 'private.json');
      await writeFile(input, JSON.stringify(protectedWorkbook));

      await expect(convertWorkbookFile(input)).rejects.toThrowError('Workbook is password protected');

      await convertWorkbookFile(input, { password: 'test-secret' });
      expect(await readFile(path.join(dir, 'private.txt'), 'utf8'))
        .toBe('sheet name: Private\nmax row index: 0\nmax column index: 1\n[A1] salary\n--------\n');
    });
  });

  describe('convertEach()', () => {
    it('should keep going after a failing file', async () => {
      const good = path.join(dir, 'good.md');
      await writeFile(good, 'fine\n');
      const missing = path.join(dir, 'missing.md');

      const result = await convertEach([missing, good], file => convertMarkupFile(file));

      expect(result.converted).toEqual([good]);
      expect(result.failed.map(failure => failure.path)).toEqual([missing]);
      expect(console.log).toHaveBeenCalledWith('[batch]', 'processed 1 files.');
    });
  });
});
