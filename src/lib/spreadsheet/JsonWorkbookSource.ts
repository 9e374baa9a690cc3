/**
 * JsonWorkbookSource - a SpreadsheetSource read from a JSON workbook
 * description.
 *
 * ```json
 * {
 *   "protection": { "password": "test-secret" },
 *   "sheets": [{
 *     "name": "Budget",
 *     "cells": [{ "ref": "A1", "value": "Item", "comment": "reviewed" }],
 *     "merged": ["A1:B1"],
 *     "shapes": [{ "text": "Draft" }]
 *   }]
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DocumentError, DocumentErrorCode } from '../errors/DocumentError';
import { parseCellReference, parseRange } from './cellReference';
import { CellRange, Sheet, SheetCell, SheetRow, SpreadsheetSource } from './types';

const cellSchema = z.object({
  ref: z.string(),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]).default(null),
  formatted: z.string().optional(),
  comment: z.string().optional()
});

const sheetSchema = z.object({
  name: z.string().min(1),
  cells: z.array(cellSchema).default([]),
  merged: z.array(z.string()).default([]),
  shapes: z.array(z.object({ text: z.string().optional() })).default([])
});

export const workbookSchema = z.object({
  protection: z.object({ password: z.string() }).optional(),
  sheets: z.array(sheetSchema)
});

export type WorkbookDescription = z.infer<typeof workbookSchema>;
type SheetDescription = z.infer<typeof sheetSchema>;

export interface WorkbookOpenOptions {
  password?: string;
}

export class JsonWorkbookSource implements SpreadsheetSource {
  private constructor(private readonly sheets: Sheet[]) {}

  /**
   * Build a source from JSON text.
   */
  static parse(json: string, options: WorkbookOpenOptions = {}): JsonWorkbookSource {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      throw new DocumentError('Workbook is not valid JSON', DocumentErrorCode.INVALID_SOURCE, error);
    }
    return JsonWorkbookSource.fromData(data, options);
  }

  /**
   * Build a source from an already parsed value.
   */
  static fromData(data: unknown, options: WorkbookOpenOptions = {}): JsonWorkbookSource {
    const result = workbookSchema.safeParse(data);
    if (!result.success) {
      throw new DocumentError(
        `Invalid workbook: ${result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
        DocumentErrorCode.INVALID_SOURCE,
        result.error.issues
      );
    }

    const workbook = result.data;
    checkPassword(workbook, options.password);
    return new JsonWorkbookSource(workbook.sheets.map(toSheet));
  }

  static async fromFile(filePath: string, options: WorkbookOpenOptions = {}): Promise<JsonWorkbookSource> {
    const json = await readFile(filePath, 'utf8');
    return JsonWorkbookSource.parse(json, options);
  }

  getSheets(): Sheet[] {
    return this.sheets;
  }
}

function checkPassword(workbook: WorkbookDescription, password: string | undefined): void {
  if (!workbook.protection) return;

  if (password === undefined) {
    throw new DocumentError('Workbook is password protected', DocumentErrorCode.PASSWORD_REQUIRED);
  }
  if (password !== workbook.protection.password) {
    throw new DocumentError('Incorrect workbook password', DocumentErrorCode.INCORRECT_PASSWORD);
  }
}

function toSheet(description: SheetDescription): Sheet {
  const rows = new Map<number, Map<number, SheetCell>>();

  for (const entry of description.cells) {
    const address = parseCellReference(entry.ref);
    if (!address) {
      throw new DocumentError(
        `Invalid cell reference '${entry.ref}' in sheet ${description.name}`,
        DocumentErrorCode.INVALID_SOURCE,
        { sheet: description.name, ref: entry.ref }
      );
    }

    const cell: SheetCell = { row: address.row, column: address.column, value: entry.value };
    if (entry.formatted !== undefined) cell.formatted = entry.formatted;
    if (entry.comment !== undefined) cell.comment = entry.comment;

    const row = rows.get(address.row) ?? new Map<number, SheetCell>();
    // A repeated reference replaces the earlier cell
    row.set(address.column, cell);
    rows.set(address.row, row);
  }

  const sheetRows: SheetRow[] = [...rows.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, cells]) => ({
      index,
      cells: [...cells.values()].sort((a, b) => a.column - b.column)
    }));

  const mergedRegions: CellRange[] = description.merged.map(text => {
    const range = parseRange(text);
    if (!range) {
      throw new DocumentError(
        `Invalid merged range '${text}' in sheet ${description.name}`,
        DocumentErrorCode.INVALID_SOURCE,
        { sheet: description.name, range: text }
      );
    }
    return range;
  });

  return {
    name: description.name,
    rows: sheetRows,
    mergedRegions,
    shapes: description.shapes
  };
}
