/**
 * Conversion options, their defaults and the JSON config file format.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DocumentError, DocumentErrorCode } from '../errors/DocumentError';
import { LayoutSettings } from '../layout/types';
import { lookupPageSize, orient } from '../layout/pageSizes';
import { Margin, OutputFormat } from '../types';

export interface ConversionOptions {
  /** Page size name, e.g. A4 or LETTER */
  pageSize: string;
  landscape: boolean;
  fontName: string;
  fontSize: number;
  margins: Margin;
  lineSpace: number;
  drawMarginLine: boolean;
  drawDebugPoints: boolean;
  format: OutputFormat;
  password?: string;
}

const DEFAULT_FONT_SIZE = 10.5;

function uniformMargin(value: number): Margin {
  return { top: value, right: value, bottom: value, left: value };
}

export const DEFAULT_MARKUP_OPTIONS: ConversionOptions = {
  pageSize: 'A4',
  landscape: false,
  fontName: 'Helvetica',
  fontSize: DEFAULT_FONT_SIZE,
  margins: uniformMargin(DEFAULT_FONT_SIZE),
  lineSpace: DEFAULT_FONT_SIZE / 2,
  drawMarginLine: false,
  drawDebugPoints: false,
  format: 'pdf'
};

export const DEFAULT_SHEET_OPTIONS: ConversionOptions = {
  ...DEFAULT_MARKUP_OPTIONS,
  margins: uniformMargin(15),
  lineSpace: 5
};

const marginSchema = z.union([
  z.number().nonnegative(),
  z.object({
    top: z.number().nonnegative().optional(),
    right: z.number().nonnegative().optional(),
    bottom: z.number().nonnegative().optional(),
    left: z.number().nonnegative().optional()
  }).strict()
]);

export const configFileSchema = z.object({
  pageSize: z.string().optional(),
  landscape: z.boolean().optional(),
  fontName: z.string().optional(),
  fontSize: z.number().positive().optional(),
  margins: marginSchema.optional(),
  lineSpace: z.number().nonnegative().optional(),
  drawMarginLine: z.boolean().optional(),
  drawDebugPoints: z.boolean().optional(),
  format: z.enum(['pdf', 'text']).optional()
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Apply a validated config file on top of `base`.
 */
export function mergeConfig(base: ConversionOptions, config: ConfigFile): ConversionOptions {
  // Absent keys are omitted by the schema, so they never override
  const { margins, ...rest } = config;
  const merged: ConversionOptions = { ...base, ...rest };

  if (typeof margins === 'number') {
    merged.margins = uniformMargin(margins);
  } else if (margins) {
    merged.margins = { ...base.margins, ...margins };
  }
  return merged;
}

/**
 * Validate a parsed config value.
 */
export function parseConfig(data: unknown): ConfigFile {
  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw new DocumentError(
      `Invalid config: ${result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`,
      DocumentErrorCode.INVALID_SOURCE,
      result.error.issues
    );
  }
  return result.data;
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const text = await readFile(filePath, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new DocumentError(
      `Config file ${filePath} is not valid JSON`,
      DocumentErrorCode.INVALID_SOURCE,
      error
    );
  }
  return parseConfig(data);
}

/**
 * Initial engine settings for a conversion.
 */
export function toLayoutSettings(options: ConversionOptions): LayoutSettings {
  return {
    pageSize: orient(lookupPageSize(options.pageSize), options.landscape),
    fontName: options.fontName,
    fontSize: options.fontSize,
    margins: { ...options.margins },
    lineSpace: options.lineSpace,
    drawMarginLine: options.drawMarginLine,
    drawDebugPoints: options.drawDebugPoints
  };
}
