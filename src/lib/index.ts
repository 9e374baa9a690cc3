export * from './types';

export { DocumentError, DocumentErrorCode, describeError } from './errors/DocumentError';
export { EventEmitter } from './events/EventEmitter';
export { createLogger, setLogLevel, getLogLevel, isLogLevel, LOG_LEVELS } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export { changeExtension } from './utils/paths';

// Text scanning
export { TextCursor, END_OF_TEXT } from './text/TextCursor';
export type { ScanResult } from './text/TextCursor';

// Layout
export { LayoutEngine, DEFAULT_LAYOUT_SETTINGS } from './layout/LayoutEngine';
export { lookupPageSize, orient, listPageSizeNames } from './layout/pageSizes';
export { fitIndex } from './layout/wrap';
export type {
  FontMetrics,
  FontMetricsProvider,
  PageSink,
  LayoutSettings,
  LayoutTarget,
  LayoutEvents,
  PageOpenedEvent,
  PageClosedEvent,
  LineWrappedEvent
} from './layout/types';

// Markup
export { MarkupInterpreter, interpretMarkup, BLOCK_KINDS } from './markup/MarkupInterpreter';

// Rendering
export { PdfPageSink } from './rendering/PdfPageSink';
export type { PdfDocumentInfo } from './rendering/PdfPageSink';
export { PdfFontMetrics } from './rendering/PdfFontMetrics';
export { TextPageSink, MonospaceFontMetrics } from './rendering/TextPageSink';

// Spreadsheets
export { JsonWorkbookSource, workbookSchema } from './spreadsheet/JsonWorkbookSource';
export type { WorkbookDescription, WorkbookOpenOptions } from './spreadsheet/JsonWorkbookSource';
export { printWorkbook, writeWorkbookText } from './spreadsheet/SpreadsheetPrinter';
export { eachCell, cellText, sheetLines } from './spreadsheet/sheetContent';
export { columnName, formatCellReference, formatRange, parseCellReference, parseRange } from './spreadsheet/cellReference';
export type * from './spreadsheet/types';

// Configuration and conversion
export {
  DEFAULT_MARKUP_OPTIONS,
  DEFAULT_SHEET_OPTIONS,
  configFileSchema,
  loadConfigFile,
  mergeConfig,
  toLayoutSettings
} from './config/options';
export type { ConversionOptions, ConfigFile } from './config/options';
export { renderMarkupToPdf, renderMarkupToText, convertMarkupFile } from './convert/convertMarkup';
export { renderWorkbookToPdf, convertWorkbookFile } from './convert/convertWorkbook';
export { convertEach } from './convert/batch';
export type { BatchResult, BatchFailure } from './convert/batch';
