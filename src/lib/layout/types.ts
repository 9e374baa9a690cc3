import { Margin, Point, Rect, Size, StrokeStyle } from '../types';

/**
 * Width measurement for one font. Implementations must be deterministic
 * and monotonic in string length, or the wrap probe may not converge.
 */
export interface FontMetrics {
  /** Width of `text` in points at `size`. */
  measure(text: string, size: number): number;
  /** Distance below the baseline in points at `size` (negative or zero). */
  descent(size: number): number;
}

/**
 * Resolves a font name to its metrics.
 * Throws a LOOKUP_FAILURE DocumentError for unknown names.
 */
export interface FontMetricsProvider {
  getMetrics(fontName: string): FontMetrics;
}

/**
 * Receives laid-out pages. Coordinates use a top-left origin in points;
 * the `y` of a run is its baseline.
 */
export interface PageSink {
  openPage(width: number, height: number): void;
  setFont(fontName: string, size: number): void;
  placeRun(text: string, x: number, y: number): void;
  strokeRect?(rect: Rect, style: StrokeStyle): void;
  strokeLine?(from: Point, to: Point, style: StrokeStyle): void;
  closePage(): void;
  finalizeDocument(): void;
}

/**
 * Initial layout settings; every field can be changed later through the
 * engine's setters.
 */
export interface LayoutSettings {
  pageSize: Size;
  fontName: string;
  fontSize: number;
  margins: Margin;
  lineSpace: number;
  drawMarginLine: boolean;
  drawDebugPoints: boolean;
}

/**
 * The layout surface the markup interpreter drives.
 */
export interface LayoutTarget {
  readonly fontSize: number;
  print(text: string): void;
  printCenter(text: string): void;
  printRight(text: string): void;
  newLine(): void;
  newPage(): void;
  setFontSize(size: number): void;
  setFont(fontName: string): void;
  setLineSpace(space: number): void;
  setMargins(margins: Partial<Margin>): void;
  setPageSize(size: Size, landscape: boolean): void;
}

export interface PageOpenedEvent {
  pageNumber: number;
  width: number;
  height: number;
}

export interface PageClosedEvent {
  pageNumber: number;
}

export interface LineWrappedEvent {
  fragment: string;
  pageNumber: number;
}

export interface LayoutEvents {
  'page-opened': [PageOpenedEvent];
  'page-closed': [PageClosedEvent];
  'line-wrapped': [LineWrappedEvent];
  'document-finalized': [{ pageCount: number }];
}
