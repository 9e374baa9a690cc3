import { EventEmitter } from '../events/EventEmitter';
import { DocumentErrorCode, wrapFailure } from '../errors/DocumentError';
import { Margin, Point, Size, StrokeStyle, TextAlignment } from '../types';
import { createLogger } from '../utils/logger';
import { lookupPageSize, orient, DEFAULT_PAGE_SIZE_NAME } from './pageSizes';
import { fitIndex } from './wrap';
import {
  FontMetrics,
  FontMetricsProvider,
  LayoutEvents,
  LayoutSettings,
  LayoutTarget,
  PageSink
} from './types';

const DEFAULT_FONT_SIZE = 10.5;

export const DEFAULT_LAYOUT_SETTINGS: LayoutSettings = {
  pageSize: lookupPageSize(DEFAULT_PAGE_SIZE_NAME),
  fontName: 'Helvetica',
  fontSize: DEFAULT_FONT_SIZE,
  margins: { top: 10.5, right: 10.5, bottom: 10.5, left: 10.5 },
  lineSpace: DEFAULT_FONT_SIZE / 2,
  drawMarginLine: false,
  drawDebugPoints: false
};

const MARGIN_LINE_STYLE: StrokeStyle = { thickness: 0.01, dashArray: [3, 1] };
const DEBUG_TICK_STYLE: StrokeStyle = { thickness: 0.01 };

/**
 * The page currently being written. Its size is fixed when it opens;
 * page size changes only reach the next page.
 */
interface OpenPage {
  number: number;
  size: Size;
  /** Horizontal cursor stops, drawn as ticks when debug points are on */
  stops: number[];
}

const logger = createLogger('LayoutEngine');

/**
 * Places text on pages with measured word-wrap, left/center/right alignment
 * and automatic line and page breaks.
 *
 * Pages open lazily on the first write. The engine owns its sink: `close()`
 * (or `run()`) finalizes the open page and the document exactly once.
 */
export class LayoutEngine extends EventEmitter<LayoutEvents> implements LayoutTarget {
  private readonly sink: PageSink;
  private readonly fonts: FontMetricsProvider;

  private pageSize: Size;
  private _fontName: string;
  private metrics: FontMetrics;
  private _fontSize: number;
  private margins: Margin;
  private lineSpace: number;
  private drawMarginLine: boolean;
  private drawDebugPoints: boolean;

  private page: OpenPage | null = null;
  private x = 0;
  private y = 0;
  private _pageCount = 0;
  private finalized = false;

  constructor(sink: PageSink, fonts: FontMetricsProvider, settings?: Partial<LayoutSettings>) {
    super();
    const resolved: LayoutSettings = { ...DEFAULT_LAYOUT_SETTINGS, ...settings };

    this.sink = sink;
    this.fonts = fonts;
    this.pageSize = { ...resolved.pageSize };
    this._fontName = resolved.fontName;
    this.metrics = fonts.getMetrics(resolved.fontName);
    this._fontSize = resolved.fontSize;
    this.margins = { ...resolved.margins };
    this.lineSpace = resolved.lineSpace;
    this.drawMarginLine = resolved.drawMarginLine;
    this.drawDebugPoints = resolved.drawDebugPoints;
  }

  // ============================================
  // State
  // ============================================

  get fontSize(): number {
    return this._fontSize;
  }

  get fontName(): string {
    return this._fontName;
  }

  get pageCount(): number {
    return this._pageCount;
  }

  get isPageOpen(): boolean {
    return this.page !== null;
  }

  /**
   * Cursor position on the open page, or null between pages.
   */
  get position(): Point | null {
    return this.page ? { x: this.x, y: this.y } : null;
  }

  getMargins(): Margin {
    return { ...this.margins };
  }

  /**
   * Size of the next page to be opened.
   */
  getPageSize(): Size {
    return { ...this.pageSize };
  }

  getLineSpace(): number {
    return this.lineSpace;
  }

  innerWidth(): number {
    const size = this.page?.size ?? this.pageSize;
    return size.width - this.margins.left - this.margins.right;
  }

  innerHeight(): number {
    const size = this.page?.size ?? this.pageSize;
    return size.height - this.margins.top - this.margins.bottom;
  }

  /**
   * Width left on the current line. Opens a page if none is open.
   */
  remainingWidth(): number {
    const page = this.ensurePage();
    return page.size.width - this.margins.right - this.x;
  }

  /**
   * Height left below the cursor. Opens a page if none is open.
   */
  remainingHeight(): number {
    const page = this.ensurePage();
    return page.size.height - this.margins.bottom - this.y;
  }

  /**
   * Width of `text` at the active font and size.
   */
  measureText(text: string): number {
    if (!text) return 0;
    return wrapFailure(
      DocumentErrorCode.MEASUREMENT_FAILURE,
      `Cannot measure text in ${this._fontName}`,
      () => this.metrics.measure(text, this._fontSize)
    );
  }

  descent(): number {
    return wrapFailure(
      DocumentErrorCode.MEASUREMENT_FAILURE,
      `Cannot read descent of ${this._fontName}`,
      () => this.metrics.descent(this._fontSize)
    );
  }

  // ============================================
  // Printing
  // ============================================

  print(text: string): void {
    this.printAligned(text, 'left');
  }

  println(text: string): void {
    this.print(text);
    this.newLine();
  }

  printCenter(text: string): void {
    this.printAligned(text, 'center');
  }

  printRight(text: string): void {
    this.printAligned(text, 'right');
  }

  /**
   * Print with the given alignment. Embedded newlines split the text into
   * lines that are laid out independently.
   */
  printAligned(text: string, alignment: TextAlignment): void {
    if (!text) return;

    const lineBreak = text.indexOf('\n');
    if (lineBreak >= 0) {
      this.printAligned(text.substring(0, lineBreak), alignment);
      this.newLine();
      this.printAligned(text.substring(lineBreak + 1), alignment);
      return;
    }

    this.layoutRun(text, alignment);
  }

  newLine(): void {
    const page = this.ensurePage();
    this.y += this._fontSize + this.lineSpace;
    if (this.y > page.size.height - this.margins.bottom - this._fontSize) {
      this.newPage();
    } else {
      this.x = this.margins.left;
    }
  }

  /**
   * Close the open page, if any. The next write opens a fresh one with the
   * settings in effect at that time.
   */
  newPage(): void {
    const page = this.page;
    if (!page) return;

    if (this.drawMarginLine && this.sink.strokeRect) {
      const strokeRect = this.sink.strokeRect.bind(this.sink);
      this.callSink('draw margin line', () =>
        strokeRect(
          {
            x: this.margins.left,
            y: this.margins.top,
            width: this.innerWidth(),
            height: this.innerHeight()
          },
          MARGIN_LINE_STYLE
        )
      );
    }
    if (this.drawDebugPoints && this.sink.strokeLine) {
      const strokeLine = this.sink.strokeLine.bind(this.sink);
      const tickBottom = this.margins.top / 2;
      for (const stop of page.stops) {
        this.callSink('draw debug point', () =>
          strokeLine({ x: stop, y: 0 }, { x: stop, y: tickBottom }, DEBUG_TICK_STYLE)
        );
      }
    }

    this.page = null;
    this.callSink('close page', () => this.sink.closePage());
    logger.debug(`page ${page.number} closed`);
    this.emit('page-closed', { pageNumber: page.number });
  }

  /**
   * Finalize the open page and the document. Safe to call more than once;
   * only the first call reaches the sink.
   */
  close(): void {
    if (this.finalized) return;

    let pageFailure: { error: unknown } | null = null;
    try {
      this.newPage();
    } catch (error) {
      pageFailure = { error };
    }
    this.finalized = true;

    try {
      this.callSink('finalize document', () => this.sink.finalizeDocument());
    } catch (error) {
      if (!pageFailure) throw error;
      logger.warn('finalize failed after an earlier page failure:', error);
    }
    if (pageFailure) throw pageFailure.error;

    logger.debug(`document finalized with ${this._pageCount} page(s)`);
    this.emit('document-finalized', { pageCount: this._pageCount });
  }

  /**
   * Run `work` against this engine and close it afterwards, whether the work
   * completes or throws. A failure while closing after a failed run is
   * logged; the original error is the one rethrown.
   */
  run<T>(work: (engine: this) => T): T {
    let result: T;
    try {
      result = work(this);
    } catch (error) {
      try {
        this.close();
      } catch (closeError) {
        logger.warn('close failed while handling an earlier error:', closeError);
      }
      throw error;
    }
    this.close();
    return result;
  }

  // ============================================
  // Settings
  // ============================================

  setFontSize(size: number): void {
    this._fontSize = size;
    if (this.page) {
      this.callSink('set font', () => this.sink.setFont(this._fontName, size));
    }
  }

  /**
   * Switch to another font. Unknown names fail with LOOKUP_FAILURE and leave
   * the current font in place.
   */
  setFont(fontName: string): void {
    this.metrics = this.fonts.getMetrics(fontName);
    this._fontName = fontName;
    if (this.page) {
      this.callSink('set font', () => this.sink.setFont(fontName, this._fontSize));
    }
  }

  setLineSpace(space: number): void {
    this.lineSpace = space;
  }

  setMargin(all: number): void;
  setMargin(vertical: number, horizontal: number): void;
  setMargin(top: number, bottom: number, left: number, right: number): void;
  setMargin(first: number, second?: number, third?: number, fourth?: number): void {
    if (second === undefined) {
      this.margins = { top: first, bottom: first, left: first, right: first };
    } else if (third === undefined || fourth === undefined) {
      this.margins = { top: first, bottom: first, left: second, right: second };
    } else {
      this.margins = { top: first, bottom: second, left: third, right: fourth };
    }
  }

  /**
   * Update only the given margins.
   */
  setMargins(margins: Partial<Margin>): void {
    this.margins = { ...this.margins, ...margins };
  }

  /**
   * Size of pages opened from now on; an open page keeps its size.
   */
  setPageSize(size: Size, landscape: boolean = false): void {
    this.pageSize = orient(size, landscape);
  }

  setPageSizeByName(name: string, landscape: boolean = false): void {
    this.setPageSize(lookupPageSize(name), landscape);
  }

  setDrawMarginLine(enabled: boolean): void {
    this.drawMarginLine = enabled;
  }

  setDrawDebugPoints(enabled: boolean): void {
    this.drawDebugPoints = enabled;
  }

  // ============================================
  // Internals
  // ============================================

  private ensurePage(): OpenPage {
    if (this.page) return this.page;
    if (this.finalized) {
      throw new Error('Document is already finalized');
    }

    const size = { ...this.pageSize };
    this.callSink('open page', () => {
      this.sink.openPage(size.width, size.height);
      this.sink.setFont(this._fontName, this._fontSize);
    });

    this._pageCount++;
    const page: OpenPage = { number: this._pageCount, size, stops: [] };
    this.page = page;
    this.x = this.margins.left;
    this.y = this.margins.top;

    logger.debug(`page ${page.number} opened (${size.width} x ${size.height})`);
    this.emit('page-opened', { pageNumber: page.number, width: size.width, height: size.height });
    return page;
  }

  /**
   * Width available to a run with the given alignment. Centered text gets
   * the inner width shrunk on both sides by what the line already uses, so
   * it stays centered on the column.
   */
  private availableWidth(alignment: TextAlignment): number {
    const remaining = this.remainingWidth();
    return alignment === 'center' ? remaining * 2 - this.innerWidth() : remaining;
  }

  private atLineStart(): boolean {
    return this.x <= this.margins.left;
  }

  /**
   * Place `text`, wrapping whatever does not fit onto following lines.
   */
  private layoutRun(text: string, alignment: TextAlignment): void {
    const width = this.measureText(text);
    const available = this.availableWidth(alignment);
    if (width <= available) {
      this.placeFitted(text, width, available, alignment);
      return;
    }

    let fit = fitIndex(text, available, (prefix) => this.measureText(prefix));
    if (fit === 0 && this.atLineStart()) {
      // Not even one character fits an empty line: place it anyway
      fit = 1;
    }
    if (fit > 0) {
      const head = text.substring(0, fit);
      this.placeFitted(head, this.measureText(head), available, alignment);
      this.emit('line-wrapped', { fragment: head, pageNumber: this._pageCount });
    }

    this.newLine();
    const rest = text.substring(fit);
    if (rest) {
      this.layoutRun(rest, alignment);
    }
  }

  private placeFitted(text: string, width: number, available: number, alignment: TextAlignment): void {
    if (alignment !== 'left') {
      const offset = alignment === 'center' ? (available - width) / 2 : available - width;
      this.advance(Math.max(0, offset));
    }
    const baseline = this.y + this._fontSize;
    this.callSink('place run', () => this.sink.placeRun(text, this.x, baseline));
    this.advance(width);
  }

  private advance(offset: number): void {
    this.x += offset;
    this.page?.stops.push(this.x);
  }

  private callSink(action: string, operation: () => void): void {
    wrapFailure(DocumentErrorCode.SINK_FAILURE, `Page sink failed to ${action}`, operation);
  }
}
