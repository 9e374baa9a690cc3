/**
 * TextPageSink - renders laid-out pages as plain text.
 *
 * Every font is treated as monospace: a character occupies a cell of
 * `CELL_WIDTH_EM` times the font size. Runs sharing a baseline become one
 * line, and a run starts at the column nearest its x offset. Pages are
 * separated by a form feed.
 */

import { FontMetrics, FontMetricsProvider, PageSink } from '../layout/types';

export const CELL_WIDTH_EM = 0.6;
export const PAGE_SEPARATOR = '\f';

/** Courier's descender, in ems */
const DESCENT_EM = -0.157;

export class MonospaceFontMetrics implements FontMetrics {
  measure(text: string, size: number): number {
    return text.length * size * CELL_WIDTH_EM;
  }

  descent(size: number): number {
    return size * DESCENT_EM;
  }
}

interface TextRun {
  text: string;
  x: number;
  y: number;
  size: number;
}

export class TextPageSink implements PageSink, FontMetricsProvider {
  private readonly metrics = new MonospaceFontMetrics();
  private readonly pages: TextRun[][] = [];
  private current: TextRun[] | null = null;
  private fontSize = 0;
  private finalized = false;

  get pageCount(): number {
    return this.pages.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  getMetrics(_fontName: string): FontMetrics {
    return this.metrics;
  }

  openPage(_width: number, _height: number): void {
    if (this.current) {
      throw new Error('Previous page is still open');
    }
    this.current = [];
    this.pages.push(this.current);
  }

  setFont(_fontName: string, size: number): void {
    this.fontSize = size;
  }

  placeRun(text: string, x: number, y: number): void {
    if (!this.current) {
      throw new Error('No page is open');
    }
    this.current.push({ text, x, y, size: this.fontSize });
  }

  closePage(): void {
    this.current = null;
  }

  finalizeDocument(): void {
    this.current = null;
    this.finalized = true;
  }

  /**
   * Lines of one page, top to bottom.
   */
  pageLines(pageIndex: number): string[] {
    const runs = this.pages[pageIndex];
    if (!runs) {
      throw new RangeError(`No page ${pageIndex}`);
    }

    const byBaseline = new Map<number, TextRun[]>();
    for (const run of runs) {
      const key = Math.round(run.y * 100) / 100;
      const line = byBaseline.get(key);
      if (line) {
        line.push(run);
      } else {
        byBaseline.set(key, [run]);
      }
    }

    return [...byBaseline.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, line]) => renderLine(line));
  }

  /**
   * The whole document as text.
   */
  toString(): string {
    return this.pages
      .map((_, index) => this.pageLines(index).join('\n'))
      .join(`\n${PAGE_SEPARATOR}\n`);
  }
}

function renderLine(runs: TextRun[]): string {
  let line = '';
  for (const run of [...runs].sort((a, b) => a.x - b.x)) {
    const column = Math.round(run.x / (run.size * CELL_WIDTH_EM));
    if (line.length < column) {
      line = line.padEnd(column, ' ');
    }
    line += run.text;
  }
  return line;
}
