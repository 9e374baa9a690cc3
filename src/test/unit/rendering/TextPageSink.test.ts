/**
 * Unit tests for TextPageSink
 */
import { describe, it, expect } from 'vitest';
import { LayoutEngine } from '../../../lib/layout/LayoutEngine';
import { MonospaceFontMetrics, TextPageSink } from '../../../lib/rendering/TextPageSink';

function createTextEngine(): { engine: LayoutEngine; sink: TextPageSink } {
  const sink = new TextPageSink();
  // 10 pt cells of 6 pt: ten columns per line
  const engine = new LayoutEngine(sink, sink, {
    pageSize: { width: 60, height: 100 },
    fontSize: 10,
    margins: { top: 0, right: 0, bottom: 0, left: 0 },
    lineSpace: 5
  });
  return { engine, sink };
}

describe('MonospaceFontMetrics', () => {
  it('should give every character the same advance', () => {
    const metrics = new MonospaceFontMetrics();

    expect(metrics.measure('abcde', 10)).toBeCloseTo(30);
    expect(metrics.measure('', 10)).toBe(0);
    expect(metrics.descent(10)).toBeLessThan(0);
  });
});

describe('TextPageSink', () => {
  it('should join runs on the same baseline by column', () => {
    const sink = new TextPageSink();
    sink.openPage(100, 100);
    sink.setFont('Helvetica', 10);

    sink.placeRun('b', 12, 20);
    sink.placeRun('a', 0, 20);
    sink.placeRun('c', 0, 35);
    sink.closePage();

    expect(sink.pageLines(0)).toEqual(['a b', 'c']);
  });

  it('should render aligned lines from the layout engine', () => {
    const { engine, sink } = createTextEngine();

    engine.run(e => {
      e.println('hello');
      e.printRight('ab');
      e.newLine();
      e.printCenter('abcd');
    });

    expect(sink.toString()).toBe('hello\n        ab\n   abcd');
    expect(sink.isFinalized).toBe(true);
  });

  it('should wrap long lines at the column limit', () => {
    const { engine, sink } = createTextEngine();

    engine.run(e => e.print('abcdefghijklmno'));

    expect(sink.pageLines(0)).toEqual(['abcdefghij', 'klmno']);
  });

  it('should separate pages with a form feed', () => {
    const { engine, sink } = createTextEngine();

    engine.run(e => {
      e.print('one');
      e.newPage();
      e.print('two');
    });

    expect(sink.pageCount).toBe(2);
    expect(sink.toString()).toBe('one\n\f\ntwo');
  });

  it('should refuse runs without an open page', () => {
    const sink = new TextPageSink();

    expect(() => sink.placeRun('x', 0, 0)).toThrowError('No page is open');
    expect(() => sink.pageLines(0)).toThrow(RangeError);
  });
});
