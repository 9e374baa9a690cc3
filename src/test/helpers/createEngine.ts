/**
 * Helper for creating LayoutEngine instances in tests
 */
import { LayoutEngine } from '../../lib/layout/LayoutEngine';
import type { LayoutSettings } from '../../lib/layout/types';
import { FixedFontProvider } from './fixedMetrics';
import { RecordingSink } from './recordingSink';

export interface TestEngineResult {
  engine: LayoutEngine;
  sink: RecordingSink;
  fonts: FixedFontProvider;
}

/**
 * A 100 x 100 pt page with 10 pt margins, 10 pt Helvetica (5 pt per
 * character, so 16 characters per line) and 5 pt line spacing.
 * Baselines fall at 20, 35, 50, 65 and 80; five lines per page.
 */
export const SMALL_PAGE: LayoutSettings = {
  pageSize: { width: 100, height: 100 },
  fontName: 'Helvetica',
  fontSize: 10,
  margins: { top: 10, right: 10, bottom: 10, left: 10 },
  lineSpace: 5,
  drawMarginLine: false,
  drawDebugPoints: false
};

export function createEngine(settings?: Partial<LayoutSettings>): TestEngineResult {
  const sink = new RecordingSink();
  const fonts = new FixedFontProvider();
  const engine = new LayoutEngine(sink, fonts, { ...SMALL_PAGE, ...settings });
  return { engine, sink, fonts };
}
