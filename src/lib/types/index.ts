export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Horizontal placement of a printed run.
 */
export type TextAlignment = 'left' | 'center' | 'right';

/**
 * Output format of a converted document.
 */
export type OutputFormat = 'pdf' | 'text';

/**
 * Stroke appearance for margin and debug decorations.
 */
export interface StrokeStyle {
  thickness: number;
  dashArray?: number[];
}
