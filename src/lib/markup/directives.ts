/**
 * Parsing of directive and style tokens.
 *
 * A directive part is `key-modifier-modifier`, e.g. `page-A3-h` or
 * `margin-TB-20`; several parts are joined with `:`. Style prefixes on
 * content lines use the same shape (`center:120%`).
 */

import { Margin, TextAlignment } from '../types';

export interface DirectivePart {
  key: string;
  modifiers: string[];
}

/**
 * Split `text` at the first run of spaces into a head and the remaining text.
 * Returns null when the text has no space.
 */
export function splitHead(text: string): { head: string; rest: string } | null {
  const match = / +/.exec(text);
  if (!match) return null;
  return {
    head: text.substring(0, match.index),
    rest: text.substring(match.index + match[0].length)
  };
}

/**
 * Parse the colon-separated parts of a directive head.
 */
export function parseDirectiveParts(head: string): DirectivePart[] {
  return head.split(':').map(part => {
    const [key, ...modifiers] = part.split('-');
    return { key, modifiers };
  });
}

/**
 * Parse a decimal number, or null when the text is not one.
 */
export function parseNumber(text: string | undefined): number | null {
  if (text === undefined || !/^[+-]?(\d+\.?\d*|\.\d+)$/.test(text.trim())) {
    return null;
  }
  return Number(text);
}

const MARGIN_SIDES: Record<string, keyof Margin> = {
  T: 'top',
  B: 'bottom',
  L: 'left',
  R: 'right'
};

/**
 * Interpret the modifiers of a `margin` part.
 *
 * `['TB', '20']` sets top and bottom; `['20']` sets all four. Letters other
 * than T, B, L and R are ignored, and so is a non-numeric value.
 */
export function parseMarginModifiers(modifiers: string[]): Partial<Margin> | null {
  if (modifiers.length >= 2) {
    const value = parseNumber(modifiers[1]);
    if (value === null) return null;

    const margins: Partial<Margin> = {};
    for (const letter of modifiers[0].toUpperCase()) {
      const side = MARGIN_SIDES[letter];
      if (side) {
        margins[side] = value;
      }
    }
    return margins;
  }

  const value = parseNumber(modifiers[0]);
  if (value === null) return null;
  return { top: value, bottom: value, left: value, right: value };
}

/**
 * Effect of a content line's style prefix.
 */
export interface LineStyle {
  alignment: TextAlignment;
  /** Font scale in percent, or null to keep the current size */
  zoom: number | null;
}

/**
 * Interpret the style tokens of a content line (`center:120%`).
 * Unknown tokens are ignored; a later alignment token wins.
 */
export function parseLineStyle(head: string): LineStyle {
  const style: LineStyle = { alignment: 'left', zoom: null };

  for (const { key } of parseDirectiveParts(head)) {
    switch (key) {
      case 'left':
        break;
      case 'center':
      case 'right':
        style.alignment = key;
        break;
      default:
        if (key.endsWith('%')) {
          const zoom = parseNumber(key.slice(0, -1));
          if (zoom !== null && Number.isInteger(zoom) && zoom !== 100) {
            style.zoom = zoom;
          }
        }
    }
  }

  return style;
}
