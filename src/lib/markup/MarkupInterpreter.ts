/**
 * MarkupInterpreter - turns line-oriented markup into layout calls.
 *
 * Line kinds (leading whitespace and blank lines are skipped):
 * - `:::page-A3-h:margin-T-20 ...`  page/setup directive
 * - `::table ...` ... `::`          block; inner lines are content lines
 * - `:center:120% text`             content line with a style prefix
 * - `\:text`                        literal line starting with a colon
 * - anything else                   plain line, printed as is
 *
 * Unknown directives and style tokens are ignored so the rest of the
 * document still renders. An unknown page size or font is fatal.
 */

import { LayoutTarget } from '../layout/types';
import { lookupPageSize } from '../layout/pageSizes';
import { TextCursor } from '../text/TextCursor';
import { createLogger } from '../utils/logger';
import {
  DirectivePart,
  parseDirectiveParts,
  parseLineStyle,
  parseMarginModifiers,
  parseNumber,
  splitHead
} from './directives';

const LEADING_WHITESPACE = [' ', '\t', '\r', '\n'];
const INLINE_WHITESPACE = [' ', '\t'];
const BLOCK_TERMINATOR = '::';
const ESCAPED_COLON = '\\:';

/**
 * Block kinds that are recognized (and logged) by name.
 */
export const BLOCK_KINDS = ['header', 'footer', 'table'] as const;

const logger = createLogger('MarkupInterpreter');

export class MarkupInterpreter {
  constructor(private readonly target: LayoutTarget) {}

  /**
   * Interpret a whole markup document. Returns when the input is exhausted.
   */
  interpret(source: string): void {
    const cursor = new TextCursor(source);
    let more = true;
    while (more) {
      more = this.step(cursor);
    }
  }

  /**
   * Process one line (or one block). Returns false at end of input.
   */
  private step(cursor: TextCursor): boolean {
    if (!cursor.skip(LEADING_WHITESPACE).ok) return false;

    if (cursor.startsWith(ESCAPED_COLON)) {
      // Drop the backslash; the colon stays part of the text
      cursor.substring(cursor.position + 1);
      return this.plainLine(cursor);
    }

    const first = cursor.eat(':');
    if (!first.ok) return false;
    if (!first.value) return this.plainLine(cursor);

    const second = cursor.eat(':');
    if (!second.ok) return false;
    if (!second.value) return this.contentLine(cursor);

    const third = cursor.eat(':');
    if (!third.ok) return false;
    return third.value ? this.setupDirective(cursor) : this.block(cursor);
  }

  private plainLine(cursor: TextCursor): boolean {
    const line = cursor.nextLine();
    if (!line.ok) return false;
    this.target.print(line.value);
    this.target.newLine();
    return true;
  }

  private contentLine(cursor: TextCursor): boolean {
    const line = cursor.nextLine();
    if (!line.ok) return false;
    this.printStyled(line.value);
    return true;
  }

  private setupDirective(cursor: TextCursor): boolean {
    if (!cursor.skip(INLINE_WHITESPACE).ok) return false;
    const line = cursor.nextLine();
    if (!line.ok) return false;

    const head = splitHead(line.value)?.head ?? line.value;
    for (const part of parseDirectiveParts(head)) {
      this.applySetup(part);
    }
    return true;
  }

  private applySetup({ key, modifiers }: DirectivePart): void {
    switch (key) {
      case 'page': {
        const size = lookupPageSize(modifiers[0]);
        const landscape = modifiers.length > 1 && modifiers[1].charAt(0).toUpperCase() === 'H';
        logger.info(`pageSize: ${modifiers[0]}, isLandscape: ${landscape}`);
        this.target.newPage();
        this.target.setPageSize(size, landscape);
        break;
      }
      case 'margin': {
        const margins = parseMarginModifiers(modifiers);
        if (margins) {
          for (const [side, value] of Object.entries(margins)) {
            logger.info(`margin ${side}: ${value}`);
          }
          this.target.setMargins(margins);
        }
        break;
      }
      case 'font':
        if (modifiers.length > 0) {
          // Font names may contain dashes (Times-Roman)
          this.target.setFont(modifiers.join('-'));
        }
        break;
      case 'size': {
        const size = parseNumber(modifiers[0]);
        if (size !== null && size > 0) {
          this.target.setFontSize(size);
        }
        break;
      }
      case 'spacing': {
        const space = parseNumber(modifiers[0]);
        if (space !== null && space >= 0) {
          this.target.setLineSpace(space);
        }
        break;
      }
      default:
        logger.debug(`ignoring directive '${key}'`);
    }
  }

  private block(cursor: TextCursor): boolean {
    const header = cursor.nextLine();
    if (!header.ok) return false;

    const head = splitHead(header.value)?.head ?? header.value;
    const [{ key: kind }] = parseDirectiveParts(head);
    if ((BLOCK_KINDS as readonly string[]).includes(kind)) {
      logger.info(kind);
    } else {
      logger.debug(`unnamed block '${kind}'`);
    }

    for (;;) {
      const line = cursor.nextLine();
      if (!line.ok) return false;
      if (line.value.trim() === BLOCK_TERMINATOR) return true;
      this.printStyled(line.value);
    }
  }

  /**
   * Print a content line: `<style-tokens> <text>`, or the whole line
   * unstyled when it has no space.
   */
  private printStyled(line: string): void {
    const split = splitHead(line);
    if (!split) {
      this.target.print(line);
      this.target.newLine();
      return;
    }

    const style = parseLineStyle(split.head);
    const baseSize = this.target.fontSize;
    if (style.zoom !== null) {
      this.target.setFontSize((baseSize * style.zoom) / 100);
    }

    try {
      switch (style.alignment) {
        case 'center':
          this.target.printCenter(split.rest);
          break;
        case 'right':
          this.target.printRight(split.rest);
          break;
        default:
          this.target.print(split.rest);
      }
      this.target.newLine();
    } finally {
      if (style.zoom !== null) {
        this.target.setFontSize(baseSize);
      }
    }
  }
}

/**
 * Interpret `source` against `target` with a fresh interpreter.
 */
export function interpretMarkup(source: string, target: LayoutTarget): void {
  new MarkupInterpreter(target).interpret(source);
}
