/**
 * TextCursor - forward scanner over a fixed text buffer.
 *
 * Every consuming read returns a ScanResult: either the value (and the
 * cursor has advanced) or END_OF_TEXT. Running out of input is the normal
 * way a parse loop ends, so it is a result variant rather than an error.
 */

export type ScanResult<T> = { ok: true; value: T } | { ok: false; reason: 'end-of-text' };

export const END_OF_TEXT: { ok: false; reason: 'end-of-text' } = Object.freeze({
  ok: false,
  reason: 'end-of-text'
});

export function scanned<T>(value: T): ScanResult<T> {
  return { ok: true, value };
}

export const LINE_TERMINATORS = ['\r', '\n'] as const;

export class TextCursor {
  private readonly source: string;
  private _position = 0;

  constructor(text: string) {
    this.source = text;
  }

  get position(): number {
    return this._position;
  }

  get length(): number {
    return this.source.length;
  }

  get atEnd(): boolean {
    return this._position >= this.source.length;
  }

  /**
   * Advance while the current character is one of `chars`.
   * Fails if the buffer runs out before a non-member is found, including
   * when the cursor already sits at the end.
   */
  skip(chars: string | readonly string[]): ScanResult<void> {
    for (;; this._position++) {
      if (this._position >= this.source.length) {
        return END_OF_TEXT;
      }
      if (!chars.includes(this.source[this._position])) {
        return scanned(undefined);
      }
    }
  }

  /**
   * Advance until the current character is one of `chars`.
   */
  skipUntil(chars: string | readonly string[]): ScanResult<void> {
    for (;; this._position++) {
      if (this._position >= this.source.length) {
        return END_OF_TEXT;
      }
      if (chars.includes(this.source[this._position])) {
        return scanned(undefined);
      }
    }
  }

  /**
   * Consume `word` if it comes next. A mismatch leaves the cursor in place.
   *
   * Reports END_OF_TEXT when the word would reach the end of the buffer
   * (`position + word.length >= length`), one character earlier than a
   * strict bound. Existing markup depends on this boundary.
   */
  eat(word: string): ScanResult<boolean> {
    const end = this._position + word.length;
    if (end >= this.source.length) {
      return END_OF_TEXT;
    }
    if (this.source.startsWith(word, this._position)) {
      this._position = end;
      return scanned(true);
    }
    return scanned(false);
  }

  /**
   * Read `[position, end)` and move to `end`.
   */
  substring(end: number): ScanResult<string> {
    if (end > this.source.length || end < this._position) {
      return END_OF_TEXT;
    }
    const text = this.source.substring(this._position, end);
    this._position = end;
    return scanned(text);
  }

  /**
   * Compare the characters just before the cursor with `word`.
   */
  previousEquals(word: string): boolean {
    const start = this._position - word.length;
    return start >= 0 && this.source.substring(start, this._position) === word;
  }

  /**
   * Whether `word` comes next. Never advances.
   */
  startsWith(word: string): boolean {
    return this.source.startsWith(word, this._position);
  }

  /**
   * Index of the next occurrence of `word`, or -1.
   */
  indexOf(word: string): number {
    return this.source.indexOf(word, this._position);
  }

  /**
   * Index of the nearest occurrence of any of `chars`, or -1.
   */
  indexOfAny(chars: string | readonly string[]): number {
    let nearest = -1;
    for (const char of chars) {
      const index = this.source.indexOf(char, this._position);
      if (index >= 0 && (nearest < 0 || index < nearest)) {
        nearest = index;
      }
    }
    return nearest;
  }

  /**
   * Read up to the next line terminator (`\n`, `\r` or `\r\n`) and consume it.
   * An unterminated tail is returned once as the final line.
   */
  nextLine(): ScanResult<string> {
    const lineEnd = this.indexOfAny(LINE_TERMINATORS);
    if (lineEnd < 0) {
      if (this._position < this.source.length) {
        return this.substring(this.source.length);
      }
      return END_OF_TEXT;
    }

    const line = this.substring(lineEnd);
    if (!line.ok) return line;

    const terminator = this.source[this._position];
    this._position++;
    if (terminator === '\r' && this.source[this._position] === '\n') {
      this._position++;
    }
    return line;
  }
}
