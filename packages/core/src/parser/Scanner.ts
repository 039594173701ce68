/**
 * Scanner - line-oriented cursor over one definition file.
 *
 * Holds the current line, a 0-based cursor into it and the 1-based line
 * number. Blank lines and lines whose first non-blank character is the
 * comment marker `;` are skipped by advanceLine().
 *
 * Columns reported in diagnostics are 1-based (`pos + 1`).
 */

import { InternalError } from '../errors/GeneratorError.js';

/** Longest line (excluding its terminator) the scanner accepts */
export const MAX_LINE_LENGTH = 1024;

export const COMMENT_MARKER = ';';

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

export class Scanner {
  private readonly lines: string[];
  private nextLineIndex = 0;
  private text = '';
  private cursor = 0;
  private lineNumber = 0;

  /**
   * @param source - Full text of the file
   * @param filePath - Used only in the line-length diagnostic
   */
  constructor(source: string, private readonly filePath: string = '<input>') {
    const lines = source.split('\n');
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    this.lines = lines.map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l));
  }

  /** 1-based number of the current line (0 before the first advance) */
  get line(): number {
    return this.lineNumber;
  }

  /** 0-based cursor within the current line */
  get pos(): number {
    return this.cursor;
  }

  /** 1-based column of the cursor */
  get column(): number {
    return this.cursor + 1;
  }

  /** Unconsumed remainder of the current line */
  get restOfLine(): string {
    return this.text.slice(this.cursor);
  }

  /**
   * Move to the next line that is neither blank nor a comment, leaving the
   * cursor on its first non-blank character.
   *
   * @returns false at end of file
   */
  advanceLine(): boolean {
    while (this.nextLineIndex < this.lines.length) {
      const text = this.lines[this.nextLineIndex++];
      this.lineNumber++;
      if (text.length > MAX_LINE_LENGTH) {
        throw new InternalError(`line length overrun (more than ${MAX_LINE_LENGTH} characters)`, {
          filePath: this.filePath,
          lineNumber: this.lineNumber,
        });
      }
      this.text = text;
      this.cursor = 0;
      this.consumeWhitespace();
      if (!this.atEndOfLine() && this.peek() !== COMMENT_MARKER) {
        return true;
      }
    }
    this.text = '';
    this.cursor = 0;
    return false;
  }

  /** Rewind the cursor to the start of the current line's content */
  restartLine(): void {
    this.cursor = 0;
    this.consumeWhitespace();
  }

  /** Skip spaces, tabs and other blanks, never past end of line */
  consumeWhitespace(): void {
    while (this.cursor < this.text.length && /\s/.test(this.text[this.cursor])) {
      this.cursor++;
    }
  }

  /** Character under the cursor, or '' at end of line */
  peek(): string {
    return this.cursor < this.text.length ? this.text[this.cursor] : '';
  }

  atEndOfLine(): boolean {
    return this.cursor >= this.text.length;
  }

  /** Step over one character */
  advance(): void {
    if (this.cursor < this.text.length) {
      this.cursor++;
    }
  }

  /** Move the cursor back to a position previously read from `pos` */
  reset(pos: number): void {
    this.cursor = pos;
  }

  /**
   * Consume a maximal run of letters, digits and underscores.
   * @returns the identifier, or null if none starts at the cursor
   */
  matchIdentifier(): string | null {
    const start = this.cursor;
    while (this.cursor < this.text.length && IDENTIFIER_CHAR.test(this.text[this.cursor])) {
      this.cursor++;
    }
    return this.cursor > start ? this.text.slice(start, this.cursor) : null;
  }

  /**
   * Consume an optional '-' followed by digits.
   * @returns the value, or null (cursor unchanged) if no digits follow
   */
  matchInteger(): number | null {
    const start = this.cursor;
    if (this.peek() === '-') {
      this.cursor++;
    }
    const digitsStart = this.cursor;
    while (this.cursor < this.text.length && DIGIT.test(this.text[this.cursor])) {
      this.cursor++;
    }
    if (this.cursor === digitsStart) {
      this.cursor = start;
      return null;
    }
    return Number.parseInt(this.text.slice(start, this.cursor), 10);
  }

  /**
   * Consume characters that may form a stanza gating token
   * (identifier characters plus '-').
   */
  matchGatingToken(): string | null {
    const start = this.cursor;
    while (this.cursor < this.text.length && /[A-Za-z0-9_-]/.test(this.text[this.cursor])) {
      this.cursor++;
    }
    return this.cursor > start ? this.text.slice(start, this.cursor) : null;
  }
}
