import type { Segment } from './segment.js';
import { SegmentKind } from './segment-kinds.js';

/**
 * Lexer for a single schematic row
 *
 * Splits a row into maximal digit runs, maximal dot runs and single symbol
 * characters. Columns count characters (code points), so a symbol outside
 * the BMP still occupies one column.
 */
export class LineLexer {
  private chars: string[] = [];
  private position: number = 0;

  /**
   * Tokenize one line of text. Joining the segment texts gives back the line.
   */
  tokenize(line: string): Segment[] {
    this.chars = Array.from(line);
    this.position = 0;

    const segments: Segment[] = [];

    while (!this.isAtEnd()) {
      segments.push(this.nextSegment());
    }

    return segments;
  }

  private isAtEnd(): boolean {
    return this.position >= this.chars.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.chars[this.position];
  }

  private advance(): string {
    const char = this.chars[this.position];
    this.position++;
    return char;
  }

  private nextSegment(): Segment {
    const start = this.position;
    const char = this.peek();

    if (isDigit(char)) {
      return this.run(SegmentKind.DIGITS, isDigit, start);
    }

    if (char === '.') {
      return this.run(SegmentKind.DOTS, (c) => c === '.', start);
    }

    return this.makeSegment(SegmentKind.SYMBOL, this.advance(), start);
  }

  private run(kind: SegmentKind, matches: (char: string) => boolean, start: number): Segment {
    let text = '';
    while (!this.isAtEnd() && matches(this.peek())) {
      text += this.advance();
    }
    return this.makeSegment(kind, text, start);
  }

  private makeSegment(kind: SegmentKind, text: string, start: number): Segment {
    return {
      kind,
      text,
      column: start,
      length: this.position - start,
    };
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/**
 * Tokenize a line with a fresh lexer
 */
export function tokenizeLine(line: string): Segment[] {
  return new LineLexer().tokenize(line);
}

/**
 * Split raw input into rows. A trailing newline does not produce an extra
 * empty row, and CRLF line endings are accepted.
 */
export function splitRows(input: string): string[] {
  const rows = input.split('\n').map((row) => (row.endsWith('\r') ? row.slice(0, -1) : row));
  if (rows[rows.length - 1] === '') {
    rows.pop();
  }
  return rows;
}
