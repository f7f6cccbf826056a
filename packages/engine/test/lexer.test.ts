import { describe, expect, it } from 'vitest';
import { LineLexer, SegmentKind, splitRows, tokenizeLine } from '../src/lexer/index.js';
import { EXAMPLE } from './helpers.js';

describe('LineLexer', () => {
  const lexer = new LineLexer();

  function kinds(line: string): string[] {
    return lexer.tokenize(line).map((s) => s.kind);
  }

  function texts(line: string): string[] {
    return lexer.tokenize(line).map((s) => s.text);
  }

  describe('runs', () => {
    it('splits digits and dots into maximal runs', () => {
      expect(lexer.tokenize('467..114..')).toEqual([
        { kind: SegmentKind.DIGITS, text: '467', column: 0, length: 3 },
        { kind: SegmentKind.DOTS, text: '..', column: 3, length: 2 },
        { kind: SegmentKind.DIGITS, text: '114', column: 5, length: 3 },
        { kind: SegmentKind.DOTS, text: '..', column: 8, length: 2 },
      ]);
    });

    it('emits each symbol as its own segment', () => {
      expect(texts('617*......')).toEqual(['617', '*', '......']);
      expect(kinds('**')).toEqual([SegmentKind.SYMBOL, SegmentKind.SYMBOL]);
      expect(lexer.tokenize('#$').map((s) => s.column)).toEqual([0, 1]);
    });

    it('keeps the actual symbol character', () => {
      expect(texts('.$.+.#.=')).toEqual(['.', '$', '.', '+', '.', '#', '.', '=']);
    });

    it('starts a new digit run after a symbol', () => {
      expect(texts('12#34')).toEqual(['12', '#', '34']);
    });
  });

  describe('edge cases', () => {
    it('returns no segments for an empty line', () => {
      expect(lexer.tokenize('')).toEqual([]);
    });

    it('returns a single segment for a line of one run type', () => {
      expect(lexer.tokenize('.....')).toEqual([
        { kind: SegmentKind.DOTS, text: '.....', column: 0, length: 5 },
      ]);
      expect(lexer.tokenize('12345')).toEqual([
        { kind: SegmentKind.DIGITS, text: '12345', column: 0, length: 5 },
      ]);
    });

    it('counts a character outside the BMP as one column', () => {
      expect(lexer.tokenize('😀12')).toEqual([
        { kind: SegmentKind.SYMBOL, text: '😀', column: 0, length: 1 },
        { kind: SegmentKind.DIGITS, text: '12', column: 1, length: 2 },
      ]);
    });

    it('treats non-ASCII digits as symbols', () => {
      expect(kinds('٣')).toEqual([SegmentKind.SYMBOL]);
    });

    it('can be reused across lines', () => {
      expect(texts('1.')).toEqual(['1', '.']);
      expect(texts('#')).toEqual(['#']);
    });
  });

  describe('reconstruction', () => {
    it('joins back into the original line', () => {
      const lines = [...splitRows(EXAMPLE), '', '#', '..', '9', '1.2.3', '*1*2*', '..😀..7'];
      for (const line of lines) {
        expect(tokenizeLine(line).map((s) => s.text).join('')).toBe(line);
      }
    });

    it('produces contiguous, increasing columns', () => {
      const segments = tokenizeLine('..35..633.');
      let column = 0;
      for (const segment of segments) {
        expect(segment.column).toBe(column);
        column += segment.length;
      }
      expect(column).toBe(10);
    });
  });
});

describe('splitRows', () => {
  it('splits on newlines', () => {
    expect(splitRows('a\nb')).toEqual(['a', 'b']);
  });

  it('ignores a trailing newline', () => {
    expect(splitRows('a\nb\n')).toEqual(['a', 'b']);
  });

  it('strips carriage returns', () => {
    expect(splitRows('a\r\nb\r\n')).toEqual(['a', 'b']);
  });

  it('keeps empty rows in the middle', () => {
    expect(splitRows('a\n\nb')).toEqual(['a', '', 'b']);
  });

  it('returns no rows for empty input', () => {
    expect(splitRows('')).toEqual([]);
  });
});
