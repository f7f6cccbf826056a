import type { SegmentKind } from './segment-kinds.js';

/**
 * A run of characters produced by the line lexer
 */
export interface Segment {
  kind: SegmentKind;
  /** The raw text of the run */
  text: string;
  /** 0-based column of the first character */
  column: number;
  /** Width in characters */
  length: number;
}
