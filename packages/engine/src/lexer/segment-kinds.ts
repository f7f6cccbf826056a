/**
 * Segment kinds produced by the line lexer
 */

export const SegmentKind = {
  DIGITS: 'DIGITS', // maximal run of 0-9
  DOTS: 'DOTS', // maximal run of '.'
  SYMBOL: 'SYMBOL', // any other single character
} as const;

export type SegmentKind = (typeof SegmentKind)[keyof typeof SegmentKind];
