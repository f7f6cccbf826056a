export { LineLexer, splitRows, tokenizeLine } from './lexer.js';
export { SegmentKind } from './segment-kinds.js';
export type { Segment } from './segment.js';
