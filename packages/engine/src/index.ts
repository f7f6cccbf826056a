/**
 * @schematic/engine
 *
 * Engine schematic scanner. Finds part numbers (numbers touching any symbol)
 * and gear ratios (products of the two numbers touching a '*').
 */

export {
  areAdjacent,
  footprint,
  intersects,
  lastColumn,
  touchesOnLine,
  type Footprint,
} from './adjacency.js';
export {
  componentKey,
  isNumberComponent,
  isSymbolComponent,
  sourcePosition,
  toComponents,
  type NumberComponent,
  type NumberToken,
  type PositionalComponent,
  type SymbolComponent,
  type SymbolToken,
  type Token,
} from './component.js';
export {
  ArithmeticOverflowError,
  IoError,
  ParseError,
  SchematicError,
  StructuralAssumptionViolation,
  type SourcePosition,
} from './errors.js';
export {
  collectGears,
  GEAR_NUMBER_COUNT,
  GEAR_SYMBOL,
  gearRatio,
  isGearSymbol,
  sumGearRatios,
  type GearCandidate,
  type GearMap,
} from './gear-ratios.js';
export { SchematicGrid } from './grid.js';
export { LineLexer, SegmentKind, splitRows, tokenizeLine, type Segment } from './lexer/index.js';
export { findPartNumbers, isPartNumber, sumPartNumbers } from './part-numbers.js';
export {
  isScanStrategy,
  SCAN_STRATEGIES,
  solveGearRatios,
  solvePartNumbers,
  type ScanStrategy,
  type SolveOptions,
} from './solve.js';
export { createScanState, scanLine, scanSchematic, type ScanState } from './stream.js';
