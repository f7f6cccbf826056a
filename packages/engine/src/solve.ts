/**
 * Solve entry points for both modes
 *
 * Each call owns its working memory; calls share no state and may run
 * side by side.
 */

import type { Logger } from '@schematic/logger';
import { collectGears, GEAR_NUMBER_COUNT, sumGearRatios } from './gear-ratios.js';
import { SchematicGrid } from './grid.js';
import { findPartNumbers, sumPartNumbers } from './part-numbers.js';
import { scanSchematic } from './stream.js';

export const SCAN_STRATEGIES = ['grid', 'stream'] as const;

/**
 * grid: parse every row first, then query each component's neighbourhood.
 * stream: one pass holding only the previous row plus an accumulator.
 */
export type ScanStrategy = (typeof SCAN_STRATEGIES)[number];

export interface SolveOptions {
  /** Defaults to 'grid' */
  strategy?: ScanStrategy;
  logger?: Logger;
}

export function isScanStrategy(value: string): value is ScanStrategy {
  return (SCAN_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Sum of every number adjacent to at least one symbol
 *
 * @throws {ParseError} If a digit run exceeds the safe integer range
 * @throws {ArithmeticOverflowError} If the sum exceeds the safe integer range
 */
export function solvePartNumbers(input: string, options: SolveOptions = {}): number {
  const strategy = options.strategy ?? 'grid';

  let count: number;
  let sum: number;
  if (strategy === 'stream') {
    const state = scanSchematic(input);
    count = state.partNumbers.size;
    sum = sumPartNumbers(state.partNumbers.values());
  } else {
    const grid = SchematicGrid.parse(input);
    const parts = findPartNumbers(grid);
    count = parts.length;
    sum = sumPartNumbers(parts);
  }

  options.logger?.debug('part_numbers_summed', { strategy, part_numbers: count, sum });
  return sum;
}

/**
 * Sum of n1 * n2 over every '*' touching exactly two numbers
 *
 * @throws {ParseError} If a digit run exceeds the safe integer range
 * @throws {ArithmeticOverflowError} If a ratio or the sum exceeds the safe integer range
 */
export function solveGearRatios(input: string, options: SolveOptions = {}): number {
  const strategy = options.strategy ?? 'grid';
  const gears =
    strategy === 'stream' ? scanSchematic(input).gears : collectGears(SchematicGrid.parse(input));

  const sum = sumGearRatios(gears);
  const qualifying = [...gears.values()].filter(
    (candidate) => candidate.numbers.length === GEAR_NUMBER_COUNT,
  ).length;

  options.logger?.debug('gear_ratios_summed', {
    strategy,
    candidates: gears.size,
    gears: qualifying,
    sum,
  });
  return sum;
}
