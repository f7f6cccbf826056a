/**
 * Gears: '*' symbols and the numbers touching them
 */

import {
  componentKey,
  isNumberComponent,
  sourcePosition,
  type PositionalComponent,
  type SymbolComponent,
} from './component.js';
import { ArithmeticOverflowError } from './errors.js';
import type { SchematicGrid } from './grid.js';

export const GEAR_SYMBOL = '*';

/** Number of adjacent part numbers that makes a '*' a gear */
export const GEAR_NUMBER_COUNT = 2;

export interface GearCandidate {
  gear: SymbolComponent;
  /** Values of the adjacent numbers, in the order they were collected */
  numbers: number[];
}

/** Candidates keyed by the position of their '*' */
export type GearMap = Map<string, GearCandidate>;

export function isGearSymbol(component: PositionalComponent): component is SymbolComponent {
  return component.token.kind === 'symbol' && component.token.char === GEAR_SYMBOL;
}

/**
 * Collect every '*' with the numbers adjacent to it
 */
export function collectGears(grid: SchematicGrid): GearMap {
  const gears: GearMap = new Map();
  for (const component of grid.components()) {
    if (!isGearSymbol(component)) continue;
    const numbers = grid
      .neighbours(component)
      .filter(isNumberComponent)
      .map((neighbour) => neighbour.token.value);
    gears.set(componentKey(component), { gear: component, numbers });
  }
  return gears;
}

/**
 * Product of the two numbers of a gear; 0 unless exactly two numbers touch it
 *
 * @throws {ArithmeticOverflowError} If the product is not a safe integer
 */
export function gearRatio(candidate: GearCandidate): number {
  if (candidate.numbers.length !== GEAR_NUMBER_COUNT) return 0;
  const [first, second] = candidate.numbers;
  const ratio = first * second;
  if (!Number.isSafeInteger(ratio)) {
    throw new ArithmeticOverflowError(
      `Gear ratio ${first} * ${second} exceeds the safe integer range`,
      sourcePosition(candidate.gear),
    );
  }
  return ratio;
}

/**
 * @throws {ArithmeticOverflowError} If a ratio or the running total is not a safe integer
 */
export function sumGearRatios(gears: ReadonlyMap<string, GearCandidate>): number {
  let sum = 0;
  for (const candidate of gears.values()) {
    sum += gearRatio(candidate);
    if (!Number.isSafeInteger(sum)) {
      throw new ArithmeticOverflowError(
        'Sum of gear ratios exceeds the safe integer range',
        sourcePosition(candidate.gear),
      );
    }
  }
  return sum;
}
