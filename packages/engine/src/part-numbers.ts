/**
 * Part numbers: numbers touching at least one symbol
 */

import {
  isNumberComponent,
  isSymbolComponent,
  sourcePosition,
  type NumberComponent,
} from './component.js';
import { ArithmeticOverflowError } from './errors.js';
import type { SchematicGrid } from './grid.js';

export function isPartNumber(grid: SchematicGrid, component: NumberComponent): boolean {
  return grid.neighbours(component).some(isSymbolComponent);
}

/**
 * Every number adjacent to any symbol, in scan order. Each position appears once
 * however many symbols touch it.
 */
export function findPartNumbers(grid: SchematicGrid): NumberComponent[] {
  const parts: NumberComponent[] = [];
  for (const component of grid.components()) {
    if (isNumberComponent(component) && isPartNumber(grid, component)) {
      parts.push(component);
    }
  }
  return parts;
}

/**
 * @throws {ArithmeticOverflowError} If the running total is not a safe integer
 */
export function sumPartNumbers(parts: Iterable<NumberComponent>): number {
  let sum = 0;
  for (const part of parts) {
    sum += part.token.value;
    if (!Number.isSafeInteger(sum)) {
      throw new ArithmeticOverflowError(
        'Sum of part numbers exceeds the safe integer range',
        sourcePosition(part),
      );
    }
  }
  return sum;
}
