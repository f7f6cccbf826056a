/**
 * Single-pass scanner
 *
 * Reads one row at a time and compares it against the previous row only.
 * Whatever has to outlive those two rows (validated part numbers, gear
 * candidates) travels in an explicit ScanState that each call takes and
 * returns, so the scan can be driven and checked line by line.
 *
 * Because the row below is not known when a row is scanned, adjacency to
 * the row below is settled retroactively: a symbol validates numbers above
 * it, and a number registers itself with any '*' above it.
 */

import { areAdjacent, touchesOnLine } from './adjacency.js';
import {
  componentKey,
  isNumberComponent,
  isSymbolComponent,
  toComponents,
  type NumberComponent,
  type PositionalComponent,
  type SymbolComponent,
} from './component.js';
import { isGearSymbol, type GearCandidate } from './gear-ratios.js';
import { LineLexer, splitRows } from './lexer/index.js';

export interface ScanState {
  /** Index of the next row to scan */
  readonly line: number;
  /** Components of the last scanned row */
  readonly previous: readonly PositionalComponent[];
  /** Validated part numbers keyed by position */
  readonly partNumbers: ReadonlyMap<string, NumberComponent>;
  /** Gear candidates keyed by position; kept for the whole input */
  readonly gears: ReadonlyMap<string, GearCandidate>;
}

export function createScanState(): ScanState {
  return {
    line: 0,
    previous: [],
    partNumbers: new Map(),
    gears: new Map(),
  };
}

/**
 * Scan one row and return the updated state. The given state is not modified.
 *
 * @throws {ParseError} If a digit run exceeds the safe integer range
 */
export function scanLine(state: ScanState, row: string, lexer = new LineLexer()): ScanState {
  const partNumbers = new Map(state.partNumbers);
  const gears = new Map(state.gears);
  const previous = scanRow(state, row, lexer, partNumbers, gears);
  return { line: state.line + 1, previous, partNumbers, gears };
}

/**
 * Scan a whole input, one row at a time. The maps are copied once from the
 * initial state and updated in place for every row after that.
 */
export function scanSchematic(input: string, initial: ScanState = createScanState()): ScanState {
  const lexer = new LineLexer();
  const partNumbers = new Map(initial.partNumbers);
  const gears = new Map(initial.gears);

  let line = initial.line;
  let previous = initial.previous;
  for (const row of splitRows(input)) {
    previous = scanRow({ line, previous }, row, lexer, partNumbers, gears);
    line++;
  }

  return { line, previous, partNumbers, gears };
}

/**
 * Apply one row's rules to the accumulator maps and return the row's
 * components. Gear entries are replaced, never mutated, so candidates shared
 * with an earlier state stay as they were.
 */
function scanRow(
  { line, previous }: Pick<ScanState, 'line' | 'previous'>,
  row: string,
  lexer: LineLexer,
  partNumbers: Map<string, NumberComponent>,
  gears: Map<string, GearCandidate>,
): PositionalComponent[] {
  const current = toComponents(lexer.tokenize(row), line);

  const addToGear = (gear: SymbolComponent, values: number[]): void => {
    const key = componentKey(gear);
    const existing = gears.get(key)?.numbers ?? [];
    gears.set(key, { gear, numbers: [...existing, ...values] });
  };

  current.forEach((component, index) => {
    const sameLine = [current[index - 1], current[index + 1]].filter(
      (neighbour): neighbour is PositionalComponent =>
        neighbour !== undefined && touchesOnLine(component, neighbour),
    );
    const above = previous.filter((candidate) => areAdjacent(component, candidate));

    if (isNumberComponent(component)) {
      if (sameLine.some(isSymbolComponent) || above.some(isSymbolComponent)) {
        partNumbers.set(componentKey(component), component);
      }
      // This number is the row below for any gear above it
      for (const gear of above.filter(isGearSymbol)) {
        addToGear(gear, [component.token.value]);
      }
      return;
    }

    // A symbol validates the numbers above it that are still waiting for one
    for (const number of above.filter(isNumberComponent)) {
      partNumbers.set(componentKey(number), number);
    }

    if (isGearSymbol(component)) {
      addToGear(component, [
        ...sameLine.filter(isNumberComponent).map((n) => n.token.value),
        ...above.filter(isNumberComponent).map((n) => n.token.value),
      ]);
    }
  });

  return current;
}
