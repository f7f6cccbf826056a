import { describe, expect, it } from 'vitest';
import { collectGears, sumGearRatios } from '../src/gear-ratios.js';
import { SchematicGrid } from '../src/grid.js';
import { findPartNumbers, sumPartNumbers } from '../src/part-numbers.js';
import { createScanState, scanLine, scanSchematic, type ScanState } from '../src/stream.js';
import { EXAMPLE, EXAMPLE_PART_NUMBERS, rows } from './helpers.js';

function partValues(state: ScanState): number[] {
  return [...state.partNumbers.values()].map((c) => c.token.value);
}

function gearNumbers(state: ScanState): Record<string, number[]> {
  return Object.fromEntries([...state.gears].map(([key, candidate]) => [key, candidate.numbers]));
}

describe('createScanState', () => {
  it('starts before the first row with nothing collected', () => {
    const state = createScanState();
    expect(state.line).toBe(0);
    expect(state.previous).toEqual([]);
    expect(state.partNumbers.size).toBe(0);
    expect(state.gears.size).toBe(0);
  });
});

describe('scanLine', () => {
  it('advances the line and keeps only the scanned row as previous', () => {
    const state = scanLine(createScanState(), '467..114..');
    expect(state.line).toBe(1);
    expect(state.previous.map((c) => c.column)).toEqual([0, 5]);
  });

  it('does not modify the state it is given', () => {
    const first = scanLine(createScanState(), '467..114..');
    const second = scanLine(first, '...*......');

    expect(first.partNumbers.size).toBe(0);
    expect(first.gears.size).toBe(0);
    expect(partValues(second)).toEqual([467]);
  });

  it('validates numbers on the row above when a symbol arrives', () => {
    let state = scanLine(createScanState(), '..5');
    expect(partValues(state)).toEqual([]);
    state = scanLine(state, '.#.');
    expect(partValues(state)).toEqual([5]);
  });

  it('validates a number against a symbol on the row above', () => {
    const state = scanSchematic(rows('.#.', '..5'));
    expect(partValues(state)).toEqual([5]);
  });

  it('checks same-row neighbours by column, not by array position', () => {
    expect(partValues(scanSchematic('12.#'))).toEqual([]);
    expect(partValues(scanSchematic('#12'))).toEqual([12]);
    expect(partValues(scanSchematic('12#'))).toEqual([12]);
  });

  it('builds up gears across three rows', () => {
    let state = createScanState();
    for (const row of ['467..114..', '...*......']) {
      state = scanLine(state, row);
    }
    expect(gearNumbers(state)).toEqual({ '1:3': [467] });

    state = scanLine(state, '..35..633.');
    expect(gearNumbers(state)).toEqual({ '1:3': [467, 35] });
    expect(partValues(state)).toEqual([467, 35]);

    state = scanLine(state, '......#...');
    expect(partValues(state)).toEqual([467, 35, 633]);
  });

  it('collects same-row numbers on both sides of a gear', () => {
    expect(gearNumbers(scanSchematic('12*3'))).toEqual({ '0:2': [12, 3] });
  });

  it('ignores a number past a dot on the gear row', () => {
    expect(gearNumbers(scanSchematic('*.7'))).toEqual({ '0:0': [] });
  });
});

describe('scanSchematic', () => {
  it('finds the example part numbers', () => {
    const state = scanSchematic(EXAMPLE);
    expect(sumPartNumbers(state.partNumbers.values())).toBe(4361);
    expect(partValues(state).sort((a, b) => a - b)).toEqual(
      [...EXAMPLE_PART_NUMBERS].sort((a, b) => a - b),
    );
  });

  it('finds the example gears', () => {
    const state = scanSchematic(EXAMPLE);
    expect(gearNumbers(state)).toEqual({
      '1:3': [467, 35],
      '4:3': [617],
      '8:5': [755, 598],
    });
    expect(sumGearRatios(state.gears)).toBe(467835);
  });

  it('does not modify the initial state', () => {
    const head = scanSchematic(rows('467..114..', '...*......'));
    scanSchematic(rows('..35..633.', '......#...'), head);

    expect(head.line).toBe(2);
    expect(partValues(head)).toEqual([467]);
    expect(gearNumbers(head)).toEqual({ '1:3': [467] });
  });

  it('matches scanning the same rows one call at a time', () => {
    const stepped = EXAMPLE.split('\n').reduce(
      (state, row) => scanLine(state, row),
      createScanState(),
    );
    const scanned = scanSchematic(EXAMPLE);

    expect(scanned.line).toBe(stepped.line);
    expect(scanned.previous).toEqual(stepped.previous);
    expect([...scanned.partNumbers.keys()]).toEqual([...stepped.partNumbers.keys()]);
    expect(gearNumbers(scanned)).toEqual(gearNumbers(stepped));
  });

  it('continues from a given state', () => {
    const head = scanSchematic(rows('467..114..', '...*......'));
    const full = scanSchematic(rows('..35..633.'), head);
    expect(gearNumbers(full)).toEqual({ '1:3': [467, 35] });
  });
});

describe('agreement with the grid scan', () => {
  const inputs = [
    EXAMPLE,
    rows('..5', '.#.'),
    rows('.#.', '..5'),
    rows('5..', '.*.', '..6'),
    rows('..6', '.*.', '5..'),
    rows('1.2', '.*.', '3..'),
    rows('*12', '...', '12*'),
    rows('#5#', '&.&'),
    rows('7.7', '.#.', '7.7'),
    rows('100', '..*', '', '*..', '200'),
    rows('..........', '.....', '3*4', '.....*....', '...8.9'),
    rows('.#', '4.', '.$'),
  ];

  it('sums the same part numbers', () => {
    for (const input of inputs) {
      const grid = SchematicGrid.parse(input);
      expect(sumPartNumbers(scanSchematic(input).partNumbers.values())).toBe(
        sumPartNumbers(findPartNumbers(grid)),
      );
    }
  });

  it('sums the same gear ratios', () => {
    for (const input of inputs) {
      const grid = SchematicGrid.parse(input);
      expect(sumGearRatios(scanSchematic(input).gears)).toBe(sumGearRatios(collectGears(grid)));
    }
  });

  it('collects the same numbers for every gear, in any order', () => {
    for (const input of inputs) {
      const streamed = scanSchematic(input).gears;
      const gridded = collectGears(SchematicGrid.parse(input));
      expect([...streamed.keys()].sort()).toEqual([...gridded.keys()].sort());
      for (const [key, candidate] of gridded) {
        const sorted = [...candidate.numbers].sort((a, b) => a - b);
        expect([...(streamed.get(key)?.numbers ?? [])].sort((a, b) => a - b)).toEqual(sorted);
      }
    }
  });
});
