/**
 * Registry of solvable puzzles, keyed by day
 */

import { solveGearRatios, solvePartNumbers, type SolveOptions } from '@schematic/engine';

export type PartNumber = 1 | 2;

export interface PuzzlePart {
  part: PartNumber;
  description: string;
  solve(input: string, options: SolveOptions): number;
}

export interface Puzzle {
  day: number;
  /** Name accepted in place of the day number */
  slug: string;
  title: string;
  parts: readonly [PuzzlePart, PuzzlePart];
}

export const FIRST_DAY = 1;
export const LAST_DAY = 25;

export const GEAR_RATIOS: Puzzle = {
  day: 3,
  slug: 'gear-ratios',
  title: 'Day 3: Gear Ratios',
  parts: [
    { part: 1, description: 'Sum of part numbers', solve: solvePartNumbers },
    { part: 2, description: 'Sum of gear ratios', solve: solveGearRatios },
  ],
};

export const PUZZLES: readonly Puzzle[] = [GEAR_RATIOS];

export function findPuzzle(day: number, registry: readonly Puzzle[] = PUZZLES): Puzzle | undefined {
  return registry.find((puzzle) => puzzle.day === day);
}
