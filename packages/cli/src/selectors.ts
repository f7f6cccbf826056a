/**
 * Parsing of the <day> and <part> command arguments
 */

import { InvalidArgumentError } from 'commander';
import { FIRST_DAY, LAST_DAY, PUZZLES, type PartNumber, type Puzzle } from './puzzles.js';

export type DaySelector = { kind: 'day'; day: number } | { kind: 'all' };

export const PART_SELECTORS = ['part1', 'part2', 'all'] as const;

export type PartSelector = (typeof PART_SELECTORS)[number];

export function possibleDayValues(registry: readonly Puzzle[] = PUZZLES): string[] {
  return [`${FIRST_DAY}..${LAST_DAY}`, 'all', ...registry.map((puzzle) => puzzle.slug)];
}

/**
 * Accepts a day number, 'all', or a puzzle slug (case-insensitive)
 */
export function parseDaySelector(value: string, registry: readonly Puzzle[] = PUZZLES): DaySelector {
  const normalized = value.trim().toLowerCase();

  if (/^\d+$/.test(normalized)) {
    const day = Number.parseInt(normalized, 10);
    if (day >= FIRST_DAY && day <= LAST_DAY) {
      return { kind: 'day', day };
    }
  } else if (normalized === 'all') {
    return { kind: 'all' };
  } else {
    const puzzle = registry.find((p) => p.slug === normalized);
    if (puzzle) {
      return { kind: 'day', day: puzzle.day };
    }
  }

  throw new InvalidArgumentError(
    `\n[possible values: ${possibleDayValues(registry).join(', ')}]`,
  );
}

export function selectParts(selector: PartSelector): PartNumber[] {
  switch (selector) {
    case 'part1':
      return [1];
    case 'part2':
      return [2];
    case 'all':
      return [1, 2];
  }
}
