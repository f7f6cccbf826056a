/**
 * Runs puzzle parts against their inputs
 */

import type { ScanStrategy } from '@schematic/engine';
import type { Logger } from '@schematic/logger';
import { findPuzzle, PUZZLES, type PartNumber, type Puzzle } from '../puzzles.js';
import { findDayInputs, readInput } from './input.js';

export interface PartResult {
  day: number;
  title: string;
  part: PartNumber;
  description: string;
  answer: number;
}

export interface RunOptions {
  strategy: ScanStrategy;
  logger: Logger;
  registry?: readonly Puzzle[];
}

/**
 * Solve the selected parts of one day
 *
 * @throws {Error} If no puzzle is registered for the day
 * @throws {IoError} If the input cannot be read
 * @throws {ParseError} If the input is malformed
 */
export async function solveDay(
  day: number,
  parts: readonly PartNumber[],
  inputPath: string,
  options: RunOptions,
): Promise<PartResult[]> {
  const puzzle = findPuzzle(day, options.registry ?? PUZZLES);
  if (!puzzle) {
    throw new Error(`Day ${day} not implemented`);
  }

  const input = await readInput(inputPath);
  return solvePuzzle(puzzle, parts, input, options);
}

/**
 * Solve every registered day that has an input under the base directory.
 * Days without a puzzle or without an input are skipped with a warning.
 */
export async function solveAll(
  baseDir: string,
  parts: readonly PartNumber[],
  options: RunOptions,
): Promise<PartResult[]> {
  const registry = options.registry ?? PUZZLES;
  const inputs = await findDayInputs(baseDir);
  const results: PartResult[] = [];

  for (const { day } of inputs) {
    if (!findPuzzle(day, registry)) {
      options.logger.warn('input_skipped', { day, reason: 'not_implemented' });
    }
  }

  for (const puzzle of registry) {
    const found = inputs.find((input) => input.day === puzzle.day);
    if (!found) {
      options.logger.warn('input_skipped', { day: puzzle.day, reason: 'missing_input' });
      continue;
    }
    const input = await readInput(found.path);
    results.push(...solvePuzzle(puzzle, parts, input, options));
  }

  return results;
}

function solvePuzzle(
  puzzle: Puzzle,
  parts: readonly PartNumber[],
  input: string,
  options: RunOptions,
): PartResult[] {
  const results: PartResult[] = [];

  for (const selected of puzzle.parts.filter((p) => parts.includes(p.part))) {
    const logger = options.logger.child({ day: puzzle.day, part: selected.part });
    logger.info('solve_started', { strategy: options.strategy });

    const startTime = performance.now();
    try {
      const answer = selected.solve(input, { strategy: options.strategy, logger });
      logger.info('solve_completed', {
        answer,
        duration_ms: Math.round(performance.now() - startTime),
      });
      results.push({
        day: puzzle.day,
        title: puzzle.title,
        part: selected.part,
        description: selected.description,
        answer,
      });
    } catch (error) {
      logger.error('solve_failed', { error });
      throw error;
    }
  }

  return results;
}
