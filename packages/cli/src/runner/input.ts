/**
 * Input discovery and reading
 */

import { IoError } from '@schematic/engine';
import { glob } from 'glob';
import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export interface DayInput {
  day: number;
  path: string;
}

/** Each day's input lives at <base>/<two-digit day>/input */
const DAY_DIRECTORY = /^\d{2}$/;

export function dayInputPath(baseDir: string, day: number): string {
  return path.join(baseDir, String(day).padStart(2, '0'), 'input');
}

/**
 * Read a whole input file as UTF-8
 *
 * @throws {IoError} If the file cannot be read
 */
export async function readInput(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new IoError(filePath, error);
  }
}

/**
 * Find every NN/input file under the base directory, ordered by day
 *
 * @throws {IoError} If the base directory is not a readable directory
 */
export async function findDayInputs(baseDir: string): Promise<DayInput[]> {
  let stats: Stats;
  try {
    stats = await fs.stat(baseDir);
  } catch (error) {
    throw new IoError(baseDir, error);
  }
  if (!stats.isDirectory()) {
    throw new IoError(baseDir, new Error('not a directory'));
  }

  const files = await glob('*/input', { cwd: baseDir, absolute: true, nodir: true });

  return files
    .map((file) => ({ dir: path.basename(path.dirname(file)), path: file }))
    .filter(({ dir }) => DAY_DIRECTORY.test(dir))
    .map(({ dir, path: file }) => ({ day: Number.parseInt(dir, 10), path: file }))
    .sort((a, b) => a.day - b.day);
}
