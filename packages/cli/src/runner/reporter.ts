/**
 * Solve result reporter
 */

import chalk from 'chalk';
import type { PartResult } from './executor.js';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  noColor?: boolean;
}

interface Palette {
  cyan(text: string): string;
  bold(text: string): string;
  gray(text: string): string;
}

const plain: Palette = {
  cyan: (s) => s,
  bold: (s) => s,
  gray: (s) => s,
};

/**
 * Format results as a title per day followed by one line per part
 */
export function formatPretty(results: readonly PartResult[], noColor = false): string[] {
  const c: Palette = noColor ? plain : chalk;
  const lines: string[] = [];
  let currentDay: number | null = null;

  for (const result of results) {
    if (result.day !== currentDay) {
      lines.push(c.cyan(result.title));
      currentDay = result.day;
    }
    lines.push(
      `${c.gray(`[Part ${result.part}]`)} ${result.description}: ${c.bold(String(result.answer))}`,
    );
  }

  return lines;
}

export function formatJson(results: readonly PartResult[]): string {
  return JSON.stringify({ results }, null, 2);
}

/**
 * Report results in the specified format
 */
export function reportResults(results: readonly PartResult[], options: ReporterOptions): void {
  if (options.format === 'json') {
    console.log(formatJson(results));
    return;
  }

  for (const line of formatPretty(results, options.noColor)) {
    console.log(line);
  }
}
