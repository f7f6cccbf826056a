/**
 * schematic list command
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { PUZZLES } from '../puzzles.js';

export const listCommand = new Command('list')
  .description('List the puzzles that can be solved')
  .option('--no-color', 'Disable colored output')
  .action((options: { color: boolean }) => {
    for (const puzzle of PUZZLES) {
      const day = String(puzzle.day).padStart(2, ' ');
      const slug = options.color ? chalk.cyan(puzzle.slug) : puzzle.slug;
      console.log(`  ${day}  ${slug}  ${puzzle.title}`);
    }
  });
