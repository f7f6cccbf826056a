#!/usr/bin/env node

/**
 * schematic CLI - engine schematic puzzle solver
 */

import { Command } from 'commander';
import { listCommand } from './commands/list.js';
import { solveCommand } from './commands/solve.js';

const program = new Command();

program
  .name('schematic')
  .description('Solve engine schematic puzzles: part numbers and gear ratios')
  .version('0.1.0');

// Register commands
program.addCommand(solveCommand);
program.addCommand(listCommand);

// Parse arguments
await program.parseAsync();
