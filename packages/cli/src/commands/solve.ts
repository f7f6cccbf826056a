/**
 * schematic solve command
 *
 * Solves one day from a single input file, or every registered day from a
 * base directory of NN/input files.
 */

import { isScanStrategy, SCAN_STRATEGIES } from '@schematic/engine';
import { createLogger } from '@schematic/logger';
import { Argument, Command, Option } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../config.js';
import { reportResults, solveAll, solveDay, type PartResult } from '../runner/index.js';
import {
  parseDaySelector,
  PART_SELECTORS,
  possibleDayValues,
  selectParts,
  type DaySelector,
  type PartSelector,
} from '../selectors.js';

interface SolveCommandOptions {
  strategy: string;
  format: 'pretty' | 'json';
  color: boolean;
}

export const solveCommand = new Command('solve')
  .description('Solve a puzzle day against its input')
  .addArgument(
    new Argument(
      '<day>',
      `Day to solve. Possible values:\n- ${possibleDayValues().join('\n- ')}`,
    ).argParser((value) => parseDaySelector(value)),
  )
  .addArgument(new Argument('<part>', 'Puzzle part').choices(PART_SELECTORS))
  .argument('[input]', 'Input file, or the base directory of NN/input files for day "all"')
  .addOption(
    new Option('--strategy <name>', 'Scan strategy').choices(SCAN_STRATEGIES).default('grid'),
  )
  .addOption(
    new Option('--format <type>', 'Output format').choices(['pretty', 'json']).default('pretty'),
  )
  .option('--no-color', 'Disable colored output')
  .action(
    async (
      day: DaySelector,
      part: PartSelector,
      input: string | undefined,
      options: SolveCommandOptions,
    ) => {
      try {
        const config = loadConfig();
        const logger = createLogger({
          environment: config.environment,
          minLevel: config.logLevel,
        });

        if (!isScanStrategy(options.strategy)) {
          throw new Error(`Unknown strategy '${options.strategy}'`);
        }
        const runOptions = { strategy: options.strategy, logger };
        const parts = selectParts(part);

        let results: PartResult[];
        if (day.kind === 'all') {
          const baseDir = input ?? config.inputDir;
          if (!baseDir) {
            throw new Error('No input directory given and SCHEMATIC_INPUT_DIR is not set');
          }
          results = await solveAll(path.resolve(baseDir), parts, runOptions);
        } else {
          if (!input) {
            throw new Error('An input file is required when solving a single day');
          }
          results = await solveDay(day.day, parts, path.resolve(input), runOptions);
        }

        reportResults(results, { format: options.format, noColor: !options.color });
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(2);
      }
    },
  );
