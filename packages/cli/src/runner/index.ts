export { solveAll, solveDay, type PartResult, type RunOptions } from './executor.js';
export { dayInputPath, findDayInputs, readInput, type DayInput } from './input.js';
export { formatJson, formatPretty, reportResults, type ReporterOptions } from './reporter.js';
