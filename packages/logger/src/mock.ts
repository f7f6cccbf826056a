/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = Logger['info'];

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@schematic/logger/mock';
 *
 * const logger = createMockLogger();
 * solvePartNumbers(input, { logger });
 *
 * expect(logger.debug).toHaveBeenCalledWith('part_numbers_summed', {
 *   part_numbers: 8,
 *   sum: 4361,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a fresh mock logger that also has spy functions
    child: vi.fn<(metadata: Record<string, unknown>) => MockLogger>(() => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };
}
