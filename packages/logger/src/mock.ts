/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@kaleidoscope/logger/mock';
 *
 * const logger = createMockLogger();
 * parse('def binary| 5 (a b) a;', { logger });
 *
 * expect(logger.debug).toHaveBeenCalledWith('operator_declared', {
 *   symbol: '|', fixity: 'binary', precedence: 5,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a new mock logger that also has spy functions
    child: vi.fn((_metadata: Record<string, unknown>) => createMockLogger()),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}
