/** Mock logger for testing */

import { type Mock, vi } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: Mock<Logger['child']>;
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
  fatal: Mock<Logger['fatal']>;
  flush: Mock<Logger['flush']>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@ctz/logger/mock';
 *
 * const logger = createMockLogger();
 * await convertFiles(['fixtures'], options, { logger });
 *
 * expect(logger.info).toHaveBeenCalledWith('file_converted', expect.objectContaining({ elements: 3 }));
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a new mock logger that also has spy functions
    child: vi.fn<Logger['child']>(() => createMockLogger()),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    fatal: vi.fn<Logger['fatal']>(),
    flush: vi.fn<Logger['flush']>().mockResolvedValue(undefined),
  };
}
