import { createFileSink, createLogger, type Logger } from '@ctz/logger';
import * as path from 'node:path';
import type { CliConfig } from './config.js';

/**
 * Logger for one CLI run: stderr only, plus a JSON-lines file when
 * `logFile` is configured
 */
export function createCliLogger(config: CliConfig, cwd: string): Logger {
  const base = {
    environment: config.environment,
    minLevel: config.logLevel,
  };

  if (config.logFile === undefined) {
    return createLogger({ ...base, consoleOnly: true });
  }
  return createLogger({ ...base, sink: createFileSink(path.resolve(cwd, config.logFile)) });
}
