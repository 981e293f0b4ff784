export { createLogger, LOG_LEVELS } from './logger.js';
export { createFileSink } from './sink.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
