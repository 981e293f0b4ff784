/** Structured logger with optional buffered sink */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000, // Large buffer, flush less often
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private buffer: LogEntry[] = [];
  private sink?: LogSink;
  private bufferSize: number;
  private consoleOnly: boolean;
  private environment: Environment;
  private envConfig: EnvironmentConfig;
  private minLevel: LogLevel;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.sink = config.sink;
    this.consoleOnly = config.consoleOnly ?? false;
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.bufferSize = config.bufferSize ?? this.envConfig.bufferSize;
    this.minLevel = config.minLevel ?? this.envConfig.minLevel;

    // Validate: if not console-only, a sink is required
    if (!this.consoleOnly && !this.sink) {
      throw new Error('LoggerConfig.sink is required when consoleOnly is false');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        sink: this.sink,
        bufferSize: this.bufferSize,
        consoleOnly: this.consoleOnly,
        environment: this.environment,
        minLevel: this.minLevel,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err: unknown) => {
      console.error('Failed to flush fatal log:', err);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: this.generateId(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    };

    this.logToConsole(entry);

    // Buffer for the sink only if not console-only mode (skip debug level)
    if (!this.consoleOnly && level !== 'debug') {
      this.buffer.push(entry);

      // Auto-flush on buffer threshold
      if (this.buffer.length >= this.bufferSize) {
        this.flush().catch((err: unknown) => {
          console.error('Failed to auto-flush logs:', err);
        });
      }
    }
  }

  async flush(): Promise<void> {
    if (this.consoleOnly || !this.sink || this.buffer.length === 0) {
      return;
    }

    const toFlush = [...this.buffer];
    this.buffer = [];

    try {
      await this.sink.write(toFlush);
    } catch (err) {
      // Report and drop the batch
      console.error('Failed to flush logs:', err, {
        entries: toFlush.length,
      });
    }
  }

  /**
   * Errors become plain objects; stacks only where the environment keeps them
   */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      result[key] =
        value instanceof Error
          ? {
              name: value.name,
              message: value.message,
              ...(this.envConfig.includeStackTraces && value.stack ? { stack: value.stack } : {}),
            }
          : value;
    }
    return result;
  }

  protected logToConsole(entry: LogEntry): void {
    const logData = {
      level: entry.level,
      event_type: entry.event_type,
      metadata: entry.metadata,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    process.stderr.write(`${JSON.stringify(logData)}\n`);
  }

  protected generateId(): string {
    return `log_${ulid()}`;
  }
}

export function createLogger(config: LoggerConfig): Logger {
  return new LoggerImpl(config);
}
