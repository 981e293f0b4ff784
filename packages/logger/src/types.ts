export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/**
 * Destination for buffered log entries
 */
export interface LogSink {
  write(entries: LogEntry[]): Promise<void>;
}

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  /**
   * Log at debug level (stderr only, never written to the sink)
   */
  debug(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at info level
   */
  info(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at warn level
   */
  warn(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at error level
   */
  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Write buffered log entries to the sink
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  sink?: LogSink;
  bufferSize?: number;
  consoleOnly?: boolean;
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
}
