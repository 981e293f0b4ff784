import type { LogEntry, LogSink } from '../src/types.js';

/**
 * Sink that keeps written entries in memory
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];
  writes = 0;

  async write(entries: LogEntry[]): Promise<void> {
    this.writes++;
    this.entries.push(...entries);
  }

  get last(): LogEntry | null {
    return this.entries.at(-1) ?? null;
  }
}

export function tick(ms = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
