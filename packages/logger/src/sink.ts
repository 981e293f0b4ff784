import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { LogEntry, LogSink } from './types.js';

/**
 * Appends entries to a file, one JSON object per line
 */
export function createFileSink(path: string): LogSink {
  let ready: Promise<unknown> | null = null;

  return {
    async write(entries: LogEntry[]): Promise<void> {
      ready ??= mkdir(dirname(path), { recursive: true });
      await ready;
      await appendFile(path, entries.map((entry) => `${JSON.stringify(entry)}\n`).join(''), 'utf8');
    },
  };
}
