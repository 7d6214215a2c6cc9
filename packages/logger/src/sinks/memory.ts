import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps every entry in an array, synchronously. Used by tests and by
 * embedders that want to inspect emitted progress lines.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // nothing is queued
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
