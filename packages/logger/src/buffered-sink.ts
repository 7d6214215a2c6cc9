import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries kept before the oldest are dropped. Defaults to 1000. */
  maxBuffer?: number | undefined;
}

/**
 * Base class for sinks that queue entries and write them on the next turn of
 * the event loop. Subclasses implement `writeEntry(entry)`.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private drainScheduled = false;
  private droppedSinceDrain = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  get pending(): number {
    return this.queue.length;
  }

  write(entry: LogEntry): void {
    if (this.queue.length >= this.maxBuffer) {
      this.droppedSinceDrain++;
      this.queue.shift();
    }
    this.queue.push(entry);

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Writes everything queued right away. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.queue;
    const dropped = this.droppedSinceDrain;
    this.queue = [];
    this.drainScheduled = false;
    this.droppedSinceDrain = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
