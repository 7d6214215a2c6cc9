import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

/**
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export function formatConsoleLine(entry: LogEntry, color = false): string {
  const time = formatTime(entry.timestamp);
  const upper = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${levelColors[entry.level]}${upper}\x1b[0m` : upper;
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';

  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}

export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = formatConsoleLine(entry, this.color);

    // Map error/warn to console.error/console.warn, rest to console.log
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
