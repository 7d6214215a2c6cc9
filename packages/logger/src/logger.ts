export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  log(level: LogLevel, msg: string, context?: Record<string, unknown>): void;
}

/**
 * Anything that hands out category loggers. Progress loggers depend on this
 * rather than on a concrete registry so embedders can route output freely.
 */
export interface LoggerProvider {
  getLogger(category: string): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Safely serialize context objects for logging.
 * Handles Error objects, circular references, BigInt, and non-serializable values.
 * Note: shared object references (same object at multiple keys) are treated as circular.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(obj, replacer));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly registry: LoggerRegistry
  ) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.dispatch('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.dispatch('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.dispatch('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.dispatch('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.dispatch('error', msgOrObj, maybeMsg);
  }

  log(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    if (context) {
      this.dispatch(level, context, msg);
    } else {
      this.dispatch(level, msg);
    }
  }

  private dispatch(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (!this.registry.isEnabled(level)) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj),
          };

    this.registry.write(entry);
  }
}

/**
 * Owns a level threshold and a set of sinks, and hands out one cached logger
 * per category. There is no process-wide instance: whoever needs output
 * creates a registry and passes it down.
 */
export class LoggerRegistry implements LoggerProvider {
  private level: LogLevel;
  private readonly sinks: Sink[];
  private readonly loggers = new Map<string, Logger>();

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'info';
    this.sinks = config.sinks ?? [];
  }

  getLogger(category: string): Logger {
    const cached = this.loggers.get(category);
    if (cached) {
      return cached;
    }

    const logger = new CategoryLogger(category, this);
    this.loggers.set(category, logger);
    return logger;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return levelOrder[level] >= levelOrder[this.level];
  }

  write(entry: LogEntry): void {
    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }

  flush(): void {
    for (const sink of this.sinks) {
      sink.flush();
    }
  }
}

export function createLoggerRegistry(config: LoggerConfig = {}): LoggerRegistry {
  return new LoggerRegistry(config);
}
