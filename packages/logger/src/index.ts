export {
  createLoggerRegistry,
  isLogLevel,
  LOG_LEVELS,
  LoggerRegistry,
  type Logger,
  type LoggerProvider,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, formatConsoleLine, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { createLoggerRegistryFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
