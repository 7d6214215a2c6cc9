export { ManualClock, systemClock, type Clock } from './clock.js';
export { LockReentryError, Mutex } from './mutex.js';
export {
  formatCount,
  humanize,
  isTimeUnit,
  niceSpeedUnit,
  niceTimeUnit,
  prettyPrintDuration,
  scale,
  TIME_UNIT_SECONDS,
  TIME_UNITS,
  type TimeUnit,
} from './format.js';
export { processMemorySampler, type MemorySample, type MemorySampler } from './memory.js';
export { isValidCount, type ProgressLog, type ProgressUpdater } from './progress-log.js';
export {
  clockOf,
  defaultLogTarget,
  ProgressLogger,
  type ProgressLoggerOptions,
  type ProgressState,
} from './progress-logger.js';
export { ConcurrentProgressLogger, type ConcurrentOptions } from './concurrent-progress-logger.js';
export { BufferedProgressLogger, DEFAULT_BUFFER_THRESHOLD } from './buffered-progress-logger.js';
export { NoProgressLogger, noLogging, optionalProgressLog } from './no-logging.js';
export { runScoped, type Flushable } from './scoped.js';
export {
  ConfigValidationError,
  concurrentOptionsSchema,
  createConcurrentProgressLogger,
  createProgressLogger,
  parseConcurrentOptions,
  parseProgressOptions,
  progressEnvSchema,
  progressOptionsFromEnv,
  progressOptionsSchema,
  type ConcurrentSettings,
  type ProgressRuntime,
  type ProgressSettings,
} from './config.js';
