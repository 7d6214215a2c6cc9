import type { LogLevel } from '@pacer/logger';

import type { TimeUnit } from './format.js';

/**
 * The part of the capability a worker needs: counting items. Also
 * implemented by {@link BufferedProgressLogger}.
 */
export interface ProgressUpdater {
  update(): void;
  updateWithCount(count: number): void;
  /**
   * Increases the count, checking the time (or merging, for buffered
   * handles) only once every implementation-defined number of calls.
   */
  lightUpdate(): void;
  /** Increases the count by `count` (default 1) and forces a log. */
  updateAndDisplay(count?: number): void;
}

/**
 * Whether `count` can be added to a counter. Update entry points ignore
 * anything else, so a counter never decreases and never turns into `NaN`.
 */
export function isValidCount(count: number): boolean {
  return Number.isSafeInteger(count) && count >= 0;
}

/**
 * The progress-reporting capability. Implemented by {@link ProgressLogger},
 * by every {@link ConcurrentProgressLogger} handle and by the no-op
 * {@link NoProgressLogger}, so code that reports progress can accept any of them.
 *
 * Setters return `this` and may be called at any time, including mid-run.
 */
export interface ProgressLog extends ProgressUpdater {
  /** Items counted so far; for concurrent handles, those merged into the shared counter. */
  readonly count: number;

  /**
   * Forces a log assuming `now` is the current time.
   * Low-level: used by wrappers, not by code reporting progress.
   */
  log(now: number): void;

  /** Logs if the log interval has elapsed. Low-level. */
  logIf(now?: number): void;

  displayMemory(displayMemory: boolean): this;
  itemName(itemName: string): this;
  /** Minimum time between two progress lines, in milliseconds. */
  logInterval(logInterval: number): this;
  /** When set, progress lines show percentage done and time to end. */
  expectedUpdates(expectedUpdates: number | undefined): this;
  /**
   * Fixes the unit used for speeds. Counts are then printed without
   * thousands separators, which keeps the output machine-parseable.
   */
  timeUnit(timeUnit: TimeUnit | undefined): this;
  /** Also shows the speed achieved since the previous line. */
  localSpeed(localSpeed: boolean): this;
  /** Category of the emitted log entries. */
  logTarget(target: string): this;
  /** Severity of the emitted log entries. */
  logLevel(level: LogLevel): this;

  /** Starts a new measurement epoch; an empty message logs nothing. */
  start(msg?: string): void;
  /** Like {@link updateWithCount}, with a timestamp the caller already read. */
  updateWithCountAndTime(count: number, now: number): void;
  /**
   * Adds `count` (default 1) and logs at `now` (default: the current time),
   * with no throttle check in between. Wrappers merge their buffers this way.
   */
  updateAndDisplay(count?: number, now?: number): void;
  stop(msg?: string): void;
  /** Stops, logs `Completed.` and the final statistics. */
  done(): void;
  /**
   * Sets the count, then behaves as {@link done}. For when per-item updates
   * were skipped or approximate and only the exact total is known.
   */
  doneWithCount(count: number): void;

  /** Milliseconds since start (frozen at stop); undefined before start. */
  elapsed(): number | undefined;
  /** Re-samples memory if displayed. Call before rendering by hand. */
  refresh(): void;
  /** Emits an arbitrary message on the logger's target and level. */
  info(msg: string): void;
  /**
   * A logger with the same setup and reset counters (for concurrent
   * handles: a new handle on the same shared counter).
   */
  clone(): ProgressLog;
}
