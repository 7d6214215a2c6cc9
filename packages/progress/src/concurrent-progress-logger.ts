import type { LogLevel } from '@pacer/logger';

import type { Clock } from './clock.js';
import type { TimeUnit } from './format.js';
import { Mutex } from './mutex.js';
import { isValidCount, type ProgressLog } from './progress-log.js';
import { clockOf, ProgressLogger, type ProgressLoggerOptions } from './progress-logger.js';
import { runScoped } from './scoped.js';

export interface ConcurrentOptions {
  /** Buffered items that trigger a merge from `update`/`updateWithCount`. */
  threshold?: number | undefined;
  /** `lightUpdate` merges once every `mergeMask + 1` calls. */
  mergeMask?: number | undefined;
  /** Clock read before taking the lock; defaults to the wrapped logger's. */
  clock?: Clock | undefined;
}

interface HandleSettings {
  threshold: number;
  mergeMask: number;
  clock: Clock;
}

/**
 * Progress logger shared by many concurrent workers.
 *
 * One {@link ProgressLog} sits behind a {@link Mutex}; every instance of this
 * class is a handle on it with a private buffered count. `update` and
 * `updateWithCount` merge the buffer into the shared logger when it reaches
 * the threshold; `lightUpdate` merges once every `mergeMask + 1` calls. A
 * merge reads the clock first, then adds the buffer exactly once under the
 * lock, runs the shared throttle, and zeroes the buffer.
 *
 * Give each worker its own handle from {@link spawn} and run the worker
 * through {@link run} so the buffer is flushed when the worker ends.
 * Configuration, lifecycle and queries go to the shared logger.
 */
export class ConcurrentProgressLogger<P extends ProgressLog = ProgressLogger> implements ProgressLog {
  static readonly DEFAULT_THRESHOLD = 1 << 15;
  /**
   * Smaller than {@link ProgressLogger.LIGHT_UPDATE_MASK}: merges are further
   * delayed by the shared throttle.
   */
  static readonly LIGHT_UPDATE_MASK = (1 << 10) - 1;

  private localCount = 0;
  private updateCalls = 0;
  private bufferThreshold: number;
  private readonly mergeMask: number;
  private readonly clock: Clock;

  constructor(
    private readonly shared: Mutex<P>,
    settings: HandleSettings
  ) {
    this.bufferThreshold = settings.threshold;
    this.mergeMask = settings.mergeMask;
    this.clock = settings.clock;
  }

  /** Wraps a fresh {@link ProgressLogger} built from `options`. */
  static create(options: ProgressLoggerOptions & ConcurrentOptions = {}): ConcurrentProgressLogger {
    return ConcurrentProgressLogger.wrap(new ProgressLogger(options), options);
  }

  /** Wraps a configured, not yet started logger. */
  static wrap<P extends ProgressLog>(inner: P, options: ConcurrentOptions = {}): ConcurrentProgressLogger<P> {
    const clock = options.clock ?? clockOf(inner);
    return new ConcurrentProgressLogger(new Mutex(inner, 'concurrent-progress'), {
      threshold: options.threshold ?? ConcurrentProgressLogger.DEFAULT_THRESHOLD,
      mergeMask: options.mergeMask ?? ConcurrentProgressLogger.LIGHT_UPDATE_MASK,
      clock,
    });
  }

  /** Items counted by this handle and not yet merged. */
  get buffered(): number {
    return this.localCount;
  }

  get count(): number {
    return this.shared.lock((inner) => inner.count);
  }

  /** Sets this handle's threshold; sibling handles keep their own. */
  threshold(threshold: number): this {
    this.bufferThreshold = threshold;
    return this;
  }

  /** A new handle on the same shared logger, with an empty buffer. */
  spawn(): ConcurrentProgressLogger<P> {
    return new ConcurrentProgressLogger(this.shared, {
      threshold: this.bufferThreshold,
      mergeMask: this.mergeMask,
      clock: this.clock,
    });
  }

  clone(): ConcurrentProgressLogger<P> {
    return this.spawn();
  }

  /** Runs `work` with this handle, then flushes it. */
  run<R>(work: (handle: this) => Promise<R>): Promise<R>;
  run<R>(work: (handle: this) => R): R;
  run<R>(work: (handle: this) => R | Promise<R>): R | Promise<R> {
    return runScoped(this, work);
  }

  /**
   * Merges the buffer now, even when empty: the shared throttle runs and may
   * log although this handle alone never reached its threshold.
   */
  flush(): void {
    this.merge(this.clock.now());
  }

  update(): void {
    this.updateWithCount(1);
  }

  updateWithCount(count: number): void {
    if (!isValidCount(count)) return;
    this.localCount += count;
    if (this.localCount >= this.bufferThreshold) {
      this.merge(this.clock.now());
    }
  }

  updateWithCountAndTime(count: number, now: number): void {
    if (!isValidCount(count)) return;
    this.localCount += count;
    if (this.localCount >= this.bufferThreshold) {
      this.merge(now);
    }
  }

  lightUpdate(): void {
    this.localCount += 1;
    const index = this.updateCalls;
    this.updateCalls = (index + 1) % (this.mergeMask + 1);
    if (index === 0) {
      this.merge(this.clock.now());
    }
  }

  /** Merges the buffer together with `count` and logs once. */
  updateAndDisplay(count = 1, now: number = this.clock.now()): void {
    if (!isValidCount(count)) return;
    const pending = this.localCount + count;
    this.shared.lock((inner) => inner.updateAndDisplay(pending, now));
    this.localCount = 0;
  }

  log(now: number): void {
    this.shared.lock((inner) => inner.log(now));
  }

  logIf(now: number = this.clock.now()): void {
    this.shared.lock((inner) => inner.logIf(now));
  }

  displayMemory(displayMemory: boolean): this {
    this.shared.lock((inner) => inner.displayMemory(displayMemory));
    return this;
  }

  itemName(itemName: string): this {
    this.shared.lock((inner) => inner.itemName(itemName));
    return this;
  }

  logInterval(logInterval: number): this {
    this.shared.lock((inner) => inner.logInterval(logInterval));
    return this;
  }

  expectedUpdates(expectedUpdates: number | undefined): this {
    this.shared.lock((inner) => inner.expectedUpdates(expectedUpdates));
    return this;
  }

  timeUnit(timeUnit: TimeUnit | undefined): this {
    this.shared.lock((inner) => inner.timeUnit(timeUnit));
    return this;
  }

  localSpeed(localSpeed: boolean): this {
    this.shared.lock((inner) => inner.localSpeed(localSpeed));
    return this;
  }

  logTarget(target: string): this {
    this.shared.lock((inner) => inner.logTarget(target));
    return this;
  }

  logLevel(level: LogLevel): this {
    this.shared.lock((inner) => inner.logLevel(level));
    return this;
  }

  /** Starts the shared logger; this handle's buffer belongs to the old epoch and is dropped. */
  start(msg = ''): void {
    this.shared.lock((inner) => inner.start(msg));
    this.localCount = 0;
    this.updateCalls = 0;
  }

  stop(msg = ''): void {
    this.finish((inner) => inner.stop(msg));
  }

  done(): void {
    this.finish((inner) => inner.done());
  }

  /** The given count replaces whatever was counted, buffered counts included. */
  doneWithCount(count: number): void {
    if (!isValidCount(count)) return;
    this.shared.lock((inner) => inner.doneWithCount(count));
    this.localCount = 0;
  }

  elapsed(): number | undefined {
    return this.shared.lock((inner) => inner.elapsed());
  }

  refresh(): void {
    this.shared.lock((inner) => inner.refresh());
  }

  info(msg: string): void {
    this.shared.lock((inner) => inner.info(msg));
  }

  toString(): string {
    return this.shared.lock((inner) => String(inner));
  }

  private merge(now: number): void {
    const pending = this.localCount;
    this.shared.lock((inner) => inner.updateWithCountAndTime(pending, now));
    this.localCount = 0;
  }

  /** Merges this handle's own buffer before the shared logger stops. */
  private finish(stop: (inner: P) => void): void {
    const now = this.clock.now();
    const pending = this.localCount;
    this.shared.lock((inner) => {
      if (pending > 0) {
        inner.updateWithCountAndTime(pending, now);
      }
      stop(inner);
    });
    this.localCount = 0;
  }
}
