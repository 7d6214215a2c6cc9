import type { Clock } from './clock.js';
import type { Mutex } from './mutex.js';
import { isValidCount, type ProgressLog, type ProgressUpdater } from './progress-log.js';
import { clockOf } from './progress-logger.js';
import { runScoped } from './scoped.js';

/** Updates a {@link BufferedProgressLogger} accumulates before merging. */
export const DEFAULT_BUFFER_THRESHOLD = 32_768;

/**
 * Buffers updates to a progress logger the caller keeps owning, taking the
 * lock only when the buffer reaches the threshold.
 *
 * Unlike {@link ConcurrentProgressLogger}, this handle only counts: the
 * caller starts and finishes the logger directly, once every handle has been
 * flushed.
 *
 * @example
 * const shared = new Mutex(pl);
 * pl.start('Smashing pumpkins...');
 * await Promise.all(chunks.map((chunk) => new BufferedProgressLogger(shared).run(async (h) => smash(chunk, h))));
 * pl.done();
 */
export class BufferedProgressLogger<P extends ProgressLog> implements ProgressUpdater {
  private localCount = 0;
  private readonly clock: Clock;

  /** `clock` defaults to the one the shared logger reads. */
  constructor(
    private readonly shared: Mutex<P>,
    private readonly threshold = DEFAULT_BUFFER_THRESHOLD,
    clock?: Clock
  ) {
    this.clock = clock ?? shared.lock(clockOf);
  }

  get inner(): Mutex<P> {
    return this.shared;
  }

  get buffered(): number {
    return this.localCount;
  }

  update(): void {
    this.updateWithCount(1);
  }

  updateWithCount(count: number): void {
    if (!isValidCount(count)) return;
    this.localCount += count;
    if (this.localCount >= this.threshold) {
      this.merge();
    }
  }

  /** Same as `update`: the threshold already keeps the lock cold. */
  lightUpdate(): void {
    this.updateWithCount(1);
  }

  /** Merges the buffer together with `count` and logs once. */
  updateAndDisplay(count = 1): void {
    if (!isValidCount(count)) return;
    const now = this.clock.now();
    const pending = this.localCount + count;
    this.shared.lock((inner) => inner.updateAndDisplay(pending, now));
    this.localCount = 0;
  }

  /** Merges a non-empty buffer. */
  flush(): void {
    if (this.localCount > 0) {
      this.merge();
    }
  }

  /** A handle on the same logger; the buffer is not copied, or it would be counted twice. */
  clone(): BufferedProgressLogger<P> {
    return new BufferedProgressLogger(this.shared, this.threshold, this.clock);
  }

  run<R>(work: (handle: this) => Promise<R>): Promise<R>;
  run<R>(work: (handle: this) => R): R;
  run<R>(work: (handle: this) => R | Promise<R>): R | Promise<R> {
    return runScoped(this, work);
  }

  private merge(): void {
    const now = this.clock.now();
    const pending = this.localCount;
    this.shared.lock((inner) => inner.updateWithCountAndTime(pending, now));
    this.localCount = 0;
  }
}
