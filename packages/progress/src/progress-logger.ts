import path from 'node:path';

import { ConsoleSink, LoggerRegistry, type LoggerProvider, type LogLevel } from '@pacer/logger';
import pluralize from 'pluralize';

import { systemClock, type Clock } from './clock.js';
import {
  formatCount,
  humanize,
  niceSpeedUnit,
  niceTimeUnit,
  prettyPrintDuration,
  TIME_UNIT_SECONDS,
  type TimeUnit,
} from './format.js';
import { processMemorySampler, type MemorySample, type MemorySampler } from './memory.js';
import { isValidCount, type ProgressLog } from './progress-log.js';

export type ProgressState = 'fresh' | 'running' | 'stopped';

export interface ProgressLoggerOptions {
  itemName?: string | undefined;
  /** Milliseconds between progress lines. */
  logInterval?: number | undefined;
  expectedUpdates?: number | undefined;
  timeUnit?: TimeUnit | undefined;
  localSpeed?: boolean | undefined;
  displayMemory?: boolean | undefined;
  logTarget?: string | undefined;
  logLevel?: LogLevel | undefined;
  /** `lightUpdate` reads the clock once every `lightUpdateMask + 1` calls. */
  lightUpdateMask?: number | undefined;
  clock?: Clock | undefined;
  logging?: LoggerProvider | undefined;
  memorySampler?: MemorySampler | undefined;
}

/**
 * Name of the running script without extension, or `main`.
 */
export function defaultLogTarget(): string {
  const script = process.argv[1];
  if (!script) {
    return 'main';
  }
  return path.basename(script, path.extname(script)) || 'main';
}

/** The clock `pl` reads, so handles over it can timestamp merges outside the lock. */
export function clockOf(pl: ProgressLog): Clock {
  return pl instanceof ProgressLogger ? pl.options.clock ?? systemClock : systemClock;
}

/**
 * Single-threaded progress logger.
 *
 * Counts items between `start` and `stop`, and on each update emits a status
 * line (count, elapsed time, speed, optionally percentage, time to end and
 * memory) if at least `logInterval` milliseconds have passed since the
 * previous one. Output goes to the category `logTarget` of the configured
 * {@link LoggerProvider}.
 *
 * An update before `start` starts the logger silently at that instant; an
 * update after `stop` is ignored.
 */
export class ProgressLogger implements ProgressLog {
  static readonly DEFAULT_LOG_INTERVAL = 10_000;
  static readonly LIGHT_UPDATE_MASK = (1 << 20) - 1;

  private name: string;
  private pluralName: string;
  private interval: number;
  private expected: number | undefined;
  private unit: TimeUnit | undefined;
  private showLocalSpeed: boolean;
  private showMemory: boolean;
  private target: string;
  private level: LogLevel;
  private mask: number;

  private readonly clock: Clock;
  private readonly logging: LoggerProvider;
  private readonly memorySampler: MemorySampler;

  private items = 0;
  private lastCount = 0;
  private startTime: number | undefined;
  private stopTime: number | undefined;
  private lastLogTime: number;
  private nextLogTime: number;
  private lightUpdateCalls = 0;
  private memory: MemorySample | undefined;

  constructor(options: ProgressLoggerOptions = {}) {
    this.name = options.itemName ?? 'item';
    this.pluralName = pluralize(this.name);
    this.interval = options.logInterval ?? ProgressLogger.DEFAULT_LOG_INTERVAL;
    this.expected = options.expectedUpdates;
    this.unit = options.timeUnit;
    this.showLocalSpeed = options.localSpeed ?? false;
    this.showMemory = options.displayMemory ?? false;
    this.target = options.logTarget ?? defaultLogTarget();
    this.level = options.logLevel ?? 'info';
    this.mask = options.lightUpdateMask ?? ProgressLogger.LIGHT_UPDATE_MASK;
    this.clock = options.clock ?? systemClock;
    this.logging = options.logging ?? new LoggerRegistry({ sinks: [new ConsoleSink()] });
    this.memorySampler = options.memorySampler ?? processMemorySampler;

    const now = this.clock.now();
    this.lastLogTime = now;
    this.nextLogTime = now;
  }

  get count(): number {
    return this.items;
  }

  get state(): ProgressState {
    if (this.startTime === undefined) return 'fresh';
    return this.stopTime === undefined ? 'running' : 'stopped';
  }

  /** Current configuration, as accepted by the constructor. */
  get options(): ProgressLoggerOptions {
    return {
      itemName: this.name,
      logInterval: this.interval,
      expectedUpdates: this.expected,
      timeUnit: this.unit,
      localSpeed: this.showLocalSpeed,
      displayMemory: this.showMemory,
      logTarget: this.target,
      logLevel: this.level,
      lightUpdateMask: this.mask,
      clock: this.clock,
      logging: this.logging,
      memorySampler: this.memorySampler,
    };
  }

  get pluralItemName(): string {
    return this.pluralName;
  }

  log(now: number): void {
    this.refresh();
    this.emit(this.render(now));
    this.lastCount = this.items;
    this.lastLogTime = now;
    this.nextLogTime = now + this.interval;
  }

  logIf(now: number = this.clock.now()): void {
    if (this.nextLogTime <= now) {
      this.log(now);
    }
  }

  displayMemory(displayMemory: boolean): this {
    this.showMemory = displayMemory;
    if (!displayMemory) {
      this.memory = undefined;
    }
    return this;
  }

  itemName(itemName: string): this {
    this.name = itemName;
    this.pluralName = pluralize(itemName);
    return this;
  }

  logInterval(logInterval: number): this {
    this.interval = logInterval;
    return this;
  }

  expectedUpdates(expectedUpdates: number | undefined): this {
    this.expected = expectedUpdates;
    return this;
  }

  timeUnit(timeUnit: TimeUnit | undefined): this {
    this.unit = timeUnit;
    return this;
  }

  localSpeed(localSpeed: boolean): this {
    this.showLocalSpeed = localSpeed;
    return this;
  }

  logTarget(target: string): this {
    this.target = target;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.level = level;
    return this;
  }

  lightUpdateMask(mask: number): this {
    this.mask = mask;
    return this;
  }

  start(msg = ''): void {
    this.begin(this.clock.now());
    this.lightUpdateCalls = 0;
    if (msg) {
      this.emit(msg);
    }
  }

  update(): void {
    this.updateWithCountAndTime(1, this.clock.now());
  }

  updateWithCount(count: number): void {
    this.updateWithCountAndTime(count, this.clock.now());
  }

  updateWithCountAndTime(count: number, now: number): void {
    if (!isValidCount(count) || !this.accepts(now)) return;
    this.items += count;
    this.logIf(now);
  }

  lightUpdate(): void {
    const index = this.lightUpdateCalls;
    this.lightUpdateCalls = (index + 1) % (this.mask + 1);

    if (index === 0 || this.startTime === undefined) {
      this.updateWithCountAndTime(1, this.clock.now());
    } else if (this.stopTime === undefined) {
      this.items += 1;
    }
  }

  updateAndDisplay(count = 1, now: number = this.clock.now()): void {
    if (!isValidCount(count) || !this.accepts(now)) return;
    this.items += count;
    this.log(now);
  }

  stop(msg = ''): void {
    if (this.startTime !== undefined && this.stopTime === undefined) {
      this.stopTime = this.clock.now();
    }
    this.expected = undefined;
    if (msg) {
      this.emit(msg);
    }
  }

  done(): void {
    this.stop();
    this.emit('Completed.');
    this.refresh();
    this.emit(this.render(this.clock.now()));
  }

  doneWithCount(count: number): void {
    if (!isValidCount(count)) return;
    this.items = count;
    this.done();
  }

  elapsed(): number | undefined {
    if (this.startTime === undefined) return undefined;
    return (this.stopTime ?? this.clock.now()) - this.startTime;
  }

  refresh(): void {
    if (this.showMemory) {
      this.memory = this.memorySampler.sample();
    }
  }

  info(msg: string): void {
    this.emit(msg);
  }

  /**
   * A fresh logger with this logger's configuration and collaborators; the
   * counters are in their pre-`start` state.
   */
  cloneConfig(): ProgressLogger {
    return new ProgressLogger(this.options);
  }

  clone(): ProgressLogger {
    return this.cloneConfig();
  }

  /** The current status line. Does not sample memory: call `refresh` first. */
  toString(): string {
    return this.render(this.clock.now());
  }

  private begin(now: number): void {
    this.startTime = now;
    this.stopTime = undefined;
    this.items = 0;
    this.lastCount = 0;
    this.lastLogTime = now;
    this.nextLogTime = now + this.interval;
  }

  private accepts(now: number): boolean {
    if (this.stopTime !== undefined) return false;
    if (this.startTime === undefined) {
      this.begin(now);
    }
    return true;
  }

  private emit(msg: string): void {
    this.logging.getLogger(this.target).log(this.level, msg);
  }

  private render(now: number): string {
    if (this.startTime === undefined) {
      return 'progress not started';
    }

    const count = formatCount(this.items, this.unit === undefined);
    const items = this.items === 1 ? this.name : this.pluralName;
    let line: string;

    if (this.stopTime !== undefined) {
      const elapsed = this.stopTime - this.startTime;
      line = `Elapsed: ${prettyPrintDuration(elapsed)}`;
      if (this.items !== 0) {
        const speed = this.formatSpeed(elapsed, this.items);
        line += speed ? ` [${count} ${items}, ${speed}]` : ` [${count} ${items}]`;
      }
    } else {
      const elapsed = now - this.startTime;
      line = `${count} ${items}, ${prettyPrintDuration(elapsed)}`;

      const speed = this.formatSpeed(elapsed, this.items);
      if (speed) {
        line += `, ${speed}`;
      }

      if (this.expected !== undefined) {
        const percent = this.expected > 0 ? (100 * this.items) / this.expected : 100;
        line += `; ${percent.toFixed(2)}% done`;
        if (this.items > 0 && elapsed > 0) {
          const msToEnd = (Math.max(0, this.expected - this.items) * elapsed) / this.items;
          line += `, ${prettyPrintDuration(msToEnd)} to end`;
        }
      }

      if (this.showLocalSpeed) {
        const localSpeed = this.formatSpeed(now - this.lastLogTime, this.items - this.lastCount);
        if (localSpeed) {
          line += ` [${localSpeed}]`;
        }
      }
    }

    if (this.showMemory && this.memory) {
      const { residentBytes, heapUsedBytes, freeBytes, totalBytes } = this.memory;
      line += `; res/heap/free/total mem ${humanize(residentBytes)}B/${humanize(heapUsedBytes)}B/${humanize(freeBytes)}B/${humanize(totalBytes)}B`;
    }

    return line;
  }

  /** Undefined when there is no time or no item to divide by. */
  private formatSpeed(elapsedMs: number, items: number): string | undefined {
    if (elapsedMs <= 0 || items <= 0) {
      return undefined;
    }

    const secondsPerItem = elapsedMs / 1000 / items;
    const timingUnit = this.unit ?? niceTimeUnit(secondsPerItem);
    const speedUnit = this.unit ?? niceSpeedUnit(secondsPerItem);
    const itemsPerUnit = TIME_UNIT_SECONDS[speedUnit] / secondsPerItem;
    const unitsPerItem = secondsPerItem / TIME_UNIT_SECONDS[timingUnit];

    return `${itemsPerUnit.toFixed(2)} ${this.pluralName}/${speedUnit}, ${unitsPerItem.toFixed(2)} ${timingUnit}/${this.name}`;
  }
}
