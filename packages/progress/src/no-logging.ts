import type { LogLevel } from '@pacer/logger';

import type { TimeUnit } from './format.js';
import type { ProgressLog } from './progress-log.js';

/* eslint-disable @typescript-eslint/no-unused-vars -- every method ignores its arguments */

/**
 * A {@link ProgressLog} that does nothing, for callers that take a progress
 * logger but run where no progress should be shown.
 */
export class NoProgressLogger implements ProgressLog {
  readonly count = 0;

  log(_now: number): void {
    return;
  }

  logIf(_now?: number): void {
    return;
  }

  displayMemory(_displayMemory: boolean): this {
    return this;
  }

  itemName(_itemName: string): this {
    return this;
  }

  logInterval(_logInterval: number): this {
    return this;
  }

  expectedUpdates(_expectedUpdates: number | undefined): this {
    return this;
  }

  timeUnit(_timeUnit: TimeUnit | undefined): this {
    return this;
  }

  localSpeed(_localSpeed: boolean): this {
    return this;
  }

  logTarget(_target: string): this {
    return this;
  }

  logLevel(_level: LogLevel): this {
    return this;
  }

  start(_msg?: string): void {
    return;
  }

  update(): void {
    return;
  }

  updateWithCount(_count: number): void {
    return;
  }

  updateWithCountAndTime(_count: number, _now: number): void {
    return;
  }

  lightUpdate(): void {
    return;
  }

  updateAndDisplay(_count?: number, _now?: number): void {
    return;
  }

  stop(_msg?: string): void {
    return;
  }

  done(): void {
    return;
  }

  doneWithCount(_count: number): void {
    return;
  }

  elapsed(): number | undefined {
    return undefined;
  }

  refresh(): void {
    return;
  }

  info(_msg: string): void {
    return;
  }

  clone(): NoProgressLogger {
    return this;
  }
}

const noProgressLogger = new NoProgressLogger();

/** The shared do-nothing logger. */
export function noLogging(): NoProgressLogger {
  return noProgressLogger;
}

/**
 * Picks the logger once, so the reporting code itself never branches:
 * `undefined` becomes the do-nothing logger.
 */
export function optionalProgressLog(pl: ProgressLog | undefined): ProgressLog {
  return pl ?? noProgressLogger;
}
