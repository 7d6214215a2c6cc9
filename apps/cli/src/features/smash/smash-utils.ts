// Pure utility functions for the smash command
// All functions are pure - no side effects

import type { ConcurrentSettings } from '@pacer/progress';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export const SMASH_MODES = ['single', 'light', 'concurrent', 'buffered'] as const;

export type SmashMode = (typeof SMASH_MODES)[number];

/**
 * CLI options structure for the smash command.
 */
export interface SmashCommandOptions {
  items?: string | undefined;
  itemName?: string | undefined;
  mode?: string | undefined;
  workers?: string | undefined;
  interval?: string | undefined;
  threshold?: string | undefined;
  expected?: string | undefined;
  target?: string | undefined;
  memory?: boolean | undefined;
  localSpeed?: boolean | undefined;
}

/**
 * Parsed smash parameters.
 */
export interface SmashParams {
  items: number;
  itemName?: string | undefined;
  mode: SmashMode;
  workers: number;
  target?: string | undefined;
  interval?: number | undefined;
  threshold?: number | undefined;
  expected?: number | undefined;
  displayMemory: boolean;
  localSpeed: boolean;
}

function isSmashMode(value: string): value is SmashMode {
  return (SMASH_MODES as readonly string[]).includes(value);
}

/**
 * Parse a whole number option. Rejects fractions and trailing garbage that
 * parseInt would silently accept.
 */
export function parseWholeNumber(name: string, value: string, min: number): Result<number, Error> {
  const trimmed = value.trim();
  const parsed = Number(trimmed);

  if (trimmed === '' || !Number.isInteger(parsed) || parsed < min) {
    const expected = min > 0 ? 'a positive integer' : 'a non-negative integer';
    return err(new Error(`Invalid ${name} value: "${value}". Must be ${expected}.`));
  }

  return ok(parsed);
}

/**
 * Parse an optional whole number option; absent stays absent.
 */
export function parseOptionalWholeNumber(
  name: string,
  value: string | undefined,
  min: number
): Result<number | undefined, Error> {
  if (value === undefined) {
    return ok(undefined);
  }
  return parseWholeNumber(name, value, min);
}

/**
 * Parse and validate the mode parameter.
 */
export function parseMode(mode?: string): Result<SmashMode, Error> {
  const value = (mode || 'single').trim();

  if (!isSmashMode(value)) {
    return err(new Error(`Invalid mode: "${value}". Must be one of ${SMASH_MODES.join(', ')}.`));
  }

  return ok(value);
}

/**
 * Build smash parameters from command options.
 * Validates all parameters and returns a Result.
 */
export function buildSmashParams(options: SmashCommandOptions): Result<SmashParams, Error> {
  const itemName = options.itemName?.trim();
  if (itemName === '') {
    return err(new Error('Item name must not be empty'));
  }

  const target = options.target?.trim();
  if (target === '') {
    return err(new Error('Target must not be empty'));
  }

  const modeResult = parseMode(options.mode);
  if (modeResult.isErr()) {
    return err(modeResult.error);
  }

  const itemsResult = parseWholeNumber('items', options.items ?? '1000000', 0);
  if (itemsResult.isErr()) {
    return err(itemsResult.error);
  }

  const workersResult = parseWholeNumber('workers', options.workers ?? '4', 1);
  if (workersResult.isErr()) {
    return err(workersResult.error);
  }

  const intervalResult = parseOptionalWholeNumber('interval', options.interval, 0);
  if (intervalResult.isErr()) {
    return err(intervalResult.error);
  }

  const thresholdResult = parseOptionalWholeNumber('threshold', options.threshold, 1);
  if (thresholdResult.isErr()) {
    return err(thresholdResult.error);
  }

  const expectedResult = parseOptionalWholeNumber('expected', options.expected, 0);
  if (expectedResult.isErr()) {
    return err(expectedResult.error);
  }

  return ok({
    items: itemsResult.value,
    itemName,
    mode: modeResult.value,
    workers: workersResult.value,
    target,
    interval: intervalResult.value,
    threshold: thresholdResult.value,
    expected: expectedResult.value,
    displayMemory: options.memory || false,
    localSpeed: options.localSpeed || false,
  });
}

/**
 * Progress settings for a run: environment settings first, then whatever
 * the command line sets explicitly. Items are pumpkins and progress goes to
 * `smash` unless either says otherwise.
 */
export function buildProgressSettings(
  params: SmashParams,
  envSettings: ConcurrentSettings
): ConcurrentSettings & { logTarget: string } {
  const settings: ConcurrentSettings & { logTarget: string } = {
    ...envSettings,
    itemName: params.itemName ?? envSettings.itemName ?? 'pumpkin',
    logTarget: params.target ?? envSettings.logTarget ?? 'smash',
  };

  if (params.interval !== undefined) settings.logInterval = params.interval;
  if (params.threshold !== undefined) settings.threshold = params.threshold;
  if (params.expected !== undefined) settings.expectedUpdates = params.expected;
  if (params.displayMemory) settings.displayMemory = true;
  if (params.localSpeed) settings.localSpeed = true;

  return settings;
}

/**
 * Split `items` into `workers` chunks whose sizes differ by at most one,
 * larger chunks first.
 */
export function splitItems(items: number, workers: number): number[] {
  const base = Math.floor(items / workers);
  const remainder = items % workers;
  return Array.from({ length: workers }, (_, index) => base + (index < remainder ? 1 : 0));
}
