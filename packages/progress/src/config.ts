import { isLogLevel, type LoggerProvider, type LogLevel } from '@pacer/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { Clock } from './clock.js';
import { ConcurrentProgressLogger } from './concurrent-progress-logger.js';
import { isTimeUnit, TIME_UNITS, type TimeUnit } from './format.js';
import type { MemorySampler } from './memory.js';
import { ProgressLogger } from './progress-logger.js';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Progress configuration is invalid:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

const timeUnitSchema = z.string().refine((val: string): val is TimeUnit => isTimeUnit(val), {
  message: `Expected one of ${TIME_UNITS.join(', ')}`,
});

const logLevelSchema = z.string().refine((val: string): val is LogLevel => isLogLevel(val), {
  message: 'Invalid log level',
});

export const progressOptionsSchema = z.object({
  itemName: z.string().trim().min(1, { message: 'Item name must not be empty' }).optional(),
  logInterval: z.number().nonnegative().optional(),
  expectedUpdates: z.number().int().nonnegative().optional(),
  timeUnit: timeUnitSchema.optional(),
  localSpeed: z.boolean().optional(),
  displayMemory: z.boolean().optional(),
  logTarget: z.string().trim().min(1, { message: 'Log target must not be empty' }).optional(),
  logLevel: logLevelSchema.optional(),
  lightUpdateMask: z.number().int().nonnegative().optional(),
});

export const concurrentOptionsSchema = progressOptionsSchema.extend({
  threshold: z.number().int().positive().optional(),
  mergeMask: z.number().int().nonnegative().optional(),
});

export type ProgressSettings = z.infer<typeof progressOptionsSchema>;
export type ConcurrentSettings = z.infer<typeof concurrentOptionsSchema>;

/** Collaborators that are not plain data and bypass validation. */
export interface ProgressRuntime {
  clock?: Clock | undefined;
  logging?: LoggerProvider | undefined;
  memorySampler?: MemorySampler | undefined;
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>, ConfigValidationError> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return err(new ConfigValidationError(result.error.issues));
  }
  return ok(result.data);
}

export function parseProgressOptions(input: unknown): Result<ProgressSettings, ConfigValidationError> {
  return validate(progressOptionsSchema, input);
}

export function parseConcurrentOptions(input: unknown): Result<ConcurrentSettings, ConfigValidationError> {
  return validate(concurrentOptionsSchema, input);
}

const optionalInt = z
  .string()
  .regex(/^\d+$/, { message: 'Expected a non-negative integer' })
  .transform((val: string) => parseInt(val, 10))
  .optional();

const optionalFlag = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true')
  .optional();

export const progressEnvSchema = z.object({
  PROGRESS_DISPLAY_MEMORY: optionalFlag,
  PROGRESS_EXPECTED_UPDATES: optionalInt,
  PROGRESS_ITEM_NAME: z.string().trim().min(1).optional(),
  PROGRESS_LOCAL_SPEED: optionalFlag,
  PROGRESS_LOG_INTERVAL_MS: optionalInt,
  PROGRESS_LOG_LEVEL: logLevelSchema.optional(),
  PROGRESS_LOG_TARGET: z.string().trim().min(1).optional(),
  PROGRESS_THRESHOLD: optionalInt,
  PROGRESS_TIME_UNIT: timeUnitSchema.optional(),
});

/**
 * Reads PROGRESS_* variables into settings. Unset variables are left out so
 * the result can be spread under explicit options.
 */
export function progressOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Result<ConcurrentSettings, ConfigValidationError> {
  return validate(progressEnvSchema, env).andThen((vars) => {
    const settings: ConcurrentSettings = {};
    if (vars.PROGRESS_ITEM_NAME !== undefined) settings.itemName = vars.PROGRESS_ITEM_NAME;
    if (vars.PROGRESS_LOG_INTERVAL_MS !== undefined) settings.logInterval = vars.PROGRESS_LOG_INTERVAL_MS;
    if (vars.PROGRESS_EXPECTED_UPDATES !== undefined) settings.expectedUpdates = vars.PROGRESS_EXPECTED_UPDATES;
    if (vars.PROGRESS_DISPLAY_MEMORY !== undefined) settings.displayMemory = vars.PROGRESS_DISPLAY_MEMORY;
    if (vars.PROGRESS_LOCAL_SPEED !== undefined) settings.localSpeed = vars.PROGRESS_LOCAL_SPEED;
    if (vars.PROGRESS_LOG_TARGET !== undefined) settings.logTarget = vars.PROGRESS_LOG_TARGET;
    if (vars.PROGRESS_LOG_LEVEL !== undefined) settings.logLevel = vars.PROGRESS_LOG_LEVEL;
    if (vars.PROGRESS_TIME_UNIT !== undefined) settings.timeUnit = vars.PROGRESS_TIME_UNIT;
    if (vars.PROGRESS_THRESHOLD !== undefined) settings.threshold = vars.PROGRESS_THRESHOLD;
    return validate(concurrentOptionsSchema, settings);
  });
}

/**
 * Builds a progress logger from key/value settings, validating them first.
 * The log target must be given: there is no process-wide default to fall
 * back on implicitly.
 */
export function createProgressLogger(
  settings: ProgressSettings & { logTarget: string },
  runtime: ProgressRuntime = {}
): Result<ProgressLogger, ConfigValidationError> {
  return parseProgressOptions(settings).map((valid) => new ProgressLogger({ ...valid, ...runtime }));
}

export function createConcurrentProgressLogger(
  settings: ConcurrentSettings & { logTarget: string },
  runtime: ProgressRuntime = {}
): Result<ConcurrentProgressLogger, ConfigValidationError> {
  return parseConcurrentOptions(settings).map((valid) => ConcurrentProgressLogger.create({ ...valid, ...runtime }));
}
