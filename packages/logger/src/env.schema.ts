import { z } from 'zod';

import { isLogLevel, LoggerRegistry, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_CONSOLE_ENABLED: z
    .string()
    .default('true')
    .transform((val: string) => val === 'true'),
  LOGGER_LOG_LEVEL: z
    .string()
    .refine((val: string) => isLogLevel(val), {
      message: 'Invalid log level',
    })
    .default('info'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Builds a registry from LOGGER_* variables. Console output is skipped under
 * NODE_ENV=test so test runs stay quiet unless a test adds its own sink.
 */
export function createLoggerRegistryFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerRegistry {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = [];

  if (config.LOGGER_CONSOLE_ENABLED && config.NODE_ENV !== 'test') {
    sinks.push(new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR }));
  }

  const level = isLogLevel(config.LOGGER_LOG_LEVEL) ? config.LOGGER_LOG_LEVEL : 'info';
  return new LoggerRegistry({ level, sinks });
}
