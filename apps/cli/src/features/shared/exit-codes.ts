import { ConfigValidationError } from '@pacer/progress';

/** Process exit statuses of `pacer`. 1 and 2 keep their usual shell meaning. */
export const ExitCodes = {
  SUCCESS: 0,
  /** Unexpected failure while smashing */
  GENERAL_ERROR: 1,
  /** A command-line option failed to parse */
  INVALID_ARGS: 2,
  /** PROGRESS_* or LOGGER_* variables failed validation */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit status for an error a command handler returned. Handlers return
 * settings errors as {@link ConfigValidationError}; anything else came from
 * the command line.
 */
export function exitCodeForError(error: Error): ExitCode {
  return error instanceof ConfigValidationError ? ExitCodes.CONFIG_ERROR : ExitCodes.INVALID_ARGS;
}

export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
