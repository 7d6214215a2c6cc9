import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Standardized CLI response format for JSON output.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        /** Human-readable error message */
        message: string;

        /** Stack trace (only in development) */
        stack?: string | undefined;
      }
    | undefined;
}

export function createSuccessResponse<T>(command: string, data: T): CLIResponse<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };
}

export function createErrorResponse(command: string, error: Error, code: string): CLIResponse<never> {
  const errorObj: { code: string; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  for (const [name, code] of Object.entries(ExitCodes)) {
    if (code === exitCode) {
      return name;
    }
  }
  return 'UNKNOWN_ERROR';
}
