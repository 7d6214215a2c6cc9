import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import type { ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  CONFIG_ERROR: 'Check the PROGRESS_* and LOGGER_* variables in your environment.',
};

/**
 * Text for a CLI error as written to stderr, tip included.
 */
export function formatCliError(error: Error, exitCode: ExitCode, color = false): string {
  const code = exitCodeToErrorCode(exitCode);
  const mark = color ? pc.red('✗') : '✗';
  let text = `\n${mark} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[code];
  if (tip) {
    text += `\n${color ? pc.dim(tip) : tip}\n`;
  }

  return text;
}

/**
 * Display a CLI error and exit.
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: 'json' | 'text'): never {
  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, exitCodeToErrorCode(exitCode)), undefined, 2));
  } else {
    process.stderr.write(formatCliError(error, exitCode, pc.isColorSupported));

    // In development, show full stack trace
    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}
