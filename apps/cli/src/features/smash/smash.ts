import type { LoggerRegistry } from '@pacer/logger';
import { prettyPrintDuration } from '@pacer/progress';
import type { Command } from 'commander';

import { displayCliError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { exitCodeForError, ExitCodes, exitWithCode } from '../shared/exit-codes.js';

import { SmashHandler, type SmashSummary } from './smash-handler.js';
import { SMASH_MODES, type SmashCommandOptions } from './smash-utils.js';

interface ExtendedSmashCommandOptions extends SmashCommandOptions {
  json?: boolean | undefined;
}

/**
 * Register the smash command.
 */
export function registerSmashCommand(program: Command, logging: LoggerRegistry): void {
  program
    .command('smash')
    .description('Run a synthetic workload through a progress logger')
    .option('--items <number>', 'Number of items to smash (default: 1000000)', '1000000')
    .option('--item-name <name>', 'Name of one item (default: pumpkin)')
    .option('--mode <mode>', `Progress logger to use: ${SMASH_MODES.join(', ')} (default: single)`, 'single')
    .option('--workers <number>', 'Concurrent workers in concurrent and buffered modes (default: 4)', '4')
    .option('--interval <ms>', 'Milliseconds between progress lines')
    .option('--threshold <number>', 'Updates a worker buffers before merging')
    .option('--expected <number>', 'Expected number of items, for percentage and time to end')
    .option('--target <name>', 'Log category of the progress lines (default: smash)')
    .option('--memory', 'Show memory usage on each line', false)
    .option('--local-speed', 'Show the speed since the previous line', false)
    .option('--json', 'Output the summary in JSON format')
    .action(async (options: ExtendedSmashCommandOptions) => {
      await executeSmashCommand(options, logging);
    });
}

/**
 * Execute the smash command.
 */
async function executeSmashCommand(options: ExtendedSmashCommandOptions, logging: LoggerRegistry): Promise<void> {
  const format = options.json ? 'json' : 'text';

  try {
    const handler = new SmashHandler({ logging });
    const result = await handler.execute(options);

    if (result.isErr()) {
      logging.flush();
      displayCliError('smash', result.error, exitCodeForError(result.error), format);
    }

    if (format === 'json') {
      console.log(JSON.stringify(createSuccessResponse('smash', result.value), undefined, 2));
    } else {
      displayTextOutput(result.value, logging);
    }

    logging.flush();
    exitWithCode(ExitCodes.SUCCESS);
  } catch (error) {
    logging.flush();
    displayCliError('smash', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR, format);
  }
}

/**
 * Display the summary in text mode.
 */
function displayTextOutput(summary: SmashSummary, logging: LoggerRegistry): void {
  const logger = logging.getLogger('SmashCommand');
  const elapsed = summary.elapsedMs === undefined ? 'no time' : prettyPrintDuration(summary.elapsedMs);

  logger.info(`Mode: ${summary.mode} (${summary.workers} ${summary.workers === 1 ? 'worker' : 'workers'})`);
  logger.info(`Counted ${summary.counted} of ${summary.items} items in ${elapsed}`);
}
