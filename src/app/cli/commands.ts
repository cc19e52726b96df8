/**
 * CLI subcommand definitions
 *
 * Registers search (also the default action), attempt and moves.
 */

import { executeAttempt } from '../../features/attempt/index.js';
import { showMoves } from '../../features/catalog/index.js';
import { executeSearch } from '../../features/search/index.js';
import { cell } from '../../core/tour/index.js';
import { program, getResolvedConfig } from './program.js';
import { parseIntegerOption } from './helpers.js';
import { EXIT_SUCCESS } from '../../shared/exitCodes.js';

/** Exit code reported by the last command action */
let commandExitCode = EXIT_SUCCESS;

/** Read and clear the exit code of the last command */
export function takeCommandExitCode(): number {
  const code = commandExitCode;
  commandExitCode = EXIT_SUCCESS;
  return code;
}

function runSearch(): void {
  commandExitCode = executeSearch(getResolvedConfig());
}

program
  .command('search')
  .description('Retry random starts until a full tour is found')
  .action(runSearch);

program
  .command('attempt')
  .description('Build one tour from the given start cell')
  .argument('<row>', 'Start row (0-based)', parseIntegerOption(0))
  .argument('<col>', 'Start column (0-based)', parseIntegerOption(0))
  .action((row: number, col: number) => {
    commandExitCode = executeAttempt(getResolvedConfig(), cell(row, col));
  });

program
  .command('moves')
  .description('List the move catalog in tie-break order')
  .action(() => {
    showMoves(getResolvedConfig().output);
  });

// --- Default action: search ---
program.action(runSearch);
