/**
 * Parse arguments, run the selected command and map the outcome to an
 * exit code. Errors raised by the preAction hook or a command are
 * reported here.
 */

import type { ParseOptions } from 'commander';
import { program } from './program.js';
import { takeCommandExitCode } from './commands.js';
import { exitCodeForError } from './helpers.js';
import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';

export async function runCli(argv?: readonly string[], options?: ParseOptions): Promise<number> {
  try {
    await program.parseAsync(argv, options);
  } catch (err) {
    error(getErrorMessage(err));
    return exitCodeForError(err);
  }
  return takeCommandExitCode();
}
