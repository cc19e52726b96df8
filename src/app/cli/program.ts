/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook that resolves configuration and
 * logging before any command runs.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod/v4';
import type { GlobalConfig } from '../../core/models/index.js';
import { getGlobalLogsDir, resolveConfig } from '../../infra/config/index.js';
import { setQuietMode } from '../../shared/context.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, setVerboseConsole } from '../../shared/utils/debug.js';
import { parseIntegerOption, resolveConfigOverrides, type GlobalCliOptions } from './helpers.js';

const require = createRequire(import.meta.url);
const PackageJsonSchema = z.object({ version: z.string() });
const { version: cliVersion } = PackageJsonSchema.parse(require('../../../package.json'));

const log = createLogger('cli');

/** Effective configuration, resolved in the preAction hook */
let resolvedConfig: GlobalConfig | null = null;

export { cliVersion };

export const program = new Command();

program
  .name('leaptour')
  .description('Find leaper tours of square boards with Warnsdorff\'s rule')
  .version(cliVersion);

// --- Global options ---
program
  .option('-d, --dimension <n>', 'Board side length', parseIntegerOption(1))
  .option('-a, --max-attempts <n>', 'Random starts to try before giving up', parseIntegerOption(1))
  .option('--seed <n>', 'Seed for reproducible start cells', parseIntegerOption())
  .option('--show-steps', 'Print the board after every step')
  .option('--json', 'Print results as JSON')
  .option('-q, --quiet', 'Only print the final outcome')
  .option('-v, --verbose', 'Debug output on stderr and in the debug log');

// Common initialization for all commands
program.hook('preAction', () => {
  const config = resolveConfig(resolveConfigOverrides(program));
  const rootOpts = program.opts<GlobalCliOptions>();

  let debugConfig = config.debug;
  if (config.verbose && (!debugConfig || !debugConfig.enabled)) {
    debugConfig = { enabled: true };
  }
  initDebugLogger(debugConfig, getGlobalLogsDir());

  if (config.verbose) {
    setVerboseConsole(true);
    setLogLevel('debug');
  } else {
    setLogLevel(config.logLevel);
  }

  setQuietMode(rootOpts.quiet === true);
  resolvedConfig = config;

  log.info('leaptour CLI starting', { version: cliVersion, config });
});

/** Configuration for command actions; preAction always runs first */
export function getResolvedConfig(): GlobalConfig {
  if (!resolvedConfig) {
    throw new Error('Configuration has not been resolved; preAction hook did not run');
  }
  return resolvedConfig;
}
