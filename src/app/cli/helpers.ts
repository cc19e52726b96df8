/**
 * CLI helper functions
 *
 * Option parsing and mapping of errors to exit codes.
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { OutputFormat } from '../../core/models/index.js';
import { isInvalidTourArgumentError } from '../../core/tour/index.js';
import type { ConfigOverrides } from '../../infra/config/index.js';
import { EXIT_GENERAL_ERROR, EXIT_INVALID_ARGUMENT } from '../../shared/exitCodes.js';
import { ConfigurationError } from '../../shared/utils/index.js';

/** Global options as commander stores them */
export type GlobalCliOptions = {
  dimension?: number;
  maxAttempts?: number;
  seed?: number;
  showSteps?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
};

/**
 * Build a commander argument parser accepting integers >= min.
 * Commander reports the InvalidArgumentError and exits.
 */
export function parseIntegerOption(min = Number.MIN_SAFE_INTEGER): (value: string) => number {
  return (value: string): number => {
    const trimmed = value.trim();
    if (!/^[-+]?\d+$/.test(trimmed)) {
      throw new InvalidArgumentError('Not an integer.');
    }
    const parsed = Number.parseInt(trimmed, 10);
    if (!Number.isSafeInteger(parsed)) {
      throw new InvalidArgumentError('Integer is out of range.');
    }
    if (parsed < min) {
      throw new InvalidArgumentError(`Must be >= ${min}.`);
    }
    return parsed;
  };
}

/** Map global flags onto config overrides; unset flags stay undefined */
export function resolveConfigOverrides(program: Command): ConfigOverrides {
  const opts = program.opts<GlobalCliOptions>();
  const output: OutputFormat | undefined = opts.json === true ? 'json' : undefined;
  return {
    dimension: opts.dimension,
    maxAttempts: opts.maxAttempts,
    seed: opts.seed,
    showSteps: opts.showSteps === true ? true : undefined,
    output,
    verbose: opts.verbose === true ? true : undefined,
  };
}

/** Exit code for an error that escaped a command */
export function exitCodeForError(err: unknown): number {
  if (err instanceof ConfigurationError || isInvalidTourArgumentError(err)) {
    return EXIT_INVALID_ARGUMENT;
  }
  return EXIT_GENERAL_ERROR;
}
