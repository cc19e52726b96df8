#!/usr/bin/env node

/**
 * leaptour CLI entry point
 */

import { runCli } from './run.js';
import { EXIT_GENERAL_ERROR } from '../../shared/exitCodes.js';

(async () => {
  process.exit(await runCli());
})().catch((err: unknown) => {
  console.error(err);
  process.exit(EXIT_GENERAL_ERROR);
});
