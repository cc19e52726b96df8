/**
 * Path utilities for leaptour configuration
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/** Get global config directory (~/.leaptour or LEAPTOUR_CONFIG_DIR) */
export function getGlobalConfigDir(): string {
  return process.env.LEAPTOUR_CONFIG_DIR || join(homedir(), '.leaptour');
}

/** Get global config file path */
export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.yaml');
}

/** Get global logs directory */
export function getGlobalLogsDir(): string {
  return join(getGlobalConfigDir(), 'logs');
}
