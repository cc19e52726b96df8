/**
 * Console output for the leaptour commands.
 *
 * Levelled messages pass through the LogManager singleton, which drops
 * anything below the configured level. Outcome lines, board rows and
 * JSON documents are printed at every level.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogLevel } from '../../core/models/index.js';

const LEVELS: Record<LogLevel, { priority: number; tag: string; paint: ChalkInstance }> = {
  debug: { priority: 0, tag: 'DEBUG', paint: chalk.gray },
  info: { priority: 1, tag: 'INFO', paint: chalk.blue },
  warn: { priority: 2, tag: 'WARN', paint: chalk.yellow },
  error: { priority: 3, tag: 'ERROR', paint: chalk.red },
};

/**
 * Holds the console log level.
 * Singleton — use LogManager.getInstance().
 */
export class LogManager {
  private static instance: LogManager | null = null;
  private level: LogLevel = 'info';

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  shouldLog(level: LogLevel): boolean {
    return LEVELS[level].priority >= LEVELS[this.level].priority;
  }

  log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const { tag, paint } = LEVELS[level];
    console.log(paint(`[${tag}] ${message}`));
  }
}

// ---- Module-level functions ----

export function setLogLevel(level: LogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function debug(message: string): void {
  LogManager.getInstance().log('debug', message);
}

export function info(message: string): void {
  LogManager.getInstance().log('info', message);
}

export function warn(message: string): void {
  LogManager.getInstance().log('warn', message);
}

export function error(message: string): void {
  LogManager.getInstance().log('error', message);
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function blankLine(): void {
  console.log();
}

/** Print a line as-is (board rows, JSON documents) */
export function print(message: string): void {
  console.log(message);
}

export function section(title: string): void {
  console.log(chalk.bold(`\n${title}`));
}

export function status(label: string, value: string, color?: 'green' | 'red'): void {
  const paint = color ? chalk[color] : chalk.white;
  console.log(`${chalk.gray(label)}: ${paint(value)}`);
}

export function list(items: readonly string[], bullet = '•'): void {
  for (const item of items) {
    console.log(`${chalk.gray(bullet)} ${item}`);
  }
}
