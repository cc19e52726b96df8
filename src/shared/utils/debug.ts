/**
 * Debug logging utilities
 * Writes debug logs to file when enabled in config.
 * When verbose console is enabled, also outputs to stderr.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';

/** Logger bound to one component name */
export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  enter(funcName: string, args?: Record<string, unknown>): void;
  exit(funcName: string, result?: unknown): void;
}

/**
 * Debug logger singleton.
 * Manages file-based debug logging and verbose console output.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private debugEnabled = false;
  private debugLogFile: string | null = null;
  private initialized = false;
  private verboseConsoleEnabled = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  /** Get default debug log file path */
  private static getDefaultLogFile(logsDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(logsDir, `debug-${timestamp}.log`);
  }

  /** Initialize debug logger from config */
  init(config?: DebugConfig, logsDir?: string): void {
    if (this.initialized) {
      return;
    }

    this.debugEnabled = config?.enabled ?? false;

    if (this.debugEnabled) {
      if (config?.logFile) {
        this.debugLogFile = config.logFile;
      } else if (logsDir) {
        this.debugLogFile = DebugLogger.getDefaultLogFile(logsDir);
      }

      if (this.debugLogFile) {
        const logDir = dirname(this.debugLogFile);
        if (!existsSync(logDir)) {
          mkdirSync(logDir, { recursive: true });
        }

        const header = [
          '='.repeat(60),
          `leaptour debug log`,
          `Started: ${new Date().toISOString()}`,
          `PID: ${process.pid}`,
          '='.repeat(60),
          '',
        ].join('\n');

        writeFileSync(this.debugLogFile, header, 'utf-8');
      }
    }

    this.initialized = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.debugEnabled = false;
    this.debugLogFile = null;
    this.initialized = false;
    this.verboseConsoleEnabled = false;
  }

  /** Enable or disable verbose console output */
  setVerboseConsole(enabled: boolean): void {
    this.verboseConsoleEnabled = enabled;
  }

  /** Check if verbose console is enabled */
  isVerboseConsole(): boolean {
    return this.verboseConsoleEnabled;
  }

  /** Check if debug is enabled */
  isEnabled(): boolean {
    return this.debugEnabled;
  }

  /** Get current debug log file path */
  getLogFile(): string | null {
    return this.debugLogFile;
  }

  /** Format log message with timestamp and level */
  private static formatLogMessage(level: string, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${component}]`;

    let logLine = `${prefix} ${message}`;

    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
        logLine += `\n${dataStr}`;
      } catch {
        logLine += `\n[Unable to serialize data]`;
      }
    }

    return logLine;
  }

  /** Format a compact console log line */
  private static formatConsoleMessage(level: string, component: string, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${level}] [${component}] ${message}`;
  }

  /** Write a log entry to verbose console (stderr) and/or file */
  writeLog(level: string, component: string, message: string, data?: unknown): void {
    if (this.verboseConsoleEnabled) {
      process.stderr.write(DebugLogger.formatConsoleMessage(level, component, message) + '\n');
    }

    if (!this.debugEnabled || !this.debugLogFile) {
      return;
    }

    const logLine = DebugLogger.formatLogMessage(level, component, message, data);

    try {
      appendFileSync(this.debugLogFile, logLine + '\n', 'utf-8');
    } catch (err) {
      this.debugLogFile = null;
      process.stderr.write(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }

  /** Create a scoped logger for a component */
  createLogger(component: string): ScopedLogger {
    return {
      debug: (message: string, data?: unknown) => this.writeLog('DEBUG', component, message, data),
      info: (message: string, data?: unknown) => this.writeLog('INFO', component, message, data),
      error: (message: string, data?: unknown) => this.writeLog('ERROR', component, message, data),
      enter: (funcName: string, args?: Record<string, unknown>) => this.writeLog('DEBUG', component, `>> ${funcName}()`, args),
      exit: (funcName: string, result?: unknown) => this.writeLog('DEBUG', component, `<< ${funcName}()`, result),
    };
  }
}

// ---- Module-level functions ----

export function initDebugLogger(config?: DebugConfig, logsDir?: string): void {
  DebugLogger.getInstance().init(config, logsDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function isVerboseConsole(): boolean {
  return DebugLogger.getInstance().isVerboseConsole();
}

export function isDebugEnabled(): boolean {
  return DebugLogger.getInstance().isEnabled();
}

export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

export function createLogger(component: string): ScopedLogger {
  return DebugLogger.getInstance().createLogger(component);
}
