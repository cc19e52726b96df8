/**
 * Configuration types
 */

/** Debug configuration for leaptour */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type OutputFormat = 'text' | 'json';

/** Global configuration for leaptour (~/.leaptour/config.yaml) */
export interface GlobalConfig {
  /** Board side length */
  dimension: number;
  /** Attempts before the search gives up */
  maxAttempts: number;
  /** Marker written to unvisited cells; never positive */
  unvisitedMarker: number;
  /** Print the board after every step */
  showSteps: boolean;
  /** Seed for reproducible start cells; random when omitted */
  seed?: number;
  logLevel: LogLevel;
  output: OutputFormat;
  verbose: boolean;
  debug?: DebugConfig;
}
