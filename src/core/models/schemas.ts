/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const OutputFormatSchema = z.enum(['text', 'json']);

/** Debug logging schema */
export const DebugConfigSchema = z.object({
  enabled: z.boolean().default(false),
  log_file: z.string().min(1).optional(),
});

/** Global configuration schema (snake_case, as written in config.yaml) */
export const GlobalConfigSchema = z.object({
  dimension: z.number().int().positive().default(10),
  max_attempts: z.number().int().positive().default(100),
  unvisited_marker: z.number().int().max(0).default(0),
  show_steps: z.boolean().default(false),
  seed: z.number().int().optional(),
  log_level: LogLevelSchema.default('info'),
  output: OutputFormatSchema.default('text'),
  verbose: z.boolean().default(false),
  debug: DebugConfigSchema.optional(),
});

export type RawGlobalConfig = z.infer<typeof GlobalConfigSchema>;
