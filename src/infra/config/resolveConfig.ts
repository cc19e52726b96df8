/**
 * Effective configuration: config.yaml, then LEAPTOUR_* env vars, then
 * CLI flags. Flags left undefined keep the configured value.
 */

import type { GlobalConfig, OutputFormat } from '../../core/models/index.js';
import { loadGlobalConfig } from './global/globalConfig.js';

export interface ConfigOverrides {
  dimension?: number;
  maxAttempts?: number;
  seed?: number;
  showSteps?: boolean;
  output?: OutputFormat;
  verbose?: boolean;
}

export function applyConfigOverrides(config: GlobalConfig, overrides: ConfigOverrides): GlobalConfig {
  return {
    ...config,
    dimension: overrides.dimension ?? config.dimension,
    maxAttempts: overrides.maxAttempts ?? config.maxAttempts,
    seed: overrides.seed ?? config.seed,
    showSteps: overrides.showSteps ?? config.showSteps,
    output: overrides.output ?? config.output,
    verbose: overrides.verbose ?? config.verbose,
  };
}

export function resolveConfig(overrides: ConfigOverrides = {}): GlobalConfig {
  return applyConfigOverrides(loadGlobalConfig(), overrides);
}
