/**
 * Global configuration loader
 *
 * Manages ~/.leaptour/config.yaml.
 * GlobalConfigManager encapsulates the config cache as a singleton.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { GlobalConfigSchema } from '../../../core/models/index.js';
import type { GlobalConfig } from '../../../core/models/index.js';
import { ConfigurationError } from '../../../shared/utils/error.js';
import { getGlobalConfigPath } from '../paths.js';
import { applyGlobalConfigEnvOverrides } from '../env/config-env-overrides.js';

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string {
  return issues
    .map((issue) => {
      const key = issue.path.map((segment) => String(segment)).join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/** Read the raw YAML document; missing file means an empty object */
function readRawConfig(configPath: string): Record<string, unknown> {
  const rawConfig: Record<string, unknown> = {};
  if (!existsSync(configPath)) {
    return rawConfig;
  }

  const content = readFileSync(configPath, 'utf-8');
  let parsedRaw: unknown;
  try {
    parsedRaw = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(`${configPath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (parsedRaw && typeof parsedRaw === 'object' && !Array.isArray(parsedRaw)) {
    Object.assign(rawConfig, parsedRaw);
  } else if (parsedRaw != null) {
    throw new ConfigurationError(`${configPath} must be a YAML object.`);
  }
  return rawConfig;
}

/**
 * Manages global configuration loading and caching.
 * Singleton — use GlobalConfigManager.getInstance().
 */
export class GlobalConfigManager {
  private static instance: GlobalConfigManager | null = null;
  private cachedConfig: GlobalConfig | null = null;

  private constructor() {}

  static getInstance(): GlobalConfigManager {
    if (!GlobalConfigManager.instance) {
      GlobalConfigManager.instance = new GlobalConfigManager();
    }
    return GlobalConfigManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    GlobalConfigManager.instance = null;
  }

  /** Invalidate the cached configuration */
  invalidateCache(): void {
    this.cachedConfig = null;
  }

  /** Load global configuration (cached) */
  load(): GlobalConfig {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }
    const configPath = getGlobalConfigPath();
    const rawConfig = readRawConfig(configPath);

    applyGlobalConfigEnvOverrides(rawConfig);

    const result = GlobalConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error.issues));
    }
    const parsed = result.data;
    const config: GlobalConfig = {
      dimension: parsed.dimension,
      maxAttempts: parsed.max_attempts,
      unvisitedMarker: parsed.unvisited_marker,
      showSteps: parsed.show_steps,
      seed: parsed.seed,
      logLevel: parsed.log_level,
      output: parsed.output,
      verbose: parsed.verbose,
      debug: parsed.debug ? {
        enabled: parsed.debug.enabled,
        logFile: parsed.debug.log_file,
      } : undefined,
    };
    this.cachedConfig = config;
    return config;
  }
}

/** Load global configuration */
export function loadGlobalConfig(): GlobalConfig {
  return GlobalConfigManager.getInstance().load();
}

/** Invalidate global config cache (e.g. after env changes in tests) */
export function invalidateGlobalConfigCache(): void {
  GlobalConfigManager.getInstance().invalidateCache();
}
