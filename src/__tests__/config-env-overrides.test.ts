import { afterEach, describe, expect, it } from 'vitest';
import {
  applyGlobalConfigEnvOverrides,
  envVarNameFromPath,
} from '../infra/config/env/config-env-overrides.js';
import { ConfigurationError } from '../shared/utils/error.js';

describe('config env overrides', () => {
  const envBackup = { ...process.env };

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (!(key in envBackup)) {
        delete process.env[key];
      }
    }
    for (const [key, value] of Object.entries(envBackup)) {
      process.env[key] = value;
    }
  });

  it('should convert dotted and camelCase paths to LEAPTOUR env variable names', () => {
    expect(envVarNameFromPath('verbose')).toBe('LEAPTOUR_VERBOSE');
    expect(envVarNameFromPath('max_attempts')).toBe('LEAPTOUR_MAX_ATTEMPTS');
    expect(envVarNameFromPath('debug.log_file')).toBe('LEAPTOUR_DEBUG_LOG_FILE');
    expect(envVarNameFromPath('unvisitedMarker')).toBe('LEAPTOUR_UNVISITED_MARKER');
  });

  it('should apply typed values from env variables', () => {
    process.env.LEAPTOUR_DIMENSION = ' 8 ';
    process.env.LEAPTOUR_SHOW_STEPS = 'TRUE';
    process.env.LEAPTOUR_LOG_LEVEL = 'debug';
    process.env.LEAPTOUR_DEBUG_ENABLED = 'true';

    const raw: Record<string, unknown> = { max_attempts: 5 };
    applyGlobalConfigEnvOverrides(raw);

    expect(raw).toEqual({
      max_attempts: 5,
      dimension: 8,
      show_steps: true,
      log_level: 'debug',
      debug: { enabled: true },
    });
  });

  it('should merge nested keys into an existing object', () => {
    process.env.LEAPTOUR_DEBUG_LOG_FILE = '/tmp/leaptour.log';

    const raw: Record<string, unknown> = { debug: { enabled: true } };
    applyGlobalConfigEnvOverrides(raw);

    expect(raw.debug).toEqual({ enabled: true, log_file: '/tmp/leaptour.log' });
  });

  it('should parse JSON for whole sections', () => {
    process.env.LEAPTOUR_DEBUG = '{"enabled":false}';

    const raw: Record<string, unknown> = {};
    applyGlobalConfigEnvOverrides(raw);

    expect(raw.debug).toEqual({ enabled: false });
  });

  it('should reject values of the wrong type', () => {
    process.env.LEAPTOUR_VERBOSE = 'yes';
    expect(() => applyGlobalConfigEnvOverrides({})).toThrow(
      new ConfigurationError('LEAPTOUR_VERBOSE must be one of: true, false'),
    );

    delete process.env.LEAPTOUR_VERBOSE;
    process.env.LEAPTOUR_SEED = 'abc';
    expect(() => applyGlobalConfigEnvOverrides({})).toThrow('LEAPTOUR_SEED must be a number');
  });
});
