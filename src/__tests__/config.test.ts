/**
 * Tests for config.yaml loading and CLI overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyConfigOverrides,
  getGlobalConfigPath,
  getGlobalLogsDir,
  invalidateGlobalConfigCache,
  loadGlobalConfig,
  resolveConfig,
} from '../infra/config/index.js';
import { ConfigurationError } from '../shared/utils/error.js';
import type { GlobalConfig } from '../core/models/index.js';

const DEFAULT_CONFIG: GlobalConfig = {
  dimension: 10,
  maxAttempts: 100,
  unvisitedMarker: 0,
  showSteps: false,
  seed: undefined,
  logLevel: 'info',
  output: 'text',
  verbose: false,
  debug: undefined,
};

describe('global config', () => {
  const envBackup = { ...process.env };
  let configDir: string;

  function writeConfig(content: string): void {
    writeFileSync(join(configDir, 'config.yaml'), content, 'utf-8');
  }

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'leaptour-config-'));
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('LEAPTOUR_')) {
        delete process.env[key];
      }
    }
    process.env.LEAPTOUR_CONFIG_DIR = configDir;
    invalidateGlobalConfigCache();
  });

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (!(key in envBackup)) {
        delete process.env[key];
      }
    }
    for (const [key, value] of Object.entries(envBackup)) {
      process.env[key] = value;
    }
    invalidateGlobalConfigCache();
    rmSync(configDir, { recursive: true, force: true });
  });

  it('should resolve paths under the config directory', () => {
    expect(getGlobalConfigPath()).toBe(join(configDir, 'config.yaml'));
    expect(getGlobalLogsDir()).toBe(join(configDir, 'logs'));
  });

  it('should return defaults when no config file exists', () => {
    expect(loadGlobalConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should map snake_case YAML keys onto the config', () => {
    writeConfig([
      'dimension: 6',
      'max_attempts: 12',
      'unvisited_marker: -1',
      'show_steps: true',
      'seed: 99',
      'log_level: warn',
      'output: json',
      'debug:',
      '  enabled: true',
      '  log_file: /tmp/leaptour-debug.log',
    ].join('\n'));

    expect(loadGlobalConfig()).toEqual({
      dimension: 6,
      maxAttempts: 12,
      unvisitedMarker: -1,
      showSteps: true,
      seed: 99,
      logLevel: 'warn',
      output: 'json',
      verbose: false,
      debug: { enabled: true, logFile: '/tmp/leaptour-debug.log' },
    });
  });

  it('should let env variables override the file', () => {
    writeConfig('dimension: 6\n');
    process.env.LEAPTOUR_DIMENSION = '7';

    expect(loadGlobalConfig().dimension).toBe(7);
  });

  it('should cache until invalidated', () => {
    writeConfig('dimension: 6\n');
    expect(loadGlobalConfig().dimension).toBe(6);

    writeConfig('dimension: 8\n');
    expect(loadGlobalConfig().dimension).toBe(6);

    invalidateGlobalConfigCache();
    expect(loadGlobalConfig().dimension).toBe(8);
  });

  it('should treat an empty file as defaults', () => {
    writeConfig('');
    expect(loadGlobalConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should reject a document that is not an object', () => {
    writeConfig('- 1\n- 2\n');

    expect(() => loadGlobalConfig()).toThrow(
      new ConfigurationError(`${join(configDir, 'config.yaml')} must be a YAML object.`),
    );
  });

  it('should report schema violations with their key', () => {
    writeConfig('dimension: 0\n');

    expect(() => loadGlobalConfig()).toThrow(ConfigurationError);
    expect(() => loadGlobalConfig()).toThrow(/^Configuration error: dimension: /);
  });

  it('should reject a positive unvisited marker', () => {
    writeConfig('unvisited_marker: 3\n');

    expect(() => loadGlobalConfig()).toThrow(/unvisited_marker: /);
  });

  it('should apply CLI overrides on top of the loaded config', () => {
    writeConfig('dimension: 6\nmax_attempts: 12\n');

    const config = resolveConfig({ maxAttempts: 3, output: 'json' });

    expect(config.dimension).toBe(6);
    expect(config.maxAttempts).toBe(3);
    expect(config.output).toBe('json');
  });
});

describe('applyConfigOverrides', () => {
  it('should keep configured values for undefined overrides', () => {
    expect(applyConfigOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('should replace every provided value', () => {
    expect(applyConfigOverrides(DEFAULT_CONFIG, {
      dimension: 5,
      maxAttempts: 2,
      seed: 7,
      showSteps: true,
      output: 'json',
      verbose: true,
    })).toEqual({
      ...DEFAULT_CONFIG,
      dimension: 5,
      maxAttempts: 2,
      seed: 7,
      showSteps: true,
      output: 'json',
      verbose: true,
    });
  });
});
