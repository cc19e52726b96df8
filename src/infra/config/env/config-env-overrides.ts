/**
 * Environment variable overrides for config.yaml keys.
 *
 * Each dotted snake_case key path maps to LEAPTOUR_<PATH>, e.g.
 * `debug.log_file` -> LEAPTOUR_DEBUG_LOG_FILE.
 */

import { ConfigurationError } from '../../../shared/utils/error.js';

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `LEAPTOUR_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new ConfigurationError(`${envKey} must be one of: true, false`);
  }
  if (type === 'number') {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${envKey} must be a number`);
    }
    return value;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`${envKey} must be valid JSON`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part) continue;
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const leaf = parts[parts.length - 1];
  if (!leaf) return;
  current[leaf] = value;
}

function applyEnvOverrides(target: Record<string, unknown>, specs: readonly EnvSpec[]): void {
  for (const spec of specs) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = process.env[envKey];
    if (raw === undefined) continue;
    const parsedValue = parseEnvValue(envKey, raw, spec.type);
    setNested(target, spec.path, parsedValue);
  }
}

const GLOBAL_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'dimension', type: 'number' },
  { path: 'max_attempts', type: 'number' },
  { path: 'unvisited_marker', type: 'number' },
  { path: 'show_steps', type: 'boolean' },
  { path: 'seed', type: 'number' },
  { path: 'log_level', type: 'string' },
  { path: 'output', type: 'string' },
  { path: 'verbose', type: 'boolean' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
];

export function applyGlobalConfigEnvOverrides(target: Record<string, unknown>): void {
  applyEnvOverrides(target, GLOBAL_ENV_SPECS);
}
