import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { globalConfigPath } from '../lib/paths.js';
import { InvalidConfigError, hasErrorCode } from '../lib/errors.js';
import type { Config } from '../types/config.js';

export const DEFAULT_CONFIG: Config = {
  debounceMs: 75,
  drainMs: 75,
  followerDebounceMs: 50,
  alwaysPrint: false,
};

const DURATION_KEYS = ['debounceMs', 'drainMs', 'followerDebounceMs'] as const;

export async function loadConfig(configFile: string = globalConfigPath()): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return DEFAULT_CONFIG;
    }
    throw err;
  }
  const parsed: unknown = YAML.parse(raw);
  return mergeConfig(DEFAULT_CONFIG, toOverrides(parsed, configFile));
}

function toOverrides(parsed: unknown, configFile: string): Partial<Config> {
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new InvalidConfigError(configFile, parsed, 'a YAML mapping');
  }
  const overrides: Partial<Config> = {};
  const entries = new Map(Object.entries(parsed));

  for (const key of DURATION_KEYS) {
    const value = entries.get(key);
    if (value !== undefined) overrides[key] = parseDuration(key, value);
  }
  const alwaysPrint = entries.get('alwaysPrint');
  if (typeof alwaysPrint === 'boolean') overrides.alwaysPrint = alwaysPrint;
  const format = entries.get('format');
  if (typeof format === 'string') overrides.format = format;
  const stateDir = entries.get('stateDir');
  if (typeof stateDir === 'string') overrides.stateDir = path.resolve(stateDir);

  return overrides;
}

export function parseDuration(key: string, value: unknown): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n) || n < 0) {
    throw new InvalidConfigError(key, value);
  }
  return n;
}

export function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const merged: Config = { ...base };
  for (const key of DURATION_KEYS) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  if (overrides.alwaysPrint !== undefined) merged.alwaysPrint = overrides.alwaysPrint;
  if (overrides.format !== undefined) merged.format = overrides.format;
  if (overrides.stateDir !== undefined) merged.stateDir = overrides.stateDir;
  return merged;
}
