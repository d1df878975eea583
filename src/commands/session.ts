import path from 'node:path';
import { loadConfig, mergeConfig, parseDuration } from '../core/config.js';
import { getRepoRoot } from '../core/git.js';
import { ensureStateDir } from '../core/state-file.js';
import { defaultStateDir, statePath } from '../lib/paths.js';
import type { WatchSession } from '../core/coordinator.js';
import type { Config } from '../types/config.js';

export interface SessionOptions {
  format?: string;
  debounceMs?: string;
  drainMs?: string;
  alwaysPrint?: boolean;
  stateDir?: string;
  config?: string;
}

export function cliOverrides(options: SessionOptions): Partial<Config> {
  const overrides: Partial<Config> = {};
  if (options.format !== undefined) overrides.format = options.format;
  if (options.debounceMs !== undefined) overrides.debounceMs = parseDuration('--debounce-ms', options.debounceMs);
  if (options.drainMs !== undefined) overrides.drainMs = parseDuration('--drain-ms', options.drainMs);
  if (options.alwaysPrint) overrides.alwaysPrint = true;
  if (options.stateDir !== undefined) overrides.stateDir = path.resolve(options.stateDir);
  return overrides;
}

/** Resolve config, repository root and state file, creating the state directory. */
export async function prepareSession(dir: string | undefined, options: SessionOptions): Promise<WatchSession> {
  const config = mergeConfig(await loadConfig(options.config), cliOverrides(options));
  const root = await getRepoRoot(dir);
  const stateDir = config.stateDir ?? defaultStateDir();
  await ensureStateDir(stateDir);
  return { root, stateFile: statePath(stateDir, root), config };
}
