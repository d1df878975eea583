import os from 'node:os';
import path from 'node:path';

const APP_DIR = 'git-status-watch';

export function globalConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR);
}

export function globalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(globalConfigDir(env), 'config.yaml');
}

export function defaultStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_RUNTIME_DIR || os.tmpdir();
  return path.join(base, APP_DIR);
}

/** Flat file name for a repository root: every "/" becomes "%2F". */
export function stateKey(repoRoot: string): string {
  return repoRoot.replaceAll('/', '%2F');
}

export function statePath(stateDir: string, repoRoot: string): string {
  return path.join(stateDir, stateKey(repoRoot));
}

export function lockPath(stateFile: string): string {
  return `${stateFile}.lock`;
}
