import path from 'node:path';
import { execa } from 'execa';
import { NotGitRepoError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';

export interface GitResult {
  stdout: string;
  stderr: string;
  failed: boolean;
}

export async function runGit(cwd: string, args: string[]): Promise<GitResult> {
  const result = await execa('git', args, { ...execaEnv, cwd, reject: false });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    failed: result.failed,
  };
}

export async function getRepoRoot(dir?: string): Promise<string> {
  const cwd = path.resolve(dir ?? process.cwd());
  const result = await runGit(cwd, ['rev-parse', '--show-toplevel']);
  if (result.failed) {
    throw new NotGitRepoError(cwd);
  }
  return result.stdout.trim();
}
