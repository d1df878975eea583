import fs from 'node:fs/promises';
import path from 'node:path';
import { runGit } from './git.js';
import { StatusComputeError } from '../lib/errors.js';
import type { OperationState, StatusSnapshot } from '../types/status.js';

export interface PorcelainSummary {
  branch: string;
  ahead: number;
  behind: number;
  staged: number;
  modified: number;
  untracked: number;
  conflicted: number;
}

const DETACHED = '(detached)';

/** Summarize `git status --porcelain=v2 --branch` output. */
export function parsePorcelainV2(output: string): PorcelainSummary {
  const summary: PorcelainSummary = {
    branch: '',
    ahead: 0,
    behind: 0,
    staged: 0,
    modified: 0,
    untracked: 0,
    conflicted: 0,
  };
  let oid: string | undefined;

  for (const line of output.split('\n')) {
    if (line.startsWith('# branch.head ')) {
      summary.branch = line.slice('# branch.head '.length);
    } else if (line.startsWith('# branch.oid ')) {
      oid = line.slice('# branch.oid '.length);
    } else if (line.startsWith('# branch.ab ')) {
      for (const part of line.slice('# branch.ab '.length).split(/\s+/)) {
        if (part.startsWith('+')) summary.ahead = toCount(part.slice(1));
        else if (part.startsWith('-')) summary.behind = toCount(part.slice(1));
      }
    } else if (line.startsWith('u ')) {
      summary.conflicted++;
    } else if (line.startsWith('1 ') || line.startsWith('2 ')) {
      // "1 XY ...": X is the index side, Y the worktree side
      const xy = line.split(' ')[1] ?? '..';
      if (xy[0] !== undefined && xy[0] !== '.') summary.staged++;
      if (xy[1] !== undefined && xy[1] !== '.') summary.modified++;
    } else if (line.startsWith('? ')) {
      summary.untracked++;
    }
  }

  if (summary.branch === DETACHED) {
    summary.branch = oid ? oid.slice(0, 7) : 'HEAD';
  }
  return summary;
}

function toCount(value: string): number {
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) || n < 0 ? 0 : n;
}

// Checked in order; the first marker present wins.
const OPERATION_MARKERS: Array<[OperationState, string[]]> = [
  ['merge', ['MERGE_HEAD']],
  ['rebase', ['rebase-merge', 'rebase-apply']],
  ['cherry_pick', ['CHERRY_PICK_HEAD']],
  ['bisect', ['BISECT_LOG']],
  ['revert', ['REVERT_HEAD']],
];

export async function detectOperationState(gitDir: string): Promise<OperationState> {
  for (const [state, markers] of OPERATION_MARKERS) {
    for (const marker of markers) {
      if (await exists(path.join(gitDir, marker))) return state;
    }
  }
  return 'clean';
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function countStashes(root: string): Promise<number> {
  const result = await runGit(root, ['rev-list', '--count', 'refs/stash']);
  // No refs/stash means no stashes
  if (result.failed) return 0;
  return toCount(result.stdout.trim());
}

async function resolveGitDir(root: string): Promise<string> {
  const result = await runGit(root, ['rev-parse', '--absolute-git-dir']);
  if (result.failed) return path.join(root, '.git');
  return result.stdout.trim();
}

/** Default status provider: reads the working tree through the git CLI. */
export async function computeStatus(root: string): Promise<StatusSnapshot> {
  const [porcelain, stash, gitDir] = await Promise.all([
    runGit(root, ['status', '--porcelain=v2', '--branch']),
    countStashes(root),
    resolveGitDir(root),
  ]);
  if (porcelain.failed) {
    throw new StatusComputeError(root, porcelain.stderr.trim() || 'git status failed');
  }

  const summary = parsePorcelainV2(porcelain.stdout);
  return {
    ...summary,
    stash,
    state: await detectOperationState(gitDir),
  };
}
