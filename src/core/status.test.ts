import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import type { GitResult } from './git.js';

vi.mock('./git.js', () => ({
  runGit: vi.fn(),
}));

import { runGit } from './git.js';
import { computeStatus, countStashes, detectOperationState, parsePorcelainV2 } from './status.js';
import { StatusComputeError } from '../lib/errors.js';

const mockedRunGit = vi.mocked(runGit);

function ok(stdout: string): GitResult {
  return { stdout, stderr: '', failed: false };
}

function failed(stderr: string): GitResult {
  return { stdout: '', stderr, failed: true };
}

describe('parsePorcelainV2', () => {
  test('given a clean repository, should report zero counts', () => {
    const output = [
      '# branch.oid 0123456789abcdef0123456789abcdef01234567',
      '# branch.head main',
      '# branch.upstream origin/main',
      '# branch.ab +0 -0',
      '',
    ].join('\n');

    expect(parsePorcelainV2(output)).toEqual({
      branch: 'main',
      ahead: 0,
      behind: 0,
      staged: 0,
      modified: 0,
      untracked: 0,
      conflicted: 0,
    });
  });

  test('given mixed changes, should count each side', () => {
    const output = [
      '# branch.oid 0123456789abcdef0123456789abcdef01234567',
      '# branch.head topic/parser',
      '# branch.upstream origin/topic/parser',
      '# branch.ab +4 -2',
      '1 M. N... 100644 100644 100644 aaaaaaa bbbbbbb lib/one.ts',
      '1 .M N... 100644 100644 100644 aaaaaaa bbbbbbb lib/two.ts',
      '1 AM N... 000000 100644 100644 0000000 bbbbbbb lib/three.ts',
      '2 R. N... 100644 100644 100644 aaaaaaa aaaaaaa R100 lib/new.ts\tlib/old.ts',
      'u UU N... 100644 100644 100644 100644 aaaaaaa bbbbbbb ccccccc lib/conflict.ts',
      '? notes.txt',
      '? scratch/',
      '',
    ].join('\n');

    expect(parsePorcelainV2(output)).toEqual({
      branch: 'topic/parser',
      ahead: 4,
      behind: 2,
      staged: 3,
      modified: 2,
      untracked: 2,
      conflicted: 1,
    });
  });

  test('given a detached head, should report the short object id', () => {
    const output = '# branch.oid 89abcdef0123456789abcdef0123456789abcdef\n# branch.head (detached)\n';

    expect(parsePorcelainV2(output).branch).toBe('89abcde');
  });

  test('given a detached head without an oid, should report HEAD', () => {
    expect(parsePorcelainV2('# branch.head (detached)\n').branch).toBe('HEAD');
  });

  test('given no upstream, should leave ahead and behind at zero', () => {
    const output = '# branch.oid (initial)\n# branch.head main\n? a.txt\n';

    expect(parsePorcelainV2(output)).toMatchObject({ branch: 'main', ahead: 0, behind: 0, untracked: 1 });
  });
});

describe('detectOperationState', () => {
  let gitDir: string;

  beforeEach(async () => {
    gitDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gsw-gitdir-'));
  });

  afterEach(async () => {
    await fs.rm(gitDir, { recursive: true, force: true });
  });

  test('given no markers, should be clean', async () => {
    expect(await detectOperationState(gitDir)).toBe('clean');
  });

  test.each([
    ['MERGE_HEAD', 'merge'],
    ['CHERRY_PICK_HEAD', 'cherry_pick'],
    ['BISECT_LOG', 'bisect'],
    ['REVERT_HEAD', 'revert'],
  ])('given %s, should report %s', async (marker, expected) => {
    await fs.writeFile(path.join(gitDir, marker), 'abc123\n');

    expect(await detectOperationState(gitDir)).toBe(expected);
  });

  test('given a rebase-merge directory, should report rebase', async () => {
    await fs.mkdir(path.join(gitDir, 'rebase-merge'));

    expect(await detectOperationState(gitDir)).toBe('rebase');
  });

  test('given both merge and revert markers, should prefer merge', async () => {
    await fs.writeFile(path.join(gitDir, 'REVERT_HEAD'), 'abc123\n');
    await fs.writeFile(path.join(gitDir, 'MERGE_HEAD'), 'abc123\n');

    expect(await detectOperationState(gitDir)).toBe('merge');
  });
});

describe('countStashes', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('given stash entries, should parse the count', async () => {
    mockedRunGit.mockResolvedValue(ok('3\n'));

    expect(await countStashes('/repo')).toBe(3);
    expect(mockedRunGit).toHaveBeenCalledWith('/repo', ['rev-list', '--count', 'refs/stash']);
  });

  test('given no stash ref, should be zero', async () => {
    mockedRunGit.mockResolvedValue(failed("fatal: ambiguous argument 'refs/stash'"));

    expect(await countStashes('/repo')).toBe(0);
  });
});

describe('computeStatus', () => {
  let gitDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    gitDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gsw-gitdir-'));
  });

  afterEach(async () => {
    await fs.rm(gitDir, { recursive: true, force: true });
  });

  function fakeGit(responses: { status: GitResult; stash: GitResult; gitDir: GitResult }): void {
    mockedRunGit.mockImplementation(async (_cwd, args) => {
      if (args[0] === 'status') return responses.status;
      if (args[0] === 'rev-list') return responses.stash;
      return responses.gitDir;
    });
  }

  test('given a repository mid-merge, should combine all sources', async () => {
    await fs.writeFile(path.join(gitDir, 'MERGE_HEAD'), 'abc123\n');
    fakeGit({
      status: ok('# branch.head main\n# branch.ab +1 -0\nu UU N... 1 1 1 1 a b c f.ts\n? x\n'),
      stash: ok('2\n'),
      gitDir: ok(`${gitDir}\n`),
    });

    expect(await computeStatus('/repo')).toEqual({
      branch: 'main',
      staged: 0,
      modified: 0,
      untracked: 1,
      conflicted: 1,
      ahead: 1,
      behind: 0,
      stash: 2,
      state: 'merge',
    });
  });

  test('given git status fails, should throw StatusComputeError', async () => {
    fakeGit({
      status: failed('fatal: not a git repository'),
      stash: failed(''),
      gitDir: failed(''),
    });

    await expect(computeStatus('/repo')).rejects.toThrow(StatusComputeError);
    await expect(computeStatus('/repo')).rejects.toThrow('fatal: not a git repository');
  });
});
