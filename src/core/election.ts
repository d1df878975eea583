import fs from 'node:fs/promises';
import { rmSync } from 'node:fs';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import { lockPath } from '../lib/paths.js';
import { LeaderLockError, errorMessage, hasErrorCode } from '../lib/errors.js';
import { warn } from '../lib/output.js';

// A holder refreshes the lock's mtime every STALE_MS / 2. A holder that stops
// refreshing counts as gone once its lock is older than this, even if its pid
// has been reused by an unrelated process.
const STALE_MS = 10_000;

export interface LockHandle {
  readonly lockPath: string;
  release(): Promise<void>;
}

export type Role =
  | { kind: 'leader'; lock: LockHandle }
  | { kind: 'follower' };

type Holder =
  | { alive: true }
  | { alive: false; ino: number | undefined };

/** The holder's pid lives inside the lock directory, so it belongs to that lock only. */
export function holderPidPath(lockfilePath: string): string {
  return path.join(lockfilePath, 'pid');
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by another user
    return !hasErrorCode(err, 'ESRCH');
  }
}

async function readHolderPid(lockfilePath: string): Promise<number | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(holderPidPath(lockfilePath), 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) return undefined;
    throw err;
  }
  const pid = Number(raw.trim());
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

/**
 * A lock without a pid yet is a holder between mkdir and writing its pid:
 * alive unless the lock has also gone stale.
 */
async function inspectHolder(lockfilePath: string): Promise<Holder> {
  let ino: number;
  let mtimeMs: number;
  try {
    ({ ino, mtimeMs } = await fs.stat(lockfilePath));
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return { alive: false, ino: undefined };
    throw err;
  }

  const pid = await readHolderPid(lockfilePath);
  if (pid !== undefined && !isProcessAlive(pid)) return { alive: false, ino };
  if (mtimeMs < Date.now() - STALE_MS) return { alive: false, ino };
  return { alive: true };
}

/**
 * Move a dead holder's lock aside and delete it. If a contender replaced it
 * between inspection and the rename, the contender's lock is put back.
 */
async function reclaim(lockfilePath: string, ino: number | undefined): Promise<void> {
  if (ino === undefined) return;
  const tombstone = `${lockfilePath}.${process.pid}.stale`;
  try {
    await fs.rename(lockfilePath, tombstone);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return;
    throw err;
  }
  const moved = await fs.stat(tombstone);
  if (moved.ino !== ino) {
    await fs.rename(tombstone, lockfilePath);
    return;
  }
  await fs.rm(tombstone, { recursive: true, force: true });
}

async function acquire(stateFile: string, lockfilePath: string): Promise<LockHandle | undefined> {
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(stateFile, {
      realpath: false,
      lockfilePath,
      stale: STALE_MS,
      retries: 0,
      onCompromised: (err) => {
        warn(`Leader lock compromised, another process may start publishing: ${err.message}`);
      },
    });
  } catch (err) {
    // ENOTEMPTY: proper-lockfile found the lock stale but cannot rmdir a lock holding a pid
    if (hasErrorCode(err, 'ELOCKED') || hasErrorCode(err, 'ENOTEMPTY')) return undefined;
    throw err;
  }

  const pidFile = holderPidPath(lockfilePath);
  try {
    await fs.writeFile(pidFile, `${process.pid}\n`);
  } catch (err) {
    await release();
    throw err;
  }

  // proper-lockfile's own exit hook runs after 'exit' listeners and can only
  // remove an empty lock directory.
  const clearPid = (): void => rmSync(pidFile, { force: true });
  process.on('exit', clearPid);

  return {
    lockPath: lockfilePath,
    async release() {
      process.off('exit', clearPid);
      await fs.rm(pidFile, { force: true });
      await release();
    },
  };
}

/**
 * One non-blocking attempt at the per-root leader lock. Resolves `undefined`
 * when a live process holds it. A lock left by a holder that died without
 * releasing (killed, crashed) is reclaimed and the lock is tried once more.
 */
export async function tryBecomeLeader(stateFile: string): Promise<LockHandle | undefined> {
  const lockfilePath = lockPath(stateFile);
  try {
    const lock = await acquire(stateFile, lockfilePath);
    if (lock) return lock;

    const holder = await inspectHolder(lockfilePath);
    if (holder.alive) return undefined;

    await reclaim(lockfilePath, holder.ino);
    return await acquire(stateFile, lockfilePath);
  } catch (err) {
    throw new LeaderLockError(lockfilePath, errorMessage(err));
  }
}

export async function electRole(stateFile: string): Promise<Role> {
  const lock = await tryBecomeLeader(stateFile);
  return lock ? { kind: 'leader', lock } : { kind: 'follower' };
}

/** Whether a live leader currently holds the lock for this state file. */
export async function isWatched(stateFile: string): Promise<boolean> {
  const lockfilePath = lockPath(stateFile);
  try {
    const locked = await lockfile.check(stateFile, {
      realpath: false,
      lockfilePath,
      stale: STALE_MS,
    });
    if (!locked) return false;
    return (await inspectHolder(lockfilePath)).alive;
  } catch (err) {
    throw new LeaderLockError(lockfilePath, errorMessage(err));
  }
}
