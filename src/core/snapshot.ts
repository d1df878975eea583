import type { StatusSnapshot } from '../types/status.js';

export function snapshotsEqual(a: StatusSnapshot, b: StatusSnapshot): boolean {
  return a.branch === b.branch
    && a.staged === b.staged
    && a.modified === b.modified
    && a.untracked === b.untracked
    && a.conflicted === b.conflicted
    && a.ahead === b.ahead
    && a.behind === b.behind
    && a.stash === b.stash
    && a.state === b.state;
}
