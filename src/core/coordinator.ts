import { runLeader, type LoopDeps, type LoopExit } from './leader.js';
import { runFollower } from './follower.js';
import type { Role } from './election.js';
import type { Config } from '../types/config.js';

export interface WatchSession {
  root: string;
  stateFile: string;
  config: Config;
}

export interface CoordinatorDeps extends LoopDeps {
  elect: (stateFile: string) => Promise<Role>;
  onRole?: (role: Role['kind']) => void;
}

/** Elect once, then run the matching loop for the life of the process. */
export async function runWatch(session: WatchSession, deps: CoordinatorDeps): Promise<LoopExit> {
  const { root, stateFile, config } = session;
  const role = await deps.elect(stateFile);
  deps.onRole?.(role.kind);

  switch (role.kind) {
    case 'leader':
      return runLeader(
        {
          root,
          stateFile,
          debounceMs: config.debounceMs,
          drainMs: config.drainMs,
          alwaysPrint: config.alwaysPrint,
        },
        deps,
      );
    case 'follower':
      return runFollower(
        {
          stateFile,
          debounceMs: config.followerDebounceMs,
          alwaysPrint: config.alwaysPrint,
        },
        deps,
      );
  }
}
