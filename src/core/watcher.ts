import path from 'node:path';
import { EventChannel } from './channel.js';
import { WatcherSetupError, errorMessage } from '../lib/errors.js';
import type { FsEventHandler, FsEventSource, FsSubscription, WatchEvent } from '../types/watch.js';

const GIT_DIR = '.git';

// Entries directly under .git/ whose writes can change the reported status.
// Everything else there (objects/, logs/, index.lock, COMMIT_EDITMSG, ...) is
// bulk storage or scratch and never affects a snapshot.
const STATUS_GIT_ENTRIES = new Set([
  'HEAD',
  'index',
  'refs',
  'MERGE_HEAD',
  'REBASE_HEAD',
  'CHERRY_PICK_HEAD',
  'REVERT_HEAD',
  'BISECT_LOG',
  'rebase-merge',
  'rebase-apply',
]);

export function isRelevantPath(filePath: string, root: string): boolean {
  const relative = path.relative(root, filePath);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return true;
  }

  const [first, second] = relative.split(path.sep);
  if (first !== GIT_DIR) return true;
  if (second === undefined) return true;
  return STATUS_GIT_ENTRIES.has(second);
}

export function isStateFile(filePath: string, stateFile: string): boolean {
  return path.resolve(filePath) === path.resolve(stateFile);
}

export interface DebounceOptions {
  debounceMs: number;
  recursive: boolean;
  isRelevant: (filePath: string) => boolean;
}

export interface DebouncedWatcher {
  readonly events: EventChannel<WatchEvent>;
  close(): Promise<void>;
}

/**
 * Subscribe to `target` and coalesce raw notifications into `changed` events.
 *
 * Every notification restarts a `debounceMs` timer. When it fires, the paths
 * accumulated since the last delivery are tested with `isRelevant`; one
 * relevant path is enough for a single `changed`. Errors after setup become
 * `error` events and watching continues. If the source ends, the channel
 * closes.
 */
export async function subscribeDebounced(
  source: FsEventSource,
  target: string,
  options: DebounceOptions,
): Promise<DebouncedWatcher> {
  const events = new EventChannel<WatchEvent>();
  let pending: string[] = [];
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let stopped = false;

  function clearTimer(): void {
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = null;
  }

  function flush(): void {
    debounceTimer = null;
    const batch = pending;
    pending = [];
    if (batch.some((filePath) => options.isRelevant(filePath))) {
      events.push({ type: 'changed' });
    }
  }

  const handler: FsEventHandler = {
    onPath(filePath) {
      if (stopped) return;
      pending.push(filePath);
      clearTimer();
      debounceTimer = setTimeout(flush, options.debounceMs);
    },
    onError(error) {
      if (stopped) return;
      events.push({ type: 'error', message: error.message });
    },
    onEnd() {
      stopped = true;
      clearTimer();
      events.close();
    },
  };

  let subscription: FsSubscription;
  try {
    subscription = await source.subscribe(target, handler, { recursive: options.recursive });
  } catch (err) {
    if (err instanceof WatcherSetupError) throw err;
    throw new WatcherSetupError(target, errorMessage(err));
  }

  return {
    events,
    async close() {
      stopped = true;
      clearTimer();
      pending = [];
      events.close();
      await subscription.close();
    },
  };
}
