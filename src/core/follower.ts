import path from 'node:path';
import { subscribeDebounced, isStateFile } from './watcher.js';
import { SnapshotEmitter } from './emitter.js';
import { readStateFile } from './state-file.js';
import { WatcherClosedError } from '../lib/errors.js';
import { warn } from '../lib/output.js';
import type { LoopDeps, LoopExit } from './leader.js';

export type FollowerDeps = Omit<LoopDeps, 'provider'>;

export interface FollowerOptions {
  stateFile: string;
  debounceMs: number;
  alwaysPrint: boolean;
}

/**
 * Re-emit whatever the leader publishes to `stateFile`. Watches only the
 * state directory, one level deep, and reacts only to the state file itself.
 * A read that fails or decodes to garbage is skipped until the next change.
 */
export async function runFollower(options: FollowerOptions, deps: FollowerDeps): Promise<LoopExit> {
  const emitter = new SnapshotEmitter(deps.sink, deps.render, options.alwaysPrint);

  const initial = await readStateFile(options.stateFile);
  if (initial && !(await emitter.emit(initial))) return 'output-closed';

  const watcher = await subscribeDebounced(deps.source, path.dirname(options.stateFile), {
    debounceMs: options.debounceMs,
    recursive: false,
    isRelevant: (filePath) => isStateFile(filePath, options.stateFile),
  });

  try {
    for (;;) {
      const event = await watcher.events.receive();
      if (!event) throw new WatcherClosedError();

      if (event.type === 'error') {
        warn(`watcher error: ${event.message}`);
        continue;
      }

      const snapshot = await readStateFile(options.stateFile);
      if (!snapshot || !emitter.shouldEmit(snapshot)) continue;
      if (!(await emitter.emit(snapshot))) return 'output-closed';
    }
  } finally {
    await watcher.close();
  }
}
