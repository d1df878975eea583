import { subscribeDebounced, isRelevantPath } from './watcher.js';
import { SnapshotEmitter, type OutputSink } from './emitter.js';
import { writeStateFile } from './state-file.js';
import { WatcherClosedError, errorMessage } from '../lib/errors.js';
import { warn } from '../lib/output.js';
import type { Renderer } from './format.js';
import type { StatusProvider, StatusSnapshot } from '../types/status.js';
import type { FsEventSource } from '../types/watch.js';

export type LoopExit = 'output-closed';

export interface LoopDeps {
  source: FsEventSource;
  provider: StatusProvider;
  sink: OutputSink;
  render: Renderer;
}

export interface LeaderOptions {
  root: string;
  stateFile: string;
  debounceMs: number;
  drainMs: number;
  alwaysPrint: boolean;
}

/**
 * Compute, publish and print status for `root` until the output closes.
 *
 * Computing status reads and may refresh files under .git/, which the watcher
 * cannot tell apart from an outside change. Each `changed` therefore waits
 * `drainMs` and drops whatever queued up before recomputing; dedup against
 * the last emitted snapshot absorbs the rest.
 *
 * Rejects with `WatcherClosedError` if the watcher stops delivering.
 */
export async function runLeader(options: LeaderOptions, deps: LoopDeps): Promise<LoopExit> {
  const emitter = new SnapshotEmitter(deps.sink, deps.render, options.alwaysPrint);

  const initial = await deps.provider(options.root);
  await publish(options.stateFile, initial);
  if (!(await emitter.emit(initial))) return 'output-closed';

  const watcher = await subscribeDebounced(deps.source, options.root, {
    debounceMs: options.debounceMs,
    recursive: true,
    isRelevant: (filePath) => isRelevantPath(filePath, options.root),
  });

  try {
    for (;;) {
      const event = await watcher.events.receive();
      if (!event) throw new WatcherClosedError();

      if (event.type === 'error') {
        warn(`watcher error: ${event.message}`);
        continue;
      }

      const drained = await watcher.events.drain(options.drainMs);
      for (const skipped of drained) {
        if (skipped.type === 'error') warn(`watcher error: ${skipped.message}`);
      }

      let snapshot: StatusSnapshot;
      try {
        snapshot = await deps.provider(options.root);
      } catch (err) {
        warn(errorMessage(err));
        continue;
      }

      if (!emitter.shouldEmit(snapshot)) continue;
      await publish(options.stateFile, snapshot);
      if (!(await emitter.emit(snapshot))) return 'output-closed';
    }
  } finally {
    await watcher.close();
  }
}

async function publish(stateFile: string, snapshot: StatusSnapshot): Promise<void> {
  try {
    await writeStateFile(stateFile, snapshot);
  } catch (err) {
    warn(`Could not publish status to ${stateFile}: ${errorMessage(err)}`);
  }
}
