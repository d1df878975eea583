import { runWatch } from '../core/coordinator.js';
import { electRole } from '../core/election.js';
import { createStreamSink } from '../core/emitter.js';
import { createRenderer } from '../core/format.js';
import { chokidarSource } from '../core/fs-source.js';
import { computeStatus } from '../core/status.js';
import { info } from '../lib/output.js';
import { prepareSession, type SessionOptions } from './session.js';

export interface WatchOptions extends SessionOptions {
  verbose?: boolean;
}

export async function watchCommand(dir: string | undefined, options: WatchOptions): Promise<void> {
  const session = await prepareSession(dir, options);

  const exit = await runWatch(session, {
    source: chokidarSource,
    provider: computeStatus,
    sink: createStreamSink(process.stdout),
    render: createRenderer(session.config.format),
    elect: electRole,
    onRole: (role) => {
      if (options.verbose) info(`Watching ${session.root} as ${role}`);
    },
  });

  if (exit === 'output-closed') {
    process.exit(0);
  }
}
