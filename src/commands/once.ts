import { isWatched } from '../core/election.js';
import { createRenderer } from '../core/format.js';
import { readStateFile, writeStateFile } from '../core/state-file.js';
import { computeStatus } from '../core/status.js';
import { errorMessage } from '../lib/errors.js';
import { warn } from '../lib/output.js';
import { prepareSession, type SessionOptions } from './session.js';

export async function onceCommand(dir: string | undefined, options: SessionOptions): Promise<void> {
  const { root, stateFile, config } = await prepareSession(dir, options);
  const render = createRenderer(config.format);

  // A live leader keeps the state file current; reading it skips a git run.
  if (await isWatched(stateFile)) {
    const published = await readStateFile(stateFile);
    if (published) {
      console.log(render(published));
      return;
    }
  }

  const snapshot = await computeStatus(root);
  try {
    await writeStateFile(stateFile, snapshot);
  } catch (err) {
    warn(`Could not publish status to ${stateFile}: ${errorMessage(err)}`);
  }
  console.log(render(snapshot));
}
