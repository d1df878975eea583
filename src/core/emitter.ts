import type { Writable } from 'node:stream';
import { snapshotsEqual } from './snapshot.js';
import { OutputClosedError } from '../lib/errors.js';
import type { Renderer } from './format.js';
import type { StatusSnapshot } from '../types/status.js';

export interface OutputSink {
  /** Write one line. Rejects with `OutputClosedError` once the consumer is gone. */
  write(line: string): Promise<void>;
}

export function createStreamSink(stream: Writable): OutputSink {
  let closedBy: Error | undefined;
  stream.on('error', (err) => {
    closedBy = err;
  });

  return {
    write(line) {
      if (closedBy) return Promise.reject(new OutputClosedError(closedBy.message));
      return new Promise((resolve, reject) => {
        stream.write(`${line}\n`, (err) => {
          if (err) reject(new OutputClosedError(err.message));
          else resolve();
        });
      });
    },
  };
}

/**
 * Dedup state for one loop: remembers the last snapshot it wrote and skips
 * structurally equal successors unless `alwaysPrint` is set.
 */
export class SnapshotEmitter {
  private last: StatusSnapshot | undefined;

  constructor(
    private readonly sink: OutputSink,
    private readonly render: Renderer,
    private readonly alwaysPrint: boolean,
  ) {}

  get lastEmitted(): StatusSnapshot | undefined {
    return this.last;
  }

  shouldEmit(snapshot: StatusSnapshot): boolean {
    if (this.alwaysPrint || !this.last) return true;
    return !snapshotsEqual(this.last, snapshot);
  }

  /** Resolves `false` when the output is closed. */
  async emit(snapshot: StatusSnapshot): Promise<boolean> {
    try {
      await this.sink.write(this.render(snapshot));
    } catch (err) {
      if (err instanceof OutputClosedError) return false;
      throw err;
    }
    this.last = snapshot;
    return true;
  }
}
