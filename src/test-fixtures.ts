import { OutputClosedError } from './lib/errors.js';
import type { OutputSink } from './core/emitter.js';
import type { StatusSnapshot } from './types/status.js';
import type { FsEventHandler, FsEventSource, SubscribeOptions } from './types/watch.js';

export function makeSnapshot(overrides?: Partial<StatusSnapshot>): StatusSnapshot {
  return {
    branch: 'main',
    staged: 0,
    modified: 0,
    untracked: 0,
    conflicted: 0,
    ahead: 0,
    behind: 0,
    stash: 0,
    state: 'clean',
    ...overrides,
  };
}

export interface SyntheticSubscription {
  target: string;
  options: SubscribeOptions;
  closed: boolean;
}

/** In-process stand-in for chokidar, driven by the test. */
export interface SyntheticSource extends FsEventSource {
  readonly subscriptions: SyntheticSubscription[];
  emit(filePath: string): void;
  fail(message: string): void;
  end(): void;
}

export function createSyntheticSource(): SyntheticSource {
  const active = new Map<SyntheticSubscription, FsEventHandler>();
  const subscriptions: SyntheticSubscription[] = [];

  return {
    subscriptions,
    async subscribe(target, handler, options) {
      const subscription: SyntheticSubscription = { target, options, closed: false };
      subscriptions.push(subscription);
      active.set(subscription, handler);
      return {
        async close() {
          subscription.closed = true;
          active.delete(subscription);
        },
      };
    },
    emit(filePath) {
      for (const handler of [...active.values()]) handler.onPath(filePath);
    },
    fail(message) {
      for (const handler of [...active.values()]) handler.onError(new Error(message));
    },
    end() {
      for (const handler of [...active.values()]) handler.onEnd();
    },
  };
}

export interface MemorySink extends OutputSink {
  readonly lines: string[];
}

/** Collects written lines; rejects like a closed pipe after `closeAfter` lines. */
export function createMemorySink(options?: { closeAfter?: number }): MemorySink {
  const lines: string[] = [];
  return {
    lines,
    async write(line) {
      if (options?.closeAfter !== undefined && lines.length >= options.closeAfter) {
        throw new OutputClosedError('EPIPE');
      }
      lines.push(line);
    },
  };
}
