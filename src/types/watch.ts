export type WatchEvent =
  | { type: 'changed' }
  | { type: 'error'; message: string };

export interface FsEventHandler {
  onPath(path: string): void;
  onError(error: Error): void;
  /** No further events will arrive, e.g. the watched directory was removed. */
  onEnd(): void;
}

export interface FsSubscription {
  close(): Promise<void>;
}

export interface SubscribeOptions {
  /** Watch the whole tree below `target`, or only its direct entries. */
  recursive: boolean;
}

/**
 * Minimal capability over filesystem notifications. The real implementation
 * wraps chokidar; tests drive a synthetic source.
 */
export interface FsEventSource {
  subscribe(target: string, handler: FsEventHandler, options: SubscribeOptions): Promise<FsSubscription>;
}
