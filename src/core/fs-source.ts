import fs from 'node:fs/promises';
import path from 'node:path';
import chokidar from 'chokidar';
import { WatcherSetupError, errorMessage } from '../lib/errors.js';
import type { FsEventSource } from '../types/watch.js';

/**
 * Filesystem notifications through chokidar. Resolves once the initial scan is
 * done; an error before that point is a setup failure. Removing the watched
 * directory itself ends the subscription.
 */
export const chokidarSource: FsEventSource = {
  async subscribe(target, handler, options) {
    try {
      const stat = await fs.stat(target);
      if (!stat.isDirectory()) {
        throw new WatcherSetupError(target, 'not a directory');
      }
    } catch (err) {
      if (err instanceof WatcherSetupError) throw err;
      throw new WatcherSetupError(target, errorMessage(err));
    }

    const watcher = chokidar.watch(target, {
      ignoreInitial: true,
      persistent: true,
      depth: options.recursive ? undefined : 0,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onReady = (): void => {
          watcher.off('error', onError);
          resolve();
        };
        const onError = (err: unknown): void => {
          watcher.off('ready', onReady);
          reject(err);
        };
        watcher.once('ready', onReady);
        watcher.once('error', onError);
      });
    } catch (err) {
      await watcher.close();
      throw new WatcherSetupError(target, errorMessage(err));
    }

    const root = path.resolve(target);
    watcher.on('all', (event, filePath) => {
      if (event === 'unlinkDir' && path.resolve(filePath) === root) {
        handler.onEnd();
        return;
      }
      handler.onPath(filePath);
    });
    watcher.on('error', (err) => handler.onError(err));

    return {
      close: () => watcher.close(),
    };
  },
};
