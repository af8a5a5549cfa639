/**
 * Chokidar Backend
 *
 * Portable fallback when watchman is not installed. Initial files are ignored:
 * the startup reconciliation scan already covers them.
 */

import { watch, type FSWatcher } from 'chokidar';
import { getErrorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { ChangeKind } from '../queue.js';
import type { Subscription, SubscriptionListener, WatchBackend } from './types.js';

export interface ChokidarBackendOptions {
  followSymlinks: boolean;
}

export class ChokidarBackend implements WatchBackend {
  readonly name = 'chokidar';

  private readonly watchers = new Set<FSWatcher>();

  constructor(private readonly options: ChokidarBackendOptions) {}

  async subscribe(root: string, listener: SubscriptionListener): Promise<Subscription> {
    const { isExcluded } = listener;
    const watcher = watch(root, {
      ignoreInitial: true,
      persistent: true,
      followSymlinks: this.options.followSymlinks,
      ignored: isExcluded ? (path: string) => path !== root && isExcluded(path) : undefined,
    });

    watcher.on('add', (path: string) => listener.onChange({ path, kind: ChangeKind.CREATED }));
    watcher.on('change', (path: string) => listener.onChange({ path, kind: ChangeKind.MODIFIED }));
    watcher.on('unlink', (path: string) => listener.onChange({ path, kind: ChangeKind.REMOVED }));
    watcher.on('error', (error: unknown) => {
      logger.error(`Watcher error for ${root}: ${getErrorMessage(error)}`);
      listener.onError(error instanceof Error ? error : new Error(getErrorMessage(error)));
    });

    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));
    this.watchers.add(watcher);

    return {
      close: async () => {
        if (!this.watchers.delete(watcher)) return;
        await watcher.close();
      },
    };
  }

  async close(): Promise<void> {
    const watchers = [...this.watchers];
    this.watchers.clear();
    await Promise.all(watchers.map((watcher) => watcher.close()));
  }
}
