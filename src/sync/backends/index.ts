/**
 * Watch Backend Selection
 */

import { logger } from '../../logger.js';
import { ChokidarBackend } from './chokidar.js';
import { WatchmanBackend, isWatchmanAvailable } from './watchman.js';
import { WatcherKind, type WatchBackend } from './types.js';

export { ChokidarBackend } from './chokidar.js';
export { WatchmanBackend, isWatchmanAvailable } from './watchman.js';
export {
  WatcherKind,
  type RawChange,
  type Subscription,
  type SubscriptionListener,
  type WatchBackend,
} from './types.js';

/**
 * Pick the backend for this run. `auto` prefers watchman when it is installed.
 */
export function selectBackend(kind: WatcherKind, options: { followSymlinks: boolean }): WatchBackend {
  if (kind === WatcherKind.WATCHMAN) return new WatchmanBackend();
  if (kind === WatcherKind.CHOKIDAR) return new ChokidarBackend(options);

  if (isWatchmanAvailable()) {
    logger.debug('Using watchman for file notifications');
    return new WatchmanBackend();
  }
  logger.debug('Watchman not found, using chokidar for file notifications');
  return new ChokidarBackend(options);
}
