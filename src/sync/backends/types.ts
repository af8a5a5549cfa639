/**
 * Watch Backend - Shared Types
 *
 * A backend turns OS notifications for one root into raw per-file changes.
 * Debouncing, exclusions and root health live above it, in the LiveWatcher.
 */

import type { ChangeKind } from '../queue.js';

export interface RawChange {
  path: string; // Absolute path of the changed file
  kind: ChangeKind;
}

export interface SubscriptionListener {
  onChange: (change: RawChange) => void;
  /** The subscription broke; the root is treated as degraded */
  onError: (error: Error) => void;
  /** Paths the backend may skip watching entirely */
  isExcluded?: (path: string) => boolean;
}

export interface Subscription {
  close(): Promise<void>;
}

export interface WatchBackend {
  readonly name: string;
  subscribe(root: string, listener: SubscriptionListener): Promise<Subscription>;
  /** Release every subscription and connection */
  close(): Promise<void>;
}

export const WatcherKind = {
  AUTO: 'auto',
  WATCHMAN: 'watchman',
  CHOKIDAR: 'chokidar',
} as const;
export type WatcherKind = (typeof WatcherKind)[keyof typeof WatcherKind];
