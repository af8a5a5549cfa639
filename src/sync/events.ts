/**
 * Sync Observability Events
 *
 * Every manifest status transition and every exhausted failure is emitted here
 * as a structured event. The engine never formats these for display; the CLI
 * (or any other presentation layer) subscribes.
 */

import { EventEmitter } from 'events';
import type { ManifestStatus } from '../db/schema.js';

export type SyncEvent =
  | {
      type: 'status';
      path: string;
      from: ManifestStatus | null;
      to: ManifestStatus | 'removed';
      timestamp: Date;
    }
  | {
      type: 'failed';
      path: string;
      failureCount: number;
      error: string;
      timestamp: Date;
    }
  | {
      type: 'discarded';
      path: string;
      reason: string;
      timestamp: Date;
    }
  | { type: 'root-degraded'; root: string; error: string; timestamp: Date }
  | { type: 'root-recovered'; root: string; timestamp: Date };

export type SyncEventType = SyncEvent['type'];

export const syncEvents = new EventEmitter();

export function emitSyncEvent(event: SyncEvent): void {
  syncEvents.emit('sync', event);
}

/**
 * Subscribe to sync events. Returns an unsubscribe function.
 */
export function onSyncEvent(listener: (event: SyncEvent) => void): () => void {
  syncEvents.on('sync', listener);
  return () => {
    syncEvents.off('sync', listener);
  };
}
