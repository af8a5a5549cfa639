/**
 * Sync Module
 *
 * Re-exports all sync-related functionality.
 */

// Engine (orchestration)
export {
  SyncEngine,
  resolveRoots,
  runOneShotSync,
  runWatchMode,
  type ResolvedRoots,
  type SyncOptions,
} from './engine.js';

// Manifest (durable state)
export {
  ManifestStore,
  type ManifestCounts,
  type ManifestEntry,
  type ManifestSnapshot,
} from './manifest.js';

// Detector (reconciliation scan)
export { detectChange, scanRoot, scanRootToArray, type ScanOptions } from './detector.js';

// Watcher (live notifications)
export { LiveWatcher, type LiveWatcherOptions } from './watcher.js';
export {
  ChokidarBackend,
  WatchmanBackend,
  WatcherKind,
  selectBackend,
  type WatchBackend,
} from './backends/index.js';

// Queue (change events)
export {
  ChangeKind,
  EventQueue,
  coalesceEvents,
  coalesceKinds,
  type ChangeEvent,
  type ChangeSource,
} from './queue.js';

// Scheduler (upload execution)
export {
  UploadScheduler,
  computeRetryDelay,
  type SchedulerOptions,
  type SchedulerStats,
} from './scheduler.js';

// Events (observability)
export { emitSyncEvent, onSyncEvent, syncEvents, type SyncEvent } from './events.js';
