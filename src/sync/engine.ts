/**
 * Sync Engine
 *
 * Orchestrates the sync process: coordinates detector, watcher, queue, and
 * scheduler around one manifest.
 */

import { realpath, stat } from 'fs/promises';
import { getConfig, getExcludePatterns, onConfigChange, type Config } from '../config.js';
import type { Db } from '../db/index.js';
import {
  CorruptManifestError,
  NoWatchedRootsError,
  WatchedRootUnavailableError,
  getErrorMessage,
} from '../errors.js';
import { FLAGS, clearFlag, isPaused, setFlag } from '../flags.js';
import { logger } from '../logger.js';
import { buildRemoteKey, type ObjectStoreClient } from '../s3/index.js';
import { SIGNALS, registerSignalHandler, unregisterSignalHandler } from '../signals.js';
import { selectBackend, type WatchBackend } from './backends/index.js';
import { scanRoot, type ScanOptions } from './detector.js';
import { onSyncEvent, type SyncEvent } from './events.js';
import { ManifestStore } from './manifest.js';
import { EventQueue } from './queue.js';
import { UploadScheduler } from './scheduler.js';
import { LiveWatcher } from './watcher.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncOptions {
  config: Config;
  db: Db;
  store: ObjectStoreClient;
  /** Watch backend override; defaults to the one named by config.watcher */
  backend?: WatchBackend;
}

export interface ResolvedRoots {
  /** Real paths of roots that are directories right now */
  available: string[];
  /** Configured roots that could not be resolved */
  unavailable: string[];
}

// ============================================================================
// Root Resolution
// ============================================================================

/**
 * Resolve configured roots to real directory paths.
 * Throws NoWatchedRootsError when none of them is a readable directory.
 */
export async function resolveRoots(dirs: readonly string[]): Promise<ResolvedRoots> {
  const available: string[] = [];
  const unavailable: string[] = [];

  for (const dir of dirs) {
    try {
      const real = await realpath(dir);
      if (!(await stat(real)).isDirectory()) {
        throw new Error('not a directory');
      }
      if (!available.includes(real)) available.push(real);
    } catch (error) {
      logger.warn(`Watched root unavailable: ${dir} (${getErrorMessage(error)})`);
      if (!unavailable.includes(dir)) unavailable.push(dir);
    }
  }

  if (available.length === 0) {
    throw new NoWatchedRootsError(
      dirs.length === 0
        ? 'No sync directories configured'
        : `None of the configured sync directories exist: ${dirs.join(', ')}`
    );
  }
  return { available, unavailable };
}

// ============================================================================
// Sync Engine
// ============================================================================

export class SyncEngine {
  readonly manifest: ManifestStore;
  readonly queue = new EventQueue();
  readonly scheduler: UploadScheduler;

  private readonly config: Config;
  private readonly backend?: WatchBackend;
  private excludePatterns: string[];
  private roots: ResolvedRoots = { available: [], unavailable: [] };
  private watcher: LiveWatcher | null = null;
  private schedulerLoop: Promise<void> | null = null;
  private reconcileTimer: NodeJS.Timeout | null = null;
  private reconciling: Promise<number> | null = null;
  private stopped = false;

  constructor(options: SyncOptions) {
    const { config } = options;
    this.config = config;
    this.backend = options.backend;
    this.excludePatterns = getExcludePatterns(config);
    this.manifest = new ManifestStore(options.db);
    this.scheduler = new UploadScheduler({
      manifest: this.manifest,
      store: options.store,
      remoteKeyFor: (root, path) => buildRemoteKey(config.prefix, root, path),
      concurrency: config.sync_concurrency,
      maxRetries: config.max_retries,
      retryBaseDelayMs: config.retry_base_delay_ms,
      retryMaxDelayMs: config.retry_max_delay_ms,
      deleteRemote: config.delete_remote,
    });
  }

  get watchedRoots(): ResolvedRoots {
    return { available: [...this.roots.available], unavailable: [...this.roots.unavailable] };
  }

  /**
   * Resolve roots, load the manifest, and start draining the queue.
   */
  async start(): Promise<void> {
    this.roots = await resolveRoots(this.config.sync_dirs);
    this.loadManifest();

    // Keep entries of roots that are configured but currently missing
    this.manifest.pruneOrphans([...this.roots.available, ...this.roots.unavailable]);

    this.schedulerLoop = this.scheduler.run(this.queue);
  }

  /**
   * Load persisted state. A manifest that cannot be interpreted is discarded:
   * every file is then detected as new and verified by a fresh upload.
   */
  private loadManifest(): void {
    try {
      const entries = this.manifest.load();
      logger.info(`Loaded manifest with ${entries.size} entries`);
    } catch (error) {
      if (!(error instanceof CorruptManifestError)) throw error;
      logger.warn(`${error.message}; discarding manifest and rescanning all roots`);
      this.manifest.clear();
    }
  }

  // ==========================================================================
  // Reconciliation
  // ==========================================================================

  private scanOptions(): ScanOptions {
    return {
      followSymlinks: this.config.follow_symlinks,
      excludePatterns: this.excludePatterns,
    };
  }

  /** Available roots that the watcher has not marked degraded */
  private healthyRoots(): string[] {
    const degraded = new Set(this.watcher?.degradedRoots ?? []);
    return this.roots.available.filter((root) => !degraded.has(root));
  }

  /**
   * Scan roots against a manifest snapshot and enqueue every difference.
   * An unreadable root is skipped; the others are still scanned.
   * Returns the number of events queued.
   */
  async reconcile(roots: readonly string[] = this.healthyRoots()): Promise<number> {
    const snapshot = this.manifest.snapshot();
    const options = this.scanOptions();
    let queued = 0;

    for (const root of roots) {
      try {
        for await (const event of scanRoot(root, snapshot, options)) {
          if (!this.queue.push(event)) return queued;
          queued++;
        }
      } catch (error) {
        if (!(error instanceof WatchedRootUnavailableError)) throw error;
        logger.warn(`Skipping reconciliation of ${root}: ${getErrorMessage(error.cause)}`);
      }
    }

    logger.info(`Reconciliation queued ${queued} change(s) across ${roots.length} root(s)`);
    return queued;
  }

  /**
   * Start a reconciliation unless one is already running.
   */
  requestReconcile(roots?: readonly string[]): void {
    if (this.stopped || this.reconciling) {
      logger.debug('Reconciliation already in progress');
      return;
    }
    this.reconciling = this.reconcile(roots)
      .catch((error: unknown) => {
        logger.error(`Reconciliation failed: ${getErrorMessage(error)}`);
        return 0;
      })
      .finally(() => {
        this.reconciling = null;
      });
  }

  setExcludePatterns(patterns: string[]): void {
    this.excludePatterns = patterns;
    this.watcher?.setExcludePatterns(patterns);
    logger.info(`Exclusion patterns updated (${patterns.length} active)`);
  }

  // ==========================================================================
  // Modes
  // ==========================================================================

  /**
   * Reconcile every root once and wait until every resulting task has
   * finished (including retries).
   */
  async runOnce(): Promise<void> {
    await this.start();
    const queued = await this.reconcile();
    if (queued === 0) {
      logger.info('No changes to sync');
    }
    await this.scheduler.drain();
    logger.info(`Sync complete: ${JSON.stringify(this.scheduler.stats())}`);
  }

  /**
   * Start the watcher first so nothing that changes during the initial scan
   * is missed, then reconcile and keep reconciling periodically.
   */
  async startWatching(): Promise<void> {
    await this.start();

    this.watcher = new LiveWatcher({
      backend:
        this.backend ??
        selectBackend(this.config.watcher, { followSymlinks: this.config.follow_symlinks }),
      excludePatterns: this.excludePatterns,
      debounceMs: this.config.debounce_ms,
      probeIntervalMs: this.config.resubscribe_interval_ms,
      onRecovered: (root) => {
        if (!this.roots.available.includes(root)) {
          this.roots.available.push(root);
          this.roots.unavailable = this.roots.unavailable.filter((r) => r !== root);
        }
        this.requestReconcile([root]);
      },
    });
    await this.watcher.start([...this.roots.available, ...this.roots.unavailable], this.queue);

    this.requestReconcile();

    if (this.config.reconcile_interval_ms > 0) {
      this.reconcileTimer = setInterval(() => {
        logger.debug('Periodic reconciliation');
        this.requestReconcile();
      }, this.config.reconcile_interval_ms);
    }
  }

  /**
   * Stop watching, then give in-flight uploads `graceMs` before cancelling.
   */
  async stop(graceMs: number = this.config.shutdown_grace_ms): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }
    await this.watcher?.stop();
    await this.scheduler.stop(graceMs);
    await this.reconciling;
    await this.schedulerLoop;
    logger.info('Sync engine stopped');
  }
}

// ============================================================================
// Event Logging
// ============================================================================

function logSyncEvent(event: SyncEvent): void {
  switch (event.type) {
    case 'status':
      logger.debug(`[status] ${event.path}: ${event.from ?? 'new'} -> ${event.to}`);
      break;
    case 'failed':
      logger.error(`[failed] ${event.path} after ${event.failureCount} attempt(s): ${event.error}`);
      break;
    case 'discarded':
      logger.info(`[discarded] ${event.path}: ${event.reason}`);
      break;
    case 'root-degraded':
      logger.warn(`[degraded] ${event.root}: ${event.error}`);
      break;
    case 'root-recovered':
      logger.info(`[recovered] ${event.root}`);
      break;
  }
}

// ============================================================================
// One-Shot Sync
// ============================================================================

/**
 * Run a one-shot sync: reconcile every root and upload what changed.
 */
export async function runOneShotSync(options: SyncOptions): Promise<void> {
  const engine = new SyncEngine(options);
  const detach = onSyncEvent(logSyncEvent);
  try {
    await engine.runOnce();
  } finally {
    await engine.stop();
    detach();
  }
}

// ============================================================================
// Watch Mode
// ============================================================================

/**
 * Run in watch mode until a stop signal, SIGINT or SIGTERM.
 */
export async function runWatchMode(options: SyncOptions): Promise<void> {
  const engine = new SyncEngine(options);
  const detach = onSyncEvent(logSyncEvent);

  const handlePause = (): void => {
    setFlag(FLAGS.PAUSED);
    engine.scheduler.pause();
  };
  const handleResume = (): void => {
    clearFlag(FLAGS.PAUSED);
    engine.scheduler.resume();
  };
  const handleReconcile = (): void => {
    logger.info('Reconcile signal received');
    engine.requestReconcile();
  };

  // Check if we were paused before restart
  if (isPaused()) {
    engine.scheduler.pause();
    logger.info('Sync is paused (restored from previous state)');
  }

  registerSignalHandler(SIGNALS.PAUSE, handlePause);
  registerSignalHandler(SIGNALS.RESUME, handleResume);
  registerSignalHandler(SIGNALS.RECONCILE, handleReconcile);

  // Wire up config change handlers
  onConfigChange('sync_concurrency', () => {
    engine.scheduler.setConcurrency(getConfig().sync_concurrency);
  });
  onConfigChange('exclude_patterns', () => {
    engine.setExcludePatterns(getExcludePatterns(getConfig()));
  });

  try {
    await engine.startWatching();
    logger.info('Watching for file changes... (press Ctrl+C to exit)');

    // Wait for stop signal
    await new Promise<void>((resolve) => {
      const finish = (reason: string): void => {
        logger.info(`${reason}, shutting down...`);
        unregisterSignalHandler(SIGNALS.STOP, handleStop);
        process.off('SIGINT', handleSigint);
        process.off('SIGTERM', handleSigterm);
        resolve();
      };
      const handleStop = (): void => finish('Stop signal received');
      const handleSigint = (): void => finish('Ctrl+C received');
      const handleSigterm = (): void => finish('SIGTERM received');

      registerSignalHandler(SIGNALS.STOP, handleStop);
      process.once('SIGINT', handleSigint);
      process.once('SIGTERM', handleSigterm);
    });
  } finally {
    unregisterSignalHandler(SIGNALS.PAUSE, handlePause);
    unregisterSignalHandler(SIGNALS.RESUME, handleResume);
    unregisterSignalHandler(SIGNALS.RECONCILE, handleReconcile);
    await engine.stop();
    detach();
  }
}
