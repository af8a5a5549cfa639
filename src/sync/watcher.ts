/**
 * Live Watcher
 *
 * Subscribes every watched root through a WatchBackend, debounces raw changes
 * per path, and feeds the result into the change queue. Roots that vanish or
 * whose subscription breaks are marked degraded and probed until they return;
 * a recovered root is handed back to the engine for a reconciliation scan.
 */

import { stat } from 'fs/promises';
import { WatchedRootUnavailableError, getErrorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { RawChange, Subscription, WatchBackend } from './backends/types.js';
import { RESUBSCRIBE_INTERVAL_MS, WATCHER_DEBOUNCE_MS } from './constants.js';
import { emitSyncEvent } from './events.js';
import { isPathExcluded } from './exclusions.js';
import { coalesceKinds, type ChangeKind, type EventQueue } from './queue.js';

// ============================================================================
// Types
// ============================================================================

export interface LiveWatcherOptions {
  backend: WatchBackend;
  excludePatterns: readonly string[];
  debounceMs?: number;
  probeIntervalMs?: number;
  /** Called after a degraded root is subscribed again */
  onRecovered?: (root: string) => void;
}

interface PendingChange {
  root: string;
  kind: ChangeKind;
  timer: NodeJS.Timeout;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

// ============================================================================
// Live Watcher
// ============================================================================

export class LiveWatcher {
  private readonly backend: WatchBackend;
  private readonly debounceMs: number;
  private readonly probeIntervalMs: number;
  private readonly onRecovered?: (root: string) => void;
  private excludePatterns: readonly string[];

  private roots: string[] = [];
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly degraded = new Set<string>();
  private readonly pending = new Map<string, PendingChange>();
  private probeTimer: NodeJS.Timeout | null = null;
  private probing = false;
  private queue: EventQueue | null = null;
  private stopped = false;

  constructor(options: LiveWatcherOptions) {
    this.backend = options.backend;
    this.excludePatterns = options.excludePatterns;
    this.debounceMs = options.debounceMs ?? WATCHER_DEBOUNCE_MS;
    this.probeIntervalMs = options.probeIntervalMs ?? RESUBSCRIBE_INTERVAL_MS;
    this.onRecovered = options.onRecovered;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /** Roots currently without a working subscription */
  get degradedRoots(): string[] {
    return [...this.degraded];
  }

  /**
   * Subscribe every root. A root that cannot be subscribed starts degraded;
   * it does not prevent the others from being watched.
   */
  async start(roots: readonly string[], queue: EventQueue): Promise<void> {
    this.roots = [...roots];
    this.queue = queue;

    await Promise.all(
      this.roots.map(async (root) => {
        if (!(await isDirectory(root))) {
          this.degrade(root, new WatchedRootUnavailableError(root));
          return;
        }
        try {
          await this.subscribeRoot(root);
        } catch (error) {
          this.degrade(root, error);
        }
      })
    );

    this.probeTimer = setInterval(() => {
      this.probeRoots().catch((error: unknown) => {
        logger.error(`Root probe failed: ${getErrorMessage(error)}`);
      });
    }, this.probeIntervalMs);

    logger.info(`Watching ${this.subscriptions.size} root(s) for changes (${this.backend.name})`);
  }

  setExcludePatterns(patterns: readonly string[]): void {
    this.excludePatterns = patterns;
  }

  private async subscribeRoot(root: string): Promise<void> {
    const subscription = await this.backend.subscribe(root, {
      onChange: (change) => this.handleChange(root, change),
      onError: (error) => this.degrade(root, error),
      isExcluded: (path) => isPathExcluded(path, root, this.excludePatterns),
    });

    if (this.stopped) {
      await subscription.close();
      return;
    }
    this.subscriptions.set(root, subscription);
    logger.debug(`Subscribed to ${root}`);
  }

  // ==========================================================================
  // Debounce
  // ==========================================================================

  private handleChange(root: string, change: RawChange): void {
    if (this.stopped || this.degraded.has(root)) return;
    if (isPathExcluded(change.path, root, this.excludePatterns)) return;

    const existing = this.pending.get(change.path);
    if (existing) clearTimeout(existing.timer);

    const kind = existing ? coalesceKinds(existing.kind, change.kind) : change.kind;
    const timer = setTimeout(() => this.flush(change.path), this.debounceMs);
    this.pending.set(change.path, { root, kind, timer });
  }

  private flush(path: string): void {
    const change = this.pending.get(path);
    if (!change) return;
    this.pending.delete(path);

    logger.debug(`[watch] ${change.kind}: ${path}`);
    this.queue?.push({
      path,
      root: change.root,
      kind: change.kind,
      observedAt: new Date(),
      source: 'watch',
    });
  }

  // ==========================================================================
  // Root Health
  // ==========================================================================

  private degrade(root: string, error: unknown): void {
    if (this.stopped || this.degraded.has(root)) return;
    this.degraded.add(root);

    const subscription = this.subscriptions.get(root);
    this.subscriptions.delete(root);
    subscription?.close().catch((closeError: unknown) => {
      logger.debug(`Failed to close subscription for ${root}: ${getErrorMessage(closeError)}`);
    });

    const message = getErrorMessage(error);
    logger.warn(`Watched root degraded: ${root} (${message}); retrying every ${this.probeIntervalMs}ms`);
    emitSyncEvent({ type: 'root-degraded', root, error: message, timestamp: new Date() });
  }

  /**
   * Check every root once: healthy roots that disappeared are degraded,
   * degraded roots that are back are subscribed again.
   */
  async probeRoots(): Promise<void> {
    if (this.probing || this.stopped) return;
    this.probing = true;
    try {
      for (const root of this.roots) {
        const available = await isDirectory(root);

        if (!this.degraded.has(root)) {
          if (!available) this.degrade(root, new WatchedRootUnavailableError(root));
          continue;
        }
        if (!available || this.stopped) continue;

        try {
          await this.subscribeRoot(root);
        } catch (error) {
          logger.debug(`Root ${root} still unavailable: ${getErrorMessage(error)}`);
          continue;
        }
        this.degraded.delete(root);
        logger.info(`Watched root recovered: ${root}`);
        emitSyncEvent({ type: 'root-recovered', root, timestamp: new Date() });
        this.onRecovered?.(root);
      }
    } finally {
      this.probing = false;
    }
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  /**
   * Stop watching. Changes still inside the debounce window are dropped;
   * the next reconciliation scan picks them up.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.probeTimer) {
      clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
    for (const change of this.pending.values()) clearTimeout(change.timer);
    this.pending.clear();

    const subscriptions = [...this.subscriptions.values()];
    this.subscriptions.clear();
    await Promise.all(subscriptions.map((subscription) => subscription.close()));
    await this.backend.close();
    logger.debug('Live watcher stopped');
  }
}
