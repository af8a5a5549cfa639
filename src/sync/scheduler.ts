/**
 * Upload Scheduler
 *
 * Drains the change queue with bounded concurrency. At most one task is in
 * flight per path; events that arrive for a busy path wait in `deferred` and
 * are coalesced until it finishes. The manifest is the only durable state:
 * an entry becomes synced only after the store confirms the checksum AND the
 * file still matches what was hashed.
 */

import { stat } from 'fs/promises';
import type { Stats } from 'fs';
import { ManifestStatus } from '../db/schema.js';
import {
  ChecksumMismatchError,
  ErrorCategory,
  categorizeError,
  getErrorMessage,
  isNotFoundError,
} from '../errors.js';
import { logger } from '../logger.js';
import type { ObjectStoreClient } from '../s3/types.js';
import { computeChecksum } from './checksum.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_SYNC_CONCURRENCY,
  JITTER_FACTOR,
  RETRY_BACKOFF_FACTOR,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
} from './constants.js';
import { emitSyncEvent } from './events.js';
import type { ManifestEntry, ManifestStore } from './manifest.js';
import { ChangeKind, coalesceEvents, type ChangeEvent, type EventQueue } from './queue.js';

// ============================================================================
// Types
// ============================================================================

export interface SchedulerOptions {
  manifest: ManifestStore;
  store: ObjectStoreClient;
  /** Maps a local file to its object key */
  remoteKeyFor: (root: string, path: string) => string;
  concurrency?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Delete the remote object when the local file is removed */
  deleteRemote?: boolean;
}

export interface SchedulerStats {
  uploaded: number;
  skipped: number;
  removed: number;
  failed: number;
  discarded: number;
  retried: number;
  queued: number;
  active: number;
  deferred: number;
  retrying: number;
}

interface ActiveTask {
  promise: Promise<void>;
  controller: AbortController;
}

type Counter = 'uploaded' | 'skipped' | 'removed' | 'failed' | 'discarded' | 'retried';

// ============================================================================
// Retry Timing
// ============================================================================

/**
 * Delay before retry number `failureCount` (1-based): base * 4^(n-1),
 * capped at maxMs, with ±25% jitter.
 */
export function computeRetryDelay(
  failureCount: number,
  baseMs: number = RETRY_BASE_DELAY_MS,
  maxMs: number = RETRY_MAX_DELAY_MS,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, failureCount - 1);
  const baseDelay = Math.min(maxMs, baseMs * RETRY_BACKOFF_FACTOR ** exponent);
  const jitter = baseDelay * JITTER_FACTOR * (random() * 2 - 1);
  return Math.min(maxMs, Math.max(1, Math.round(baseDelay + jitter)));
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

// ============================================================================
// Upload Scheduler
// ============================================================================

export class UploadScheduler {
  private readonly manifest: ManifestStore;
  private readonly store: ObjectStoreClient;
  private readonly remoteKeyFor: (root: string, path: string) => string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly deleteRemote: boolean;
  private concurrency: number;

  /** Active tasks: path -> task */
  private readonly activeTasks = new Map<string, ActiveTask>();
  /** Latest event for a path whose task is still running */
  private readonly deferred = new Map<string, ChangeEvent>();
  private readonly retryTimers = new Map<string, NodeJS.Timeout>();
  /** Paths that already used their one checksum-mismatch retry */
  private readonly mismatchRetried = new Set<string>();

  private readonly counters: Record<Counter, number> = {
    uploaded: 0,
    skipped: 0,
    removed: 0,
    failed: 0,
    discarded: 0,
    retried: 0,
  };

  private queue: EventQueue | null = null;
  private slotWaiters: (() => void)[] = [];
  private idleWaiters: (() => void)[] = [];
  private paused = false;
  private stopping = false;

  constructor(options: SchedulerOptions) {
    this.manifest = options.manifest;
    this.store = options.store;
    this.remoteKeyFor = options.remoteKeyFor;
    this.concurrency = options.concurrency ?? DEFAULT_SYNC_CONCURRENCY;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? RETRY_MAX_DELAY_MS;
    this.deleteRemote = options.deleteRemote ?? false;
  }

  // ==========================================================================
  // Run Loop
  // ==========================================================================

  /**
   * Consume the queue until it is closed. Resolves once the loop exits;
   * tasks still in flight are awaited by stop().
   */
  async run(queue: EventQueue): Promise<void> {
    this.queue = queue;
    while (!this.stopping) {
      await this.waitForSlot();
      if (this.stopping) break;
      if (!(await queue.wait())) break;
      // Paused or resized while waiting for an event
      if (!this.hasSlot()) continue;

      // shift + dispatch run in the same tick so the event is never invisible to drain()
      const event = queue.shift();
      if (event) this.dispatch(event);
    }
  }

  private hasSlot(): boolean {
    return !this.paused && this.activeTasks.size < this.concurrency;
  }

  private async waitForSlot(): Promise<void> {
    while (!this.stopping && !this.hasSlot()) {
      await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
    }
  }

  private notifySlot(): void {
    const waiters = this.slotWaiters;
    this.slotWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private dispatch(event: ChangeEvent): void {
    const { path } = event;

    if (this.retryTimers.has(path)) {
      // The pending retry already covers a rescan; a live change supersedes it
      if (event.source === 'scan') return;
      this.cancelRetry(path);
    }

    if (this.activeTasks.has(path)) {
      this.defer(event);
      return;
    }

    const controller = new AbortController();
    const promise = this.processEvent(event, controller.signal)
      .catch((error: unknown) => {
        logger.error(`Unexpected error processing ${path}: ${getErrorMessage(error)}`);
      })
      .finally(() => this.finishTask(path));
    this.activeTasks.set(path, { promise, controller });
  }

  /** Hold an event until the path's current task finishes */
  private defer(event: ChangeEvent): void {
    const previous = this.deferred.get(event.path);
    this.deferred.set(event.path, previous ? coalesceEvents(previous, event) : event);
    logger.debug(`Deferred ${event.kind} for ${event.path}: task in flight`);
  }

  private finishTask(path: string): void {
    this.activeTasks.delete(path);

    const next = this.deferred.get(path);
    if (next) {
      this.deferred.delete(path);
      if (!this.stopping) this.queue?.push(next);
    }

    this.notifySlot();
    this.checkIdle();
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  private async processEvent(event: ChangeEvent, signal: AbortSignal): Promise<void> {
    if (event.kind === ChangeKind.REMOVED) {
      await this.processRemoval(event, signal);
    } else {
      await this.processUpload(event, signal);
    }
  }

  private async processUpload(event: ChangeEvent, signal: AbortSignal): Promise<void> {
    const { path, root } = event;

    let before: Stats | null;
    try {
      before = await statOrNull(path);
    } catch (error) {
      this.recordFailure(event, this.pendingEntry(event, null), error);
      return;
    }
    if (!before) {
      await this.processRemoval({ ...event, kind: ChangeKind.REMOVED }, signal);
      return;
    }
    if (!before.isFile()) {
      logger.debug(`Skipping non-file: ${path}`);
      return;
    }

    const prior = this.manifest.get(path);
    if (
      prior?.status === ManifestStatus.SYNCED &&
      prior.size === before.size &&
      prior.modifiedAt === before.mtimeMs
    ) {
      this.counters.skipped++;
      logger.debug(`Unchanged: ${path}`);
      return;
    }

    if (event.source !== 'retry') this.mismatchRetried.delete(path);
    const attempt = this.pendingEntry(event, before);
    this.manifest.upsert(attempt);

    const remoteKey = this.remoteKeyFor(root, path);
    let checksum: string;
    let alreadyStored = false;
    try {
      checksum = await computeChecksum(path, signal);
      // After a mismatch the stored object is suspect: always upload again
      if (!this.mismatchRetried.has(path)) {
        alreadyStored = await this.isAlreadyStored(remoteKey, checksum, signal);
      }
      if (!alreadyStored) {
        logger.info(`Uploading: ${path} -> ${remoteKey}`);
        const result = await this.store.put(path, remoteKey, {
          checksum,
          size: before.size,
          modifiedAt: before.mtimeMs,
          signal,
        });
        if (result.checksum !== checksum) {
          throw new ChecksumMismatchError(checksum, result.checksum);
        }
      }
    } catch (error) {
      if (signal.aborted) {
        logger.info(`Upload of ${path} cancelled; left pending`);
        return;
      }
      this.recordFailure(event, attempt, error);
      return;
    }

    if (signal.aborted) return;

    // The bytes the store holds must still be the file's bytes
    let after: Stats | null;
    try {
      after = await statOrNull(path);
    } catch (error) {
      this.recordFailure(event, attempt, error);
      return;
    }
    if (!after || after.size !== before.size || after.mtimeMs !== before.mtimeMs) {
      this.counters.discarded++;
      const reason = after ? 'file changed during upload' : 'file removed during upload';
      logger.info(`Discarding result for ${path}: ${reason}`);
      emitSyncEvent({ type: 'discarded', path, reason, timestamp: new Date() });
      this.defer({
        ...event,
        kind: after ? ChangeKind.MODIFIED : ChangeKind.REMOVED,
        observedAt: new Date(),
        source: 'watch',
      });
      return;
    }

    this.manifest.upsert({
      ...attempt,
      checksum,
      status: ManifestStatus.SYNCED,
      failureCount: 0,
      lastError: null,
    });
    this.mismatchRetried.delete(path);
    if (alreadyStored) {
      this.counters.skipped++;
      logger.info(`Already stored: ${path} (${checksum})`);
    } else {
      this.counters.uploaded++;
      logger.info(`Synced: ${path} (${checksum})`);
    }
  }

  /** A failed lookup only means the file is uploaded again */
  private async isAlreadyStored(
    remoteKey: string,
    checksum: string,
    signal: AbortSignal
  ): Promise<boolean> {
    try {
      return await this.store.exists(remoteKey, checksum, signal);
    } catch (error) {
      if (signal.aborted) throw error;
      logger.debug(`Could not check ${remoteKey} in the store: ${getErrorMessage(error)}`);
      return false;
    }
  }

  private async processRemoval(event: ChangeEvent, signal: AbortSignal): Promise<void> {
    const { path, root } = event;

    // Delete+recreate can surface as a removal of a file that exists again
    let current: Stats | null;
    try {
      current = await statOrNull(path);
    } catch (error) {
      logger.warn(`Cannot confirm removal of ${path}: ${getErrorMessage(error)}`);
      return;
    }
    if (current?.isFile()) {
      await this.processUpload({ ...event, kind: ChangeKind.MODIFIED }, signal);
      return;
    }

    if (!this.manifest.get(path)) {
      logger.debug(`Removed untracked file: ${path}`);
      return;
    }

    if (this.deleteRemote) {
      const remoteKey = this.remoteKeyFor(root, path);
      try {
        await this.store.delete(remoteKey);
        logger.info(`Deleted remote object: ${remoteKey}`);
      } catch (error) {
        logger.error(`Failed to delete ${remoteKey}: ${getErrorMessage(error)}; entry kept`);
        return;
      }
    }

    this.manifest.remove(path);
    this.mismatchRetried.delete(path);
    this.counters.removed++;
    logger.info(`Removed: ${path}`);
  }

  /**
   * The pending_upload entry written before an attempt. A fresh change
   * starts the failure count over; a retry carries it forward.
   */
  private pendingEntry(event: ChangeEvent, stats: Stats | null): ManifestEntry {
    const prior = this.manifest.get(event.path);
    const isRetry = event.source === 'retry';
    return {
      path: event.path,
      root: event.root,
      size: stats?.size ?? prior?.size ?? 0,
      modifiedAt: stats?.mtimeMs ?? prior?.modifiedAt ?? 0,
      checksum: prior?.checksum ?? null,
      status: ManifestStatus.PENDING_UPLOAD,
      lastAttemptAt: new Date(),
      failureCount: isRetry ? (prior?.failureCount ?? 0) : 0,
      lastError: isRetry ? (prior?.lastError ?? null) : null,
    };
  }

  // ==========================================================================
  // Failures and Retries
  // ==========================================================================

  private recordFailure(event: ChangeEvent, attempt: ManifestEntry, error: unknown): void {
    const { path } = event;
    const category = categorizeError(error);
    const message = getErrorMessage(error);

    if (category === ErrorCategory.LOCAL_NOT_FOUND) {
      logger.info(`File vanished during upload: ${path}`);
      this.defer({ ...event, kind: ChangeKind.REMOVED, observedAt: new Date(), source: 'watch' });
      return;
    }

    const failureCount = attempt.failureCount + 1;
    let retryable = category !== ErrorCategory.PERSISTENT;
    if (category === ErrorCategory.CHECKSUM_MISMATCH) {
      retryable = !this.mismatchRetried.has(path);
      this.mismatchRetried.add(path);
    }

    // A newer change is already waiting, or we are shutting down: stay pending
    if (this.deferred.has(path) || (this.stopping && retryable)) {
      this.manifest.upsert({ ...attempt, failureCount, lastError: message });
      logger.warn(`Upload of ${path} failed: ${message}`);
      return;
    }

    if (retryable && failureCount < this.maxRetries) {
      this.manifest.upsert({ ...attempt, failureCount, lastError: message });
      this.scheduleRetry(event, failureCount, message);
      return;
    }

    this.manifest.upsert({
      ...attempt,
      status: ManifestStatus.FAILED,
      failureCount,
      lastError: message,
    });
    this.mismatchRetried.delete(path);
    this.counters.failed++;
    logger.error(`Upload of ${path} failed permanently after ${failureCount} attempt(s): ${message}`);
    emitSyncEvent({ type: 'failed', path, failureCount, error: message, timestamp: new Date() });
  }

  private scheduleRetry(event: ChangeEvent, failureCount: number, message: string): void {
    const { path } = event;
    const delayMs = computeRetryDelay(failureCount, this.retryBaseDelayMs, this.retryMaxDelayMs);
    logger.warn(
      `Upload of ${path} failed (${failureCount}/${this.maxRetries}): ${message}; retrying in ${delayMs}ms`
    );

    const timer = setTimeout(() => {
      this.retryTimers.delete(path);
      this.queue?.push({ ...event, observedAt: new Date(), source: 'retry' });
      this.checkIdle();
    }, delayMs);
    this.retryTimers.set(path, timer);
    this.counters.retried++;
  }

  private cancelRetry(path: string): void {
    const timer = this.retryTimers.get(path);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(path);
    }
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  /** Update the concurrency bound; takes effect for the next dispatch */
  setConcurrency(value: number): void {
    this.concurrency = value;
    logger.info(`Sync concurrency updated to ${value}`);
    this.notifySlot();
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    logger.info('Uploads paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    logger.info('Uploads resumed');
    this.notifySlot();
  }

  get isPaused(): boolean {
    return this.paused;
  }

  private isIdle(): boolean {
    return (
      (this.queue?.size ?? 0) === 0 &&
      this.activeTasks.size === 0 &&
      this.deferred.size === 0 &&
      this.retryTimers.size === 0
    );
  }

  private checkIdle(): void {
    if (!this.isIdle() && !this.stopping) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /**
   * Resolve once nothing is queued, running, deferred or waiting to retry.
   * Used by one-shot mode after the reconciliation scan.
   */
  drain(): Promise<void> {
    if (this.isIdle() || this.stopping) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop dispatching, drop queued work, and give in-flight tasks `graceMs`
   * to finish before cancelling them. Cancelled entries stay pending_upload.
   */
  async stop(graceMs: number): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    this.queue?.close();
    for (const timer of this.retryTimers.values()) clearTimeout(timer);
    this.retryTimers.clear();
    this.deferred.clear();
    this.notifySlot();

    const tasks = [...this.activeTasks.values()];
    if (tasks.length > 0) {
      logger.info(`Waiting up to ${graceMs}ms for ${tasks.length} in-flight task(s)...`);
      let timer: NodeJS.Timeout | undefined;
      const finished = await Promise.race([
        Promise.all(tasks.map((task) => task.promise)).then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), graceMs);
        }),
      ]);
      clearTimeout(timer);

      if (!finished) {
        logger.warn(`Cancelling ${this.activeTasks.size} in-flight task(s)`);
        for (const task of this.activeTasks.values()) task.controller.abort();
        await Promise.all(tasks.map((task) => task.promise));
      }
    }
    this.mismatchRetried.clear();

    this.checkIdle();
  }

  stats(): SchedulerStats {
    return {
      ...this.counters,
      queued: this.queue?.size ?? 0,
      active: this.activeTasks.size,
      deferred: this.deferred.size,
      retrying: this.retryTimers.size,
    };
  }
}
