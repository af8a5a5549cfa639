/**
 * Shared test fixtures: in-memory database, temp directories, and an
 * in-process object store.
 */

import { createHash } from 'crypto';
import { mkdtemp, readFile, realpath, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfig, type Config } from '../config.js';
import { openDatabase, type StateDatabase } from '../db/index.js';
import type { ObjectStoreClient, PutMetadata, PutResult } from '../s3/types.js';
import type {
  Subscription,
  SubscriptionListener,
  WatchBackend,
} from '../sync/backends/types.js';
import type { ChangeKind } from '../sync/queue.js';

export function createTestDb(): StateDatabase {
  return openDatabase(':memory:');
}

/** A fresh directory under the OS temp dir, as a real path */
export async function makeTempDir(prefix = 's3fs-test-'): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export function md5(content: string | Buffer): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * Write a file and pin its mtime so consecutive writes always look different.
 */
export async function writeFileAt(path: string, content: string, mtimeSeconds: number): Promise<void> {
  await writeFile(path, content);
  await utimes(path, mtimeSeconds, mtimeSeconds);
}

export function makeConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    sync_dirs: [],
    bucket: 'test-bucket',
    prefix: 'backup',
    retry_base_delay_ms: 1,
    retry_max_delay_ms: 10,
    debounce_ms: 20,
    reconcile_interval_ms: 0,
    shutdown_grace_ms: 0,
    watcher: 'chokidar',
    ...overrides,
  });
}

/**
 * Resolve once `predicate` holds, polling every 5ms.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

// ============================================================================
// Fake Object Store
// ============================================================================

export interface RecordedPut {
  localPath: string;
  remoteKey: string;
  checksum: string;
  size: number;
}

/**
 * ObjectStoreClient that keeps objects in memory. Confirms the MD5 of the
 * bytes it actually read, like S3's ETag.
 */
export class FakeObjectStore implements ObjectStoreClient {
  readonly objects = new Map<string, Buffer>();
  readonly puts: RecordedPut[] = [];
  readonly deletes: string[] = [];
  /** Errors thrown by the next put calls, in order */
  readonly failures: Error[] = [];
  /** Errors thrown by the next exists calls, in order */
  readonly existsFailures: Error[] = [];
  readonly existsChecks: string[] = [];
  /** Checksum to confirm instead of the real one */
  confirmOverride: string | null = null;
  /** Runs after the body was read, before the put resolves */
  onPut: ((localPath: string, attempt: number) => Promise<void> | void) | null = null;
  /** Make puts wait until aborted */
  hang = false;

  private inFlight = new Map<string, number>();
  maxInFlightPerPath = 0;
  maxInFlight = 0;
  private totalInFlight = 0;

  async put(localPath: string, remoteKey: string, metadata: PutMetadata): Promise<PutResult> {
    const current = (this.inFlight.get(localPath) ?? 0) + 1;
    this.inFlight.set(localPath, current);
    this.maxInFlightPerPath = Math.max(this.maxInFlightPerPath, current);
    this.totalInFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.totalInFlight);

    try {
      const failure = this.failures.shift();
      if (failure) throw failure;

      if (this.hang) {
        await new Promise<never>((_, reject) => {
          metadata.signal?.addEventListener('abort', () => {
            const error = new Error('The operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        });
      }

      const body = await readFile(localPath);
      this.objects.set(remoteKey, body);
      this.puts.push({ localPath, remoteKey, checksum: metadata.checksum, size: metadata.size });
      await this.onPut?.(localPath, this.puts.length);

      return { checksum: this.confirmOverride ?? md5(body) };
    } finally {
      this.inFlight.set(localPath, (this.inFlight.get(localPath) ?? 1) - 1);
      this.totalInFlight--;
    }
  }

  async exists(remoteKey: string, checksum: string): Promise<boolean> {
    this.existsChecks.push(remoteKey);
    const existsFailure = this.existsFailures.shift();
    if (existsFailure) throw existsFailure;

    const body = this.objects.get(remoteKey);
    if (!body) return false;
    return (this.confirmOverride ?? md5(body)) === checksum;
  }

  async delete(remoteKey: string): Promise<void> {
    this.deletes.push(remoteKey);
    this.objects.delete(remoteKey);
  }
}

// ============================================================================
// Fake Watch Backend
// ============================================================================

/**
 * WatchBackend driven by the test: changes and failures are injected by hand.
 */
export class FakeWatchBackend implements WatchBackend {
  readonly name = 'fake';
  readonly listeners = new Map<string, SubscriptionListener>();
  /** Roots whose next subscribe calls fail */
  readonly unsubscribable = new Set<string>();
  subscribeCount = 0;
  closed = false;

  async subscribe(root: string, listener: SubscriptionListener): Promise<Subscription> {
    this.subscribeCount++;
    if (this.unsubscribable.has(root)) {
      throw new Error(`cannot watch ${root}`);
    }
    this.listeners.set(root, listener);
    return {
      close: async () => {
        if (this.listeners.get(root) === listener) this.listeners.delete(root);
      },
    };
  }

  emit(root: string, path: string, kind: ChangeKind): void {
    this.listeners.get(root)?.onChange({ path, kind });
  }

  fail(root: string, error: Error): void {
    this.listeners.get(root)?.onError(error);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
