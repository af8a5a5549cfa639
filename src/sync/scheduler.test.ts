import { rm } from 'fs/promises';
import { join, relative } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { StateDatabase } from '../db/index.js';
import { ManifestStatus } from '../db/schema.js';
import { PersistentStoreError, TransientStoreError } from '../errors.js';
import {
  FakeObjectStore,
  createTestDb,
  makeTempDir,
  md5,
  removeTempDir,
  waitFor,
  writeFileAt,
} from '../test/helpers.js';
import { onSyncEvent, type SyncEvent } from './events.js';
import { ManifestStore } from './manifest.js';
import { ChangeKind, EventQueue, type ChangeSource } from './queue.js';
import { UploadScheduler, computeRetryDelay, type SchedulerOptions } from './scheduler.js';

describe('computeRetryDelay', () => {
  const noJitter = () => 0.5;

  it('grows by a factor of four per failure', () => {
    expect(computeRetryDelay(1, 1000, 300_000, noJitter)).toBe(1000);
    expect(computeRetryDelay(2, 1000, 300_000, noJitter)).toBe(4000);
    expect(computeRetryDelay(3, 1000, 300_000, noJitter)).toBe(16000);
  });

  it('is capped at the maximum delay', () => {
    expect(computeRetryDelay(10, 1000, 300_000, noJitter)).toBe(300_000);
    expect(computeRetryDelay(10, 1000, 300_000, () => 1)).toBe(300_000);
  });

  it('jitters by up to a quarter either way', () => {
    expect(computeRetryDelay(1, 1000, 300_000, () => 1)).toBe(1250);
    expect(computeRetryDelay(1, 1000, 300_000, () => 0)).toBe(750);
  });
});

describe('UploadScheduler', () => {
  let root: string;
  let state: StateDatabase;
  let manifest: ManifestStore;
  let store: FakeObjectStore;
  let queue: EventQueue;
  let scheduler: UploadScheduler;
  let running: Promise<void>;
  let events: SyncEvent[];
  let detach: () => void;

  function start(options: Partial<SchedulerOptions> = {}): void {
    scheduler = new UploadScheduler({
      manifest,
      store,
      remoteKeyFor: (watchedRoot, path) => `backup/${relative(watchedRoot, path)}`,
      maxRetries: 3,
      retryBaseDelayMs: 1,
      retryMaxDelayMs: 10,
      ...options,
    });
    running = scheduler.run(queue);
  }

  function push(name: string, kind: ChangeKind = ChangeKind.CREATED, source: ChangeSource = 'watch') {
    queue.push({ path: join(root, name), root, kind, observedAt: new Date(), source });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    state = createTestDb();
    manifest = new ManifestStore(state.db);
    manifest.load();
    store = new FakeObjectStore();
    queue = new EventQueue();
    events = [];
    detach = onSyncEvent((event) => events.push(event));
  });

  afterEach(async () => {
    detach();
    await scheduler.stop(0);
    await running;
    state.sqlite.close();
    await removeTempDir(root);
  });

  it('uploads a new file and records the confirmed checksum', async () => {
    await writeFileAt(join(root, 'a.txt'), '0123456789', 1_700_000_000);
    start();

    push('a.txt');
    await scheduler.drain();

    expect(manifest.get(join(root, 'a.txt'))).toMatchObject({
      root,
      size: 10,
      checksum: '781e5e245d69b566979b86e28d23f2c7',
      status: ManifestStatus.SYNCED,
      failureCount: 0,
      lastError: null,
    });
    expect(store.objects.get('backup/a.txt')?.toString()).toBe('0123456789');
    expect(scheduler.stats()).toMatchObject({ uploaded: 1, failed: 0, active: 0 });
  });

  it('skips a file whose manifest entry already matches', async () => {
    await writeFileAt(join(root, 'a.txt'), '0123456789', 1_700_000_000);
    start();

    push('a.txt');
    await scheduler.drain();
    push('a.txt', ChangeKind.MODIFIED);
    await scheduler.drain();

    expect(store.puts).toHaveLength(1);
    expect(scheduler.stats()).toMatchObject({ uploaded: 1, skipped: 1 });
  });

  it('records a file the store already holds without uploading it', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.objects.set('backup/a.txt', Buffer.from('0123456789'));
    start();

    push('a.txt');
    await scheduler.drain();

    expect(store.puts).toEqual([]);
    expect(manifest.get(path)).toMatchObject({
      size: 10,
      checksum: md5('0123456789'),
      status: ManifestStatus.SYNCED,
    });
    expect(scheduler.stats()).toMatchObject({ uploaded: 0, skipped: 1 });
  });

  it('uploads over a stored object with different content', async () => {
    await writeFileAt(join(root, 'a.txt'), '0123456789', 1_700_000_000);
    store.objects.set('backup/a.txt', Buffer.from('older'));
    start();

    push('a.txt');
    await scheduler.drain();

    expect(store.puts).toHaveLength(1);
    expect(store.objects.get('backup/a.txt')?.toString()).toBe('0123456789');
    expect(scheduler.stats()).toMatchObject({ uploaded: 1, skipped: 0 });
  });

  it('uploads anyway when the store lookup fails', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.existsFailures.push(new TransientStoreError('HEAD timed out'));
    start();

    push('a.txt');
    await scheduler.drain();

    expect(store.puts).toHaveLength(1);
    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.SYNCED,
      failureCount: 0,
      lastError: null,
    });
  });

  it('a removal forgets that the path already used its mismatch retry', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.confirmOverride = 'ffffffffffffffffffffffffffffffff';
    start({ retryBaseDelayMs: 60_000, retryMaxDelayMs: 60_000 });

    push('a.txt');
    await waitFor(() => scheduler.stats().retrying === 1);

    await rm(path);
    push('a.txt', ChangeKind.REMOVED);
    await scheduler.drain();
    expect(manifest.get(path)).toBeUndefined();

    store.confirmOverride = null;
    await writeFileAt(path, '0123456789', 1_700_000_000);
    push('a.txt', ChangeKind.CREATED, 'retry');
    await scheduler.drain();

    expect(store.puts).toHaveLength(1);
    expect(manifest.get(path)?.status).toBe(ManifestStatus.SYNCED);
    expect(scheduler.stats()).toMatchObject({ uploaded: 0, skipped: 1, removed: 1 });
  });

  it('discards an upload when the file changes underneath it', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.onPut = async (_localPath, attempt) => {
      if (attempt === 1) await writeFileAt(path, '01234567890123456789', 1_700_000_100);
    };
    start();

    push('a.txt');
    await scheduler.drain();

    expect(store.puts.map((put) => put.size)).toEqual([10, 20]);
    expect(manifest.get(path)).toMatchObject({
      size: 20,
      checksum: md5('01234567890123456789'),
      status: ManifestStatus.SYNCED,
    });
    expect(events.filter((event) => event.type === 'discarded')).toEqual([
      {
        type: 'discarded',
        path,
        reason: 'file changed during upload',
        timestamp: expect.any(Date),
      },
    ]);
    expect(scheduler.stats()).toMatchObject({ uploaded: 1, discarded: 1 });
  });

  it('marks a file failed after exhausting its retries', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.failures.push(
      new TransientStoreError('network down'),
      new TransientStoreError('network down'),
      new TransientStoreError('network down')
    );
    start();

    push('a.txt');
    await scheduler.drain();

    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.FAILED,
      failureCount: 3,
      lastError: 'network down',
    });
    expect(events.filter((event) => event.type === 'failed')).toEqual([
      { type: 'failed', path, failureCount: 3, error: 'network down', timestamp: expect.any(Date) },
    ]);
    expect(scheduler.stats()).toMatchObject({ failed: 1, retried: 2, uploaded: 0 });
  });

  it('a fresh change to a failed file starts its failure count over', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.failures.push(new PersistentStoreError('AccessDenied: denied'));
    start();

    push('a.txt');
    await scheduler.drain();
    expect(manifest.get(path)).toMatchObject({ status: ManifestStatus.FAILED, failureCount: 1 });

    await writeFileAt(path, 'fixed', 1_700_000_100);
    push('a.txt', ChangeKind.MODIFIED);
    await scheduler.drain();

    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.SYNCED,
      checksum: md5('fixed'),
      failureCount: 0,
      lastError: null,
    });
  });

  it('persistent errors fail without retrying', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.failures.push(new PersistentStoreError('AccessDenied: denied'));
    start();

    push('a.txt');
    await scheduler.drain();

    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.FAILED,
      failureCount: 1,
      lastError: 'AccessDenied: denied',
    });
    expect(scheduler.stats()).toMatchObject({ failed: 1, retried: 0 });
  });

  it('a checksum mismatch is retried exactly once', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.confirmOverride = 'ffffffffffffffffffffffffffffffff';
    start();

    push('a.txt');
    await scheduler.drain();

    expect(store.puts).toHaveLength(2);
    expect(store.existsChecks).toEqual(['backup/a.txt']);
    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.FAILED,
      failureCount: 2,
      lastError:
        'Checksum mismatch: expected 781e5e245d69b566979b86e28d23f2c7, store confirmed ffffffffffffffffffffffffffffffff',
    });
  });

  it('a rescan does not jump a pending retry, a live change does', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.failures.push(new TransientStoreError('network down'));
    start({ retryBaseDelayMs: 60_000, retryMaxDelayMs: 60_000 });

    push('a.txt');
    await waitFor(() => scheduler.stats().retrying === 1);

    push('a.txt', ChangeKind.MODIFIED, 'scan');
    await waitFor(() => queue.size === 0);
    expect(scheduler.stats()).toMatchObject({ retrying: 1, active: 0 });
    expect(store.puts).toHaveLength(0);

    push('a.txt', ChangeKind.MODIFIED, 'watch');
    await scheduler.drain();

    expect(scheduler.stats().retrying).toBe(0);
    expect(manifest.get(path)?.status).toBe(ManifestStatus.SYNCED);
  });

  it('removal forgets the entry and keeps the remote object by default', async () => {
    const path = join(root, 'gone.txt');
    manifest.upsert({
      path,
      root,
      size: 3,
      modifiedAt: 1,
      checksum: md5('bye'),
      status: ManifestStatus.SYNCED,
      lastAttemptAt: null,
      failureCount: 0,
      lastError: null,
    });
    start();

    push('gone.txt', ChangeKind.REMOVED);
    await scheduler.drain();

    expect(manifest.get(path)).toBeUndefined();
    expect(store.deletes).toEqual([]);
    expect(scheduler.stats().removed).toBe(1);
  });

  it('removal deletes the remote object when configured to', async () => {
    const path = join(root, 'gone.txt');
    manifest.upsert({
      path,
      root,
      size: 3,
      modifiedAt: 1,
      checksum: md5('bye'),
      status: ManifestStatus.SYNCED,
      lastAttemptAt: null,
      failureCount: 0,
      lastError: null,
    });
    start({ deleteRemote: true });

    push('gone.txt', ChangeKind.REMOVED);
    await scheduler.drain();

    expect(manifest.get(path)).toBeUndefined();
    expect(store.deletes).toEqual(['backup/gone.txt']);
  });

  it('an event for a file that no longer exists is dropped', async () => {
    start();

    push('never-there.txt');
    await scheduler.drain();

    expect(manifest.size).toBe(0);
    expect(store.puts).toEqual([]);
    expect(scheduler.stats()).toMatchObject({ uploaded: 0, removed: 0, failed: 0 });
  });

  it('keeps one task in flight per path', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    store.onPut = () => gate;
    start();

    push('a.txt');
    await waitFor(() => store.puts.length === 1);
    push('a.txt', ChangeKind.MODIFIED);
    await waitFor(() => queue.size === 0);

    expect(scheduler.stats()).toMatchObject({ active: 1, deferred: 1 });

    release();
    await scheduler.drain();

    expect(store.maxInFlightPerPath).toBe(1);
    expect(scheduler.stats()).toMatchObject({ uploaded: 1, skipped: 1, deferred: 0 });
  });

  it('never exceeds the concurrency bound', async () => {
    const names = ['a', 'b', 'c', 'd', 'e'];
    for (const name of names) {
      await writeFileAt(join(root, name), name, 1_700_000_000);
    }
    store.onPut = () => new Promise<void>((resolve) => setTimeout(resolve, 20));
    start({ concurrency: 2 });

    for (const name of names) push(name);
    await scheduler.drain();

    expect(store.maxInFlight).toBe(2);
    expect(scheduler.stats().uploaded).toBe(5);
  });

  it('stop cancels in-flight uploads and leaves them pending', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    store.hang = true;
    start();

    push('a.txt');
    await waitFor(() => store.maxInFlight === 1);
    await scheduler.stop(0);
    await running;

    expect(manifest.get(path)).toMatchObject({
      status: ManifestStatus.PENDING_UPLOAD,
      failureCount: 0,
    });
    expect(scheduler.stats().active).toBe(0);
  });

  it('pause holds dispatch until resumed', async () => {
    await writeFileAt(join(root, 'a.txt'), '0123456789', 1_700_000_000);
    start();
    scheduler.pause();

    push('a.txt');
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(scheduler.isPaused).toBe(true);
    expect(queue.size).toBe(1);
    expect(store.puts).toEqual([]);

    scheduler.resume();
    await scheduler.drain();

    expect(store.puts).toHaveLength(1);
  });
});
