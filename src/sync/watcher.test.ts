import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeWatchBackend, makeTempDir, removeTempDir, waitFor } from '../test/helpers.js';
import { DEFAULT_EXCLUDE_PATTERNS } from './constants.js';
import { onSyncEvent, type SyncEvent } from './events.js';
import { ChangeKind, EventQueue } from './queue.js';
import { LiveWatcher } from './watcher.js';

describe('LiveWatcher', () => {
  let base: string;
  let root: string;
  let backend: FakeWatchBackend;
  let queue: EventQueue;
  let watcher: LiveWatcher;
  let recovered: string[];
  let events: SyncEvent[];
  let detach: () => void;

  beforeEach(async () => {
    base = await makeTempDir();
    root = join(base, 'photos');
    await mkdir(root);
    backend = new FakeWatchBackend();
    queue = new EventQueue();
    recovered = [];
    events = [];
    detach = onSyncEvent((event) => events.push(event));
    watcher = new LiveWatcher({
      backend,
      excludePatterns: DEFAULT_EXCLUDE_PATTERNS,
      debounceMs: 20,
      probeIntervalMs: 60_000,
      onRecovered: (recoveredRoot) => recovered.push(recoveredRoot),
    });
  });

  afterEach(async () => {
    detach();
    await watcher.stop();
    await removeTempDir(base);
  });

  it('coalesces a burst of changes into one queued event', async () => {
    await watcher.start([root], queue);
    const path = join(root, 'a.jpg');

    backend.emit(root, path, ChangeKind.REMOVED);
    backend.emit(root, path, ChangeKind.CREATED);
    expect(queue.size).toBe(0);

    await waitFor(() => queue.size === 1);
    expect(queue.shift()).toMatchObject({
      path,
      root,
      kind: ChangeKind.MODIFIED,
      source: 'watch',
    });
  });

  it('drops excluded paths', async () => {
    await watcher.start([root], queue);

    backend.emit(root, join(root, 'node_modules', 'pkg', 'index.js'), ChangeKind.CREATED);
    backend.emit(root, join(root, 'a.jpg.swp'), ChangeKind.CREATED);
    backend.emit(root, join(root, 'a.jpg'), ChangeKind.CREATED);

    await waitFor(() => queue.size === 1);
    expect(queue.shift()?.path).toBe(join(root, 'a.jpg'));
  });

  it('applies updated exclusion patterns to later changes', async () => {
    await watcher.start([root], queue);
    watcher.setExcludePatterns(['*.raw']);

    backend.emit(root, join(root, 'a.raw'), ChangeKind.CREATED);
    backend.emit(root, join(root, 'a.jpg'), ChangeKind.CREATED);

    await waitFor(() => queue.size === 1);
    expect(queue.has(join(root, 'a.raw'))).toBe(false);
  });

  it('a missing root starts degraded without blocking the others', async () => {
    const missing = join(base, 'not-mounted');

    await watcher.start([root, missing], queue);

    expect(watcher.degradedRoots).toEqual([missing]);
    expect([...backend.listeners.keys()]).toEqual([root]);
    expect(events.filter((event) => event.type === 'root-degraded')).toEqual([
      {
        type: 'root-degraded',
        root: missing,
        error: `Watched root unavailable: ${missing}`,
        timestamp: expect.any(Date),
      },
    ]);
  });

  it('a broken subscription degrades the root until a probe recovers it', async () => {
    await watcher.start([root], queue);

    backend.fail(root, new Error('watch channel closed'));
    expect(watcher.degradedRoots).toEqual([root]);

    backend.emit(root, join(root, 'a.jpg'), ChangeKind.CREATED);
    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(queue.size).toBe(0);

    await watcher.probeRoots();

    expect(watcher.degradedRoots).toEqual([]);
    expect(recovered).toEqual([root]);
    expect(events.map((event) => event.type)).toEqual(['root-degraded', 'root-recovered']);

    backend.emit(root, join(root, 'b.jpg'), ChangeKind.CREATED);
    await waitFor(() => queue.size === 1);
  });

  it('a root that disappears is degraded and comes back once it exists again', async () => {
    await watcher.start([root], queue);

    await rm(root, { recursive: true });
    await watcher.probeRoots();
    expect(watcher.degradedRoots).toEqual([root]);
    expect(backend.listeners.size).toBe(0);

    await watcher.probeRoots();
    expect(recovered).toEqual([]);

    await mkdir(root);
    await watcher.probeRoots();
    expect(watcher.degradedRoots).toEqual([]);
    expect(recovered).toEqual([root]);
  });

  it('a root whose subscription keeps failing stays degraded', async () => {
    backend.unsubscribable.add(root);
    await watcher.start([root], queue);
    expect(watcher.degradedRoots).toEqual([root]);

    await watcher.probeRoots();
    expect(watcher.degradedRoots).toEqual([root]);

    backend.unsubscribable.delete(root);
    await watcher.probeRoots();
    expect(watcher.degradedRoots).toEqual([]);
    expect(backend.subscribeCount).toBe(3);
  });

  it('stop drops changes still inside the debounce window', async () => {
    await watcher.start([root], queue);

    backend.emit(root, join(root, 'a.jpg'), ChangeKind.CREATED);
    await watcher.stop();
    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(queue.size).toBe(0);
    expect(backend.closed).toBe(true);
  });
});
