import { mkdir, stat, symlink, unlink } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ManifestStatus } from '../db/schema.js';
import { WatchedRootUnavailableError } from '../errors.js';
import { makeTempDir, removeTempDir, writeFileAt } from '../test/helpers.js';
import { DEFAULT_EXCLUDE_PATTERNS } from './constants.js';
import { detectChange, scanRootToArray, type ScanOptions } from './detector.js';
import type { ManifestEntry } from './manifest.js';
import { ChangeKind } from './queue.js';

const options: ScanOptions = { followSymlinks: false, excludePatterns: DEFAULT_EXCLUDE_PATTERNS };

async function syncedEntry(root: string, path: string): Promise<ManifestEntry> {
  const stats = await stat(path);
  return {
    path,
    root,
    size: stats.size,
    modifiedAt: stats.mtimeMs,
    checksum: 'cccccccccccccccccccccccccccccccc',
    status: ManifestStatus.SYNCED,
    lastAttemptAt: null,
    failureCount: 0,
    lastError: null,
  };
}

describe('detectChange', () => {
  const stats = { size: 10, mtimeMs: 1000 };
  const base: ManifestEntry = {
    path: '/r/a',
    root: '/r',
    size: 10,
    modifiedAt: 1000,
    checksum: 'cccccccccccccccccccccccccccccccc',
    status: ManifestStatus.SYNCED,
    lastAttemptAt: null,
    failureCount: 0,
    lastError: null,
  };

  it('untracked file is created', () => {
    expect(detectChange(undefined, stats)).toBe(ChangeKind.CREATED);
  });

  it('synced file with identical metadata needs nothing', () => {
    expect(detectChange(base, stats)).toBeNull();
  });

  it('size or mtime difference is a modification', () => {
    expect(detectChange(base, { size: 11, mtimeMs: 1000 })).toBe(ChangeKind.MODIFIED);
    expect(detectChange(base, { size: 10, mtimeMs: 1001 })).toBe(ChangeKind.MODIFIED);
  });

  it('an unconfirmed upload is always retried', () => {
    expect(detectChange({ ...base, status: ManifestStatus.PENDING_UPLOAD }, stats)).toBe(
      ChangeKind.MODIFIED
    );
  });

  it('a failed file is left alone until it changes', () => {
    const failed = { ...base, status: ManifestStatus.FAILED, failureCount: 3 };
    expect(detectChange(failed, stats)).toBeNull();
    expect(detectChange(failed, { size: 12, mtimeMs: 1000 })).toBe(ChangeKind.MODIFIED);
  });
});

describe('scanRoot', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reports every file of a fresh root as created', async () => {
    await mkdir(join(root, 'docs', 'deep'), { recursive: true });
    await writeFileAt(join(root, 'a.txt'), '0123456789', 1_700_000_000);
    await writeFileAt(join(root, 'docs', 'deep', 'b.txt'), 'bb', 1_700_000_000);

    const events = await scanRootToArray(root, new Map(), options);

    expect(events.map((e) => [e.path, e.kind, e.source]).sort()).toEqual([
      [join(root, 'a.txt'), ChangeKind.CREATED, 'scan'],
      [join(root, 'docs', 'deep', 'b.txt'), ChangeKind.CREATED, 'scan'],
    ]);
    expect(events.every((e) => e.root === root)).toBe(true);
  });

  it('skips excluded files and directories', async () => {
    await mkdir(join(root, 'node_modules', 'pkg'), { recursive: true });
    await writeFileAt(join(root, 'node_modules', 'pkg', 'index.js'), 'x', 1_700_000_000);
    await writeFileAt(join(root, '.DS_Store'), 'x', 1_700_000_000);
    await writeFileAt(join(root, 'notes.swp'), 'x', 1_700_000_000);
    await writeFileAt(join(root, 'keep.md'), 'x', 1_700_000_000);

    const events = await scanRootToArray(root, new Map(), options);

    expect(events.map((e) => e.path)).toEqual([join(root, 'keep.md')]);
  });

  it('a second scan after syncing yields nothing', async () => {
    const path = join(root, 'a.txt');
    await writeFileAt(path, '0123456789', 1_700_000_000);
    const snapshot = new Map([[path, await syncedEntry(root, path)]]);

    expect(await scanRootToArray(root, snapshot, options)).toEqual([]);
  });

  it('detects modifications and removals', async () => {
    const changed = join(root, 'changed.txt');
    const gone = join(root, 'gone.txt');
    await writeFileAt(changed, 'v1', 1_700_000_000);
    await writeFileAt(gone, 'bye', 1_700_000_000);
    const snapshot = new Map([
      [changed, await syncedEntry(root, changed)],
      [gone, await syncedEntry(root, gone)],
    ]);

    await writeFileAt(changed, 'version two', 1_700_000_100);
    await unlink(gone);

    const events = await scanRootToArray(root, snapshot, options);

    expect(events.map((e) => [e.path, e.kind])).toEqual([
      [changed, ChangeKind.MODIFIED],
      [gone, ChangeKind.REMOVED],
    ]);
  });

  it('ignores manifest entries that belong to other roots', async () => {
    const elsewhere: ManifestEntry = {
      path: '/elsewhere/a.txt',
      root: '/elsewhere',
      size: 1,
      modifiedAt: 1,
      checksum: 'cccccccccccccccccccccccccccccccc',
      status: ManifestStatus.SYNCED,
      lastAttemptAt: null,
      failureCount: 0,
      lastError: null,
    };

    const events = await scanRootToArray(root, new Map([[elsewhere.path, elsewhere]]), options);

    expect(events).toEqual([]);
  });

  it('does not follow symlinks unless asked to', async () => {
    const target = await makeTempDir();
    try {
      await writeFileAt(join(target, 'linked.txt'), 'x', 1_700_000_000);
      await symlink(target, join(root, 'link'));

      expect(await scanRootToArray(root, new Map(), options)).toEqual([]);

      const followed = await scanRootToArray(root, new Map(), { ...options, followSymlinks: true });
      expect(followed.map((e) => e.path)).toEqual([join(root, 'link', 'linked.txt')]);
    } finally {
      await removeTempDir(target);
    }
  });

  it('an unreadable root fails the scan', async () => {
    await expect(
      scanRootToArray(join(root, 'does-not-exist'), new Map(), options)
    ).rejects.toBeInstanceOf(WatchedRootUnavailableError);
  });
});
