/**
 * Change Detector
 *
 * Reconciles one watched root against a manifest snapshot. Untouched files cost
 * a single stat: content is only read later, at upload time.
 */

import { opendir, realpath, stat } from 'fs/promises';
import type { Dir, Stats } from 'fs';
import { join, sep } from 'path';
import { ManifestStatus } from '../db/schema.js';
import { WatchedRootUnavailableError, getErrorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { isPathExcluded } from './exclusions.js';
import type { ManifestEntry, ManifestSnapshot } from './manifest.js';
import { ChangeKind, type ChangeEvent } from './queue.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  followSymlinks: boolean;
  excludePatterns: readonly string[];
}

interface WalkState {
  root: string;
  options: ScanOptions;
  seen: Set<string>;
  unreadableDirs: string[];
  visitedDirs: Set<string>; // real paths, for symlink cycle protection
}

// ============================================================================
// Decision
// ============================================================================

/**
 * Decide what a file's current metadata means relative to its manifest entry.
 * Returns null when nothing needs to happen.
 */
export function detectChange(
  entry: Readonly<ManifestEntry> | undefined,
  stats: { size: number; mtimeMs: number }
): ChangeKind | null {
  if (!entry) return ChangeKind.CREATED;

  // An upload was started but never confirmed
  if (entry.status === ManifestStatus.PENDING_UPLOAD) return ChangeKind.MODIFIED;

  if (entry.size !== stats.size || entry.modifiedAt !== stats.mtimeMs) {
    return ChangeKind.MODIFIED;
  }
  return null;
}

function isUnder(path: string, dir: string): boolean {
  return path.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

// ============================================================================
// Walk
// ============================================================================

/**
 * Enumerate every regular file under a directory, depth first.
 * Yields [path, stats]. Unreadable subdirectories are recorded and skipped.
 */
async function* walk(dir: string, state: WalkState): AsyncGenerator<[string, Stats]> {
  let handle: Dir;
  try {
    handle = await opendir(dir);
  } catch (error) {
    if (dir === state.root) {
      throw new WatchedRootUnavailableError(state.root, { cause: error });
    }
    logger.warn(`Skipping unreadable directory ${dir}: ${getErrorMessage(error)}`);
    state.unreadableDirs.push(dir);
    return;
  }

  for await (const dirent of handle) {
    const path = join(dir, dirent.name);
    if (isPathExcluded(path, state.root, state.options.excludePatterns)) continue;

    if (dirent.isSymbolicLink() && !state.options.followSymlinks) continue;
    if (!dirent.isDirectory() && !dirent.isFile() && !dirent.isSymbolicLink()) continue;

    let stats: Stats;
    try {
      // stat follows symlinks; without followSymlinks we never get here for a link
      stats = await stat(path);
    } catch (error) {
      logger.debug(`Cannot stat ${path}: ${getErrorMessage(error)}`);
      continue;
    }

    if (stats.isDirectory()) {
      const real = await realpath(path).catch(() => path);
      if (state.visitedDirs.has(real)) continue;
      state.visitedDirs.add(real);
      yield* walk(path, state);
    } else if (stats.isFile()) {
      yield [path, stats];
    }
  }
}

// ============================================================================
// Scan
// ============================================================================

/**
 * Compare one root's files against the manifest and yield a ChangeEvent per
 * difference. Removals are yielded after the walk completes. Single pass;
 * order is unspecified.
 *
 * Throws WatchedRootUnavailableError if the root itself cannot be read.
 */
export async function* scanRoot(
  root: string,
  snapshot: ManifestSnapshot,
  options: ScanOptions
): AsyncGenerator<ChangeEvent> {
  const state: WalkState = {
    root,
    options,
    seen: new Set(),
    unreadableDirs: [],
    visitedDirs: new Set([await realpath(root).catch(() => root)]),
  };

  const event = (path: string, kind: ChangeKind): ChangeEvent => ({
    path,
    root,
    kind,
    observedAt: new Date(),
    source: 'scan',
  });

  for await (const [path, stats] of walk(root, state)) {
    state.seen.add(path);
    const kind = detectChange(snapshot.get(path), stats);
    if (kind) {
      yield event(path, kind);
    }
  }

  for (const entry of snapshot.values()) {
    if (entry.root !== root || state.seen.has(entry.path)) continue;
    // A file we could not list is not a file that was deleted
    if (state.unreadableDirs.some((dir) => isUnder(entry.path, dir))) continue;
    yield event(entry.path, ChangeKind.REMOVED);
  }
}

/**
 * Run scanRoot to completion and collect its events.
 */
export async function scanRootToArray(
  root: string,
  snapshot: ManifestSnapshot,
  options: ScanOptions
): Promise<ChangeEvent[]> {
  const events: ChangeEvent[] = [];
  for await (const event of scanRoot(root, snapshot, options)) {
    events.push(event);
  }
  return events;
}
