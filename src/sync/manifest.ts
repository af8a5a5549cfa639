/**
 * Manifest Store
 *
 * Durable record of the last-known sync state of every tracked file.
 * Every upsert/remove is a single-row SQLite write, fsynced before returning;
 * an in-memory mirror serves snapshots and lookups.
 */

import { eq, sql } from 'drizzle-orm';
import { type Db, schema } from '../db/index.js';
import { ManifestStatus } from '../db/schema.js';
import { CorruptManifestError } from '../errors.js';
import { logger } from '../logger.js';
import { emitSyncEvent } from './events.js';

// ============================================================================
// Types
// ============================================================================

export interface ManifestEntry {
  path: string;
  root: string;
  size: number;
  modifiedAt: number; // mtime in milliseconds since epoch
  checksum: string | null; // hex MD5, set once an upload has been confirmed
  status: ManifestStatus;
  lastAttemptAt: Date | null;
  failureCount: number;
  lastError: string | null;
}

export type ManifestSnapshot = ReadonlyMap<string, Readonly<ManifestEntry>>;

export interface ManifestCounts {
  synced: number;
  pendingUpload: number;
  failed: number;
}

const STATUSES = new Set<string>(Object.values(ManifestStatus));

function isManifestStatus(value: string): value is ManifestStatus {
  return STATUSES.has(value);
}

// ============================================================================
// Manifest Store
// ============================================================================

export class ManifestStore {
  private entries = new Map<string, ManifestEntry>();

  constructor(private readonly db: Db) {}

  /**
   * Read persisted state into memory.
   * Throws CorruptManifestError if any row cannot be interpreted.
   */
  load(): Map<string, ManifestEntry> {
    let rows: (typeof schema.manifest.$inferSelect)[];
    try {
      rows = this.db.select().from(schema.manifest).all();
    } catch (error) {
      throw new CorruptManifestError('Manifest table could not be read', { cause: error });
    }

    const entries = new Map<string, ManifestEntry>();
    for (const row of rows) {
      entries.set(row.path, parseRow(row));
    }

    this.entries = entries;
    logger.debug(`Loaded ${entries.size} manifest entries`);
    return new Map(entries);
  }

  get(path: string): Readonly<ManifestEntry> | undefined {
    return this.entries.get(path);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Write one entry. Durable once this returns.
   * Emits a status event when the entry's status changes.
   */
  upsert(entry: ManifestEntry): void {
    if (entry.status === ManifestStatus.SYNCED && !entry.checksum) {
      throw new Error(`Refusing to mark ${entry.path} synced without a confirmed checksum`);
    }

    const previous = this.entries.get(entry.path);
    const values = { ...entry, updatedAt: new Date() };

    this.db
      .insert(schema.manifest)
      .values(values)
      .onConflictDoUpdate({
        target: schema.manifest.path,
        set: {
          root: values.root,
          size: values.size,
          modifiedAt: values.modifiedAt,
          checksum: values.checksum,
          status: values.status,
          lastAttemptAt: values.lastAttemptAt,
          failureCount: values.failureCount,
          lastError: values.lastError,
          updatedAt: values.updatedAt,
        },
      })
      .run();

    this.entries.set(entry.path, { ...entry });

    if (previous?.status !== entry.status) {
      emitSyncEvent({
        type: 'status',
        path: entry.path,
        from: previous?.status ?? null,
        to: entry.status,
        timestamp: values.updatedAt,
      });
    }
  }

  /**
   * Delete one entry. Returns false if the path was not tracked.
   */
  remove(path: string): boolean {
    const previous = this.entries.get(path);
    this.db.delete(schema.manifest).where(eq(schema.manifest.path, path)).run();
    this.entries.delete(path);

    if (!previous) return false;

    emitSyncEvent({
      type: 'status',
      path,
      from: previous.status,
      to: 'removed',
      timestamp: new Date(),
    });
    return true;
  }

  /**
   * Drop entries whose root is not among the given roots.
   * Returns the number of entries removed.
   */
  pruneOrphans(roots: readonly string[]): number {
    const keep = new Set(roots);
    const orphans = [...this.entries.values()].filter((entry) => !keep.has(entry.root));
    if (orphans.length === 0) return 0;

    this.db.transaction((tx) => {
      for (const entry of orphans) {
        tx.delete(schema.manifest).where(eq(schema.manifest.path, entry.path)).run();
      }
    });
    for (const entry of orphans) {
      this.entries.delete(entry.path);
    }

    logger.info(`Pruned ${orphans.length} manifest entries outside configured roots`);
    return orphans.length;
  }

  /**
   * Read-only copy of the current state. Reflects every write that returned
   * before the call.
   */
  snapshot(): ManifestSnapshot {
    return new Map(this.entries);
  }

  counts(): ManifestCounts {
    const rows = this.db
      .select({
        status: schema.manifest.status,
        count: sql<number>`count(*)`,
      })
      .from(schema.manifest)
      .groupBy(schema.manifest.status)
      .all();

    const counts: ManifestCounts = { synced: 0, pendingUpload: 0, failed: 0 };
    for (const row of rows) {
      if (row.status === ManifestStatus.SYNCED) counts.synced = row.count;
      else if (row.status === ManifestStatus.PENDING_UPLOAD) counts.pendingUpload = row.count;
      else if (row.status === ManifestStatus.FAILED) counts.failed = row.count;
    }
    return counts;
  }

  /**
   * Re-arm failed entries so the next reconciliation retries them.
   * Returns the number of entries changed.
   */
  rearmFailed(): number {
    const failed = this.db
      .select({ path: schema.manifest.path })
      .from(schema.manifest)
      .where(eq(schema.manifest.status, ManifestStatus.FAILED))
      .all();
    if (failed.length === 0) return 0;

    const updatedAt = new Date();
    this.db
      .update(schema.manifest)
      .set({ status: ManifestStatus.PENDING_UPLOAD, failureCount: 0, updatedAt })
      .where(eq(schema.manifest.status, ManifestStatus.FAILED))
      .run();

    for (const { path } of failed) {
      const entry = this.entries.get(path);
      if (entry) {
        this.entries.set(path, { ...entry, status: ManifestStatus.PENDING_UPLOAD, failureCount: 0 });
      }
      emitSyncEvent({
        type: 'status',
        path,
        from: ManifestStatus.FAILED,
        to: ManifestStatus.PENDING_UPLOAD,
        timestamp: updatedAt,
      });
    }
    return failed.length;
  }

  /** Forget everything: every file is treated as new on the next scan. */
  clear(): void {
    this.db.delete(schema.manifest).run();
    this.entries.clear();
  }
}

// ============================================================================
// Row Parsing
// ============================================================================

function parseRow(row: typeof schema.manifest.$inferSelect): ManifestEntry {
  const fail = (reason: string): never => {
    throw new CorruptManifestError(`Manifest entry for ${row.path} is invalid: ${reason}`);
  };

  const status: string = row.status;
  if (!isManifestStatus(status)) fail(`unknown status "${status}"`);
  if (!Number.isInteger(row.size) || row.size < 0) fail(`bad size ${row.size}`);
  if (!Number.isFinite(row.modifiedAt)) fail(`bad modification time ${row.modifiedAt}`);
  if (row.status === ManifestStatus.SYNCED && !row.checksum) fail('synced without checksum');

  return {
    path: row.path,
    root: row.root,
    size: row.size,
    modifiedAt: row.modifiedAt,
    checksum: row.checksum,
    status: row.status,
    lastAttemptAt: row.lastAttemptAt,
    failureCount: row.failureCount,
    lastError: row.lastError,
  };
}
