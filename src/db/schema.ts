/**
 * S3 Folder Sync - Database Schema
 *
 * Drizzle ORM schema for SQLite state storage.
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

export const ManifestStatus = {
  SYNCED: 'synced',
  PENDING_UPLOAD: 'pending_upload',
  FAILED: 'failed',
} as const;
export type ManifestStatus = (typeof ManifestStatus)[keyof typeof ManifestStatus];

/**
 * Manifest table: last-known sync state, one row per tracked file.
 * modified_at is the file's mtime in (possibly fractional) milliseconds.
 */
export const manifest = sqliteTable(
  'manifest',
  {
    path: text('path').primaryKey(),
    root: text('root').notNull(),
    size: integer('size').notNull(),
    modifiedAt: real('modified_at').notNull(),
    checksum: text('checksum'),
    status: text('status').$type<ManifestStatus>().notNull(),
    lastAttemptAt: integer('last_attempt_at', { mode: 'timestamp_ms' }),
    failureCount: integer('failure_count').notNull().default(0),
    lastError: text('last_error'),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('manifest_root_idx').on(table.root)]
);

/**
 * Signals table for inter-process communication queue.
 */
export const signals = sqliteTable('signals', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  signal: text('signal').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date()),
});

/**
 * Flags table for persistent process state (run lock, paused).
 */
export const flags = sqliteTable('flags', {
  name: text('name').primaryKey(),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date()),
});
