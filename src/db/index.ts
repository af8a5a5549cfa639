/**
 * S3 Folder Sync - Database Connection
 *
 * SQLite database using Drizzle ORM for state persistence.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { CorruptManifestError, getErrorCode } from '../errors.js';
import { logger } from '../logger.js';
import { getStateDir } from '../paths.js';
import * as schema from './schema.js';

// ============================================================================
// Constants
// ============================================================================

export const STATE_DIR = getStateDir();
export const DB_PATH = join(STATE_DIR, 'state.db');

/** Migrations ship next to this module (copied into dist/ by the build) */
const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));

export type Db = BetterSQLite3Database<typeof schema>;

export interface StateDatabase {
  db: Db;
  sqlite: Database.Database;
}

export { schema };

// ============================================================================
// Migration Runner
// ============================================================================

function loadMigrations(): { id: string; sql: string }[] {
  return readdirSync(MIGRATIONS_DIR)
    .filter((name) => name.endsWith('.sql'))
    .sort()
    .map((name) => ({
      id: name.replace(/\.sql$/, ''),
      sql: readFileSync(join(MIGRATIONS_DIR, name), 'utf-8'),
    }));
}

/**
 * Runs the bundled migrations against the database.
 * Tracks applied migrations using content hashes (compatible with Drizzle's migrator).
 */
function runMigrations(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "__drizzle_migrations" (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash text NOT NULL,
      created_at numeric
    )
  `);

  const rows: unknown[] = sqlite.prepare('SELECT hash FROM __drizzle_migrations').all();
  const applied = new Set(
    rows.flatMap((row) =>
      typeof row === 'object' && row !== null && 'hash' in row && typeof row.hash === 'string'
        ? [row.hash]
        : []
    )
  );

  const insert = sqlite.prepare('INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)');

  for (const migration of loadMigrations()) {
    const hash = createHash('sha256').update(migration.sql).digest('hex');
    if (applied.has(hash)) continue;

    const statements = migration.sql
      .split('--> statement-breakpoint')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    sqlite.transaction(() => {
      for (const statement of statements) {
        sqlite.exec(statement);
      }
      insert.run(hash, Date.now());
    })();

    logger.debug(`Applied migration ${migration.id}`);
  }
}

// ============================================================================
// Database Initialization
// ============================================================================

function isCorruptionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && (code.startsWith('SQLITE_CORRUPT') || code === 'SQLITE_NOTADB');
}

/**
 * Open (creating if needed) a state database and bring its schema up to date.
 * Every write is fsynced before the statement returns (synchronous = FULL).
 * Throws CorruptManifestError when the file is not a readable SQLite database.
 */
export function openDatabase(path: string): StateDatabase {
  const inMemory = path === ':memory:';
  if (!inMemory && !existsSync(dirname(path))) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  try {
    if (!inMemory) {
      sqlite.pragma('journal_mode = WAL');
    }
    sqlite.pragma('synchronous = FULL');

    const check: unknown = sqlite.pragma('quick_check', { simple: true });
    if (check !== 'ok') {
      throw new CorruptManifestError(`State database failed integrity check: ${String(check)}`);
    }

    runMigrations(sqlite);
  } catch (error) {
    sqlite.close();
    if (error instanceof CorruptManifestError) throw error;
    if (isCorruptionError(error)) {
      throw new CorruptManifestError(`State database is corrupt: ${path}`, { cause: error });
    }
    throw error;
  }

  return { db: drizzle(sqlite, { schema }), sqlite };
}

// ============================================================================
// Process-wide Database
// ============================================================================

let current: StateDatabase | null = null;

/**
 * Get the process-wide state database, opening it on first use.
 */
export function getDb(): Db {
  if (!current) {
    current = openDatabase(DB_PATH);
  }
  return current.db;
}

export function closeDb(): void {
  current?.sqlite.close();
  current = null;
}

/**
 * Move a corrupt database (and its WAL side files) out of the way.
 * Returns the path it was moved to.
 */
export function quarantineDatabase(path: string = DB_PATH): string {
  const target = `${path}.corrupt-${Date.now()}`;
  for (const suffix of ['', '-wal', '-shm']) {
    if (existsSync(path + suffix)) {
      renameSync(path + suffix, target + suffix);
    }
  }
  return target;
}

/**
 * Open a state database, quarantining it first if it is corrupt.
 * A quarantined manifest degrades to a full re-scan, never to an abort.
 */
export function openOrRecoverDatabase(path: string): StateDatabase {
  try {
    return openDatabase(path);
  } catch (error) {
    if (!(error instanceof CorruptManifestError)) throw error;
    const moved = quarantineDatabase(path);
    logger.warn(`${error.message}; moved to ${moved}, starting with an empty manifest`);
    return openDatabase(path);
  }
}

/**
 * Open the process-wide database, recovering from a corrupt file.
 */
export function openStateDatabase(): Db {
  if (!current) {
    current = openOrRecoverDatabase(DB_PATH);
  }
  return current.db;
}
