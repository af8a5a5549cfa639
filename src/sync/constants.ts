/**
 * Sync Module Constants
 *
 * Centralized defaults for the sync engine, scheduler, watcher, and store.
 */

// ============================================================================
// Timing Constants
// ============================================================================

/** Debounce time for file watcher events (200ms) */
export const WATCHER_DEBOUNCE_MS = 200;

/** Interval between probes of a degraded watched root (30 seconds) */
export const RESUBSCRIBE_INTERVAL_MS = 30_000;

/** Interval for periodic full reconciliation scans (10 minutes) */
export const RECONCILIATION_INTERVAL_MS = 10 * 60 * 1000;

/** Grace period for in-flight uploads on shutdown (10 seconds) */
export const SHUTDOWN_TIMEOUT_MS = 10_000;

// ============================================================================
// Upload Configuration
// ============================================================================

/** Default bound on concurrently in-flight uploads */
export const DEFAULT_SYNC_CONCURRENCY = 100;

/** Files above this size use multipart upload (100 MiB) */
export const MULTIPART_THRESHOLD_BYTES = 100 * 1024 * 1024;

/** Multipart part size (5 MiB, the S3 minimum) */
export const MULTIPART_PART_SIZE_BYTES = 5 * 1024 * 1024;

// ============================================================================
// Retry Configuration
// ============================================================================

/** Attempts before an entry is marked failed */
export const DEFAULT_MAX_RETRIES = 3;

/** First retry delay; each further retry waits 4x longer */
export const RETRY_BASE_DELAY_MS = 1_000;

/** Cap on a single retry delay (5 minutes) */
export const RETRY_MAX_DELAY_MS = 5 * 60 * 1000;

/** Backoff multiplier between consecutive retries */
export const RETRY_BACKOFF_FACTOR = 4;

/** Jitter factor for retry timing (±25%) */
export const JITTER_FACTOR = 0.25;

// ============================================================================
// Exclusions
// ============================================================================

/** OS, editor and VCS clutter that is never uploaded */
export const DEFAULT_EXCLUDE_PATTERNS = [
  '.DS_Store',
  'Thumbs.db',
  'desktop.ini',
  '*.swp',
  '*.swo',
  '*.tmp',
  '*~',
  '.git',
  '.svn',
  '.hg',
  'node_modules',
  '__pycache__',
  '.Trashes',
  '.Spotlight-V100',
  '.fseventsd',
  '$RECYCLE.BIN',
  'System Volume Information',
];
