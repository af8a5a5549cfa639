/**
 * S3 Folder Sync - Status Command
 *
 * Prints JSON status of the sync process and the manifest
 */

import { openStateDatabase } from '../db/index.js';
import { getStoredPid, isAlreadyRunning, isPaused } from '../flags.js';
import { ManifestStore, type ManifestCounts } from '../sync/manifest.js';

// ============================================================================
// Types
// ============================================================================

interface StatusResult {
  status: 'running' | 'stopped';
  pid: number | null;
  paused: boolean;
  files: ManifestCounts;
}

// ============================================================================
// Command
// ============================================================================

export function statusCommand(): void {
  const db = openStateDatabase();
  const running = isAlreadyRunning();

  const result: StatusResult = {
    status: running ? 'running' : 'stopped',
    pid: running ? getStoredPid() : null,
    paused: running ? isPaused() : false,
    files: new ManifestStore(db).counts(),
  };

  console.log(JSON.stringify(result));
}
