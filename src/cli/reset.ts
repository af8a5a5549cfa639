/**
 * Reset Command - Clear sync state from database
 */

import { confirm } from '@inquirer/prompts';
import { openStateDatabase } from '../db/index.js';
import { isAlreadyRunning } from '../flags.js';
import { clearSignals } from '../signals.js';
import { ManifestStore } from '../sync/manifest.js';

export async function resetCommand(options: {
  yes?: boolean;
  signals?: boolean;
  failed?: boolean;
}): Promise<void> {
  const { yes, signals: signalsOnly, failed: failedOnly } = options;

  if (!signalsOnly && isAlreadyRunning()) {
    console.log('A sync process is running. Stop it first with: s3-folder-sync stop');
    process.exitCode = 1;
    return;
  }

  if (!yes) {
    let message: string;
    if (failedOnly) {
      message = 'This will re-arm every failed file so the next scan uploads it again. Continue?';
    } else if (signalsOnly) {
      message = 'This will clear all signals from the database. Continue?';
    } else {
      message =
        'This will forget every synced file, forcing s3-folder-sync to re-upload everything on its next run. Continue?';
    }

    const confirmed = await confirm({
      message,
      default: false,
    });

    if (!confirmed) {
      console.log('Aborted.');
      return;
    }
  }

  const db = openStateDatabase();

  if (failedOnly) {
    const changed = new ManifestStore(db).rearmFailed();
    console.log(`Re-armed ${changed} failed file(s).`);
  } else if (signalsOnly) {
    clearSignals();
    console.log('Signals cleared.');
  } else {
    new ManifestStore(db).clear();
    clearSignals();
    console.log('State reset.');
  }
}
