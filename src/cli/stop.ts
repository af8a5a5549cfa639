/**
 * Stop Command
 *
 * Stops a running s3-folder-sync process gracefully.
 */

import { isAlreadyRunning } from '../flags.js';
import { SIGNALS, sendSignal } from '../signals.js';

/**
 * Stop the sync process gracefully by sending a stop signal.
 * The process finishes (or cancels) in-flight uploads and releases its lock.
 */
export function stopCommand(): void {
  // Check if a sync process is running first
  if (!isAlreadyRunning()) {
    console.log('No running s3-folder-sync process found.');
    return;
  }

  sendSignal(SIGNALS.STOP);
  console.log('Stop signal sent. Waiting for process to exit...');

  // Wait for up to 15 seconds for the process to exit (running_pid flag disappears)
  const startTime = Date.now();
  const timeout = 15000;
  const checkInterval = 100;

  const waitForExit = (): void => {
    if (!isAlreadyRunning()) {
      console.log('s3-folder-sync stopped.');
      return;
    }

    if (Date.now() - startTime < timeout) {
      setTimeout(waitForExit, checkInterval);
    } else {
      console.log('Process did not respond to stop signal.');
    }
  };

  waitForExit();
}
