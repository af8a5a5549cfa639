/**
 * Resume Command
 *
 * Resumes uploads after the sync process has been paused.
 */

import { FLAGS, hasFlag, isAlreadyRunning } from '../flags.js';
import { SIGNALS, consumeSignal, hasSignal, sendSignal } from '../signals.js';

export function resumeCommand(): void {
  // Check if a sync process is running first
  if (!isAlreadyRunning()) {
    console.log('No running s3-folder-sync process found.');
    return;
  }

  // Check if actually paused
  if (!hasFlag(FLAGS.PAUSED)) {
    console.log('Sync is not paused.');
    return;
  }

  sendSignal(SIGNALS.RESUME);
  console.log('Resume signal sent. Waiting for confirmation...');

  const startTime = Date.now();
  const timeout = 5000;
  const checkInterval = 100;

  const waitForAck = (): void => {
    if (!hasFlag(FLAGS.PAUSED) || !hasSignal(SIGNALS.RESUME)) {
      console.log('Syncing resumed.');
      return;
    }

    if (Date.now() - startTime < timeout) {
      setTimeout(waitForAck, checkInterval);
    } else {
      consumeSignal(SIGNALS.RESUME);
      console.log('Process did not respond to resume signal.');
    }
  };

  waitForAck();
}
