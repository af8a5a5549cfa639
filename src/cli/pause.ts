/**
 * Pause Command
 *
 * Pauses uploads without stopping the process. Changes are still detected
 * and queued; nothing is dispatched until resume.
 */

import { FLAGS, hasFlag, isAlreadyRunning } from '../flags.js';
import { SIGNALS, consumeSignal, hasSignal, sendSignal } from '../signals.js';

/**
 * Pause the sync process by sending a pause signal.
 */
export function pauseCommand(): void {
  // Check if a sync process is running first
  if (!isAlreadyRunning()) {
    console.log('No running s3-folder-sync process found.');
    return;
  }

  // Check if already paused
  if (hasFlag(FLAGS.PAUSED)) {
    console.log('Sync is already paused. Use "resume" to continue syncing.');
    return;
  }

  sendSignal(SIGNALS.PAUSE);
  console.log('Pause signal sent. Waiting for confirmation...');

  // Wait for up to 5 seconds for the process to acknowledge
  const startTime = Date.now();
  const timeout = 5000;
  const checkInterval = 100;

  const waitForAck = (): void => {
    // The engine sets the paused flag once it has consumed the signal
    if (hasFlag(FLAGS.PAUSED) || !hasSignal(SIGNALS.PAUSE)) {
      console.log('Syncing paused.');
      return;
    }

    if (Date.now() - startTime < timeout) {
      setTimeout(waitForAck, checkInterval);
    } else {
      // Timeout - consume signal and report
      consumeSignal(SIGNALS.PAUSE);
      console.log('Process did not respond to pause signal.');
    }
  };

  waitForAck();
}
