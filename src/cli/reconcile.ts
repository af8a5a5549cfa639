/**
 * Reconcile Command - Trigger a full filesystem scan on the running daemon
 */

import { isAlreadyRunning } from '../flags.js';
import { logger } from '../logger.js';
import { SIGNALS, sendSignal } from '../signals.js';

export function reconcileCommand(): void {
  // Check if daemon is running
  if (!isAlreadyRunning()) {
    logger.error('No running daemon found. Start the daemon first with: s3-folder-sync start');
    process.exit(1);
  }

  sendSignal(SIGNALS.RECONCILE);
  logger.info('Reconcile signal sent to daemon. Check daemon logs for progress.');
}
