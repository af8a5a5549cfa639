/**
 * S3 Folder Sync - Signal Management
 *
 * Inter-process communication via a signal queue stored in SQLite.
 * CLI commands insert a row; the running engine polls, consumes and broadcasts
 * it in-process through an EventEmitter.
 */

import { EventEmitter } from 'events';
import { eq } from 'drizzle-orm';
import { getDb, schema } from './db/index.js';
import { getErrorMessage } from './errors.js';
import { logger } from './logger.js';

const SIGNAL_POLL_INTERVAL_MS = 1000;

/** Signals understood by the running engine */
export const SIGNALS = {
  STOP: 'stop',
  RECONCILE: 'reconcile',
  PAUSE: 'pause-sync',
  RESUME: 'resume-sync',
  CONFIG_CHECK: 'config:check',
} as const;

// Central event emitter for signal broadcasting
const signalEmitter = new EventEmitter();

let pollingInterval: NodeJS.Timeout | null = null;

/**
 * Send a signal by adding it to the signal queue.
 */
export function sendSignal(signal: string): void {
  getDb().insert(schema.signals).values({ signal, createdAt: new Date() }).run();
}

/**
 * Check if a specific signal is in the queue (for producer to verify consumption).
 */
export function hasSignal(signal: string): boolean {
  const row = getDb()
    .select()
    .from(schema.signals)
    .where(eq(schema.signals.signal, signal))
    .get();
  return !!row;
}

/**
 * Remove a queued signal nobody consumed.
 */
export function consumeSignal(signal: string): void {
  getDb().delete(schema.signals).where(eq(schema.signals.signal, signal)).run();
}

/**
 * Drop every queued signal. Returns the number removed.
 */
export function clearSignals(): number {
  return getDb().delete(schema.signals).run().changes;
}

/**
 * Register a handler for a specific signal. Handler is called when signal is detected.
 */
export function registerSignalHandler(signal: string, handler: () => void): void {
  signalEmitter.on(signal, handler);
}

/**
 * Unregister a handler for a specific signal.
 */
export function unregisterSignalHandler(signal: string, handler: () => void): void {
  signalEmitter.off(signal, handler);
}

/**
 * Consume and broadcast every queued signal that has a listener.
 */
export function pollSignals(): void {
  const db = getDb();
  const rows = db.select().from(schema.signals).all();

  for (const row of rows) {
    // Check if anyone is listening for this signal
    if (signalEmitter.listenerCount(row.signal) > 0) {
      // Consume the signal BEFORE broadcasting (handler may exit process)
      db.delete(schema.signals).where(eq(schema.signals.id, row.id)).run();
      signalEmitter.emit(row.signal);
    }
  }
}

/**
 * Start the signal polling loop. Checks DB for signals and emits to registered handlers.
 */
export function startSignalListener(): void {
  if (pollingInterval) return;

  pollingInterval = setInterval(() => {
    try {
      pollSignals();
    } catch (error) {
      logger.error(`Signal poll failed: ${getErrorMessage(error)}`);
    }
  }, SIGNAL_POLL_INTERVAL_MS);
}

/**
 * Stop the signal polling loop.
 */
export function stopSignalListener(): void {
  if (pollingInterval) {
    clearInterval(pollingInterval);
    pollingInterval = null;
  }
}
