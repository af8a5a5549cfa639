/**
 * S3 Folder Sync - Logger
 *
 * Logs to the console by default; the CLI adds a JSON file transport.
 * In daemon mode, console logging is disabled.
 */

import { join } from 'path';
import winston from 'winston';
import { getStateDir } from './paths.js';

export const LOG_FILE = join(getStateDir(), 'sync.log');

export const logger = winston.createLogger({
  level: process.env.S3_FOLDER_SYNC_LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level}: ${message}`)
      ),
    }),
  ],
});

/**
 * Add the sync.log file transport (idempotent).
 */
export function enableFileLogging(filename: string = LOG_FILE): void {
  const exists = logger.transports.some(
    (transport) => transport instanceof winston.transports.File
  );
  if (exists) return;
  logger.add(new winston.transports.File({ filename }));
}

/**
 * Disable console logging (for daemon mode - background process)
 */
export function disableConsoleLogging(): void {
  logger.transports.forEach((transport) => {
    if (transport instanceof winston.transports.Console) {
      transport.silent = true;
    }
  });
}

/**
 * Enable debug level logging
 */
export function enableDebug(): void {
  logger.level = 'debug';
}
