/**
 * Logs command to view s3-folder-sync logs
 */

import { spawn } from 'child_process';
import { existsSync, readFileSync, unlinkSync } from 'fs';
import { LOG_FILE, logger } from '../logger.js';

interface LogsOptions {
  follow?: boolean;
}

/** Follow the log file with the platform's tail equivalent */
function followLogs(): void {
  const child =
    process.platform === 'win32'
      ? spawn('powershell', ['-Command', `Get-Content -Path "${LOG_FILE}" -Wait -Tail 50`], {
          stdio: 'inherit',
        })
      : spawn('tail', ['-n', '50', '-f', LOG_FILE], { stdio: 'inherit' });

  child.on('error', (err: Error) => {
    logger.error(`Failed to follow logs: ${err.message}`);
    process.exit(1);
  });

  // Handle Ctrl+C gracefully
  process.on('SIGINT', () => {
    child.kill();
    process.exit(0);
  });
}

export function logsCommand(options: LogsOptions): void {
  if (!existsSync(LOG_FILE)) {
    logger.error(`Log file not found: ${LOG_FILE}`);
    logger.error('The service may not have run yet.');
    process.exit(1);
  }

  if (options.follow) {
    followLogs();
    return;
  }

  const content = readFileSync(LOG_FILE, 'utf-8');
  if (!content.trim()) {
    logger.info('Log file is empty.');
    return;
  }

  // Write directly to stdout to avoid double-encoding through the JSON logger
  process.stdout.write(content);
}

export function logsClearCommand(): void {
  if (!existsSync(LOG_FILE)) {
    logger.info('No log file to clear.');
    return;
  }

  unlinkSync(LOG_FILE);
  logger.info('Logs cleared.');
}
