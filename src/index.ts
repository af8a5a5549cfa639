#!/usr/bin/env node

/**
 * S3 Folder Sync CLI
 */

import { program } from 'commander';
import { configCommand } from './cli/config.js';
import { logsClearCommand, logsCommand } from './cli/logs.js';
import { pauseCommand } from './cli/pause.js';
import { reconcileCommand } from './cli/reconcile.js';
import { resetCommand } from './cli/reset.js';
import { resumeCommand } from './cli/resume.js';
import { startCommand } from './cli/start.js';
import { statusCommand } from './cli/status.js';
import { stopCommand } from './cli/stop.js';
import { setConfigFile } from './config.js';

program
  .name('s3-folder-sync')
  .description('Mirror local folders into an S3 bucket')
  .version('0.1.0')
  .option('-c, --config <path>', 'Use this config file instead of the default');

program.hook('preAction', () => {
  const { config } = program.opts<{ config?: string }>();
  if (config) setConfigFile(config);
});

program.command('config').description('Show the config file and reload it').action(configCommand);

program
  .command('reset')
  .description('Reset sync state')
  .option('-y, --yes', 'Skip confirmation prompt')
  .option('--signals', 'Clear only the signals table')
  .option('--failed', 'Re-arm only files that failed to upload')
  .action(resetCommand);

program
  .command('start')
  .description('Start syncing changes to S3')
  .option('--no-daemon', 'Run in foreground instead of as daemon')
  .option('--no-watch', 'Sync once and exit (requires --no-daemon)')
  .option('--debug', 'Enable debug logging')
  .action(startCommand);

program
  .command('stop')
  .description('Stop any running s3-folder-sync process')
  .action(stopCommand);

program.command('status').description('Print sync status as JSON').action(statusCommand);

program
  .command('reconcile')
  .description('Ask the running process for a full rescan')
  .action(reconcileCommand);

program
  .command('pause')
  .description('Pause uploads without stopping the process')
  .action(pauseCommand);

program
  .command('resume')
  .description('Resume uploads after they have been paused')
  .action(resumeCommand);

const logsCmd = program.command('logs').description('View sync logs');

logsCmd.option('-f, --follow', 'Follow logs in real-time').action(logsCommand);

logsCmd.command('clear').description('Clear log file').action(logsClearCommand);

await program.parseAsync();
