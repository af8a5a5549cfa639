/**
 * Start CLI Command
 *
 * Handles CLI argument parsing and delegates to the sync engine.
 */

import { spawn } from 'child_process';
import { getConfigFile, loadConfig, watchConfig, type Config } from '../config.js';
import { closeDb, openStateDatabase } from '../db/index.js';
import { getErrorMessage } from '../errors.js';
import { acquireRunLock, releaseRunLock } from '../flags.js';
import { disableConsoleLogging, enableDebug, enableFileLogging, logger } from '../logger.js';
import { S3ObjectStore } from '../s3/index.js';
import { startSignalListener, stopSignalListener } from '../signals.js';
import { runOneShotSync, runWatchMode } from '../sync/index.js';

// ============================================================================
// Types
// ============================================================================

interface StartOptions {
  daemon?: boolean; // Commander's --no-daemon sets this to false
  watch?: boolean; // Commander's --no-watch sets this to false
  debug?: boolean;
}

/** Set on the detached child so it knows nobody is watching its console */
const DAEMON_ENV = 'S3_FOLDER_SYNC_DAEMON';

// ============================================================================
// Daemon
// ============================================================================

/**
 * Spawn a detached background process (daemon) and exit.
 * The child process runs with --no-daemon to execute the actual sync.
 */
function spawnDaemon(options: StartOptions): void {
  const args = [...process.execArgv, process.argv[1], 'start', '--no-daemon'];

  // Forward relevant flags to the daemon process
  if (options.debug) args.push('--debug');

  const child = spawn(process.execPath, args, {
    detached: true,
    stdio: 'ignore',
    env: { ...process.env, [DAEMON_ENV]: '1', S3_FOLDER_SYNC_CONFIG: getConfigFile() },
  });

  // Unref so parent can exit without waiting for child
  child.unref();

  logger.info(`Started daemon process (PID: ${child.pid})`);
  process.exit(0);
}

function createStore(config: Config): S3ObjectStore {
  return new S3ObjectStore({
    bucket: config.bucket,
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.force_path_style,
    multipartThresholdBytes: config.multipart_threshold_bytes,
  });
}

// ============================================================================
// CLI Command
// ============================================================================

/**
 * Main entry point for the start command.
 */
export async function startCommand(options: StartOptions): Promise<void> {
  // Commander's --no-watch sets watch=false, default is true
  const watchMode = options.watch !== false;

  // Validate: --no-watch requires --no-daemon
  if (!watchMode && options.daemon !== false) {
    logger.error('Error: --no-watch requires --no-daemon');
    process.exit(1);
  }

  // Daemonize: spawn background process and exit
  if (options.daemon !== false) {
    spawnDaemon(options);
    return;
  }

  // From here on, we're running in foreground (--no-daemon mode)
  if (process.env[DAEMON_ENV]) {
    disableConsoleLogging();
  }
  enableFileLogging();

  if (options.debug) {
    enableDebug();
    logger.debug('Debug logging enabled');
  }

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error(getErrorMessage(error));
    process.exit(1);
  }

  const db = openStateDatabase();

  // Acquire run lock (prevents multiple instances)
  if (!acquireRunLock()) {
    logger.error('Another instance is already running. Use `s3-folder-sync stop` to stop it.');
    process.exit(1);
  }

  // Start signal listener for IPC
  startSignalListener();

  // Start watching for config reload signals
  watchConfig();

  const store = createStore(config);

  const cleanup = async (): Promise<void> => {
    stopSignalListener();
    store.close();
    releaseRunLock();
    closeDb();
  };

  // Global crash handlers - log errors and cleanup before exit
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    if (error.stack) {
      logger.error(error.stack);
    }
    void cleanup().finally(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    const stack = reason instanceof Error ? reason.stack : undefined;
    logger.error(`Unhandled rejection: ${message}`);
    if (stack) {
      logger.error(stack);
    }
    void cleanup().finally(() => process.exit(1));
  });

  if (!watchMode) {
    // Watch mode handles Ctrl+C itself; a one-shot run just leaves its entries pending
    process.once('SIGINT', () => {
      logger.info('Interrupted');
      void cleanup().finally(() => process.exit(130));
    });
  }

  try {
    await store.verifyBucket();
    if (watchMode) {
      await runWatchMode({ config, db, store });
    } else {
      await runOneShotSync({ config, db, store });
    }
  } catch (error) {
    logger.error(`Sync failed: ${getErrorMessage(error)}`);
    await cleanup();
    process.exit(1);
  }

  await cleanup();
}
