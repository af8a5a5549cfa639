/**
 * Config Command - Show the config file and ask a running daemon to reload it
 */

import { getConfigFile, readConfigFile } from '../config.js';
import { getErrorMessage } from '../errors.js';
import { isAlreadyRunning } from '../flags.js';
import { SIGNALS, sendSignal } from '../signals.js';

export function configCommand(): void {
  const path = getConfigFile();
  console.log(`Config file: ${path}`);

  try {
    const config = readConfigFile(path);
    console.log(JSON.stringify(config, null, 2));
  } catch (error) {
    console.error(getErrorMessage(error));
    process.exitCode = 1;
    return;
  }

  if (isAlreadyRunning()) {
    sendSignal(SIGNALS.CONFIG_CHECK);
    console.log('Reload signal sent to the running process.');
  }
}
