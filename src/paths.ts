/**
 * S3 Folder Sync - Cross-platform Path Helpers
 *
 * Provides consistent paths across macOS, Linux, and Windows:
 * - macOS/Linux: Uses XDG Base Directory specification
 * - Windows: Uses %APPDATA% and %LOCALAPPDATA%
 */

import { join } from 'path';
import { xdgConfig, xdgState } from 'xdg-basedir';

export const APP_NAME = 's3-folder-sync';

/**
 * Get the configuration directory path.
 * - macOS/Linux: ~/.config/s3-folder-sync
 * - Windows: %APPDATA%\s3-folder-sync
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA;
    if (!appData) {
      throw new Error('APPDATA environment variable is not set');
    }
    return join(appData, APP_NAME);
  }

  if (!xdgConfig) {
    throw new Error('Could not determine XDG config directory');
  }
  return join(xdgConfig, APP_NAME);
}

/**
 * Get the state directory path (for database, logs, etc.).
 * - macOS/Linux: ~/.local/state/s3-folder-sync
 * - Windows: %LOCALAPPDATA%\s3-folder-sync
 */
export function getStateDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA;
    if (!localAppData) {
      throw new Error('LOCALAPPDATA environment variable is not set');
    }
    return join(localAppData, APP_NAME);
  }

  if (!xdgState) {
    throw new Error('Could not determine XDG state directory');
  }
  return join(xdgState, APP_NAME);
}
