/**
 * S3 Folder Sync - Configuration
 *
 * Reads config from ~/.config/s3-folder-sync/config.json (or --config /
 * S3_FOLDER_SYNC_CONFIG). Supports hot-reloading via namespaced signals
 * (config:reload:<key>).
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { ConfigError, getErrorCode, getErrorMessage } from './errors.js';
import { logger } from './logger.js';
import { getConfigDir } from './paths.js';
import { SIGNALS, registerSignalHandler, sendSignal } from './signals.js';
import { WatcherKind } from './sync/backends/types.js';
import {
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SYNC_CONCURRENCY,
  MULTIPART_THRESHOLD_BYTES,
  RECONCILIATION_INTERVAL_MS,
  RESUBSCRIBE_INTERVAL_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
  SHUTDOWN_TIMEOUT_MS,
  WATCHER_DEBOUNCE_MS,
} from './sync/constants.js';
import { validateGlob } from './sync/exclusions.js';

// ============================================================================
// Types
// ============================================================================

export interface Config {
  sync_dirs: string[];
  bucket: string;
  prefix: string;
  region?: string;
  endpoint?: string;
  force_path_style: boolean;
  sync_concurrency: number;
  max_retries: number;
  retry_base_delay_ms: number;
  retry_max_delay_ms: number;
  debounce_ms: number;
  resubscribe_interval_ms: number;
  /** 0 disables periodic reconciliation */
  reconcile_interval_ms: number;
  shutdown_grace_ms: number;
  delete_remote: boolean;
  follow_symlinks: boolean;
  watcher: WatcherKind;
  exclude_patterns: string[];
  multipart_threshold_bytes: number;
}

/** Config keys that can be watched for changes */
export type ConfigKey = keyof Config;

// ============================================================================
// Constants
// ============================================================================

/** Base signal prefix for config reload */
export const CONFIG_RELOAD_SIGNAL = 'config:reload';

export const DEFAULT_CONFIG_FILE = join(getConfigDir(), 'config.json');

/** Keys a running engine can apply without a restart */
const HOT_RELOAD_KEYS: ConfigKey[] = ['sync_concurrency', 'exclude_patterns'];

const WATCHER_KINDS = new Set<string>(Object.values(WatcherKind));

function isWatcherKind(value: string): value is WatcherKind {
  return WATCHER_KINDS.has(value);
}

let configFile = process.env.S3_FOLDER_SYNC_CONFIG || DEFAULT_CONFIG_FILE;

/** Point every later load at a different file (the --config option) */
export function setConfigFile(path: string): void {
  configFile = resolve(expandHome(path));
  currentConfig = null;
}

export function getConfigFile(): string {
  return configFile;
}

function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, fallback?: string): string {
  const value = raw[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config "${key}" must be a string`);
  }
  return value;
}

function readOptionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config "${key}" must be a string`);
  }
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Config "${key}" must be true or false`);
  }
  return value;
}

function readInteger(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number
): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`Config "${key}" must be an integer >= ${min}`);
  }
  return value;
}

function readStringArray(raw: Record<string, unknown>, key: string): string[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Config "${key}" must be an array of strings`);
  }
  return value;
}

/**
 * Validate a parsed JSON document and fill in defaults.
 * Throws ConfigError describing the first problem found.
 */
export function parseConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }

  const syncDirs = readStringArray(raw, 'sync_dirs');
  if (syncDirs.some((dir) => dir.trim() === '')) {
    throw new ConfigError('Config "sync_dirs" entries cannot be empty');
  }

  const bucket = readString(raw, 'bucket', '');
  if (!bucket) {
    throw new ConfigError('Config must set "bucket"');
  }

  const watcher = readString(raw, 'watcher', WatcherKind.AUTO);
  if (!isWatcherKind(watcher)) {
    throw new ConfigError(
      `Config "watcher" must be one of: ${[...WATCHER_KINDS].join(', ')} (got "${watcher}")`
    );
  }

  const excludePatterns = readStringArray(raw, 'exclude_patterns');
  for (const pattern of excludePatterns) {
    const result = validateGlob(pattern);
    if (!result.valid) {
      throw new ConfigError(`Config exclude pattern "${pattern}": ${result.error}`);
    }
  }

  const config: Config = {
    sync_dirs: syncDirs.map((dir) => resolve(expandHome(dir))),
    bucket,
    prefix: readString(raw, 'prefix', ''),
    region: readOptionalString(raw, 'region'),
    endpoint: readOptionalString(raw, 'endpoint'),
    force_path_style: readBoolean(raw, 'force_path_style', false),
    sync_concurrency: readInteger(raw, 'sync_concurrency', DEFAULT_SYNC_CONCURRENCY, 1),
    max_retries: readInteger(raw, 'max_retries', DEFAULT_MAX_RETRIES, 1),
    retry_base_delay_ms: readInteger(raw, 'retry_base_delay_ms', RETRY_BASE_DELAY_MS, 1),
    retry_max_delay_ms: readInteger(raw, 'retry_max_delay_ms', RETRY_MAX_DELAY_MS, 1),
    debounce_ms: readInteger(raw, 'debounce_ms', WATCHER_DEBOUNCE_MS, 0),
    resubscribe_interval_ms: readInteger(
      raw,
      'resubscribe_interval_ms',
      RESUBSCRIBE_INTERVAL_MS,
      100
    ),
    reconcile_interval_ms: readInteger(raw, 'reconcile_interval_ms', RECONCILIATION_INTERVAL_MS, 0),
    shutdown_grace_ms: readInteger(raw, 'shutdown_grace_ms', SHUTDOWN_TIMEOUT_MS, 0),
    delete_remote: readBoolean(raw, 'delete_remote', false),
    follow_symlinks: readBoolean(raw, 'follow_symlinks', false),
    watcher,
    exclude_patterns: excludePatterns,
    multipart_threshold_bytes: readInteger(
      raw,
      'multipart_threshold_bytes',
      MULTIPART_THRESHOLD_BYTES,
      5 * 1024 * 1024
    ),
  };

  if (config.retry_max_delay_ms < config.retry_base_delay_ms) {
    throw new ConfigError('Config "retry_max_delay_ms" must be >= "retry_base_delay_ms"');
  }

  return config;
}

/** Built-in exclusions plus the configured ones */
export function getExcludePatterns(config: Config): string[] {
  return [...DEFAULT_EXCLUDE_PATTERNS, ...config.exclude_patterns];
}

// ============================================================================
// Config File
// ============================================================================

const DEFAULT_CONFIG_TEMPLATE = {
  sync_dirs: [],
  bucket: '',
  prefix: '',
  sync_concurrency: DEFAULT_SYNC_CONCURRENCY,
  delete_remote: false,
  exclude_patterns: [],
};

/**
 * Read and validate a config file, writing a template first if it is absent.
 * Throws ConfigError if the file is unreadable or invalid.
 */
export function readConfigFile(path: string = configFile): Config {
  if (!existsSync(path)) {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(DEFAULT_CONFIG_TEMPLATE, null, 2) + '\n');
    logger.info(`Created default config file: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file ${path}: ${error.message}`);
    }
    if (getErrorCode(error) === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    throw new ConfigError(`Error reading config ${path}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    return parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${error.message} (${path})`);
    }
    throw error;
  }
}

// ============================================================================
// Config Singleton
// ============================================================================

let currentConfig: Config | null = null;

/**
 * Load config from file. Throws ConfigError if it is invalid.
 */
export function loadConfig(): Config {
  if (currentConfig) {
    return currentConfig;
  }
  currentConfig = readConfigFile();
  return currentConfig;
}

/**
 * Get the current config. Must call loadConfig() first.
 */
export function getConfig(): Config {
  if (!currentConfig) {
    throw new Error('Config not loaded. Call loadConfig() first.');
  }
  return currentConfig;
}

/** Check if two values are deeply equal (for array comparison) */
function isEqual<T>(a: T, b: T): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Reload config from file and send signals for changed keys.
 * Keys outside HOT_RELOAD_KEYS only take effect after a restart.
 */
export function reloadConfig(): void {
  const oldConfig = currentConfig;
  let newConfig: Config;
  try {
    newConfig = readConfigFile();
  } catch (error) {
    logger.warn(`Config reload failed, keeping previous config: ${getErrorMessage(error)}`);
    return;
  }

  currentConfig = newConfig;
  logger.info('Config reloaded');

  if (!oldConfig) return;

  for (const key of Object.keys(newConfig)) {
    if (!isConfigKey(key, newConfig) || isEqual(oldConfig[key], newConfig[key])) continue;
    if (HOT_RELOAD_KEYS.includes(key)) {
      logger.debug(`Config key "${key}" changed, sending signal`);
      sendSignal(`${CONFIG_RELOAD_SIGNAL}:${key}`);
    } else {
      logger.warn(`Config key "${key}" changed; restart to apply it`);
    }
  }
}

function isConfigKey(key: string, config: Config): key is ConfigKey {
  return key in config;
}

/**
 * Register a handler for changes to a specific config key.
 * Handler is called when config:reload:<key> signal is received.
 */
export function onConfigChange(key: ConfigKey, handler: () => void): void {
  registerSignalHandler(`${CONFIG_RELOAD_SIGNAL}:${key}`, handler);
}

/**
 * Start watching for config check signals.
 * When received, reloads config and sends signals for changed keys.
 */
export function watchConfig(): void {
  registerSignalHandler(SIGNALS.CONFIG_CHECK, reloadConfig);
}
