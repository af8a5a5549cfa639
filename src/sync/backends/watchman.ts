/**
 * Watchman Backend
 *
 * Handles the Watchman client connection and per-root subscriptions.
 * Each subscription starts from the root's current clock, so only changes made
 * after subscribing are reported; anything earlier is the detector's job.
 */

import { execFileSync } from 'child_process';
import { join } from 'path';
import watchman from 'fb-watchman';
import { getErrorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { APP_NAME } from '../../paths.js';
import { ChangeKind } from '../queue.js';
import type { Subscription, SubscriptionListener, WatchBackend } from './types.js';

// ============================================================================
// Types
// ============================================================================

interface WatchProjectResponse {
  watch: string;
  relative_path?: string;
}

interface ClockResponse {
  clock: string;
}

interface WatchmanFile {
  name: string;
  exists: boolean;
  new?: boolean;
}

interface SubscriptionResponse {
  subscription: string;
  files?: unknown[];
  canceled?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isWatchmanFile(value: unknown): value is WatchmanFile {
  return isObject(value) && typeof value.name === 'string' && typeof value.exists === 'boolean';
}

function isSubscriptionResponse(value: unknown): value is SubscriptionResponse {
  return isObject(value) && typeof value.subscription === 'string';
}

// ============================================================================
// Process Helpers
// ============================================================================

/** Check if the watchman binary is installed and answers */
export function isWatchmanAvailable(): boolean {
  try {
    execFileSync('watchman', ['version'], { stdio: 'ignore', timeout: 5000 });
    return true;
  } catch {
    return false;
  }
}

/** Check if watchman is already running without starting it */
function isWatchmanRunning(): boolean {
  try {
    execFileSync('watchman', ['get-pid', '--no-spawn'], { stdio: 'ignore', timeout: 5000 });
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Watchman Backend
// ============================================================================

export class WatchmanBackend implements WatchBackend {
  readonly name = 'watchman';

  private readonly client = new watchman.Client();
  private readonly listeners = new Map<string, { root: string; listener: SubscriptionListener }>();
  private connected = false;
  private closing = false;
  /** Whether we started the watchman server (and so should shut it down) */
  private spawned = false;
  private sequence = 0;

  /** Promisified wrapper for Watchman commands */
  private command<T>(args: unknown[]): Promise<T> {
    return new Promise((resolve, reject) => {
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      (this.client as any).command(args, (err: Error | null, resp: T) => {
        if (err) reject(err);
        else resolve(resp);
      });
    });
  }

  private async connect(): Promise<void> {
    if (this.connected) return;

    const wasRunning = isWatchmanRunning();
    // The client will auto-start watchman if not running
    await this.command<{ version: string }>(['version']);
    this.spawned = !wasRunning;
    logger.debug(wasRunning ? 'Watchman was already running' : 'Watchman was not running, we spawned it');

    this.client.on('subscription', (resp: unknown) => this.handleSubscription(resp));
    this.client.on('error', (error: Error) => {
      logger.error(`Watchman error: ${error.message}`);
      this.failAll(error);
    });
    this.client.on('end', () => {
      if (!this.closing) this.failAll(new Error('Watchman connection closed'));
    });
    this.connected = true;
  }

  async subscribe(root: string, listener: SubscriptionListener): Promise<Subscription> {
    await this.connect();

    const project = await this.command<WatchProjectResponse>(['watch-project', root]);
    const { clock } = await this.command<ClockResponse>(['clock', project.watch]);

    const subName = `${APP_NAME}-${++this.sequence}`;
    const sub: Record<string, unknown> = {
      expression: ['type', 'f'],
      fields: ['name', 'exists', 'new'],
      since: clock,
    };
    if (project.relative_path) {
      sub.relative_root = project.relative_path;
    }

    await this.command(['subscribe', project.watch, subName, sub]);
    this.listeners.set(subName, { root, listener });
    logger.debug(`Subscribed ${subName} to ${root}`);

    return {
      close: async () => {
        if (!this.listeners.delete(subName)) return;
        try {
          await this.command(['unsubscribe', project.watch, subName]);
          logger.debug(`Unsubscribed from ${subName}`);
        } catch (error) {
          logger.warn(`Failed to unsubscribe from ${subName}: ${getErrorMessage(error)}`);
        }
      },
    };
  }

  private handleSubscription(resp: unknown): void {
    if (!isSubscriptionResponse(resp)) return;
    const entry = this.listeners.get(resp.subscription);
    if (!entry) return;

    const { root, listener } = entry;
    if (resp.canceled) {
      this.listeners.delete(resp.subscription);
      listener.onError(new Error(`Watchman cancelled the subscription for ${root}`));
      return;
    }

    const files = resp.files ?? [];
    logger.debug(`Watchman event: ${resp.subscription} (${files.length} files)`);

    for (const file of files) {
      if (!isWatchmanFile(file)) continue;
      const kind = !file.exists
        ? ChangeKind.REMOVED
        : file.new
          ? ChangeKind.CREATED
          : ChangeKind.MODIFIED;
      listener.onChange({ path: join(root, file.name), kind });
    }
  }

  private failAll(error: Error): void {
    const entries = [...this.listeners.values()];
    this.listeners.clear();
    for (const { listener } of entries) listener.onError(error);
  }

  async close(): Promise<void> {
    this.closing = true;
    this.listeners.clear();
    this.client.end();

    if (this.spawned) {
      logger.debug('Shutting down watchman server (we spawned it)');
      try {
        execFileSync('watchman', ['shutdown-server'], { stdio: 'ignore', timeout: 5000 });
      } catch (error) {
        logger.warn(`Failed to shut down watchman: ${getErrorMessage(error)}`);
      }
    }
  }
}
