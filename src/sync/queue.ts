/**
 * Change Event Queue
 *
 * The single in-memory queue that the reconciliation scan and the live watcher
 * both feed and the upload scheduler drains. Events are coalesced per path:
 * only the latest kind for a path is acted upon.
 */

// ============================================================================
// Types
// ============================================================================

export const ChangeKind = {
  CREATED: 'created',
  MODIFIED: 'modified',
  REMOVED: 'removed',
} as const;
export type ChangeKind = (typeof ChangeKind)[keyof typeof ChangeKind];

/** Where an event came from. `retry` events are re-enqueued by the scheduler. */
export type ChangeSource = 'scan' | 'watch' | 'retry';

export interface ChangeEvent {
  path: string; // Absolute path of the file
  root: string; // Watched root the path belongs to
  kind: ChangeKind;
  observedAt: Date;
  source: ChangeSource;
}

// ============================================================================
// Coalescing
// ============================================================================

/**
 * Merge two kinds observed for the same path, oldest first.
 * An editor's delete+create save sequence collapses into a modification.
 */
export function coalesceKinds(previous: ChangeKind, next: ChangeKind): ChangeKind {
  if (previous === ChangeKind.REMOVED && next === ChangeKind.CREATED) {
    return ChangeKind.MODIFIED;
  }
  if (previous === ChangeKind.CREATED && next === ChangeKind.MODIFIED) {
    return ChangeKind.CREATED;
  }
  return next;
}

/** Merge a newer event into an older one for the same path */
export function coalesceEvents(previous: ChangeEvent, next: ChangeEvent): ChangeEvent {
  return { ...next, kind: coalesceKinds(previous.kind, next.kind) };
}

// ============================================================================
// Queue
// ============================================================================

export class EventQueue {
  /** Pending events keyed by path; Map iteration order gives FIFO per first arrival */
  private readonly pending = new Map<string, ChangeEvent>();
  private waiters: (() => void)[] = [];
  private closed = false;

  get size(): number {
    return this.pending.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an event, coalescing with any pending event for the same path.
   * Returns false if the queue is closed.
   */
  push(event: ChangeEvent): boolean {
    if (this.closed) return false;

    const previous = this.pending.get(event.path);
    this.pending.set(event.path, previous ? coalesceEvents(previous, event) : event);

    this.wake();
    return true;
  }

  /**
   * Wait until an event is available. Resolves to false once the queue is closed.
   */
  async wait(): Promise<boolean> {
    while (this.pending.size === 0) {
      if (this.closed) return false;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return !this.closed;
  }

  /**
   * Take the oldest pending event without waiting.
   */
  shift(): ChangeEvent | undefined {
    for (const [path, event] of this.pending) {
      this.pending.delete(path);
      return event;
    }
    return undefined;
  }

  /**
   * Take the next event, waiting while the queue is empty.
   * Resolves to null once the queue is closed.
   */
  async next(): Promise<ChangeEvent | null> {
    while (await this.wait()) {
      const event = this.shift();
      if (event) return event;
    }
    return null;
  }

  /** Whether an event for this path is waiting to be taken */
  has(path: string): boolean {
    return this.pending.has(path);
  }

  /**
   * Stop accepting events and release every waiting consumer.
   * Events still pending are dropped; the next reconciliation re-detects them.
   */
  close(): void {
    this.closed = true;
    this.pending.clear();
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
