import { normalizeUrl } from './base.js';

/**
 * A unit of work in the frontier.
 */
export interface FrontierEntry {
  /** Normalized URL key. */
  url: string;
  /** Position in arrival order, starting at 0. */
  order: number;
  /** Link distance from the nearest seed. */
  depth: number;
}

/**
 * Why the frontier stopped handing out work.
 */
export type FrontierCloseReason = 'completed' | 'fatal' | 'cancelled';

/**
 * Configuration for the Frontier.
 */
export interface FrontierOptions {
  /** Maps a raw URL to its key, or undefined to drop it. */
  keyer?: (url: string) => string | undefined;
  /** Maximum number of keys ever enqueued. */
  maxPages?: number;
  /** Maximum link depth that is enqueued. */
  maxDepth?: number;
  /** Called once per key refused by the page cap or depth limit. */
  onSkipped?: (url: string, reason: string) => void;
  /** Called when a skipped key is later enqueued from a shallower depth. */
  onReadmitted?: (url: string) => void;
}

interface Waiter {
  resolve: (entry: FrontierEntry | undefined) => void;
  timer: NodeJS.Timeout | undefined;
}

/**
 * Deduplicating FIFO work queue shared by all workers of one crawl.
 *
 * Owns the visited set, the queue, the active-worker count and the
 * completion decision. Every method that touches that state runs to
 * completion without awaiting, so on the event loop each one is a single
 * atomic step:
 *
 * - `claim` dequeues and increments the active count together
 * - `offer` hands a new entry straight to a waiting claimer if there is one
 * - `release` decrements the active count and, when that leaves no active
 *   worker and an empty queue, declares completion
 *
 * Completion is therefore never derived from a separate done counter, and
 * there is no moment where an entry is neither queued nor counted active.
 */
export class Frontier {
  private readonly keyer: (url: string) => string | undefined;
  private readonly maxPages: number;
  private readonly maxDepth: number;
  private readonly onSkipped?: (url: string, reason: string) => void;
  private readonly onReadmitted?: (url: string) => void;

  private readonly queue: FrontierEntry[] = [];
  private readonly visited = new Set<string>();
  private readonly skipped = new Set<string>();
  private readonly waiters: Waiter[] = [];
  private active = 0;
  private done = 0;
  private nextOrder = 0;
  private reason: FrontierCloseReason | undefined;
  private readonly closed: Promise<FrontierCloseReason>;
  private resolveClosed: (reason: FrontierCloseReason) => void = () => {};

  constructor(options: FrontierOptions = {}) {
    this.keyer = options.keyer ?? ((url) => normalizeUrl(url));
    this.maxPages = options.maxPages ?? Infinity;
    this.maxDepth = options.maxDepth ?? Infinity;
    this.onSkipped = options.onSkipped;
    this.onReadmitted = options.onReadmitted;
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  /**
   * Enqueue a URL unless its key was seen before.
   *
   * Malformed and out-of-scope URLs are dropped silently. URLs beyond the
   * depth limit or the page cap are dropped and reported as skipped. A
   * depth-skipped key stays unvisited, so a shallower link can still
   * enqueue it; it is then reported as readmitted.
   *
   * @returns true when a new entry was enqueued
   */
  offer(url: string, depth = 0): boolean {
    if (this.reason !== undefined) {
      return false;
    }

    const key = this.keyer(url);
    if (key === undefined || this.visited.has(key)) {
      return false;
    }

    if (depth > this.maxDepth) {
      this.skip(key, `Exceeds max depth (${this.maxDepth})`);
      return false;
    }
    if (this.visited.size >= this.maxPages) {
      this.skip(key, `Exceeds max pages (${this.maxPages})`);
      return false;
    }

    this.visited.add(key);
    if (this.skipped.delete(key)) {
      this.onReadmitted?.(key);
    }
    const entry: FrontierEntry = { url: key, order: this.nextOrder++, depth };

    const waiter = this.waiters.shift();
    if (waiter) {
      this.active++;
      this.settle(waiter, entry);
    } else {
      this.queue.push(entry);
    }
    return true;
  }

  /**
   * Take the oldest queued entry and count the caller as active.
   *
   * When the queue is empty, waits until an entry arrives, the frontier
   * closes, or `timeoutMs` elapses. Resolves undefined on close or timeout.
   * A caller that receives an entry must call `release()` exactly once.
   */
  claim(timeoutMs: number): Promise<FrontierEntry | undefined> {
    if (this.reason !== undefined) {
      return Promise.resolve(undefined);
    }

    const entry = this.queue.shift();
    if (entry) {
      this.active++;
      return Promise.resolve(entry);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve, timer: undefined };
      if (Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve(undefined);
        }, Math.max(0, timeoutMs));
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a claim. The call that leaves no active worker while the queue
   * is empty declares completion.
   */
  release(): void {
    if (this.active === 0) {
      throw new Error('Frontier.release() called without an active claim');
    }
    this.active--;
    this.checkCompletion();
  }

  /**
   * Count a finished item. Bookkeeping only.
   */
  markDone(): void {
    this.done++;
  }

  /**
   * Declare completion if no work is queued and no worker is active.
   *
   * @returns true if the frontier is (now) closed as completed
   */
  checkCompletion(): boolean {
    if (this.reason === undefined && this.active === 0 && this.queue.length === 0) {
      this.shutdown('completed');
    }
    return this.reason === 'completed';
  }

  /**
   * Close the frontier and wake every waiting claimer with undefined.
   * Only the first call has an effect.
   *
   * @returns true if this call closed the frontier
   */
  shutdown(reason: FrontierCloseReason): boolean {
    if (this.reason !== undefined) {
      return false;
    }
    this.reason = reason;
    for (const waiter of this.waiters.splice(0)) {
      this.settle(waiter, undefined);
    }
    this.resolveClosed(reason);
    return true;
  }

  /**
   * Remove and return every entry still queued.
   */
  drain(): FrontierEntry[] {
    return this.queue.splice(0);
  }

  /** Resolves with the close reason once the frontier closes. */
  whenClosed(): Promise<FrontierCloseReason> {
    return this.closed;
  }

  /** Number of queued, unclaimed entries. */
  get size(): number {
    return this.queue.length;
  }

  /** Number of workers holding a claim. */
  get activeCount(): number {
    return this.active;
  }

  /** Number of keys ever enqueued. */
  get visitedCount(): number {
    return this.visited.size;
  }

  get doneCount(): number {
    return this.done;
  }

  get isClosed(): boolean {
    return this.reason !== undefined;
  }

  get closeReason(): FrontierCloseReason | undefined {
    return this.reason;
  }

  private settle(waiter: Waiter, entry: FrontierEntry | undefined): void {
    if (waiter.timer !== undefined) {
      clearTimeout(waiter.timer);
    }
    waiter.resolve(entry);
  }

  private skip(key: string, reason: string): void {
    if (this.skipped.has(key)) {
      return;
    }
    this.skipped.add(key);
    this.onSkipped?.(key, reason);
  }
}
