import PQueue from 'p-queue';
import { TransientFetchError } from './errors.js';

/**
 * Configuration for the AdmissionGate.
 */
export interface AdmissionGateConfig {
  /** Maximum number of fetches open at the same time. */
  maxOpen: number;
}

/**
 * Per-call options for `AdmissionGate.run`.
 */
export interface GateRunOptions {
  /** URL being fetched, used in timeout errors. */
  url: string;
  /** Upper bound on the task once it holds a slot. */
  timeoutMs?: number;
  /** Aborting gives up the wait for a slot. A running task is not interrupted. */
  signal?: AbortSignal;
}

/**
 * Thrown when the wait for a slot is cancelled by shutdown.
 */
export class AdmissionAbortedError extends Error {
  constructor(public readonly url: string) {
    super(`Gave up waiting for a fetch slot: ${url}`);
    this.name = 'AdmissionAbortedError';
  }
}

/**
 * Counting semaphore in front of the shared fetch resource.
 *
 * Wraps p-queue so that at most `maxOpen` fetches run at once, whatever
 * the size of the worker pool. A slot is held for as long as the task
 * runs, also past its timeout: callers do their parsing after `run`
 * resolves.
 */
export class AdmissionGate {
  private readonly queue: PQueue;
  private open = 0;
  private peak = 0;

  constructor(config: AdmissionGateConfig) {
    if (!Number.isInteger(config.maxOpen) || config.maxOpen < 1) {
      throw new Error(`AdmissionGate: maxOpen must be a positive integer, got ${config.maxOpen}`);
    }
    this.queue = new PQueue({ concurrency: config.maxOpen });
  }

  /**
   * Run a task once a slot is free.
   *
   * The task receives a signal that fires when `timeoutMs` elapses; the
   * call then rejects with a timeout `TransientFetchError` at once, but
   * the slot stays taken until the task itself settles. If
   * `options.signal` aborts before a slot is granted, the call rejects
   * with `AdmissionAbortedError` right away.
   *
   * @param task - The async function to execute (typically a fetch call)
   * @returns The result of task
   */
  run<T>(
    task: (signal: AbortSignal) => Promise<T>,
    options: GateRunOptions,
  ): Promise<T> {
    const { url, timeoutMs, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new AdmissionAbortedError(url));
    }

    return new Promise<T>((resolve, reject) => {
      let started = false;
      let settled = false;
      const settle = (finish: () => void) => {
        if (!settled) {
          settled = true;
          signal?.removeEventListener('abort', onAbort);
          finish();
        }
      };
      const onAbort = () => {
        if (!started) {
          settle(() => reject(new AdmissionAbortedError(url)));
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      void this.queue
        .add(async () => {
          if (signal?.aborted) {
            throw new AdmissionAbortedError(url);
          }
          started = true;
          this.open++;
          this.peak = Math.max(this.peak, this.open);

          const controller = new AbortController();
          const timer = startTimer(timeoutMs, () => {
            controller.abort();
            settle(() =>
              reject(
                new TransientFetchError(
                  `Fetch timed out after ${timeoutMs}ms: ${url}`,
                  url,
                  'Timeout',
                ),
              ),
            );
          });
          try {
            const value = await task(controller.signal);
            settle(() => resolve(value));
          } catch (error) {
            settle(() => reject(error));
          } finally {
            clearTimeout(timer);
            this.open--;
          }
        })
        .catch((error: unknown) => settle(() => reject(error)));
    });
  }

  /** Number of tasks currently holding a slot. */
  get openCount(): number {
    return this.open;
  }

  /** Highest number of slots held at once since creation. */
  get peakOpen(): number {
    return this.peak;
  }

  /** Number of tasks waiting for a slot. */
  get waiting(): number {
    return this.queue.size;
  }

  /**
   * Drop every task still waiting for a slot.
   */
  clear(): void {
    this.queue.clear();
  }
}

function startTimer(
  timeoutMs: number | undefined,
  onTimeout: () => void,
): NodeJS.Timeout | undefined {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
    return undefined;
  }
  return setTimeout(onTimeout, timeoutMs);
}
