import { AdmissionAbortedError } from './admission-gate.js';
import { classifyFetchError, ResourceFatalError } from './errors.js';

/**
 * Configuration for the RetryPolicy.
 */
export interface RetryPolicyConfig {
  /** Politeness delay before every attempt in milliseconds. */
  delay: number;
  /** Minimum back-off before a retry in milliseconds. */
  retryDelay: number;
  /** Extra attempts allowed after a transient failure. */
  maxRetries: number;
}

/**
 * Retry policy for fetch attempts.
 *
 * - Waits the politeness delay before every attempt
 * - Transient errors (timeout, network) are retried up to maxRetries
 *   times after a back-off of max(retryDelay, 2 * delay)
 * - Permanent and fatal errors are re-thrown immediately
 * - Anything unclassified is classified first, so callers always see a
 *   `FetchError` or the fatal/abort error that was thrown
 */
export class RetryPolicy {
  private delay: number;
  private readonly retryDelay: number;
  private readonly maxRetries: number;

  constructor(config: RetryPolicyConfig) {
    this.delay = config.delay;
    this.retryDelay = config.retryDelay;
    this.maxRetries = config.maxRetries;
  }

  /**
   * Set a minimum floor for the delay (e.g., from robots.txt crawl-delay).
   *
   * @param delayMs - Minimum delay in milliseconds
   */
  setDelayFloor(delayMs: number): void {
    if (delayMs > this.delay) {
      this.delay = delayMs;
    }
  }

  /**
   * Execute an attempt function with the retry policy applied.
   *
   * @param url - URL being fetched, used to classify unknown errors
   * @param attempt - Called once per attempt
   * @param signal - Aborting stops further retries
   * @returns The result of the first successful attempt
   */
  async execute<T>(
    url: string,
    attempt: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    for (let retry = 0; ; retry++) {
      await sleep(this.delay, signal);
      try {
        return await attempt();
      } catch (error) {
        if (error instanceof AdmissionAbortedError) {
          throw error;
        }
        const classified = classifyFetchError(error, url);
        if (classified instanceof ResourceFatalError || !classified.transient) {
          throw classified;
        }
        if (retry >= this.maxRetries || signal?.aborted) {
          throw classified;
        }
        await sleep(this.backoff(), signal);
        if (signal?.aborted) {
          throw classified;
        }
      }
    }
  }

  /**
   * Get the current politeness delay (for testing/inspection).
   */
  getDelay(): number {
    return this.delay;
  }

  private backoff(): number {
    return Math.max(this.retryDelay, this.delay * 2);
  }
}

/**
 * Sleep for a given number of milliseconds, waking early on abort.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
