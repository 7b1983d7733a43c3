import type {
  DocsCrawlConfig,
  FailedUrl,
  FetchConfig,
  PageRecord,
  RenderedPage,
} from '../types.js';
import type { Fetcher } from '../fetcher/index.js';
import type { Extractor, ExtractResult } from '../extractor/index.js';
import type { Sink } from '../output/file-sink.js';
import { emptyExtractResult } from '../extractor/index.js';
import { AdmissionAbortedError, type AdmissionGate } from '../fetcher/admission-gate.js';
import type { RetryPolicy } from '../fetcher/retry.js';
import {
  ExtractionError,
  FetchError,
  PersistError,
  ResourceFatalError,
  classifyFetchError,
} from '../fetcher/errors.js';
import type { Frontier, FrontierEntry } from './frontier.js';
import type { OutcomeRecorder } from './outcome.js';

/**
 * Per-page event callbacks a worker reports through.
 */
export type WorkerEvents = Pick<
  DocsCrawlConfig,
  'onPageFetched' | 'onPageFailed' | 'onPersistError' | 'onExtractError'
>;

/**
 * Everything a worker shares with the rest of the pool. One context is
 * built by the coordinator and handed to every worker.
 */
export interface WorkerContext {
  frontier: Frontier;
  fetcher: Fetcher;
  extractor: Extractor;
  sink: Sink;
  gate: AdmissionGate;
  retry: RetryPolicy;
  outcome: OutcomeRecorder;
  fetchConfig: FetchConfig;
  /** How long one idle `claim` waits before polling again. */
  claimTimeoutMs: number;
  /** Fires on forced shutdown. */
  signal: AbortSignal;
  /** Reports an error that must stop the whole crawl. */
  onFatal: (error: ResourceFatalError) => void;
  events: WorkerEvents;
}

interface AttemptState {
  attempts: number;
  lastError: FetchError | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One fetch/extract/persist/enqueue loop of the pool.
 *
 * Workers hold no state of their own between pages; the frontier, gate and
 * outcome they write to are shared.
 */
export class CrawlWorker {
  constructor(
    readonly id: number,
    private readonly ctx: WorkerContext,
  ) {}

  /**
   * Claim and process entries until the frontier closes.
   *
   * Resolves once the frontier is closed or the shutdown signal fired;
   * never rejects for per-URL errors.
   */
  async run(): Promise<void> {
    const { frontier, signal } = this.ctx;

    for (;;) {
      const entry = await frontier.claim(this.ctx.claimTimeoutMs);
      if (!entry) {
        if (frontier.isClosed || signal.aborted) {
          return;
        }
        continue;
      }

      try {
        await this.process(entry);
      } catch (error) {
        // Anything that escapes process() is a bug or a throwing callback
        this.ctx.onFatal(
          new ResourceFatalError(
            `Unexpected error processing ${entry.url}: ${errorMessage(error)}`,
            { cause: error },
          ),
        );
      } finally {
        frontier.markDone();
        frontier.release();
      }
    }
  }

  /**
   * Fetch one entry, extract it, persist it and offer its links.
   */
  async process(entry: FrontierEntry): Promise<void> {
    const { url, depth } = entry;
    const state: AttemptState = { attempts: 0, lastError: undefined };

    let page: RenderedPage;
    try {
      page = await this.fetchWithRetry(url, state);
    } catch (error) {
      this.handleFetchFailure(url, error, state);
      return;
    }

    const result = this.extract(url, page);
    const record: PageRecord = Object.freeze({
      url,
      record: Object.freeze({ ...result.record }),
      links: Object.freeze([...result.links]),
      fetchedAt: page.fetchedAt,
    });

    try {
      await this.ctx.sink.persist(record);
    } catch (error) {
      const persistError =
        error instanceof PersistError
          ? error
          : new PersistError(`Failed to persist ${url}: ${errorMessage(error)}`, url, {
              cause: error,
            });
      this.ctx.outcome.recordPersistFailure(url, persistError.message);
      this.ctx.events.onPersistError?.(url, persistError);
    }

    this.ctx.outcome.recordSuccess(url);
    this.ctx.events.onPageFetched?.(record);

    for (const link of result.links) {
      this.ctx.frontier.offer(link.href, depth + 1);
    }
  }

  /**
   * Run the fetch through the retry policy, taking a gate slot for each
   * attempt. The slot is held only while the fetch itself runs.
   */
  private fetchWithRetry(url: string, state: AttemptState): Promise<RenderedPage> {
    const { fetcher, gate, retry, fetchConfig, signal } = this.ctx;

    return retry.execute(
      url,
      async () => {
        try {
          return await gate.run(
            (timeoutSignal) => {
              state.attempts++;
              return fetcher.fetch(url, fetchConfig, timeoutSignal);
            },
            { url, timeoutMs: fetchConfig.timeoutMs, signal },
          );
        } catch (error) {
          if (error instanceof FetchError) {
            state.lastError = error;
          }
          throw error;
        }
      },
      signal,
    );
  }

  private handleFetchFailure(url: string, error: unknown, state: AttemptState): void {
    const { outcome, events } = this.ctx;

    if (error instanceof AdmissionAbortedError) {
      if (state.attempts === 0 || state.lastError === undefined) {
        const failure = outcome.recordNotAttempted(url, error.message);
        events.onPageFailed?.(failure);
        return;
      }
      // Shut down while waiting to retry: report the error that caused the retry
      this.recordFailure(url, state.lastError, state.attempts);
      return;
    }

    const classified = classifyFetchError(error, url);
    this.recordFailure(url, classified, state.attempts);
    if (classified instanceof ResourceFatalError) {
      this.ctx.onFatal(classified);
    }
  }

  private recordFailure(
    url: string,
    error: FetchError | ResourceFatalError,
    attempts: number,
  ): void {
    const failure: FailedUrl =
      error instanceof ResourceFatalError
        ? { url, errorClass: 'ResourceFatalError', message: error.message, attempts }
        : {
            url,
            errorClass: error.transient ? 'TransientFetchError' : 'PermanentFetchError',
            kind: error.kind,
            message: error.message,
            attempts,
          };
    this.ctx.outcome.recordFailure(failure);
    this.ctx.events.onPageFailed?.(failure);
  }

  /**
   * Run the extractor. A throwing extractor counts as an empty result.
   */
  private extract(url: string, page: RenderedPage): ExtractResult {
    try {
      return this.ctx.extractor.extract(page);
    } catch (error) {
      this.ctx.events.onExtractError?.(
        url,
        error instanceof ExtractionError
          ? error
          : new ExtractionError(`Failed to extract ${url}: ${errorMessage(error)}`, url, {
              cause: error,
            }),
      );
      return emptyExtractResult();
    }
  }
}
