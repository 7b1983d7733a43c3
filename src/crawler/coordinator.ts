import type {
  CrawlOutcome,
  CrawlState,
  CrawlStatus,
  DocsCrawlConfig,
  FetchConfig,
} from '../types.js';
import type { Fetcher } from '../fetcher/index.js';
import type { Extractor } from '../extractor/index.js';
import type { Sink } from '../output/file-sink.js';
import { AdmissionGate } from '../fetcher/admission-gate.js';
import { RetryPolicy } from '../fetcher/retry.js';
import { ResourceFatalError } from '../fetcher/errors.js';
import { Frontier } from './frontier.js';
import { OutcomeRecorder } from './outcome.js';
import { CrawlWorker, type WorkerEvents } from './worker.js';

/**
 * Events the coordinator reports, in addition to the per-page ones.
 */
export type CoordinatorEvents = WorkerEvents &
  Pick<DocsCrawlConfig, 'onPageSkipped' | 'onStateChange' | 'onFatal'>;

/**
 * Collaborators and limits for one crawl.
 */
export interface CoordinatorOptions {
  fetcher: Fetcher;
  extractor: Extractor;
  sink: Sink;
  /** Maps a raw URL to its key; undefined drops it. */
  keyer?: (url: string) => string | undefined;
  /** Fetch slots open at once. Defaults to 3. */
  maxOpenPages?: number;
  maxPages?: number;
  maxDepth?: number;
  /** Idle claim timeout in milliseconds. Defaults to 1000. */
  claimTimeoutMs?: number;
  /** Politeness delay before each attempt in milliseconds. */
  delay?: number;
  /** Minimum back-off before the retry in milliseconds. */
  retryDelay?: number;
  /** Retries after a transient failure. Defaults to 1. */
  maxRetries?: number;
  events?: CoordinatorEvents;
}

/**
 * Runs a crawl with a pool of workers over one shared frontier.
 *
 * Lifecycle: `seeding` -> `running` -> `draining` -> `terminated`.
 *
 * A crawl ends in one of three ways:
 * - completed: the frontier saw its last active worker release with an
 *   empty queue
 * - fatal: a worker reported a `ResourceFatalError`
 * - cancelled: the caller's signal aborted
 *
 * The last two take the forced path once: the shared signal aborts, the
 * frontier closes, gate waiters give up, and URLs still queued are
 * reported as not attempted. Fetches already running are left to finish.
 * The fetcher is closed in every case.
 */
export class CrawlCoordinator {
  readonly frontier: Frontier;
  readonly gate: AdmissionGate;
  private readonly retry: RetryPolicy;
  private readonly outcome = new OutcomeRecorder();
  private readonly controller = new AbortController();
  private readonly events: CoordinatorEvents;
  private currentState: CrawlState = 'seeding';
  private started = false;
  private forcedError: Error | undefined;

  constructor(private readonly options: CoordinatorOptions) {
    this.events = options.events ?? {};
    this.gate = new AdmissionGate({ maxOpen: options.maxOpenPages ?? 3 });
    this.retry = new RetryPolicy({
      delay: options.delay ?? 0,
      retryDelay: options.retryDelay ?? 500,
      maxRetries: options.maxRetries ?? 1,
    });
    this.frontier = new Frontier({
      keyer: options.keyer,
      maxPages: options.maxPages,
      maxDepth: options.maxDepth,
      onSkipped: (url, reason) => {
        this.outcome.recordSkipped(url, reason);
        this.events.onPageSkipped?.(url, reason);
      },
      onReadmitted: (url) => this.outcome.withdrawSkipped(url),
    });
  }

  get state(): CrawlState {
    return this.currentState;
  }

  /**
   * Crawl from the given seeds.
   *
   * @param seedUrls - Offered at depth 0, in order
   * @param poolSize - Number of workers
   * @param fetchConfig - Options passed to every fetch
   * @param signal - Aborting cancels the crawl
   */
  async run(
    seedUrls: readonly string[],
    poolSize: number,
    fetchConfig: FetchConfig,
    signal?: AbortSignal,
  ): Promise<CrawlOutcome> {
    if (this.started) {
      throw new Error('CrawlCoordinator.run() can only be called once');
    }
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new Error(`CrawlCoordinator: poolSize must be a positive integer, got ${poolSize}`);
    }
    this.started = true;

    const startTime = Date.now();
    const onAbort = () => {
      this.forceShutdown('cancelled', new Error('Crawl cancelled'));
    };

    this.transition('seeding');
    try {
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      for (const seed of seedUrls) {
        this.frontier.offer(seed, 0);
      }
      await this.applyCrawlDelay(seedUrls);

      const context = {
        frontier: this.frontier,
        fetcher: this.options.fetcher,
        extractor: this.options.extractor,
        sink: this.options.sink,
        gate: this.gate,
        retry: this.retry,
        outcome: this.outcome,
        fetchConfig,
        claimTimeoutMs: this.options.claimTimeoutMs ?? 1_000,
        signal: this.controller.signal,
        onFatal: (error: ResourceFatalError) => this.forceShutdown('fatal', error),
        events: this.events,
      };
      const workers = Array.from(
        { length: poolSize },
        (_, id) => new CrawlWorker(id, context),
      );

      this.transition('running');
      const loops = workers.map((worker) => worker.run());
      // Nothing to crawl (no seeds, or all seeds rejected)
      this.frontier.checkCompletion();

      await this.frontier.whenClosed();
      this.transition('draining');
      await Promise.all(loops);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.options.fetcher.close();
    }

    for (const entry of this.frontier.drain()) {
      const failure = this.outcome.recordNotAttempted(
        entry.url,
        `Not attempted: crawl stopped (${this.frontier.closeReason ?? 'closed'})`,
      );
      this.events.onPageFailed?.(failure);
    }

    this.transition('terminated');
    return this.outcome.build(
      this.status(),
      Date.now() - startTime,
      this.forcedError?.message,
    );
  }

  /**
   * Take the forced shutdown path. Only the first call has an effect, and
   * none once the crawl has completed.
   */
  forceShutdown(status: Exclude<CrawlStatus, 'completed'>, error: Error): void {
    if (!this.frontier.shutdown(status)) {
      return;
    }
    this.forcedError = error;
    this.controller.abort(error);
    this.gate.clear();
    if (status === 'fatal') {
      this.events.onFatal?.(error);
    }
  }

  private status(): CrawlStatus {
    return this.frontier.closeReason ?? 'completed';
  }

  /**
   * Raise the politeness delay to the largest crawl delay the seeds'
   * origins ask for.
   */
  private async applyCrawlDelay(seedUrls: readonly string[]): Promise<void> {
    const { fetcher } = this.options;
    if (!fetcher.getCrawlDelay) {
      return;
    }
    const origins = new Map<string, string>();
    for (const seed of seedUrls) {
      let origin: string;
      try {
        origin = new URL(seed).origin;
      } catch {
        // malformed seeds were already dropped by the frontier
        continue;
      }
      origins.set(origin, seed);
    }
    for (const seed of origins.values()) {
      const seconds = await fetcher.getCrawlDelay(seed);
      if (seconds !== undefined && seconds > 0) {
        this.retry.setDelayFloor(seconds * 1000);
      }
    }
  }

  private transition(next: CrawlState): void {
    this.currentState = next;
    this.events.onStateChange?.(next);
  }
}
