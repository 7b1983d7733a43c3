import type {
  CrawlOutcome,
  CrawlStatus,
  FailedUrl,
  PersistFailure,
  SkippedUrl,
} from '../types.js';

/**
 * Collects per-URL results while a crawl runs and assembles the
 * CrawlOutcome at the end.
 *
 * `attempted` counts URLs whose fetch was started at least once:
 * successes plus failures other than `NotAttempted`.
 */
export class OutcomeRecorder {
  private readonly pages: string[] = [];
  private readonly failures: FailedUrl[] = [];
  private readonly skippedUrls: SkippedUrl[] = [];
  private readonly persistFailures: PersistFailure[] = [];

  recordSuccess(url: string): void {
    this.pages.push(url);
  }

  recordFailure(failure: FailedUrl): void {
    this.failures.push(failure);
  }

  recordNotAttempted(url: string, message: string): FailedUrl {
    const failure: FailedUrl = {
      url,
      errorClass: 'NotAttempted',
      message,
      attempts: 0,
    };
    this.failures.push(failure);
    return failure;
  }

  recordSkipped(url: string, reason: string): void {
    this.skippedUrls.push({ url, reason });
  }

  /** Drop a skip entry for a URL that was enqueued after all. */
  withdrawSkipped(url: string): void {
    const index = this.skippedUrls.findIndex((entry) => entry.url === url);
    if (index !== -1) {
      this.skippedUrls.splice(index, 1);
    }
  }

  recordPersistFailure(url: string, message: string): void {
    this.persistFailures.push({ url, message });
  }

  get succeededCount(): number {
    return this.pages.length;
  }

  get failedCount(): number {
    return this.failures.filter((f) => f.errorClass !== 'NotAttempted').length;
  }

  /**
   * Build the terminal outcome.
   *
   * @param status - How the crawl ended
   * @param duration - Wall time in milliseconds
   * @param error - Message of the error that forced shutdown
   */
  build(status: CrawlStatus, duration: number, error?: string): CrawlOutcome {
    const failed = this.failedCount;
    const notAttempted = this.failures.length - failed;
    const outcome: CrawlOutcome = {
      status,
      attempted: this.pages.length + failed,
      succeeded: this.pages.length,
      failed,
      skipped: this.skippedUrls.length,
      notAttempted,
      pages: [...this.pages],
      failures: [...this.failures],
      skippedUrls: [...this.skippedUrls],
      persistFailures: [...this.persistFailures],
      stats: { duration },
    };
    if (error !== undefined) {
      outcome.error = error;
    }
    return outcome;
  }
}
