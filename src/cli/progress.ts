import type {
  CrawlResult,
  CrawlState,
  CrawlStatus,
  FailedUrl,
  PageRecord,
} from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Event callbacks the CLI attaches to the crawl config.
 */
export interface ProgressCallbacks {
  onPageFetched: (page: PageRecord) => void;
  onPageFailed: (failure: FailedUrl) => void;
  onPageSkipped: (url: string, reason: string) => void;
  onPersistError: (url: string, error: Error) => void;
  onExtractError: (url: string, error: Error) => void;
  onStateChange: (state: CrawlState) => void;
  onFatal: (error: Error) => void;
}

/**
 * Create event callback handlers for progress display during crawling.
 *
 * Everything goes to stderr so it does not interfere with stdout.
 *
 * - quiet mode: only the fatal error
 * - normal mode: page count and URL per page, failures and write errors
 * - verbose mode: adds title, size and link count, skipped URLs, not
 *   attempted URLs, extraction errors and state changes
 *
 * @param verbosity - The desired output verbosity
 */
export function createProgressCallbacks(verbosity: Verbosity): ProgressCallbacks {
  let fetchedCount = 0;
  const write = (line: string) => {
    process.stderr.write(`${line}\n`);
  };
  const onFatal = (error: Error) => {
    write(`Fatal: ${error.message}`);
  };

  if (verbosity === 'quiet') {
    return {
      onPageFetched: () => {
        fetchedCount++;
      },
      onPageFailed: () => {},
      onPageSkipped: () => {},
      onPersistError: () => {},
      onExtractError: () => {},
      onStateChange: () => {},
      onFatal,
    };
  }

  const verbose = verbosity === 'verbose';

  return {
    onPageFetched: (page: PageRecord) => {
      fetchedCount++;
      if (verbose) {
        const title = page.record.title ? ` "${page.record.title}"` : '';
        write(
          `[${fetchedCount}] Fetched: ${page.url}${title} (${page.record.markdown.length} chars, ${page.links.length} links)`,
        );
      } else {
        write(`[${fetchedCount}] ${page.url}`);
      }
    },

    onPageFailed: (failure: FailedUrl) => {
      if (failure.errorClass === 'NotAttempted') {
        if (verbose) {
          write(`  Not attempted: ${failure.url}`);
        }
        return;
      }
      write(`  Failed: ${failure.url} - ${failure.message}`);
    },

    onPageSkipped: (url: string, reason: string) => {
      if (verbose) {
        write(`  Skipped: ${url} (${reason})`);
      }
    },

    onPersistError: (url: string, error: Error) => {
      write(`  Write error: ${url} - ${error.message}`);
    },

    onExtractError: (url: string, error: Error) => {
      if (verbose) {
        write(`  Extraction error: ${url} - ${error.message}`);
      }
    },

    onStateChange: (state: CrawlState) => {
      if (verbose) {
        write(`State: ${state}`);
      }
    },

    onFatal,
  };
}

/**
 * Process exit code for a crawl status.
 */
export function exitCodeFor(status: CrawlStatus): number {
  switch (status) {
    case 'completed':
      return 0;
    case 'fatal':
      return 2;
    case 'cancelled':
      return 130;
    default: {
      const _exhaustive: never = status;
      throw new Error(`Unknown crawl status: ${_exhaustive}`);
    }
  }
}

/**
 * Print a summary of the crawl results to stderr.
 *
 * @param result - The crawl result to summarize
 * @param verbosity - The desired output verbosity
 */
export function printSummary(result: CrawlResult, verbosity: Verbosity): void {
  const { outcome } = result;
  if (verbosity === 'quiet') {
    return;
  }

  const durationSec = (outcome.stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(`Done! Crawled ${outcome.succeeded} pages`);
  if (outcome.failed > 0) {
    process.stderr.write(`, failed ${outcome.failed}`);
  }
  if (outcome.skipped > 0) {
    process.stderr.write(`, skipped ${outcome.skipped}`);
  }
  if (outcome.notAttempted > 0) {
    process.stderr.write(`, not attempted ${outcome.notAttempted}`);
  }
  process.stderr.write(` in ${durationSec}s\n`);

  if (outcome.status !== 'completed') {
    const reason = outcome.error ? ` (${outcome.error})` : '';
    process.stderr.write(`Status: ${outcome.status}${reason}\n`);
  }
  if (outcome.persistFailures.length > 0) {
    process.stderr.write(`Write errors: ${outcome.persistFailures.length}\n`);
  }
  process.stderr.write(`Output: ${result.outputPath}\n`);
  if (result.singleFilePath) {
    process.stderr.write(`Single file: ${result.singleFilePath}\n`);
  }

  if (verbosity === 'verbose') {
    const attempted = outcome.failures.filter((f) => f.errorClass !== 'NotAttempted');
    for (const failure of attempted) {
      const kind = failure.kind ? `${failure.kind}, ` : '';
      process.stderr.write(
        `  ${failure.url} [${kind}${failure.attempts} attempt(s)]: ${failure.message}\n`,
      );
    }
  }
}

/**
 * Print dry-run information showing what would be fetched.
 *
 * @param urls - The seed URLs
 * @param config - Key configuration values to display
 */
export function printDryRun(
  urls: string[],
  config: {
    concurrency: number;
    maxOpenPages: number;
    maxDepth: number;
    maxPages: number;
    outputDir: string;
    respectRobots: boolean;
    source?: string;
    contentSelector?: string;
    waitCondition?: string;
    includePatterns?: string[];
    excludePatterns?: string[];
    pathPrefix?: string;
  },
): void {
  process.stderr.write('\n--- Dry Run ---\n');
  for (const url of urls) {
    process.stderr.write(`URL: ${url}\n`);
  }
  if (config.source) {
    process.stderr.write(`Source: ${config.source}\n`);
  }
  process.stderr.write(`Workers: ${config.concurrency}\n`);
  process.stderr.write(`Open pages: ${config.maxOpenPages}\n`);
  process.stderr.write(`Max depth: ${config.maxDepth}\n`);
  process.stderr.write(`Max pages: ${config.maxPages}\n`);
  process.stderr.write(`Output: ${config.outputDir}\n`);
  process.stderr.write(`Respect robots.txt: ${config.respectRobots}\n`);
  if (config.contentSelector) {
    process.stderr.write(`Content selector: ${config.contentSelector}\n`);
  }
  if (config.waitCondition) {
    process.stderr.write(`Wait for: ${config.waitCondition}\n`);
  }
  if (config.includePatterns && config.includePatterns.length > 0) {
    process.stderr.write(`Include patterns: ${config.includePatterns.join(', ')}\n`);
  }
  if (config.excludePatterns && config.excludePatterns.length > 0) {
    process.stderr.write(`Exclude patterns: ${config.excludePatterns.join(', ')}\n`);
  }
  if (config.pathPrefix) {
    process.stderr.write(`Path prefix: ${config.pathPrefix}\n`);
  }
  process.stderr.write('--- No pages will be fetched ---\n');
}
