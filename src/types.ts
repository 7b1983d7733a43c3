/**
 * How long the fetcher waits before a page counts as loaded.
 *
 * `css:<selector>` waits until the selector matches in the document.
 */
export type WaitCondition =
  | 'load'
  | 'domcontentloaded'
  | 'networkidle'
  | `css:${string}`;

/**
 * Per-fetch options handed to the fetcher on every call.
 */
export interface FetchConfig {
  waitCondition: WaitCondition;
  /** Restricts extraction to a subtree. A comma list is tried in order. */
  contentSelector?: string;
  /** Upper bound on a single fetch in milliseconds. */
  timeoutMs: number;
  /** Whether same-origin iframes are fetched and inlined. */
  renderFrames: boolean;
}

/**
 * A page as returned by the fetcher, after redirects and frame rendering.
 */
export interface RenderedPage {
  /** Final URL after redirects. */
  url: string;
  /** URL the fetch was requested for. */
  requestedUrl: string;
  html: string;
  statusCode: number;
  headers: Record<string, string>;
  fetchedAt: Date;
  /** Content selector that was in effect for this fetch. */
  contentSelector?: string;
}

/**
 * The content payload extracted from a page.
 */
export interface ContentRecord {
  title: string;
  markdown: string;
  text: string;
}

/**
 * An outbound navigation entry discovered on a page.
 */
export interface NavLink {
  /** Absolute URL, fragment preserved (the frontier normalizes it). */
  href: string;
  text: string;
}

/**
 * Everything persisted for one successfully processed URL.
 */
export interface PageRecord {
  readonly url: string;
  readonly record: ContentRecord;
  readonly links: readonly NavLink[];
  readonly fetchedAt: Date;
}

/**
 * Error classes reported per URL in the crawl outcome.
 */
export type FailureClass =
  | 'TransientFetchError'
  | 'PermanentFetchError'
  | 'ResourceFatalError'
  | 'NotAttempted';

/**
 * A URL that was claimed (or left queued) and did not produce a page.
 */
export interface FailedUrl {
  url: string;
  errorClass: FailureClass;
  /** Fetch error kind (`Timeout`, `NotFound`, ...), when there is one. */
  kind?: string;
  message: string;
  attempts: number;
}

/**
 * A URL refused at enqueue time by the page cap or the depth limit.
 */
export interface SkippedUrl {
  url: string;
  reason: string;
}

/**
 * A page that was fetched and extracted but could not be written.
 */
export interface PersistFailure {
  url: string;
  message: string;
}

export type CrawlStatus = 'completed' | 'cancelled' | 'fatal';

/**
 * Coordinator lifecycle: seeding -> running -> draining -> terminated.
 */
export type CrawlState = 'seeding' | 'running' | 'draining' | 'terminated';

/**
 * Terminal summary of a crawl run.
 */
export interface CrawlOutcome {
  status: CrawlStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  notAttempted: number;
  /** Keys of pages processed successfully, in completion order. */
  pages: string[];
  failures: FailedUrl[];
  skippedUrls: SkippedUrl[];
  persistFailures: PersistFailure[];
  /** Message of the error that forced shutdown, for `fatal` and `cancelled`. */
  error?: string;
  stats: {
    duration: number;
  };
}

/**
 * Whether the query string is part of a URL key.
 *
 * - `strip`: the query is removed
 * - `keep`: the query is kept with parameters sorted by name
 */
export type QueryPolicy = 'strip' | 'keep';

/**
 * Full configuration interface for docs-crawl.
 */
export interface DocsCrawlConfig {
  // Seeds
  urls: string[];

  // Pool
  concurrency: number;
  maxOpenPages: number;
  claimTimeoutMs: number;

  // Scope
  maxPages: number;
  maxDepth: number;
  queryPolicy: QueryPolicy;
  allowedHosts?: string[];
  pathPrefix?: string;
  includePatterns?: string[];
  excludePatterns?: string[];

  // Fetching
  fetch: FetchConfig;
  delay: number;
  retryDelay: number;
  respectRobots: boolean;
  headers?: Record<string, string>;

  // Extraction
  linkSelector: string;

  // Output
  outputDir: string;
  outputStructure: 'mirror' | 'flat';
  writeJson: boolean;
  singleFile?: boolean;
  /** Name recorded in each JSON document's metadata. Defaults to the hostname. */
  sourceName?: string;

  // Events
  onPageFetched?: (page: PageRecord) => void;
  onPageFailed?: (failure: FailedUrl) => void;
  onPageSkipped?: (url: string, reason: string) => void;
  onPersistError?: (url: string, error: Error) => void;
  onExtractError?: (url: string, error: Error) => void;
  onStateChange?: (state: CrawlState) => void;
  onFatal?: (error: Error) => void;
}

/**
 * What `crawlDocs` accepts: seeds plus any subset of the other settings.
 * `fetch` options are merged field by field over the defaults.
 */
export type DocsCrawlOptions = Partial<Omit<DocsCrawlConfig, 'urls' | 'fetch'>> & {
  urls: string[];
  fetch?: Partial<FetchConfig>;
};

/**
 * Result returned from `crawlDocs`.
 */
export interface CrawlResult {
  outcome: CrawlOutcome;
  outputPath: string;
  singleFilePath?: string;
}

/**
 * Default per-fetch options.
 */
export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  waitCondition: 'load',
  timeoutMs: 30_000,
  renderFrames: false,
};

/**
 * Default configuration values. Applied when merging user-provided
 * partial config into a full DocsCrawlConfig.
 */
export const CONFIG_DEFAULTS = {
  concurrency: 3,
  maxOpenPages: 3,
  claimTimeoutMs: 1_000,
  maxPages: 500,
  maxDepth: 10,
  queryPolicy: 'strip',
  fetch: DEFAULT_FETCH_CONFIG,
  delay: 0,
  retryDelay: 500,
  respectRobots: true,
  linkSelector: 'a[href]',
  outputDir: './output',
  outputStructure: 'mirror',
  writeJson: true,
} satisfies Partial<DocsCrawlConfig>;
