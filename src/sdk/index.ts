import type {
  CrawlResult,
  DocsCrawlConfig,
  DocsCrawlOptions,
  FetchConfig,
} from '../types.js';
import { CONFIG_DEFAULTS, DEFAULT_FETCH_CONFIG } from '../types.js';
import { createFetcher } from '../fetcher/index.js';
import type { Fetcher } from '../fetcher/index.js';
import { createExtractor } from '../extractor/index.js';
import type { Extractor } from '../extractor/index.js';
import { FileSink } from '../output/file-sink.js';
import type { Sink } from '../output/file-sink.js';
import { writeCombinedFile } from '../output/single-file.js';
import { CrawlCoordinator } from '../crawler/coordinator.js';
import { UrlScope, createUrlKeyer } from '../crawler/base.js';

const WAIT_CONDITION_PATTERN = /^(load|domcontentloaded|networkidle|css:\S.*)$/;

/**
 * Collaborators `crawlDocs` would otherwise build itself. Tests and
 * embedders pass their own.
 */
export interface CrawlRuntime {
  fetcher?: Fetcher;
  extractor?: Extractor;
  /** Replaces the file sink; the combined file is then not written. */
  sink?: Sink;
  /** Aborting cancels the crawl. */
  signal?: AbortSignal;
}

function requirePositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new Error(`crawlDocs: "${name}" must be a positive integer, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    throw new Error(`crawlDocs: "${name}" must be a non-negative number, got ${value}`);
  }
}

/**
 * Validate the user-provided options and throw clear errors for invalid inputs.
 *
 * @throws Error prefixed with `crawlDocs:` for the first problem found
 */
function validateConfig(options: DocsCrawlOptions): void {
  if (!Array.isArray(options.urls) || options.urls.length === 0) {
    throw new Error('crawlDocs: "urls" must contain at least one seed URL');
  }
  for (const url of options.urls) {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error(`crawlDocs: invalid seed URL "${url}"`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`crawlDocs: seed URL must use http or https: "${url}"`);
    }
  }

  requirePositiveInteger('concurrency', options.concurrency);
  requirePositiveInteger('maxOpenPages', options.maxOpenPages);
  requirePositiveInteger('maxPages', options.maxPages);
  requirePositiveInteger('claimTimeoutMs', options.claimTimeoutMs);
  if (
    options.maxDepth !== undefined &&
    (!Number.isInteger(options.maxDepth) || options.maxDepth < 0)
  ) {
    throw new Error(
      `crawlDocs: "maxDepth" must be a non-negative integer, got ${options.maxDepth}`,
    );
  }
  requireNonNegative('delay', options.delay);
  requireNonNegative('retryDelay', options.retryDelay);

  if (options.queryPolicy !== undefined && !['strip', 'keep'].includes(options.queryPolicy)) {
    throw new Error(`crawlDocs: unknown query policy "${options.queryPolicy}"`);
  }
  if (
    options.outputStructure !== undefined &&
    !['mirror', 'flat'].includes(options.outputStructure)
  ) {
    throw new Error(`crawlDocs: unknown output structure "${options.outputStructure}"`);
  }

  const fetch = options.fetch ?? {};
  if (fetch.waitCondition !== undefined && !WAIT_CONDITION_PATTERN.test(fetch.waitCondition)) {
    throw new Error(
      `crawlDocs: invalid wait condition "${fetch.waitCondition}". ` +
        'Use load, domcontentloaded, networkidle or css:<selector>',
    );
  }
  requirePositiveInteger('fetch.timeoutMs', fetch.timeoutMs);
}

/**
 * Merge user options with CONFIG_DEFAULTS.
 *
 * Merge order (later wins):
 * 1. CONFIG_DEFAULTS
 * 2. User-provided values (`fetch` merged field by field)
 *
 * `allowedHosts` defaults to the hosts of the seed URLs.
 */
function mergeDefaults(options: DocsCrawlOptions): DocsCrawlConfig {
  const fetch: FetchConfig = { ...DEFAULT_FETCH_CONFIG, ...options.fetch };
  return {
    ...CONFIG_DEFAULTS,
    ...options,
    fetch,
    allowedHosts:
      options.allowedHosts ?? [...new Set(options.urls.map((url) => new URL(url).hostname))],
  };
}

/**
 * Validate and merge the user options into a full DocsCrawlConfig.
 */
export function validateAndMergeConfig(options: DocsCrawlOptions): DocsCrawlConfig {
  validateConfig(options);
  return mergeDefaults(options);
}

/**
 * Crawl documentation sites and write every page as markdown and JSON.
 *
 * This is the main SDK entry point. It validates the configuration,
 * builds the fetcher, extractor and file sink, runs the crawl coordinator
 * and, when `singleFile` is set, writes the combined file.
 *
 * The returned promise resolves for every crawl that ran, including
 * `fatal` and `cancelled` ones; check `outcome.status`.
 *
 * @example
 * ```typescript
 * const { outcome } = await crawlDocs({
 *   urls: ['https://docs.example.com/guide/'],
 *   fetch: { contentSelector: 'article, main' },
 * });
 * console.log(`${outcome.succeeded} pages`);
 * ```
 */
export async function crawlDocs(
  options: DocsCrawlOptions,
  runtime: CrawlRuntime = {},
): Promise<CrawlResult> {
  const config = validateAndMergeConfig(options);

  const fetcher =
    runtime.fetcher ??
    createFetcher({ respectRobots: config.respectRobots, headers: config.headers });
  const extractor =
    runtime.extractor ??
    createExtractor({
      linkSelector: config.linkSelector,
      onError: (error) => config.onExtractError?.(error.url, error),
    });
  let fileSink: FileSink | undefined;
  let sink: Sink;
  if (runtime.sink) {
    sink = runtime.sink;
  } else {
    fileSink = new FileSink({
      outputDir: config.outputDir,
      structure: config.outputStructure,
      writeJson: config.writeJson,
      sourceName: config.sourceName,
    });
    sink = fileSink;
  }

  const scope = new UrlScope({
    allowedHosts: config.allowedHosts,
    pathPrefix: config.pathPrefix,
    includePatterns: config.includePatterns,
    excludePatterns: config.excludePatterns,
  });

  const coordinator = new CrawlCoordinator({
    fetcher,
    extractor,
    sink,
    keyer: createUrlKeyer(config.queryPolicy, scope),
    maxOpenPages: config.maxOpenPages,
    maxPages: config.maxPages,
    maxDepth: config.maxDepth,
    claimTimeoutMs: config.claimTimeoutMs,
    delay: config.delay,
    retryDelay: config.retryDelay,
    events: {
      onPageFetched: config.onPageFetched,
      onPageFailed: config.onPageFailed,
      onPageSkipped: config.onPageSkipped,
      onPersistError: config.onPersistError,
      onExtractError: config.onExtractError,
      onStateChange: config.onStateChange,
      onFatal: config.onFatal,
    },
  });

  const outcome = await coordinator.run(
    config.urls,
    config.concurrency,
    config.fetch,
    runtime.signal,
  );

  const result: CrawlResult = { outcome, outputPath: config.outputDir };
  if (config.singleFile && fileSink && fileSink.pages.length > 0) {
    result.singleFilePath = await writeCombinedFile(fileSink.pages, config.outputDir);
  }
  return result;
}

export default crawlDocs;

// Re-export building blocks for advanced usage
export { createFetcher } from '../fetcher/index.js';
export type { Fetcher, HttpFetcherOptions } from '../fetcher/index.js';
export { createExtractor } from '../extractor/index.js';
export type { Extractor, ExtractResult, ExtractorOptions } from '../extractor/index.js';
export { FileSink, writeCombinedFile } from '../output/index.js';
export type { Sink } from '../output/index.js';
export { CrawlCoordinator, Frontier, normalizeUrl, UrlScope } from '../crawler/index.js';
export {
  FetchError,
  TransientFetchError,
  PermanentFetchError,
  ResourceFatalError,
  ExtractionError,
  PersistError,
} from '../fetcher/errors.js';
export { loadSourcesFile, resolveSource, presetToOptions } from '../sources/index.js';
export type { SourcePreset, SourcesFile } from '../sources/index.js';
export { CONFIG_DEFAULTS, DEFAULT_FETCH_CONFIG } from '../types.js';
export type {
  DocsCrawlConfig,
  DocsCrawlOptions,
  CrawlResult,
  CrawlOutcome,
  CrawlState,
  CrawlStatus,
  FetchConfig,
  FailedUrl,
  PageRecord,
  RenderedPage,
  WaitCondition,
} from '../types.js';
