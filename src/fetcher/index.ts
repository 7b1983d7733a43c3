import type { FetchConfig, RenderedPage } from '../types.js';
import {
  type RobotsCache,
  DEFAULT_USER_AGENT,
  getRobotsEntry,
  isUrlAllowed,
} from './robots.js';
import {
  PermanentFetchError,
  ResourceFatalError,
  TransientFetchError,
  errorForStatus,
} from './errors.js';
import { inlineFrames, waitConditionMet } from './render.js';

/**
 * The page-fetching capability the crawl coordinator depends on.
 *
 * One Fetcher is one shared browsing resource: every worker calls the same
 * instance, and the admission gate caps how many calls are open at once.
 */
export interface Fetcher {
  /**
   * Fetch a URL and return the rendered page.
   *
   * Rejects with a `FetchError` for per-page failures and with a
   * `ResourceFatalError` when the resource itself is unusable.
   */
  fetch(url: string, config: FetchConfig, signal?: AbortSignal): Promise<RenderedPage>;
  /** Crawl delay in seconds requested by the URL's origin, if any. */
  getCrawlDelay?(url: string): Promise<number | undefined>;
  /** Release the resource. Later fetches reject with ResourceFatalError. */
  close(): void;
}

/**
 * Options for the HTTP fetcher.
 */
export interface HttpFetcherOptions {
  respectRobots: boolean;
  headers?: Record<string, string>;
}

/** Maximum number of redirects to follow. */
const MAX_REDIRECTS = 5;

/** Content types considered as HTML. */
const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Convert a Response's headers to a plain object.
 */
function responseHeadersToRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * Create a Fetcher backed by the global `fetch`.
 *
 * The session shares one robots.txt cache and one set of request headers
 * across all workers. Frames are inlined when `renderFrames` is set and a
 * `css:` wait condition must match in the fetched document.
 *
 * @param options - Robots and header options
 * @returns A Fetcher instance
 */
export function createFetcher(options: HttpFetcherOptions): Fetcher {
  const robotsCache: RobotsCache = new Map();
  const userAgent =
    options.headers?.['User-Agent'] ??
    options.headers?.['user-agent'] ??
    DEFAULT_USER_AGENT;
  const requestHeaders: Record<string, string> = {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
    ...options.headers,
  };
  let closed = false;

  /**
   * Perform the raw HTTP fetch for a URL, following redirects.
   */
  async function rawFetch(
    url: string,
    signal: AbortSignal | undefined,
    timeoutMs: number,
  ): Promise<{ response: Response; finalUrl: string }> {
    let currentUrl = url;

    for (let redirectCount = 0; ; redirectCount++) {
      let response: Response;
      try {
        response = await fetch(currentUrl, {
          headers: requestHeaders,
          signal,
          redirect: 'manual',
        });
      } catch (error) {
        if (closed) {
          throw new ResourceFatalError(`Fetcher closed while fetching ${url}`, { cause: error });
        }
        if (error instanceof Error && error.name === 'AbortError') {
          throw new TransientFetchError(
            `Request timed out after ${timeoutMs}ms: ${currentUrl}`,
            url,
            'Timeout',
          );
        }
        throw new TransientFetchError(
          `Network error fetching ${currentUrl}: ${error instanceof Error ? error.message : String(error)}`,
          url,
          'NetworkError',
        );
      }

      const status = response.status;
      if (status < 300 || status >= 400) {
        return { response, finalUrl: currentUrl };
      }

      const location = response.headers.get('location');
      if (!location) {
        throw new PermanentFetchError(
          `Redirect response missing Location header: ${currentUrl}`,
          url,
          'HttpError',
          status,
        );
      }
      if (redirectCount === MAX_REDIRECTS) {
        throw new PermanentFetchError(
          `Too many redirects (max ${MAX_REDIRECTS}): ${url}`,
          url,
          'HttpError',
          status,
        );
      }
      currentUrl = new URL(location, currentUrl).href;
    }
  }

  /**
   * Fetch an HTML document and read its body.
   */
  async function fetchHtml(
    url: string,
    signal: AbortSignal | undefined,
    timeoutMs: number,
  ): Promise<{ html: string; finalUrl: string; response: Response }> {
    const { response, finalUrl } = await rawFetch(url, signal, timeoutMs);

    if (!response.ok) {
      throw errorForStatus(response.status, url, responseHeadersToRecord(response));
    }

    const contentType = response.headers.get('content-type') ?? '';
    const isHtml = HTML_CONTENT_TYPES.some((type) =>
      contentType.toLowerCase().includes(type),
    );
    if (!isHtml) {
      throw new PermanentFetchError(
        `Non-HTML content type (${contentType}): ${finalUrl}`,
        url,
        'HttpError',
        response.status,
      );
    }

    return { html: await response.text(), finalUrl, response };
  }

  return {
    async fetch(url: string, config: FetchConfig, signal?: AbortSignal): Promise<RenderedPage> {
      if (closed) {
        throw new ResourceFatalError(`Fetcher is closed: cannot fetch ${url}`);
      }

      if (options.respectRobots) {
        const allowed = await isUrlAllowed(url, robotsCache, userAgent);
        if (!allowed) {
          throw new PermanentFetchError(`URL disallowed by robots.txt: ${url}`, url, 'Blocked');
        }
      }

      const { html: pageHtml, finalUrl, response } = await fetchHtml(
        url,
        signal,
        config.timeoutMs,
      );

      let html = pageHtml;
      if (config.renderFrames) {
        html = await inlineFrames(html, finalUrl, async (frameUrl) => {
          const frame = await fetchHtml(frameUrl, signal, config.timeoutMs);
          return frame.html;
        });
      }

      if (!waitConditionMet(html, config.waitCondition)) {
        throw new TransientFetchError(
          `Wait condition "${config.waitCondition}" not met: ${finalUrl}`,
          url,
          'Timeout',
        );
      }

      return {
        url: finalUrl,
        requestedUrl: url,
        html,
        statusCode: response.status,
        headers: responseHeadersToRecord(response),
        fetchedAt: new Date(),
        contentSelector: config.contentSelector,
      };
    },

    async getCrawlDelay(url: string): Promise<number | undefined> {
      if (!options.respectRobots) {
        return undefined;
      }
      const entry = await getRobotsEntry(url, robotsCache, userAgent);
      return entry.crawlDelay;
    },

    close(): void {
      closed = true;
      robotsCache.clear();
    },
  };
}

// Re-export types and utilities for external use
export { DEFAULT_USER_AGENT, getOrigin } from './robots.js';
export type { RobotsCache, RobotsCacheEntry } from './robots.js';
export {
  FetchError,
  TransientFetchError,
  PermanentFetchError,
  ResourceFatalError,
  ExtractionError,
  PersistError,
  classifyFetchError,
  errorForStatus,
} from './errors.js';
export type { FetchErrorKind } from './errors.js';
export { AdmissionGate, AdmissionAbortedError } from './admission-gate.js';
export type { AdmissionGateConfig, GateRunOptions } from './admission-gate.js';
export { RetryPolicy } from './retry.js';
export type { RetryPolicyConfig } from './retry.js';
export { inlineFrames, waitConditionMet } from './render.js';
