import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const robotsParser = require('robots-parser') as (
  url: string,
  robotstxt: string,
) => Robot;

/**
 * Parsed robots.txt instance from robots-parser library.
 */
export interface Robot {
  isAllowed(url: string, ua?: string): boolean | undefined;
  getCrawlDelay(ua?: string): number | undefined;
}

/**
 * Cached robots.txt data for a domain.
 */
export interface RobotsCacheEntry {
  /** The parsed robots.txt instance */
  robot: Robot;
  /** Crawl-delay in seconds, if specified */
  crawlDelay: number | undefined;
}

/**
 * Cache of robots.txt lookups, keyed by origin (e.g., "https://example.com").
 *
 * Values are promises so that workers asking for the same origin at the
 * same time share a single robots.txt request.
 */
export type RobotsCache = Map<string, Promise<RobotsCacheEntry>>;

/**
 * Default user agent string for requests and robots.txt matching.
 */
export const DEFAULT_USER_AGENT = 'docs-crawl/1.0';

/** Timeout for robots.txt requests in milliseconds. */
const ROBOTS_TIMEOUT_MS = 10_000;

/**
 * Extract the origin from a URL string (protocol + hostname + port).
 */
export function getOrigin(url: string): string {
  return new URL(url).origin;
}

/**
 * Fetch and parse robots.txt for a given origin.
 * If the fetch fails (404, timeout, network error), returns an "allow all" entry.
 *
 * @param origin - The domain origin (e.g., "https://example.com")
 * @param userAgent - User agent string for the fetch request
 * @param timeoutMs - Timeout for the robots.txt fetch in milliseconds
 */
export async function fetchRobotsTxt(
  origin: string,
  userAgent: string,
  timeoutMs: number = ROBOTS_TIMEOUT_MS,
): Promise<RobotsCacheEntry> {
  const robotsUrl = `${origin}/robots.txt`;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(robotsUrl, {
      signal: controller.signal,
      headers: { 'User-Agent': userAgent },
    });

    if (!response.ok) {
      return allowAll(robotsUrl);
    }

    const robot = robotsParser(robotsUrl, await response.text());
    return { robot, crawlDelay: robot.getCrawlDelay(userAgent) };
  } catch {
    // Unreachable robots.txt means no restrictions
    return allowAll(robotsUrl);
  } finally {
    clearTimeout(timeout);
  }
}

function allowAll(robotsUrl: string): RobotsCacheEntry {
  return { robot: robotsParser(robotsUrl, ''), crawlDelay: undefined };
}

/**
 * Look up (and cache) the robots.txt entry for a URL's origin.
 */
export function getRobotsEntry(
  url: string,
  cache: RobotsCache,
  userAgent: string,
): Promise<RobotsCacheEntry> {
  const origin = getOrigin(url);
  let entry = cache.get(origin);
  if (!entry) {
    entry = fetchRobotsTxt(origin, userAgent);
    cache.set(origin, entry);
  }
  return entry;
}

/**
 * Check if a URL is allowed by robots.txt.
 *
 * @returns true if the URL is allowed, false if disallowed
 */
export async function isUrlAllowed(
  url: string,
  cache: RobotsCache,
  userAgent: string,
): Promise<boolean> {
  const entry = await getRobotsEntry(url, cache, userAgent);
  // robots-parser returns undefined for URLs not matching any rule => allowed
  return entry.robot.isAllowed(url, userAgent) !== false;
}
