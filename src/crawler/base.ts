import type { QueryPolicy } from '../types.js';

/** URL schemes that never produce a key. */
const EXCLUDED_SCHEMES = ['mailto:', 'javascript:', 'tel:', 'data:'];

/**
 * File extensions that are assets rather than documentation pages.
 */
export const DEFAULT_IGNORED_EXTENSIONS = [
  '.png', '.jpg', '.jpeg', '.gif', '.svg', '.ico', '.webp',
  '.css', '.js', '.mjs', '.map',
  '.zip', '.gz', '.tgz', '.tar', '.pdf',
  '.woff', '.woff2', '.ttf', '.mp3', '.mp4',
];

/**
 * Normalize a URL into the key used for deduplication.
 *
 * - Strips the fragment
 * - Applies the query policy (`strip` removes it, `keep` sorts parameters)
 * - Lowercases scheme and hostname, drops the default port
 * - Strips trailing slashes from the pathname (unless the path is just "/")
 *
 * Returns undefined for anything that is not an absolute http(s) URL, so
 * every input maps to at most one key. Normalizing a key again returns
 * the same key.
 */
export function normalizeUrl(
  url: string,
  queryPolicy: QueryPolicy = 'strip',
): string | undefined {
  const trimmed = url.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return undefined;
  }

  const lower = trimmed.toLowerCase();
  if (EXCLUDED_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
    return undefined;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return undefined;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return undefined;
  }

  parsed.hash = '';
  if (queryPolicy === 'strip') {
    parsed.search = '';
  } else {
    parsed.searchParams.sort();
    if ([...parsed.searchParams.keys()].length === 0) {
      parsed.search = '';
    }
  }

  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.href;
}

/**
 * Convert a glob-style pattern to a RegExp.
 *
 * Supports:
 * - `*` matches any characters except `/`
 * - `**` matches any characters including `/`
 * - `?` matches a single character
 * - All other regex special chars are escaped
 *
 * The pattern is matched against the URL's pathname.
 */
export function globToRegex(pattern: string): RegExp {
  let regexStr = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    if (char === '*' && pattern[i + 1] === '*') {
      regexStr += '.*';
      i += 2;
      // Skip a trailing slash after ** (e.g., /**/foo matches /a/b/foo)
      if (pattern[i] === '/') {
        regexStr += '(?:/|$)';
        i++;
      }
    } else if (char === '*') {
      regexStr += '[^/]*';
      i++;
    } else if (char === '?') {
      regexStr += '[^/]';
      i++;
    } else if ('.+^${}()|[]\\'.includes(char)) {
      regexStr += '\\' + char;
      i++;
    } else {
      regexStr += char;
      i++;
    }
  }
  return new RegExp('^' + regexStr + '$');
}

/**
 * Options describing which URL keys belong to a crawl.
 */
export interface UrlScopeOptions {
  /** Hostnames that may be crawled. Empty or missing means any host. */
  allowedHosts?: string[];
  /** Only follow URLs under this path (a path or a full URL). */
  pathPrefix?: string;
  /** Glob patterns; only pathnames matching at least one are in scope. */
  includePatterns?: string[];
  /** Glob patterns; pathnames matching any of these are out of scope. */
  excludePatterns?: string[];
  /** Pathname endings that mark asset URLs. */
  ignoredExtensions?: string[];
}

/**
 * Decides whether a normalized URL key is inside the crawl.
 */
export class UrlScope {
  private readonly hosts: Set<string>;
  private readonly pathPrefix: string | undefined;
  private readonly include: RegExp[];
  private readonly exclude: RegExp[];
  private readonly ignoredExtensions: string[];

  constructor(options: UrlScopeOptions = {}) {
    this.hosts = new Set(
      (options.allowedHosts ?? []).map((host) => host.toLowerCase()),
    );
    this.pathPrefix = resolvePathPrefix(options.pathPrefix);
    this.include = (options.includePatterns ?? []).map(globToRegex);
    this.exclude = (options.excludePatterns ?? []).map(globToRegex);
    this.ignoredExtensions = (
      options.ignoredExtensions ?? DEFAULT_IGNORED_EXTENSIONS
    ).map((ext) => ext.toLowerCase());
  }

  /**
   * Check a normalized key against hosts, prefix, patterns and extensions.
   */
  accepts(key: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(key);
    } catch {
      return false;
    }

    if (this.hosts.size > 0 && !this.hosts.has(parsed.hostname)) {
      return false;
    }

    const pathname = parsed.pathname;
    if (this.pathPrefix && !matchesPrefix(pathname, this.pathPrefix)) {
      return false;
    }

    const lowerPath = pathname.toLowerCase();
    if (this.ignoredExtensions.some((ext) => lowerPath.endsWith(ext))) {
      return false;
    }

    if (this.include.length > 0 && !this.include.some((re) => re.test(pathname))) {
      return false;
    }

    if (this.exclude.some((re) => re.test(pathname))) {
      return false;
    }

    return true;
  }
}

/**
 * Accept a prefix given either as a path or as a full URL, and give it
 * a leading slash.
 */
function resolvePathPrefix(prefix: string | undefined): string | undefined {
  if (!prefix) {
    return undefined;
  }
  let path = prefix;
  try {
    path = new URL(prefix).pathname;
  } catch {
    // not a URL, use as a path
  }
  return path.startsWith('/') ? path : '/' + path;
}

/**
 * Prefix match at a path boundary: `/docs` matches `/docs` and
 * `/docs/api` but not `/docsearch`.
 */
function matchesPrefix(pathname: string, prefix: string): boolean {
  if (!pathname.startsWith(prefix)) {
    // `/docs/` as a prefix still matches the normalized `/docs`
    return prefix.endsWith('/') && pathname === prefix.slice(0, -1);
  }
  return (
    pathname.length === prefix.length ||
    prefix.endsWith('/') ||
    pathname[prefix.length] === '/'
  );
}

/**
 * Build the key function used by the frontier: normalize, then apply the
 * scope. Returns undefined for rejected URLs.
 */
export function createUrlKeyer(
  queryPolicy: QueryPolicy,
  scope: UrlScope = new UrlScope(),
): (url: string) => string | undefined {
  return (url: string) => {
    const key = normalizeUrl(url, queryPolicy);
    if (key === undefined || !scope.accepts(key)) {
      return undefined;
    }
    return key;
  };
}
