/**
 * Kinds of fetch failure a fetcher can report.
 *
 * - `Timeout`, `NetworkError`: transient, retried once
 * - `NotFound`, `Blocked`, `HttpError`: permanent, never retried
 */
export type FetchErrorKind =
  | 'Timeout'
  | 'NetworkError'
  | 'NotFound'
  | 'Blocked'
  | 'HttpError';

const TRANSIENT_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  'Timeout',
  'NetworkError',
]);

/**
 * Error thrown when a fetch operation fails in an expected way.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly kind: FetchErrorKind,
    public readonly statusCode?: number,
    public readonly headers?: Record<string, string>,
  ) {
    super(message);
    this.name = 'FetchError';
  }

  /** Whether another attempt may succeed. */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

/**
 * A timeout or network blip. Retried once, then recorded as failed.
 */
export class TransientFetchError extends FetchError {
  constructor(
    message: string,
    url: string,
    kind: 'Timeout' | 'NetworkError',
    statusCode?: number,
  ) {
    super(message, url, kind, statusCode);
    this.name = 'TransientFetchError';
  }
}

/**
 * Not found, blocked or otherwise refused. Recorded as failed, no retry.
 */
export class PermanentFetchError extends FetchError {
  constructor(
    message: string,
    url: string,
    kind: 'NotFound' | 'Blocked' | 'HttpError',
    statusCode?: number,
    headers?: Record<string, string>,
  ) {
    super(message, url, kind, statusCode, headers);
    this.name = 'PermanentFetchError';
  }
}

/**
 * The shared fetch resource itself is unusable. The only error that ends
 * a crawl early.
 */
export class ResourceFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceFatalError';
  }
}

/**
 * Raised inside the extractor. Callers treat it as an empty result.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * A sink could not write a page. Logged, never fatal.
 */
export class PersistError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistError';
  }
}

/**
 * Map an HTTP status code to a fetch error for the given URL.
 */
export function errorForStatus(
  status: number,
  url: string,
  headers?: Record<string, string>,
): FetchError {
  const message = `HTTP ${status} for ${url}`;
  if (status === 404 || status === 410) {
    return new PermanentFetchError(message, url, 'NotFound', status, headers);
  }
  if (status === 401 || status === 403 || status === 429 || status === 451) {
    return new PermanentFetchError(message, url, 'Blocked', status, headers);
  }
  if (status === 408 || (status >= 500 && status < 600)) {
    // 5xx and request timeouts are worth a second attempt
    return new TransientFetchError(
      message,
      url,
      status === 408 ? 'Timeout' : 'NetworkError',
      status,
    );
  }
  return new PermanentFetchError(message, url, 'HttpError', status, headers);
}

/**
 * Bring anything a fetcher throws into the error taxonomy.
 *
 * Errors already classified pass through unchanged. Unknown errors are
 * treated as network errors so they get their one retry.
 */
export function classifyFetchError(
  error: unknown,
  url: string,
): FetchError | ResourceFatalError {
  if (error instanceof FetchError || error instanceof ResourceFatalError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new TransientFetchError(`Fetch aborted: ${url}`, url, 'Timeout');
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientFetchError(
    `Network error fetching ${url}: ${message}`,
    url,
    'NetworkError',
  );
}
