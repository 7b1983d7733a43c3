import { describe, it, expect, vi, afterEach } from "vitest";
import {
  getOrigin,
  fetchRobotsTxt,
  getRobotsEntry,
  isUrlAllowed,
  DEFAULT_USER_AGENT,
  type RobotsCache,
} from "../fetcher/robots.js";

function textResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/plain" },
  });
}

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// 1. getOrigin
// ---------------------------------------------------------------------------
describe("getOrigin", () => {
  it("should extract origin from a full URL", () => {
    expect(getOrigin("https://docs.example.com/guide/page")).toBe(
      "https://docs.example.com",
    );
  });

  it("should keep a non-default port", () => {
    expect(getOrigin("https://docs.example.com:8443/path")).toBe(
      "https://docs.example.com:8443",
    );
  });

  it("should strip path, query, and fragment", () => {
    expect(getOrigin("http://example.com/path?q=1#frag")).toBe("http://example.com");
  });
});

// ---------------------------------------------------------------------------
// 2. fetchRobotsTxt
// ---------------------------------------------------------------------------
describe("fetchRobotsTxt", () => {
  it("should parse rules and the crawl delay", async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(
        textResponse("User-agent: *\nDisallow: /private/\nCrawl-delay: 2\n"),
      );

    const entry = await fetchRobotsTxt("https://example.com", DEFAULT_USER_AGENT);

    expect(entry.robot.isAllowed("https://example.com/private/x", DEFAULT_USER_AGENT)).toBe(false);
    expect(entry.robot.isAllowed("https://example.com/docs", DEFAULT_USER_AGENT)).not.toBe(false);
    expect(entry.crawlDelay).toBe(2);
  });

  it("should leave crawlDelay undefined without a Crawl-delay directive", async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(textResponse("User-agent: *\nDisallow: /admin/\n"));

    const entry = await fetchRobotsTxt("https://example.com", DEFAULT_USER_AGENT);
    expect(entry.crawlDelay).toBeUndefined();
  });

  it("should allow everything when robots.txt is missing", async () => {
    globalThis.fetch = vi.fn().mockResolvedValueOnce(textResponse("not found", 404));

    const entry = await fetchRobotsTxt("https://example.com", DEFAULT_USER_AGENT);
    expect(entry.robot.isAllowed("https://example.com/anything", DEFAULT_USER_AGENT)).not.toBe(false);
    expect(entry.crawlDelay).toBeUndefined();
  });

  it("should allow everything on a network error", async () => {
    globalThis.fetch = vi.fn().mockRejectedValueOnce(new Error("DNS failure"));

    const entry = await fetchRobotsTxt("https://example.com", DEFAULT_USER_AGENT);
    expect(entry.robot.isAllowed("https://example.com/anything", DEFAULT_USER_AGENT)).not.toBe(false);
  });

  it("should request /robots.txt with the given User-Agent", async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(textResponse("User-agent: *\nAllow: /\n"));
    globalThis.fetch = mockFetch;

    await fetchRobotsTxt("https://example.com", "test-agent/2.0");

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://example.com/robots.txt");
    expect(init.headers["User-Agent"]).toBe("test-agent/2.0");
  });
});

// ---------------------------------------------------------------------------
// 3. Cache behavior
// ---------------------------------------------------------------------------
describe("getRobotsEntry / isUrlAllowed", () => {
  it("should share one request between concurrent lookups for an origin", async () => {
    const mockFetch = vi
      .fn()
      .mockImplementation(async () => textResponse("User-agent: *\nDisallow: /private/\n"));
    globalThis.fetch = mockFetch;
    const cache: RobotsCache = new Map();

    const [a, b] = await Promise.all([
      getRobotsEntry("https://example.com/a", cache, DEFAULT_USER_AGENT),
      getRobotsEntry("https://example.com/b", cache, DEFAULT_USER_AGENT),
    ]);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it("should fetch robots.txt once per origin", async () => {
    const mockFetch = vi
      .fn()
      .mockImplementation(async () => textResponse("User-agent: *\nDisallow: /private/\n"));
    globalThis.fetch = mockFetch;
    const cache: RobotsCache = new Map();

    expect(await isUrlAllowed("https://example.com/docs", cache, DEFAULT_USER_AGENT)).toBe(true);
    expect(await isUrlAllowed("https://example.com/private/a", cache, DEFAULT_USER_AGENT)).toBe(false);
    expect(await isUrlAllowed("https://other.example.com/private/a", cache, DEFAULT_USER_AGENT)).toBe(false);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
      "https://example.com/robots.txt",
      "https://other.example.com/robots.txt",
    ]);
  });
});
