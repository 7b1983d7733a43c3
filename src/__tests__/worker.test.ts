import { describe, it, expect, vi } from "vitest";
import { CrawlWorker, type WorkerContext, type WorkerEvents } from "../crawler/worker.js";
import { Frontier } from "../crawler/frontier.js";
import { OutcomeRecorder } from "../crawler/outcome.js";
import { AdmissionGate } from "../fetcher/admission-gate.js";
import { RetryPolicy } from "../fetcher/retry.js";
import {
  ExtractionError,
  PermanentFetchError,
  ResourceFatalError,
  TransientFetchError,
} from "../fetcher/errors.js";
import type { Extractor } from "../extractor/index.js";
import type { Fetcher } from "../fetcher/index.js";
import type { Sink } from "../output/file-sink.js";
import type { PageRecord } from "../types.js";
import {
  FETCH_CONFIG,
  FakeFetcher,
  MemorySink,
  deferred,
  siteExtractor,
  tick,
  waitUntil,
} from "./fakes.js";

const PAGE = "https://example.com/docs";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Harness {
  ctx: WorkerContext;
  controller: AbortController;
  onFatal: ReturnType<typeof vi.fn>;
}

function makeHarness(
  overrides: {
    fetcher?: Fetcher;
    extractor?: Extractor;
    sink?: Sink;
    gate?: AdmissionGate;
    events?: WorkerEvents;
    maxRetries?: number;
  } = {},
): Harness {
  const controller = new AbortController();
  const onFatal = vi.fn();
  const ctx: WorkerContext = {
    frontier: new Frontier(),
    fetcher: overrides.fetcher ?? new FakeFetcher(),
    extractor: overrides.extractor ?? siteExtractor({ [PAGE]: [`${PAGE}/a`, `${PAGE}/b#x`] }),
    sink: overrides.sink ?? new MemorySink(),
    gate: overrides.gate ?? new AdmissionGate({ maxOpen: 2 }),
    retry: new RetryPolicy({ delay: 0, retryDelay: 0, maxRetries: overrides.maxRetries ?? 1 }),
    outcome: new OutcomeRecorder(),
    fetchConfig: FETCH_CONFIG,
    claimTimeoutMs: 20,
    signal: controller.signal,
    onFatal,
    events: overrides.events ?? {},
  };
  return { ctx, controller, onFatal };
}

const ENTRY = { url: PAGE, order: 0, depth: 2 };

// ---------------------------------------------------------------------------
// 1. Successful page
// ---------------------------------------------------------------------------
describe("CrawlWorker.process success", () => {
  it("should persist the page, record it and offer its links one level deeper", async () => {
    const sink = new MemorySink();
    const onPageFetched = vi.fn();
    const { ctx } = makeHarness({ sink, events: { onPageFetched } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(sink.persisted).toEqual([PAGE]);
    expect(ctx.outcome.succeededCount).toBe(1);
    expect(onPageFetched).toHaveBeenCalledTimes(1);

    const claimed = [await ctx.frontier.claim(0), await ctx.frontier.claim(0)];
    expect(claimed).toEqual([
      { url: `${PAGE}/a`, order: 0, depth: 3 },
      { url: `${PAGE}/b`, order: 1, depth: 3 },
    ]);
  });

  it("should hand out a frozen page record", async () => {
    const onPageFetched = vi.fn();
    const { ctx } = makeHarness({ events: { onPageFetched } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    const page: unknown = onPageFetched.mock.calls[0][0];
    expect(Object.isFrozen(page)).toBe(true);
    expect(page).toMatchObject({
      url: PAGE,
      record: { title: PAGE, markdown: `Content of ${PAGE}` },
      links: [
        { href: `${PAGE}/a`, text: `${PAGE}/a` },
        { href: `${PAGE}/b#x`, text: `${PAGE}/b#x` },
      ],
    });
  });

  it("should pass the sink the same record, stamped with the fetch time", async () => {
    const persisted: PageRecord[] = [];
    const onPageFetched = vi.fn();
    const sink: Sink = {
      persist: async (page) => {
        persisted.push(page);
      },
    };
    const { ctx } = makeHarness({ sink, events: { onPageFetched } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(persisted).toHaveLength(1);
    expect(persisted[0].fetchedAt).toEqual(new Date("2024-01-01T00:00:00Z"));
    expect(onPageFetched).toHaveBeenCalledWith(persisted[0]);
  });

  it("should count a page whose write failed as processed", async () => {
    const onPersistError = vi.fn();
    const { ctx } = makeHarness({
      sink: new MemorySink(new Set([PAGE])),
      events: { onPersistError },
    });

    await new CrawlWorker(0, ctx).process(ENTRY);

    const outcome = ctx.outcome.build("completed", 0);
    expect(outcome.succeeded).toBe(1);
    expect(outcome.persistFailures).toEqual([
      { url: PAGE, message: `Failed to write ${PAGE}: disk full` },
    ]);
    expect(onPersistError).toHaveBeenCalledWith(PAGE, expect.any(Error));
  });

  it("should wrap a sink error that is not a PersistError", async () => {
    const onPersistError = vi.fn();
    const sink: Sink = {
      persist: async () => {
        throw new Error("disk full");
      },
    };
    const { ctx } = makeHarness({ sink, events: { onPersistError } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(ctx.outcome.build("completed", 0).persistFailures).toEqual([
      { url: PAGE, message: `Failed to persist ${PAGE}: disk full` },
    ]);
  });

  it("should treat a throwing extractor as an empty result", async () => {
    const onExtractError = vi.fn();
    const sink = new MemorySink();
    const extractor: Extractor = {
      extract: () => {
        throw new Error("bad html");
      },
    };
    const { ctx } = makeHarness({ extractor, sink, events: { onExtractError } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(ctx.outcome.succeededCount).toBe(1);
    expect(ctx.frontier.size).toBe(0);
    const [url, error] = onExtractError.mock.calls[0];
    expect(url).toBe(PAGE);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ message: `Failed to extract ${PAGE}: bad html` });
  });
});

// ---------------------------------------------------------------------------
// 2. Failures
// ---------------------------------------------------------------------------
describe("CrawlWorker.process failures", () => {
  it("should record a permanent failure after one attempt", async () => {
    const sink = new MemorySink();
    const onPageFailed = vi.fn();
    const fetcher = new FakeFetcher(() => {
      throw new PermanentFetchError(`HTTP 404 for ${PAGE}`, PAGE, "NotFound", 404);
    });
    const { ctx } = makeHarness({ fetcher, sink, events: { onPageFailed } });

    await new CrawlWorker(0, ctx).process(ENTRY);

    const failure = {
      url: PAGE,
      errorClass: "PermanentFetchError",
      kind: "NotFound",
      message: `HTTP 404 for ${PAGE}`,
      attempts: 1,
    };
    expect(ctx.outcome.build("completed", 0).failures).toEqual([failure]);
    expect(onPageFailed).toHaveBeenCalledWith(failure);
    expect(sink.persisted).toEqual([]);
    expect(ctx.frontier.size).toBe(0);
  });

  it("should retry a transient failure once and record both attempts", async () => {
    const fetcher = new FakeFetcher(() => {
      throw new TransientFetchError(`Timed out: ${PAGE}`, PAGE, "Timeout");
    });
    const { ctx } = makeHarness({ fetcher });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(fetcher.calls).toEqual([PAGE, PAGE]);
    expect(ctx.outcome.build("completed", 0).failures).toEqual([
      {
        url: PAGE,
        errorClass: "TransientFetchError",
        kind: "Timeout",
        message: `Timed out: ${PAGE}`,
        attempts: 2,
      },
    ]);
  });

  it("should succeed when the retry succeeds", async () => {
    const fetcher = new FakeFetcher((_url, call) => {
      if (call === 1) throw new TransientFetchError("blip", PAGE, "NetworkError");
    });
    const { ctx } = makeHarness({ fetcher });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(fetcher.calls).toHaveLength(2);
    expect(ctx.outcome.succeededCount).toBe(1);
    expect(ctx.outcome.failedCount).toBe(0);
  });

  it("should report a fatal error to the coordinator", async () => {
    const fatal = new ResourceFatalError("browser crashed");
    const fetcher = new FakeFetcher(() => {
      throw fatal;
    });
    const { ctx, onFatal } = makeHarness({ fetcher });

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(onFatal).toHaveBeenCalledWith(fatal);
    expect(fetcher.calls).toHaveLength(1);
    expect(ctx.outcome.build("fatal", 0).failures).toEqual([
      { url: PAGE, errorClass: "ResourceFatalError", message: "browser crashed", attempts: 1 },
    ]);
  });

  it("should mark the URL not attempted when shutdown came before the first attempt", async () => {
    const onPageFailed = vi.fn();
    const fetcher = new FakeFetcher();
    const { ctx, controller } = makeHarness({ fetcher, events: { onPageFailed } });
    controller.abort();

    await new CrawlWorker(0, ctx).process(ENTRY);

    expect(fetcher.calls).toEqual([]);
    const outcome = ctx.outcome.build("cancelled", 0);
    expect(outcome.notAttempted).toBe(1);
    expect(outcome.attempted).toBe(0);
    expect(outcome.failures).toEqual([
      {
        url: PAGE,
        errorClass: "NotAttempted",
        message: `Gave up waiting for a fetch slot: ${PAGE}`,
        attempts: 0,
      },
    ]);
    expect(onPageFailed).toHaveBeenCalledTimes(1);
  });

  it("should record the earlier error when shutdown interrupts the wait for a retry slot", async () => {
    const gate = new AdmissionGate({ maxOpen: 1 });
    const blocker = deferred();
    const fetcher = new FakeFetcher((_url, call) => {
      if (call === 1) {
        // Take the only slot as soon as the first attempt gives it up
        void gate.run(() => blocker.promise, { url: "https://example.com/other" });
        throw new TransientFetchError("blip", PAGE, "NetworkError");
      }
    });
    const { ctx, controller } = makeHarness({ fetcher, gate });

    const processing = new CrawlWorker(0, ctx).process(ENTRY);
    await waitUntil(() => fetcher.calls.length === 1 && gate.waiting === 1);

    controller.abort();
    await processing;
    blocker.resolve();

    expect(fetcher.calls).toHaveLength(1);
    expect(ctx.outcome.build("cancelled", 0).failures).toEqual([
      {
        url: PAGE,
        errorClass: "TransientFetchError",
        kind: "NetworkError",
        message: "blip",
        attempts: 1,
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// 3. run loop
// ---------------------------------------------------------------------------
describe("CrawlWorker.run", () => {
  it("should process queued entries and return once the frontier completes", async () => {
    const { ctx } = makeHarness({ extractor: siteExtractor() });
    ctx.frontier.offer("https://example.com/1");
    ctx.frontier.offer("https://example.com/2");

    await new CrawlWorker(0, ctx).run();

    expect(ctx.frontier.closeReason).toBe("completed");
    expect(ctx.frontier.doneCount).toBe(2);
    expect(ctx.outcome.succeededCount).toBe(2);
  });

  it("should keep polling while idle until the frontier closes", async () => {
    const { ctx } = makeHarness({ extractor: siteExtractor() });
    const running = new CrawlWorker(0, ctx).run();

    await tick(50);
    ctx.frontier.offer("https://example.com/late");
    await waitUntil(() => ctx.outcome.succeededCount === 1);

    ctx.frontier.shutdown("cancelled");
    await running;
    expect(ctx.frontier.activeCount).toBe(0);
  });

  it("should escalate an error escaping process and still release the claim", async () => {
    const { ctx, onFatal } = makeHarness({
      extractor: siteExtractor(),
      events: {
        onPageFetched: () => {
          throw new Error("listener failed");
        },
      },
    });
    onFatal.mockImplementation(() => ctx.frontier.shutdown("fatal"));
    ctx.frontier.offer("https://example.com/1");
    ctx.frontier.offer("https://example.com/2");

    await new CrawlWorker(0, ctx).run();

    expect(onFatal).toHaveBeenCalledTimes(1);
    const error: unknown = onFatal.mock.calls[0][0];
    expect(error).toBeInstanceOf(ResourceFatalError);
    expect(error).toMatchObject({
      message: "Unexpected error processing https://example.com/1: listener failed",
    });
    expect(ctx.frontier.activeCount).toBe(0);
    expect(ctx.frontier.size).toBe(1);
  });
});
