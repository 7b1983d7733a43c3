import { describe, it, expect, vi } from "vitest";
import { JSDOM } from "jsdom";
import {
  createExtractor,
  emptyExtractResult,
  extractNavLinks,
  htmlToMarkdown,
  renderTable,
  selectContentRoot,
} from "../extractor/index.js";
import { ExtractionError } from "../fetcher/errors.js";
import type { RenderedPage } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makePage(html: string, overrides: Partial<RenderedPage> = {}): RenderedPage {
  return {
    url: "https://example.com/docs/intro",
    requestedUrl: "https://example.com/docs/intro",
    html,
    statusCode: 200,
    headers: {},
    fetchedAt: new Date("2024-01-01T00:00:00Z"),
    ...overrides,
  };
}

function documentOf(html: string): Document {
  return new JSDOM(html).window.document;
}

const DOC_PAGE = `<html><head><title>Doc Title</title></head><body>
<nav><a href="/docs/a">A</a></nav>
<main><h1>Intro</h1><p>Hello <strong>world</strong>.</p><script>track()</script></main>
</body></html>`;

// ---------------------------------------------------------------------------
// 1. htmlToMarkdown / renderTable
// ---------------------------------------------------------------------------
describe("htmlToMarkdown", () => {
  it("should return an empty string for blank input", () => {
    expect(htmlToMarkdown("")).toBe("");
    expect(htmlToMarkdown("   \n")).toBe("");
  });

  it("should use ATX headings and strong markers", () => {
    expect(htmlToMarkdown("<h2>Setup</h2><p>Run <strong>it</strong>.</p>")).toBe(
      "## Setup\n\nRun **it**.",
    );
  });

  it("should fence code blocks with the language", () => {
    expect(
      htmlToMarkdown('<pre><code class="language-ts">const x = 1;</code></pre>'),
    ).toBe("```ts\nconst x = 1;\n```");
  });

  it("should render tables as pipe tables", () => {
    const html =
      "<table><tr><th>Name</th><th>Type</th></tr><tr><td>id</td><td>a|b</td></tr></table>";
    expect(htmlToMarkdown(html)).toBe(
      "| Name | Type |\n| --- | --- |\n| id | a\\|b |",
    );
  });

  it("should drop script content and frame error placeholders", () => {
    const html =
      '<p>Keep</p><script>alert(1)</script><div data-frame-error="cross-origin"><p>Broken</p></div>';
    expect(htmlToMarkdown(html)).toBe("Keep");
  });
});

describe("renderTable", () => {
  it("should return an empty string without rows", () => {
    expect(renderTable([])).toBe("");
    expect(renderTable([[]])).toBe("");
  });

  it("should pad short rows to the widest row", () => {
    expect(renderTable([["a", "b"], ["c"]])).toBe(
      "\n\n| a | b |\n| --- | --- |\n| c |  |\n\n",
    );
  });
});

// ---------------------------------------------------------------------------
// 2. extractNavLinks
// ---------------------------------------------------------------------------
describe("extractNavLinks", () => {
  const html = `<body>
<nav class="sidebar">
  <a href="/docs/a">  A
    link </a>
  <a href="/docs/b#usage">B</a>
  <a href="#top">Top</a>
  <a href="mailto:docs@example.com">Mail</a>
  <a href="javascript:void(0)">JS</a>
  <a href="ftp://example.com/file">FTP</a>
  <a href="/docs/a">Again</a>
</nav>
<main><a href="/other">Other</a></main>
</body>`;

  it("should collect anchors inside matched containers", () => {
    const links = extractNavLinks(documentOf(html), "https://example.com/docs/", "nav.sidebar");
    expect(links).toEqual([
      { href: "https://example.com/docs/a", text: "A link" },
      { href: "https://example.com/docs/b#usage", text: "B" },
    ]);
  });

  it("should take matched anchors directly", () => {
    const links = extractNavLinks(documentOf(html), "https://example.com/docs/", "a[href]");
    expect(links.map((l) => l.href)).toEqual([
      "https://example.com/docs/a",
      "https://example.com/docs/b#usage",
      "https://example.com/other",
    ]);
  });

  it("should resolve relative hrefs against the page", () => {
    const doc = documentOf('<a href="../api">API</a>');
    expect(extractNavLinks(doc, "https://example.com/docs/guide/", "a")).toEqual([
      { href: "https://example.com/docs/api", text: "API" },
    ]);
  });

  it("should return no links for an invalid selector", () => {
    expect(extractNavLinks(documentOf(html), "https://example.com/", "[[[")).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 3. selectContentRoot
// ---------------------------------------------------------------------------
describe("selectContentRoot", () => {
  const doc = documentOf('<body><main id="m">x</main><article id="a">y</article></body>');

  it("should return undefined without a selector", () => {
    expect(selectContentRoot(doc, undefined)).toBeUndefined();
  });

  it("should try a comma list in order", () => {
    expect(selectContentRoot(doc, ".missing, article, main")?.id).toBe("a");
  });

  it("should skip invalid selectors", () => {
    expect(selectContentRoot(doc, "[[[, main")?.id).toBe("m");
  });

  it("should return undefined when nothing matches", () => {
    expect(selectContentRoot(doc, ".missing")).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// 4. createExtractor
// ---------------------------------------------------------------------------
describe("createExtractor", () => {
  it("should extract the content root as markdown", () => {
    const extractor = createExtractor();
    const result = extractor.extract(makePage(DOC_PAGE, { contentSelector: "main" }));

    expect(result.record).toEqual({
      title: "Intro",
      markdown: "# Intro\n\nHello **world**.",
      text: "IntroHello world.",
    });
  });

  it("should take links from the whole document", () => {
    const extractor = createExtractor();
    const result = extractor.extract(makePage(DOC_PAGE, { contentSelector: "main" }));

    expect(result.links).toEqual([{ href: "https://example.com/docs/a", text: "A" }]);
  });

  it("should honor a custom link selector", () => {
    const extractor = createExtractor({ linkSelector: "main a" });
    const result = extractor.extract(makePage(DOC_PAGE, { contentSelector: "main" }));

    expect(result.links).toEqual([]);
  });

  it("should fall back to the document title when the root has no heading", () => {
    const html =
      "<html><head><title> Reference  Guide </title></head><body><main><p>Body</p></main></body></html>";
    const result = createExtractor().extract(makePage(html, { contentSelector: "main" }));

    expect(result.record.title).toBe("Reference Guide");
    expect(result.record.markdown).toBe("Body");
  });

  it("should use Readability when no content selector matches", () => {
    const html = `<html><head><title>Doc Title</title></head><body>
<article><h1>Getting Started</h1>
<p>Install the package and import the client. The client reads its settings from the environment.</p>
<p>Every request returns a typed response object that you can inspect for details.</p>
</article></body></html>`;
    const result = createExtractor().extract(makePage(html, { contentSelector: ".missing" }));

    expect(result.record.title).toBe("Getting Started");
    expect(result.record.markdown).toContain("Install the package and import the client.");
    expect(result.record.text).toContain("typed response object");
  });

  it("should report a page it cannot parse and return an empty result", () => {
    const onError = vi.fn();
    const extractor = createExtractor({ onError });

    const result = extractor.extract(makePage("<p>x</p>", { url: "not a url" }));

    expect(result).toEqual(emptyExtractResult());
    expect(onError).toHaveBeenCalledTimes(1);
    const error: unknown = onError.mock.calls[0][0];
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ url: "not a url" });
    expect(error instanceof Error && error.message.startsWith("Failed to extract not a url: ")).toBe(
      true,
    );
  });
});
