import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';

import type { ContentRecord, NavLink, RenderedPage } from '../types.js';
import { ExtractionError } from '../fetcher/errors.js';
import { htmlToMarkdown } from './markdown.js';
import { extractNavLinks } from './links.js';

/**
 * What the extractor produces for one page.
 */
export interface ExtractResult {
  record: ContentRecord;
  links: NavLink[];
}

/**
 * Turns a rendered page into a content record and its navigation links.
 *
 * Implementations must not throw; a page that cannot be parsed yields
 * an empty result.
 */
export interface Extractor {
  extract(page: RenderedPage): ExtractResult;
}

/**
 * Options for the built-in extractor.
 */
export interface ExtractorOptions {
  /** CSS selector for navigation links. Defaults to `a[href]`. */
  linkSelector?: string;
  /** Elements removed from the content before conversion. */
  removeSelectors?: string[];
  /** Called when a page could not be extracted. */
  onError?: (error: ExtractionError) => void;
}

export const DEFAULT_LINK_SELECTOR = 'a[href]';

export const DEFAULT_REMOVE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'nav',
  '[role="navigation"]',
];

export function emptyExtractResult(): ExtractResult {
  return { record: { title: '', markdown: '', text: '' }, links: [] };
}

/**
 * Find the content root for a comma list of selectors, trying each in
 * order. The first selector that matches wins.
 */
export function selectContentRoot(
  document: Document,
  contentSelector: string | undefined,
): Element | undefined {
  if (!contentSelector) {
    return undefined;
  }
  for (const selector of contentSelector.split(',')) {
    const trimmed = selector.trim();
    if (!trimmed) {
      continue;
    }
    try {
      const match = document.querySelector(trimmed);
      if (match) {
        return match;
      }
    } catch {
      // invalid selector, try the next one
      continue;
    }
  }
  return undefined;
}

function collapse(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Create the jsdom-based extractor.
 *
 * Content comes from the page's content selector when one matches, then
 * from Mozilla Readability, then from `<body>`. The title is the first
 * `<h1>` of the content, falling back to the document title.
 */
export function createExtractor(options: ExtractorOptions = {}): Extractor {
  const linkSelector = options.linkSelector ?? DEFAULT_LINK_SELECTOR;
  const removeSelectors = options.removeSelectors ?? DEFAULT_REMOVE_SELECTORS;

  function strip(root: Element): void {
    for (const selector of removeSelectors) {
      for (const element of Array.from(root.querySelectorAll(selector))) {
        element.remove();
      }
    }
  }

  function extractPage(page: RenderedPage): ExtractResult {
    const dom = new JSDOM(page.html, { url: page.url });
    const document = dom.window.document;
    const links = extractNavLinks(document, page.url, linkSelector);
    const documentTitle = collapse(document.title);

    let contentHtml: string;
    let title: string;

    const root = selectContentRoot(document, page.contentSelector);
    if (root) {
      strip(root);
      contentHtml = root.innerHTML;
      title = collapse(root.querySelector('h1')?.textContent) || documentTitle;
    } else {
      // Readability rewrites the document it reads, so give it its own copy
      const article = new Readability(
        new JSDOM(page.html, { url: page.url }).window.document,
      ).parse();
      if (article?.content) {
        contentHtml = article.content;
        title = collapse(article.title) || documentTitle;
      } else {
        strip(document.body);
        contentHtml = document.body.innerHTML;
        title = documentTitle;
      }
      const heading = collapse(document.querySelector('h1')?.textContent);
      if (heading) {
        title = heading;
      }
    }

    const holder = document.createElement('div');
    holder.innerHTML = contentHtml;

    return {
      record: {
        title,
        markdown: htmlToMarkdown(contentHtml),
        text: collapse(holder.textContent),
      },
      links,
    };
  }

  return {
    extract(page: RenderedPage): ExtractResult {
      try {
        return extractPage(page);
      } catch (error) {
        options.onError?.(
          new ExtractionError(
            `Failed to extract ${page.url}: ${error instanceof Error ? error.message : String(error)}`,
            page.url,
            { cause: error },
          ),
        );
        return emptyExtractResult();
      }
    },
  };
}

export { htmlToMarkdown, createTurndownService, renderTable } from './markdown.js';
export { extractNavLinks } from './links.js';
