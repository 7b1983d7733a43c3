import { JSDOM } from 'jsdom';

import type { WaitCondition } from '../types.js';

/** Maximum number of iframes inlined into one page. */
export const MAX_FRAMES = 10;

/**
 * Check whether a fetched document satisfies the wait condition.
 *
 * `load`, `domcontentloaded` and `networkidle` hold for any complete
 * response body. `css:<selector>` holds when the selector matches.
 */
export function waitConditionMet(html: string, condition: WaitCondition): boolean {
  if (!condition.startsWith('css:')) {
    return true;
  }
  const selector = condition.slice('css:'.length).trim();
  const { document } = new JSDOM(html).window;
  try {
    return document.querySelector(selector) !== null;
  } catch {
    // An invalid selector can never match
    return false;
  }
}

/**
 * Replace same-origin `<iframe src>` elements with the documents they load.
 *
 * Each inlined frame becomes `<div data-frame-src="...">` holding the
 * frame's body. Frames on other origins, or that fail to load, stay as
 * they are and are marked with `data-frame-error`.
 *
 * @param html - The page HTML
 * @param pageUrl - The page URL, used to resolve frame sources
 * @param loadFrame - Loads a frame URL and returns its HTML
 */
export async function inlineFrames(
  html: string,
  pageUrl: string,
  loadFrame: (url: string) => Promise<string>,
): Promise<string> {
  const dom = new JSDOM(html, { url: pageUrl });
  const document = dom.window.document;
  const frames = Array.from(document.querySelectorAll('iframe[src]')).slice(0, MAX_FRAMES);
  if (frames.length === 0) {
    return html;
  }

  const origin = new URL(pageUrl).origin;

  for (const frame of frames) {
    const src = frame.getAttribute('src') ?? '';
    let frameUrl: URL;
    try {
      frameUrl = new URL(src, pageUrl);
    } catch {
      frame.setAttribute('data-frame-error', 'invalid src');
      continue;
    }
    if (frameUrl.origin !== origin) {
      frame.setAttribute('data-frame-error', 'cross-origin');
      continue;
    }

    try {
      const frameHtml = await loadFrame(frameUrl.href);
      const frameDoc = new JSDOM(frameHtml, { url: frameUrl.href }).window.document;
      const container = document.createElement('div');
      container.setAttribute('data-frame-src', frameUrl.href);
      container.innerHTML = frameDoc.body.innerHTML;
      frame.replaceWith(container);
    } catch (error) {
      frame.setAttribute(
        'data-frame-error',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  return dom.serialize();
}
