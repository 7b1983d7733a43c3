import type { NavLink } from '../types.js';

/** URL schemes that are never navigation targets. */
const EXCLUDED_SCHEMES = ['mailto:', 'javascript:', 'tel:', 'data:'];

/**
 * Collect navigation links from a document.
 *
 * Elements matched by `linkSelector` contribute their own `href` when they
 * are anchors, and the `a[href]` inside them otherwise, so both
 * `nav a` and `nav.sidebar` work as selectors.
 *
 * Hrefs are resolved against `pageUrl`. Fragment-only links, excluded
 * schemes and anything that is not http(s) are dropped. Fragments on
 * real links are kept: deduplication by key is the frontier's job. The
 * result holds each absolute href once, in document order.
 */
export function extractNavLinks(
  document: Document,
  pageUrl: string,
  linkSelector: string,
): NavLink[] {
  let matched: Element[];
  try {
    matched = Array.from(document.querySelectorAll(linkSelector));
  } catch {
    // invalid selector: no navigation
    return [];
  }

  const anchors: Element[] = [];
  for (const element of matched) {
    if (element.tagName === 'A' && element.hasAttribute('href')) {
      anchors.push(element);
    } else {
      anchors.push(...Array.from(element.querySelectorAll('a[href]')));
    }
  }

  const seen = new Set<string>();
  const links: NavLink[] = [];

  for (const anchor of anchors) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href || href.startsWith('#')) {
      continue;
    }
    const lowerHref = href.toLowerCase();
    if (EXCLUDED_SCHEMES.some((scheme) => lowerHref.startsWith(scheme))) {
      continue;
    }

    let resolved: URL;
    try {
      resolved = new URL(href, pageUrl);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      continue;
    }

    if (seen.has(resolved.href)) {
      continue;
    }
    seen.add(resolved.href);
    links.push({
      href: resolved.href,
      text: (anchor.textContent ?? '').replace(/\s+/g, ' ').trim(),
    });
  }

  return links;
}
