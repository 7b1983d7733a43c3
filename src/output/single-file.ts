import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { urlToPath } from './utils.js';

/** File name of the combined document. */
export const COMBINED_FILE_NAME = 'combined.md';

/**
 * Minimal page shape needed for the combined file.
 */
export interface CombinablePage {
  url: string;
  title: string;
  markdown: string;
}

/**
 * Label for the combined file header: hostname plus the common path
 * prefix of all pages, without a trailing slash.
 */
export function buildHeaderLabel(pages: readonly CombinablePage[]): string {
  if (pages.length === 0) {
    return 'no pages';
  }
  const hostname = new URL(pages[0].url).hostname;
  const all = pages.map((page) => getPathSegments(page.url));
  const common: string[] = [];
  for (let i = 0; i < all[0].length; i++) {
    const segment = all[0][i];
    // the last segment of a page is the page itself, not a directory
    if (all.some((segments) => segments.length <= i + 1 || segments[i] !== segment)) {
      break;
    }
    common.push(segment);
  }
  return common.length > 0 ? `${hostname}/${common.join('/')}` : hostname;
}

/**
 * Order pages so parents come before their children and siblings are
 * sorted by path segment.
 */
export function sortParentsFirst<T extends CombinablePage>(pages: readonly T[]): T[] {
  return [...pages].sort((a, b) => {
    const segmentsA = getPathSegments(a.url);
    const segmentsB = getPathSegments(b.url);

    const minLen = Math.min(segmentsA.length, segmentsB.length);
    for (let i = 0; i < minLen; i++) {
      const cmp = segmentsA[i].localeCompare(segmentsB[i]);
      if (cmp !== 0) return cmp;
    }

    return segmentsA.length - segmentsB.length;
  });
}

function getPathSegments(url: string): string[] {
  return urlToPath(url)
    .split('/')
    .filter((seg) => seg.length > 0);
}

/**
 * Render the combined markdown document.
 */
export function renderCombined(pages: readonly CombinablePage[]): string {
  const header = `# Combined documentation: ${buildHeaderLabel(pages)}`;
  const sections = sortParentsFirst(pages).map((page) => {
    const title = page.title ? `## ${page.title}\n\n` : '';
    return `---\n\n${title}Source: ${page.url}\n\n${page.markdown}`;
  });
  return `${header}\n\n${sections.join('\n\n')}\n`;
}

/**
 * Write every page into `<outputDir>/combined.md`.
 *
 * @returns The path of the written file
 */
export async function writeCombinedFile(
  pages: readonly CombinablePage[],
  outputDir: string,
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filePath = join(outputDir, COMBINED_FILE_NAME);
  await writeFile(filePath, renderCombined(pages), 'utf-8');
  return filePath;
}
