import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ContentRecord, NavLink, PageRecord } from '../types.js';
import { PersistError } from '../fetcher/errors.js';
import {
  type OutputStructure,
  addFrontMatter,
  jsonFilePath,
  markdownFilePath,
  pagePath,
} from './utils.js';

/**
 * Destination for extracted pages.
 *
 * `persist` rejects with a `PersistError`; the crawl logs it and carries on.
 */
export interface Sink {
  persist(page: PageRecord): Promise<void>;
}

/**
 * A page as written by the FileSink, kept for the combined file.
 */
export interface StoredPage {
  url: string;
  title: string;
  markdown: string;
  markdownPath: string;
  jsonPath?: string;
}

/**
 * JSON document written next to each markdown page.
 */
export interface PageDocument {
  metadata: {
    source: string;
    page: string;
    timestamp: string;
    formatVersion: '1.0';
  };
  url: string;
  title: string;
  content: string;
  navigation: NavLink[];
}

export interface FileSinkOptions {
  outputDir: string;
  structure: OutputStructure;
  /** Also write `json/<path>.json`. */
  writeJson: boolean;
  /** Name recorded as `metadata.source`; defaults to the page's hostname. */
  sourceName?: string;
}

/**
 * Render the markdown file body for a page.
 */
export function renderPageMarkdown(
  url: string,
  record: ContentRecord,
  fetchedAt: Date,
): string {
  const heading = record.title ? `# ${record.title}\n\n` : '';
  const body = `${heading}URL: ${url}\n\n${record.markdown}\n`;
  return addFrontMatter(body, {
    source: url,
    fetchedAt: fetchedAt.toISOString(),
    title: record.title ? JSON.stringify(record.title) : undefined,
  });
}

/**
 * Writes every page as markdown (and optionally JSON) under the output
 * directory, in mirror or flat layout.
 */
export class FileSink implements Sink {
  private readonly stored = new Map<string, StoredPage>();

  constructor(private readonly options: FileSinkOptions) {}

  /**
   * Write one page. Front matter and JSON metadata carry the time the
   * page was fetched.
   */
  async persist(page: PageRecord): Promise<void> {
    const { url, record, links, fetchedAt: timestamp } = page;
    const { outputDir, structure, writeJson } = this.options;
    const markdownPath = markdownFilePath(url, outputDir, structure);
    const jsonPath = writeJson ? jsonFilePath(url, outputDir, structure) : undefined;

    try {
      await mkdir(dirname(markdownPath), { recursive: true });
      await writeFile(markdownPath, renderPageMarkdown(url, record, timestamp), 'utf-8');

      if (jsonPath) {
        const document: PageDocument = {
          metadata: {
            source: this.options.sourceName ?? new URL(url).hostname,
            page: pagePath(url, structure),
            timestamp: timestamp.toISOString(),
            formatVersion: '1.0',
          },
          url,
          title: record.title,
          content: record.markdown,
          navigation: [...links],
        };
        await mkdir(dirname(jsonPath), { recursive: true });
        await writeFile(jsonPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
      }
    } catch (error) {
      throw new PersistError(
        `Failed to write ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        { cause: error },
      );
    }

    this.stored.set(url, {
      url,
      title: record.title,
      markdown: record.markdown,
      markdownPath,
      jsonPath,
    });
  }

  /** Pages written so far, in write order. */
  get pages(): StoredPage[] {
    return [...this.stored.values()];
  }

  get outputDir(): string {
    return this.options.outputDir;
  }
}
