import { join } from 'node:path';

/**
 * Output layout for page files.
 *
 * - `mirror`: one directory per path segment (`docs/api/auth`)
 * - `flat`: a single directory, segments joined by `_` (`docs_api_auth`)
 */
export type OutputStructure = 'mirror' | 'flat';

/**
 * Extract the decoded pathname from a URL (e.g., "/docs/api/auth").
 * Malformed percent escapes are kept as they are.
 */
export function urlToPath(url: string): string {
  const { pathname } = new URL(url);
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

/**
 * Sanitize a filename component to be filesystem-safe.
 */
export function sanitizeFilename(name: string): string {
  let sanitized = name
    .replace(/[<>:"|?*\\]/g, '_')
    .replace(/\0/g, '')
    .replace(/\.{2,}/g, '.')
    .trim();

  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 200);
  }

  return sanitized;
}

/**
 * Map a URL key to a file path relative to the output directory, without
 * extension.
 *
 * - `/` -> `index`
 * - `/docs/api/auth` -> `docs/api/auth` (mirror) or `docs_api_auth` (flat)
 * - a kept query string is appended as `_<query>` so variants do not collide
 */
export function pagePath(url: string, structure: OutputStructure): string {
  const parsed = new URL(url);
  const segments = urlToPath(url)
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(sanitizeFilename)
    .filter((segment) => segment.length > 0 && segment !== '.');

  if (segments.length === 0) {
    segments.push('index');
  }

  const query = parsed.search.slice(1);
  if (query) {
    const last = segments.length - 1;
    segments[last] = sanitizeFilename(`${segments[last]}_${query.replace(/[&=/]/g, '_')}`);
  }

  return structure === 'mirror' ? segments.join('/') : segments.join('_');
}

/**
 * Absolute-or-relative markdown file path for a URL key.
 */
export function markdownFilePath(
  url: string,
  outputDir: string,
  structure: OutputStructure,
): string {
  return join(outputDir, ...`${pagePath(url, structure)}.md`.split('/'));
}

/**
 * JSON file path for a URL key, under `<outputDir>/json/`.
 */
export function jsonFilePath(
  url: string,
  outputDir: string,
  structure: OutputStructure,
): string {
  return join(outputDir, 'json', ...`${pagePath(url, structure)}.json`.split('/'));
}

/**
 * Build a YAML front matter block and prepend it to markdown content.
 * Entries with an undefined or empty value are left out.
 *
 * @param markdown - The markdown body
 * @param metadata - Key-value pairs to include in front matter
 * @returns Markdown string with front matter prepended
 */
export function addFrontMatter(
  markdown: string,
  metadata: Record<string, string | undefined>,
): string {
  const lines = ['---'];
  for (const [key, value] of Object.entries(metadata)) {
    if (value) {
      lines.push(`${key}: ${value}`);
    }
  }
  lines.push('---');
  lines.push('');

  return lines.join('\n') + markdown;
}
