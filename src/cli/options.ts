import type { DocsCrawlOptions, FetchConfig, WaitCondition } from '../types.js';
import { presetToOptions, type SourcePreset } from '../sources/index.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  concurrency?: string;
  maxOpenPages?: string;
  maxPages?: string;
  depth?: string;
  keepQuery?: boolean;
  prefix?: string;
  include?: string[];
  exclude?: string[];
  selector?: string;
  linkSelector?: string;
  waitFor?: string;
  timeout?: string;
  frames?: boolean;
  output: string;
  flat?: boolean;
  /** Commander negated option: `--no-json` sets this to false. */
  json?: boolean;
  singleFile?: boolean;
  delay?: string;
  ignoreRobots?: boolean;
  header?: string[];
  sources?: string;
  source?: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

/**
 * A named preset picked with `--sources <file> --source <name>`.
 */
export interface SelectedSource {
  name: string;
  preset: SourcePreset;
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @param headers - Array of "key:value" strings
 * @returns A Record mapping header names to values
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new Error(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = value;
  }

  return result;
}

export function isWaitCondition(value: string): value is WaitCondition {
  return (
    value === 'load' ||
    value === 'domcontentloaded' ||
    value === 'networkidle' ||
    /^css:\S/.test(value)
  );
}

/**
 * Parse `--wait-for`. A bare selector is shorthand for `css:<selector>`.
 */
export function parseWaitCondition(value: string): WaitCondition {
  const trimmed = value.trim();
  if (isWaitCondition(trimmed)) {
    return trimmed;
  }
  const css = `css:${trimmed}`;
  if (trimmed !== '' && isWaitCondition(css)) {
    return css;
  }
  throw new Error(
    `Invalid wait condition "${value}". Use load, domcontentloaded, networkidle or css:<selector>.`,
  );
}

/**
 * Build crawl options from the parsed CLI options and URL arguments.
 *
 * Starts from the selected source preset, if any, then applies every
 * option the user set explicitly. Positional URLs replace the preset's
 * seed. The SDK's own default merging handles the rest.
 *
 * @param urls - The positional URL arguments
 * @param options - The parsed commander options
 * @param source - The selected preset
 */
export function buildConfig(
  urls: string[],
  options: CLIOptions,
  source?: SelectedSource,
): DocsCrawlOptions {
  const config: DocsCrawlOptions = source
    ? presetToOptions(source.name, source.preset, options.output)
    : { urls, outputDir: options.output };
  if (urls.length > 0) {
    config.urls = urls;
  }

  // Pool
  if (options.concurrency !== undefined) {
    config.concurrency = parseInt(options.concurrency, 10);
  }
  if (options.maxOpenPages !== undefined) {
    config.maxOpenPages = parseInt(options.maxOpenPages, 10);
  }

  // Scope
  if (options.depth !== undefined) {
    config.maxDepth = parseInt(options.depth, 10);
  }
  if (options.maxPages !== undefined) {
    config.maxPages = parseInt(options.maxPages, 10);
  }
  if (options.keepQuery) {
    config.queryPolicy = 'keep';
  }
  if (options.prefix !== undefined) {
    config.pathPrefix = options.prefix;
  }
  if (options.include !== undefined && options.include.length > 0) {
    config.includePatterns = options.include;
  }
  if (options.exclude !== undefined && options.exclude.length > 0) {
    config.excludePatterns = [...(config.excludePatterns ?? []), ...options.exclude];
  }

  // Fetching
  const fetch: Partial<FetchConfig> = { ...config.fetch };
  if (options.selector !== undefined) {
    fetch.contentSelector = options.selector;
  }
  if (options.waitFor !== undefined) {
    fetch.waitCondition = parseWaitCondition(options.waitFor);
  }
  if (options.timeout !== undefined) {
    fetch.timeoutMs = parseInt(options.timeout, 10);
  }
  if (options.frames) {
    fetch.renderFrames = true;
  }
  if (Object.keys(fetch).length > 0) {
    config.fetch = fetch;
  }
  if (options.delay !== undefined) {
    config.delay = parseInt(options.delay, 10);
  }
  if (options.ignoreRobots) {
    config.respectRobots = false;
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = parseHeaders(options.header);
  }

  // Extraction
  if (options.linkSelector !== undefined) {
    config.linkSelector = options.linkSelector;
  }

  // Output
  if (options.flat) {
    config.outputStructure = 'flat';
  }
  if (options.json === false) {
    config.writeJson = false;
  }
  if (options.singleFile) {
    config.singleFile = true;
  }

  return config;
}
