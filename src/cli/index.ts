import { Command } from 'commander';
import { crawlDocs } from '../sdk/index.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { loadSourcesFile, resolveSource } from '../sources/index.js';
import { buildConfig } from './options.js';
import type { CLIOptions, SelectedSource } from './options.js';
import {
  createProgressCallbacks,
  exitCodeFor,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --header, --include, --exclude which can be specified multiple times.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('docs-crawl')
    .description('Crawl documentation sites and write every page as markdown and JSON')
    .version('0.1.0')
    .argument('[urls...]', 'Seed URLs to crawl')

    // Pool
    .option('-c, --concurrency <n>', 'Number of workers', String(CONFIG_DEFAULTS.concurrency))
    .option('--max-open-pages <n>', 'Fetches open at the same time', String(CONFIG_DEFAULTS.maxOpenPages))

    // Scope
    .option('--max-pages <n>', 'Max pages to enqueue', String(CONFIG_DEFAULTS.maxPages))
    .option('--depth <n>', 'Max link depth from the seeds', String(CONFIG_DEFAULTS.maxDepth))
    .option('--keep-query', 'Treat URLs with different query strings as different pages')
    .option('--prefix <path>', 'Only follow links under this URL path prefix (path or full URL)')
    .option('--include <pattern>', 'Path patterns to include (repeatable)', collect, [])
    .option('--exclude <pattern>', 'Path patterns to exclude (repeatable)', collect, [])

    // Extraction
    .option('--selector <css>', 'Content selector; a comma list is tried in order')
    .option('--link-selector <css>', 'Selector for navigation links')

    // Fetching
    .option('--wait-for <condition>', 'load, domcontentloaded, networkidle or css:<selector>')
    .option('--timeout <ms>', 'Per-fetch timeout in ms')
    .option('--frames', 'Inline same-origin iframes')
    .option('--delay <ms>', 'Delay before each request in ms', String(CONFIG_DEFAULTS.delay))
    .option('--ignore-robots', 'Ignore robots.txt')
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])

    // Output
    .option('-o, --output <dir>', 'Output directory', CONFIG_DEFAULTS.outputDir)
    .option('--flat', 'Flat file structure instead of mirror')
    .option('--no-json', 'Skip the JSON file per page')
    .option('--single-file', 'Also write one combined markdown file')

    // Sources
    .option('--sources <file>', 'JSON file with named documentation sources')
    .option('--source <name>', 'Crawl the named source from --sources')

    // General
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show what would be crawled without fetching');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Check option combinations commander cannot express.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(urls: string[], options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
  if (options.source !== undefined && options.sources === undefined) {
    throw new Error('The --source option requires --sources <file>.');
  }
  if (options.sources !== undefined && options.source === undefined) {
    throw new Error('The --sources option requires --source <name>.');
  }
  if (urls.length === 0 && options.source === undefined) {
    throw new Error('At least one URL is required (or --sources with --source).');
  }
}

async function loadSelectedSource(
  options: CLIOptions,
): Promise<SelectedSource | undefined> {
  if (options.sources === undefined || options.source === undefined) {
    return undefined;
  }
  const file = await loadSourcesFile(options.sources);
  return { name: options.source, preset: resolveSource(file, options.source) };
}

/**
 * Run one CLI invocation after commander has parsed it.
 *
 * @returns The process exit code
 */
async function execute(urls: string[], options: CLIOptions): Promise<number> {
  try {
    validateCLIOptions(urls, options);
    const verbosity = getVerbosity(options);

    const source = await loadSelectedSource(options);
    const config = buildConfig(urls, options, source);

    if (options.dryRun) {
      printDryRun(config.urls, {
        concurrency: config.concurrency ?? CONFIG_DEFAULTS.concurrency,
        maxOpenPages: config.maxOpenPages ?? CONFIG_DEFAULTS.maxOpenPages,
        maxDepth: config.maxDepth ?? CONFIG_DEFAULTS.maxDepth,
        maxPages: config.maxPages ?? CONFIG_DEFAULTS.maxPages,
        outputDir: config.outputDir ?? CONFIG_DEFAULTS.outputDir,
        respectRobots: config.respectRobots ?? CONFIG_DEFAULTS.respectRobots,
        source: source?.name,
        contentSelector: config.fetch?.contentSelector,
        waitCondition: config.fetch?.waitCondition,
        includePatterns: config.includePatterns,
        excludePatterns: config.excludePatterns,
        pathPrefix: config.pathPrefix,
      });
      return 0;
    }

    const callbacks = createProgressCallbacks(verbosity);
    const controller = new AbortController();
    const onSigint = () => {
      if (verbosity !== 'quiet') {
        process.stderr.write('\nCancelling: waiting for open fetches to finish...\n');
      }
      controller.abort();
    };

    process.once('SIGINT', onSigint);
    try {
      const result = await crawlDocs(
        { ...config, ...callbacks },
        { signal: controller.signal },
      );
      printSummary(result, verbosity);
      return exitCodeFor(result.outcome.status);
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  } catch (error) {
    process.stderr.write(
      `Error: ${error instanceof Error ? error.message : String(error)}\n`,
    );
    return 1;
  }
}

/**
 * Main CLI entry point. Parses command-line arguments, builds
 * configuration, and invokes the SDK's crawlDocs() function.
 *
 * @param argv - The process.argv array to parse
 * @returns The process exit code: 0 completed, 1 error, 2 fatal, 130 cancelled
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();
  let exitCode = 0;

  program.action(async (urls: string[], options: CLIOptions) => {
    exitCode = await execute(urls, options);
  });

  await program.parseAsync(argv);
  return exitCode;
}
