import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import type { DocsCrawlOptions, WaitCondition } from '../types.js';

const waitConditionSchema = z.custom<WaitCondition>(
  (value) =>
    typeof value === 'string' &&
    (value === 'load' ||
      value === 'domcontentloaded' ||
      value === 'networkidle' ||
      /^css:\S/.test(value)),
  { message: 'Expected load, domcontentloaded, networkidle or css:<selector>' },
);

/**
 * One named documentation source.
 */
export const sourcePresetSchema = z
  .object({
    url: z.string().url(),
    outputDir: z.string().min(1).optional(),
    contentSelector: z.string().min(1).optional(),
    linkSelector: z.string().min(1).optional(),
    pathPrefix: z.string().min(1).optional(),
    waitCondition: waitConditionSchema.optional(),
    renderFrames: z.boolean().optional(),
    excludePatterns: z.array(z.string()).optional(),
  })
  .strict();

export const sourcesFileSchema = z.object({
  sources: z.record(sourcePresetSchema),
});

export type SourcePreset = z.infer<typeof sourcePresetSchema>;
export type SourcesFile = z.infer<typeof sourcesFileSchema>;

/**
 * Validate a parsed sources document.
 *
 * @throws Error listing every problem, one `path: message` per line
 */
export function parseSources(data: unknown, origin = 'sources'): SourcesFile {
  const result = sourcesFileSchema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid sources file "${origin}":\n${problems}`);
  }
  return result.data;
}

/**
 * Read and validate a sources JSON file.
 */
export async function loadSourcesFile(filePath: string): Promise<SourcesFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Cannot read sources file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid JSON in sources file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseSources(data, filePath);
}

/**
 * Look up a source by name.
 */
export function resolveSource(file: SourcesFile, name: string): SourcePreset {
  const preset = Object.hasOwn(file.sources, name) ? file.sources[name] : undefined;
  if (!preset) {
    const available = Object.keys(file.sources).sort().join(', ') || '(none)';
    throw new Error(`Unknown source "${name}". Available sources: ${available}`);
  }
  return preset;
}

/**
 * Turn a preset into crawl options. The preset's `outputDir` (or its name)
 * becomes a sub-directory of `baseOutputDir`.
 */
export function presetToOptions(
  name: string,
  preset: SourcePreset,
  baseOutputDir: string,
): DocsCrawlOptions {
  const options: DocsCrawlOptions = {
    urls: [preset.url],
    outputDir: join(baseOutputDir, preset.outputDir ?? name),
    sourceName: name,
    fetch: {},
  };

  if (preset.contentSelector !== undefined) {
    options.fetch = { ...options.fetch, contentSelector: preset.contentSelector };
  }
  if (preset.waitCondition !== undefined) {
    options.fetch = { ...options.fetch, waitCondition: preset.waitCondition };
  }
  if (preset.renderFrames !== undefined) {
    options.fetch = { ...options.fetch, renderFrames: preset.renderFrames };
  }
  if (preset.linkSelector !== undefined) {
    options.linkSelector = preset.linkSelector;
  }
  if (preset.pathPrefix !== undefined) {
    options.pathPrefix = preset.pathPrefix;
  }
  if (preset.excludePatterns !== undefined) {
    options.excludePatterns = preset.excludePatterns;
  }

  return options;
}
