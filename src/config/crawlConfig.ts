/**
 * Target configuration: one YAML file per portal
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { CrawlConfig, RefreshMode } from '../types/crawl.types';
import { isValidUrl, normalizeUrl } from '../core/urlNormalizer';
import { ConfigError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_DELAY_SECS,
  DEFAULT_HISTORY_PATH,
  DEFAULT_MAX_DEPTH,
  DEFAULT_NO_NEW_LIMIT,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TIMEOUT_MS,
  MIN_CONCURRENCY,
  MIN_MAX_DEPTH,
  MIN_NO_NEW_LIMIT,
  MIN_TIMEOUT_MS,
} from './constants';

const REFRESH_MODES: readonly RefreshMode[] = ['pull', 'pagination', 'none'];

const rawConfigSchema = z.object({
  start_url: z.string().refine(isValidUrl, { message: 'start_url must be an absolute http(s) URL' }),
  output_dir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  history_path: z.string().min(1).default(DEFAULT_HISTORY_PATH),
  concurrency: z.number().int().default(DEFAULT_CONCURRENCY),
  max_depth: z.number().int().default(DEFAULT_MAX_DEPTH),
  timeout: z.number().default(DEFAULT_TIMEOUT_MS),
  delay: z.number().default(DEFAULT_DELAY_SECS),
  prefixes: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((value) => (value == null ? [] : typeof value === 'string' ? [value] : value)),
  refresh_mode: z
    .unknown()
    .transform((value) => (value == null ? undefined : typeof value === 'string' ? value : String(value))),
  obey_robot: z.boolean().default(true),
  no_new_limit: z.number().int().default(DEFAULT_NO_NEW_LIMIT),
  deal_cookie: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type RawCrawlConfig = z.input<typeof rawConfigSchema>;

/**
 * Validate a parsed config object and resolve it into a CrawlConfig.
 *
 * Numbers below their minimum are clamped; an unknown refresh_mode becomes
 * "none" with a warning. Relative paths resolve against `baseDir`.
 */
export function parseCrawlConfig(input: unknown, source?: string, baseDir = process.cwd()): CrawlConfig {
  const parsed = rawConfigSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid config: ${summary}`, source, parsed.error.issues);
  }

  const raw = parsed.data;
  return {
    startUrl: normalizeUrl(raw.start_url),
    outputDir: path.resolve(baseDir, raw.output_dir),
    historyPath: path.resolve(baseDir, raw.history_path),
    concurrency: Math.max(MIN_CONCURRENCY, raw.concurrency),
    maxDepth: Math.max(MIN_MAX_DEPTH, raw.max_depth),
    timeoutMs: Math.max(MIN_TIMEOUT_MS, Math.trunc(raw.timeout)),
    delaySeconds: Math.max(0, raw.delay),
    refreshMode: resolveRefreshMode(raw.refresh_mode),
    noNewLimit: Math.max(MIN_NO_NEW_LIMIT, raw.no_new_limit),
    prefixes: raw.prefixes.filter((prefix) => prefix.length > 0),
    obeyRobots: raw.obey_robot,
    dealCookie: raw.deal_cookie,
    verbose: raw.verbose,
  };
}

/**
 * Read and validate a YAML target config.
 * Relative output and history paths resolve against the working directory.
 */
export async function loadCrawlConfig(filePath: string): Promise<CrawlConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${errorMessage(error)}`, filePath);
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Config file is not valid YAML: ${errorMessage(error)}`, filePath);
  }

  return parseCrawlConfig(document, filePath);
}

export function resolveRefreshMode(value: string | null | undefined): RefreshMode {
  const mode = (value ?? 'none').trim().toLowerCase();
  const known = REFRESH_MODES.find((candidate) => candidate === mode);
  if (known) return known;

  logger.warn({ refreshMode: value }, "Unknown refresh_mode; treating as 'none'");
  return 'none';
}
