/**
 * Run one portal crawl per config file, in order.
 * A bad config or a crashed run is logged and the next target still runs.
 */

import { loadCrawlConfig } from '../config/crawlConfig';
import type { InteractionTable } from '../config/interactions';
import type { CrawlStats } from '../types/crawl.types';
import type { Renderer } from '../types/render.types';
import { PortalCrawler, type PortalCrawlerDeps } from './crawler';
import { ConfigError, errorMessage } from '../utils/errors';
import { logger, setVerbose } from '../utils/logger';

export type TargetResult =
  | { configPath: string; status: 'completed'; runId: string; stats: CrawlStats }
  | { configPath: string; status: 'config_error'; error: string }
  | { configPath: string; status: 'failed'; error: string };

export interface RunTargetsOptions {
  /** One renderer per target, closed when the target finishes */
  createRenderer: () => Promise<Renderer>;
  interactions: InteractionTable;
  /** Force debug logging for every target */
  debug?: boolean;
  overrides?: Pick<PortalCrawlerDeps, 'robots' | 'sleep' | 'now'>;
}

export async function runTargets(configPaths: readonly string[], options: RunTargetsOptions): Promise<TargetResult[]> {
  const results: TargetResult[] = [];

  for (const configPath of configPaths) {
    logger.info({ configPath }, '===== Start to process target =====');
    results.push(await runTarget(configPath, options));
    logger.info({ configPath }, '===== Target done =====');
  }

  setVerbose(Boolean(options.debug));
  return results;
}

async function runTarget(configPath: string, options: RunTargetsOptions): Promise<TargetResult> {
  let renderer: Renderer | null = null;

  try {
    const config = await loadCrawlConfig(configPath);
    setVerbose(config.verbose || Boolean(options.debug));

    renderer = await options.createRenderer();
    const crawler = new PortalCrawler(config, {
      ...options.overrides,
      renderer,
      interactions: options.interactions,
    });
    const stats = await crawler.run();
    return { configPath, status: 'completed', runId: crawler.runId, stats };
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ configPath, path: error.path, error: error.message }, 'Invalid configuration; skipping target');
      return { configPath, status: 'config_error', error: error.message };
    }
    logger.error({ configPath, error: errorMessage(error) }, 'Error processing target');
    return { configPath, status: 'failed', error: errorMessage(error) };
  } finally {
    if (renderer) {
      try {
        await renderer.close();
      } catch (error) {
        logger.warn({ configPath, error: errorMessage(error) }, 'Failed to close renderer');
      }
    }
  }
}
