/**
 * Structured logging with Pino
 */

import pino from 'pino';
import * as dotenv from 'dotenv';
import type { CrawlStats } from '../types/crawl.types';

dotenv.config();

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_PRETTY = process.env.LOG_PRETTY === 'true';

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: LOG_LEVEL,
  transport: LOG_PRETTY
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Raise or restore the level for a single portal run (`verbose` in the target config)
 */
export function setVerbose(verbose: boolean): void {
  logger.level = verbose ? 'debug' : LOG_LEVEL;
}

/**
 * Log the start of a BFS level
 */
export function logLevelProgress(runId: string, depth: number, size: number) {
  logger.info(
    {
      runId,
      depth,
      size,
    },
    'Processing level'
  );
}

/**
 * Log crawl statistics
 */
export function logCrawlStats(runId: string, stats: CrawlStats) {
  logger.info(
    {
      runId,
      stats,
      durationSec: stats.durationMs !== undefined ? Math.round(stats.durationMs / 1000) : undefined,
    },
    'Crawl completed'
  );
}
