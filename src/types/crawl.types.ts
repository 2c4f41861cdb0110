/**
 * Crawl-related type definitions
 */

/**
 * How the portal is asked for more content once its links are exhausted
 */
export type RefreshMode = 'pull' | 'pagination' | 'none';

/**
 * Resolved configuration for one portal run (immutable for the run)
 */
export interface CrawlConfig {
  startUrl: string;
  outputDir: string;
  historyPath: string;
  concurrency: number;
  maxDepth: number;
  timeoutMs: number;
  delaySeconds: number;
  refreshMode: RefreshMode;
  noNewLimit: number;
  prefixes: string[];
  obeyRobots: boolean;
  dealCookie: boolean;
  verbose: boolean;
}

/**
 * Crawl statistics
 */
export interface CrawlStats {
  linksDiscovered: number;
  pagesArchived: number;
  pagesUnrecorded: number;
  pagesDisallowed: number;
  pagesFailed: number;
  levelsProcessed: number;
  revealAttempts: number;
  emptyCycles: number;
  startTime: Date;
  endTime?: Date;
  durationMs?: number;
}
