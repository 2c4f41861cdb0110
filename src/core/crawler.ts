/**
 * Portal crawler
 * Level-synchronous BFS from a portal page, with reveal interactions when the
 * portal stops producing new links
 *
 * States:
 *   levelActive(d) - process every URL of depth d, then build depth d+1
 *   levelEmpty     - reveal more portal content and re-extract
 *   exhausted      - `noNewLimit` consecutive empty cycles; run ends
 */

import { promises as fs } from 'fs';
import { sleep as crawleeSleep } from 'crawlee';
import { v4 as uuidv4 } from 'uuid';
import { EMPTY_CYCLE_BACKOFF_MS } from '../config/constants';
import { type InteractionTable, resolveInteractions } from '../config/interactions';
import type { CrawlConfig, CrawlStats } from '../types/crawl.types';
import type { PageOutcome } from '../types/page.types';
import type { PageSession, Renderer } from '../types/render.types';
import { ConcurrencyLimiter } from './concurrencyLimiter';
import { HistoryStore } from './historyStore';
import { CrawlState, LinkFilter } from './linkFilter';
import { PageProcessor } from './pageProcessor';
import { PolitenessController } from './politeness';
import { PopupDismisser } from './popupDismisser';
import { RevealDriver } from './revealDriver';
import type { RobotsFetcher } from './robots';
import { extractOrigin } from './urlNormalizer';
import { errorMessage } from '../utils/errors';
import { logger, logCrawlStats, logLevelProgress } from '../utils/logger';

export type SchedulerState =
  | { kind: 'levelActive'; depth: number; urls: string[] }
  | { kind: 'levelEmpty' }
  | { kind: 'exhausted' };

export interface PortalCrawlerDeps {
  renderer: Renderer;
  interactions: InteractionTable;
  robots?: RobotsFetcher;
  history?: HistoryStore;
  /** Shared by every timed wait in the run; tests pass a no-op */
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds since epoch, for per-domain pacing */
  now?: () => number;
}

export class PortalCrawler {
  readonly runId = uuidv4();

  private readonly history: HistoryStore;
  private readonly politeness: PolitenessController;
  private readonly limiter: ConcurrencyLimiter;
  private readonly reveal: RevealDriver;
  private readonly popups: PopupDismisser | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  private state: CrawlState | null = null;
  private stats: CrawlStats = emptyStats();
  private trace: SchedulerState[] = [];

  constructor(
    private readonly config: CrawlConfig,
    private readonly deps: PortalCrawlerDeps
  ) {
    this.sleep = deps.sleep ?? ((ms) => crawleeSleep(ms));
    this.history = deps.history ?? new HistoryStore(config.historyPath);
    this.politeness = new PolitenessController({
      obeyRobots: config.obeyRobots,
      delaySeconds: config.delaySeconds,
      robots: deps.robots,
      now: deps.now,
      sleep: this.sleep,
    });
    this.limiter = new ConcurrencyLimiter(config.concurrency);
    this.reveal = new RevealDriver({
      mode: config.refreshMode,
      controls: resolveInteractions(deps.interactions, extractOrigin(config.startUrl)),
      sleep: this.sleep,
    });
    this.popups = config.dealCookie ? new PopupDismisser(deps.interactions, this.sleep) : undefined;
  }

  /**
   * States visited by the last run, in order
   */
  get transitions(): readonly SchedulerState[] {
    return this.trace;
  }

  get seenUrls(): ReadonlySet<string> {
    return this.state?.seen ?? new Set<string>();
  }

  /**
   * Archive everything reachable from the portal
   *
   * @returns Crawl statistics
   */
  async run(): Promise<CrawlStats> {
    this.stats = emptyStats();
    this.trace = [];

    logger.info({ runId: this.runId, startUrl: this.config.startUrl }, 'Starting crawl');

    const processed = await this.history.load();
    await fs.mkdir(this.config.outputDir, { recursive: true });

    this.state = new CrawlState(processed);
    const links = new LinkFilter(this.state, this.config.prefixes);
    const processor = new PageProcessor({
      config: this.config,
      renderer: this.deps.renderer,
      history: this.history,
      politeness: this.politeness,
      limiter: this.limiter,
      links,
      popups: this.popups,
      sleep: this.sleep,
    });

    const portal = await this.deps.renderer.newSession();
    try {
      await this.openPortal(portal);
      this.state.markSeen(this.config.startUrl);

      const initial = await this.extractPortalLinks(portal, links);
      let current: SchedulerState = initial.length > 0 ? levelActive(1, initial) : { kind: 'levelEmpty' };
      let consecutiveEmpty = 0;

      while (current.kind !== 'exhausted') {
        this.trace.push(current);

        if (current.kind === 'levelActive') {
          current = await this.runLevel(processor, current.depth, current.urls);
          continue;
        }

        // levelEmpty
        this.stats.revealAttempts++;
        const revealed = await this.reveal.attempt(portal);
        const found = await this.extractPortalLinks(portal, links);

        if (found.length > 0) {
          consecutiveEmpty = 0;
          current = levelActive(1, found);
          continue;
        }

        consecutiveEmpty++;
        this.stats.emptyCycles++;
        logger.info({ runId: this.runId, revealed, consecutiveEmpty }, 'No new portal links');

        if (consecutiveEmpty >= this.config.noNewLimit) {
          logger.info(
            { runId: this.runId, attempts: this.config.noNewLimit },
            'Portal appears exhausted; stopping'
          );
          current = { kind: 'exhausted' };
        } else {
          await this.sleep(EMPTY_CYCLE_BACKOFF_MS);
        }
      }
      this.trace.push(current);
    } finally {
      try {
        await portal.close();
      } catch (error) {
        logger.debug({ error: errorMessage(error) }, 'Failed to close portal page');
      }
      await this.history.flush();
    }

    this.stats.endTime = new Date();
    this.stats.durationMs = this.stats.endTime.getTime() - this.stats.startTime.getTime();
    logCrawlStats(this.runId, this.stats);

    return this.stats;
  }

  private async openPortal(portal: PageSession): Promise<void> {
    const { startUrl, timeoutMs } = this.config;
    logger.info({ url: startUrl, timeoutMs }, 'Opening portal');
    try {
      await portal.goto(startUrl, timeoutMs);
    } catch (error) {
      logger.warn({ url: startUrl, stage: 'navigation', error: errorMessage(error) }, 'Portal navigation failed; continuing');
    }

    if (this.popups) {
      await this.popups.dismiss(portal, startUrl);
    }
  }

  private async extractPortalLinks(portal: PageSession, links: LinkFilter): Promise<string[]> {
    let hrefs: string[];
    try {
      hrefs = await portal.links();
    } catch (error) {
      logger.debug({ url: this.config.startUrl, stage: 'extraction', error: errorMessage(error) }, 'Failed to extract portal links');
      return [];
    }

    const found = links.filter(hrefs);
    this.stats.linksDiscovered += found.length;
    logger.debug({ found: found.length }, 'Portal extracted links');
    return found;
  }

  /**
   * Process one full level and wait for every task before building the next.
   * Sub-links were already filtered (and marked seen) by the processor.
   */
  private async runLevel(processor: PageProcessor, depth: number, urls: string[]): Promise<SchedulerState> {
    logLevelProgress(this.runId, depth, urls.length);

    const settled = await Promise.allSettled(urls.map((url) => processor.process(url, depth)));

    const next: string[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.stats.pagesFailed++;
        logger.error({ url: urls[index], depth, error: errorMessage(result.reason) }, 'Page task rejected');
        return;
      }
      this.tally(result.value);
      next.push(...result.value.links);
    });

    this.stats.levelsProcessed++;
    this.stats.linksDiscovered += next.length;

    if (next.length > 0 && depth + 1 <= this.config.maxDepth) {
      return levelActive(depth + 1, next);
    }
    return { kind: 'levelEmpty' };
  }

  private tally(outcome: PageOutcome): void {
    switch (outcome.status) {
      case 'archived':
        this.stats.pagesArchived++;
        break;
      case 'unrecorded':
        this.stats.pagesUnrecorded++;
        break;
      case 'disallowed':
        this.stats.pagesDisallowed++;
        break;
      case 'failed':
        this.stats.pagesFailed++;
        break;
    }
  }
}

function levelActive(depth: number, urls: string[]): SchedulerState {
  return { kind: 'levelActive', depth, urls };
}

function emptyStats(): CrawlStats {
  return {
    linksDiscovered: 0,
    pagesArchived: 0,
    pagesUnrecorded: 0,
    pagesDisallowed: 0,
    pagesFailed: 0,
    levelsProcessed: 0,
    revealAttempts: 0,
    emptyCycles: 0,
    startTime: new Date(),
  };
}
