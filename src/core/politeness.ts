/**
 * Politeness: robots.txt compliance and per-domain pacing
 */

import { sleep as crawleeSleep } from 'crawlee';
import { extractDomain, extractOrigin } from './urlNormalizer';
import { ALLOW_ALL, CrawleeRobotsFetcher, type RobotsFetcher, type RobotsPolicy } from './robots';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface PolitenessOptions {
  obeyRobots: boolean;
  delaySeconds: number;
  robots?: RobotsFetcher;
  /** Milliseconds since epoch */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class PolitenessController {
  private readonly obeyRobots: boolean;
  private readonly delayMs: number;
  private readonly robots: RobotsFetcher;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /** origin -> policy; holds the pending fetch so concurrent first lookups share it */
  private readonly robotsCache = new Map<string, Promise<RobotsPolicy>>();
  /** domain -> the latest caller's turn, resolving to the time it actually resumed (ms) */
  private readonly domainTurns = new Map<string, Promise<number>>();
  /** domain -> time of the latest dispatch (ms) */
  private readonly domainLastFetch = new Map<string, number>();

  constructor(options: PolitenessOptions) {
    this.obeyRobots = options.obeyRobots;
    this.delayMs = Math.max(0, options.delaySeconds) * 1000;
    this.robots = options.robots ?? new CrawleeRobotsFetcher();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => crawleeSleep(ms));
  }

  /**
   * Whether robots.txt lets us fetch `url`. Fails open when robots.txt is unavailable.
   */
  async allowed(url: string): Promise<boolean> {
    if (!this.obeyRobots) return true;

    const origin = extractOrigin(url);
    let policy = this.robotsCache.get(origin);
    if (!policy) {
      policy = this.fetchPolicy(origin);
      this.robotsCache.set(origin, policy);
    }

    return (await policy).isAllowed(url);
  }

  /**
   * Suspend until `delaySeconds` have passed since the previous caller for the
   * same domain actually resumed.
   *
   * Callers for one domain form a chain: each is linked behind the previous one
   * before the first await, and measures its delay from the previous caller's
   * real resume time, so early or late timers never shorten a gap.
   *
   * @returns The time this caller resumed (ms)
   */
  waitTurn(url: string): Promise<number> {
    const domain = extractDomain(url);
    const turn = this.takeTurn(url, domain, this.domainTurns.get(domain));
    this.domainTurns.set(domain, turn);
    return turn;
  }

  private async takeTurn(url: string, domain: string, previous: Promise<number> | undefined): Promise<number> {
    if (previous !== undefined) {
      const earliest = (await previous) + this.delayMs;
      let remaining = earliest - this.now();
      if (remaining > 0) {
        logger.debug({ url, domain, waitMs: remaining }, 'Waiting for domain turn');
      }
      while (remaining > 0) {
        await this.sleep(remaining);
        remaining = earliest - this.now();
      }
    }

    const resumed = this.now();
    this.domainLastFetch.set(domain, resumed);
    return resumed;
  }

  lastDispatch(domain: string): number | undefined {
    return this.domainLastFetch.get(domain);
  }

  private async fetchPolicy(origin: string): Promise<RobotsPolicy> {
    try {
      const policy = await this.robots.fetchPolicy(origin);
      logger.debug({ origin }, 'Loaded robots.txt');
      return policy;
    } catch (error) {
      logger.warn(
        { origin, stage: 'robots', error: errorMessage(error) },
        'Failed to read robots.txt; assuming allowed'
      );
      return ALLOW_ALL;
    }
  }
}
