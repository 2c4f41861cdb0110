/**
 * robots.txt lookup
 */

import { RobotsTxtFile } from 'crawlee';

/**
 * Parsed robots.txt rules for one origin
 */
export interface RobotsPolicy {
  isAllowed(url: string): boolean;
}

export interface RobotsFetcher {
  /**
   * Fetch and parse `${origin}/robots.txt`. Rejects on network or parse failure.
   */
  fetchPolicy(origin: string): Promise<RobotsPolicy>;
}

/**
 * Fallback used when robots.txt cannot be fetched
 */
export const ALLOW_ALL: RobotsPolicy = {
  isAllowed: () => true,
};

/**
 * Fetcher backed by Crawlee's robots.txt support (user agent "*").
 * A missing robots.txt (non-2xx) yields an allow-all policy from Crawlee itself.
 */
export class CrawleeRobotsFetcher implements RobotsFetcher {
  async fetchPolicy(origin: string): Promise<RobotsPolicy> {
    return RobotsTxtFile.find(origin);
  }
}

/**
 * Build a policy from robots.txt text already in hand
 */
export function policyFromText(origin: string, content: string): RobotsPolicy {
  return RobotsTxtFile.from(new URL('/robots.txt', origin).toString(), content);
}
