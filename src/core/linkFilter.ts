/**
 * Per-run crawl state and the link filter shared by the portal and every page
 */

import { isValidUrl, matchesPrefix, normalizeUrl } from './urlNormalizer';

/**
 * Sets that decide whether a discovered link is new.
 *
 * `processed` is the history store's live key set, so records made during
 * this run are visible immediately. `seen` holds every URL enqueued this run.
 */
export class CrawlState {
  readonly seen = new Set<string>();

  constructor(readonly processed: ReadonlySet<string>) {}

  markSeen(url: string): void {
    this.seen.add(url);
  }

  isKnown(url: string): boolean {
    return this.seen.has(url) || this.processed.has(url);
  }
}

export class LinkFilter {
  constructor(
    private readonly state: CrawlState,
    private readonly prefixes: readonly string[]
  ) {}

  /**
   * Normalize, drop anything outside the allow-list or already known, and mark
   * the survivors as seen. A link returned here is never returned again this run.
   *
   * Non-http(s) targets (mailto:, javascript:, ...) are dropped.
   */
  filter(hrefs: readonly string[]): string[] {
    const out: string[] = [];

    for (const href of hrefs) {
      if (!href || !isValidUrl(href)) continue;

      const url = normalizeUrl(href);
      if (!matchesPrefix(url, this.prefixes)) continue;
      if (this.state.isKnown(url)) continue;

      this.state.markSeen(url);
      out.push(url);
    }

    return out;
  }
}
