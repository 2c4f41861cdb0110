/**
 * Reveal driver: coax more links out of a page that has run dry
 *
 * Every attempt scrolls to the bottom first to trigger lazy loading, then,
 * depending on the refresh mode, clicks a "next page" or "load more" control.
 */

import { sleep as crawleeSleep } from 'crawlee';
import type { ResolvedInteractions } from '../config/interactions';
import {
  CLICK_SETTLE_MS,
  NETWORK_IDLE_WAIT_MS,
  REVEAL_CLICK_TIMEOUT_MS,
  SCROLL_SETTLE_MS,
} from '../config/constants';
import type { RefreshMode } from '../types/crawl.types';
import type { PageSession, SelectorDescriptor } from '../types/render.types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RevealDriverOptions {
  mode: RefreshMode;
  controls: ResolvedInteractions;
  sleep?: (ms: number) => Promise<void>;
}

export class RevealDriver {
  private readonly mode: RefreshMode;
  private readonly controls: ResolvedInteractions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RevealDriverOptions) {
    this.mode = options.mode;
    this.controls = options.controls;
    this.sleep = options.sleep ?? ((ms) => crawleeSleep(ms));
  }

  /**
   * @returns True when an interaction was performed. In "none" mode the scroll
   * alone counts, so the caller must judge progress by the links it finds.
   */
  async attempt(session: PageSession): Promise<boolean> {
    try {
      await session.scrollToBottom();
      await this.sleep(SCROLL_SETTLE_MS);
      logger.debug('Scrolled to bottom to trigger lazy loading');
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Failed to scroll to bottom');
    }

    switch (this.mode) {
      case 'pagination':
        logger.info('Refresh: pagination');
        return this.clickFirst(session, this.controls.next);
      case 'pull':
        logger.info('Refresh: pull');
        return this.clickFirst(session, this.controls.loadMore);
      case 'none':
        logger.info('No refresh mode; only attempted lazy loading by scrolling');
        return true;
    }
  }

  private async clickFirst(session: PageSession, descriptors: readonly SelectorDescriptor[]): Promise<boolean> {
    for (const descriptor of descriptors) {
      let clicked: boolean;
      try {
        clicked = await session.interact(descriptor, { timeoutMs: REVEAL_CLICK_TIMEOUT_MS });
      } catch (error) {
        logger.debug({ descriptor, error: errorMessage(error) }, 'Reveal click failed; trying next control');
        continue;
      }
      if (!clicked) continue;

      logger.info({ descriptor }, 'Clicked reveal control');
      await this.sleep(CLICK_SETTLE_MS);
      try {
        await session.waitForSettle(NETWORK_IDLE_WAIT_MS);
      } catch (error) {
        logger.debug({ error: errorMessage(error) }, 'Page did not settle after reveal click');
      }
      return true;
    }

    return false;
  }
}
