/**
 * Cookie banner / popup dismissal (enabled by `deal_cookie`)
 */

import { sleep as crawleeSleep } from 'crawlee';
import { type InteractionTable, resolveInteractions } from '../config/interactions';
import { DISMISS_CLICK_TIMEOUT_MS, DISMISS_SETTLE_MS } from '../config/constants';
import type { PageSession } from '../types/render.types';
import { extractOrigin } from './urlNormalizer';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export class PopupDismisser {
  constructor(
    private readonly table: InteractionTable,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => crawleeSleep(ms)
  ) {}

  /**
   * Try every dismiss control on the page and in its frames, so a cookie banner
   * and a second overlay both get closed. Site-specific controls for the URL's
   * origin come before the defaults.
   *
   * @returns Number of controls clicked
   */
  async dismiss(session: PageSession, url: string): Promise<number> {
    const { dismiss } = resolveInteractions(this.table, extractOrigin(url));
    let clicks = 0;

    for (const descriptor of dismiss) {
      try {
        const clicked = await session.interact(descriptor, {
          timeoutMs: DISMISS_CLICK_TIMEOUT_MS,
          includeFrames: true,
        });
        if (!clicked) continue;

        clicks++;
        logger.debug({ url, descriptor }, 'Dismissed popup');
        await this.sleep(DISMISS_SETTLE_MS);
      } catch (error) {
        logger.debug({ url, stage: 'popup', descriptor, error: errorMessage(error) }, 'Dismiss click failed');
      }
    }

    return clicks;
  }
}
