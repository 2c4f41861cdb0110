/**
 * Per-URL pipeline
 *
 * robots check -> slot -> domain turn -> open -> (dismiss popups) -> export PDF
 * -> record history -> extract next-level links -> close -> release slot
 *
 * Each stage reports a Result; nothing thrown inside a task reaches the
 * scheduler, so one bad page never takes down its siblings.
 */

import { sleep as crawleeSleep } from 'crawlee';
import { PRE_EXPORT_SETTLE_MS } from '../config/constants';
import type { CrawlConfig } from '../types/crawl.types';
import type { PageFailure, PageOutcome, PageStage } from '../types/page.types';
import type { PageSession, Renderer } from '../types/render.types';
import { type Result, ok, err } from '../types/result';
import { ConcurrencyLimiter } from './concurrencyLimiter';
import { HistoryStore } from './historyStore';
import { LinkFilter } from './linkFilter';
import { PolitenessController } from './politeness';
import { PopupDismisser } from './popupDismisser';
import { artifactFilename, artifactPath } from '../utils/filename';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface PageProcessorDeps {
  config: Pick<CrawlConfig, 'outputDir' | 'timeoutMs' | 'maxDepth'>;
  renderer: Renderer;
  history: HistoryStore;
  politeness: PolitenessController;
  limiter: ConcurrencyLimiter;
  links: LinkFilter;
  /** Only set when `deal_cookie` is on */
  popups?: PopupDismisser;
  sleep?: (ms: number) => Promise<void>;
}

interface SavedArtifact {
  filename: string;
  fingerprint: string;
  path: string;
}

export class PageProcessor {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: PageProcessorDeps) {
    this.sleep = deps.sleep ?? ((ms) => crawleeSleep(ms));
  }

  async process(url: string, depth: number): Promise<PageOutcome> {
    if (!(await this.deps.politeness.allowed(url))) {
      logger.info({ url, depth }, 'Robots.txt prohibits access');
      return { status: 'disallowed', url, depth, links: [] };
    }

    return this.deps.limiter.run(() => this.processInSlot(url, depth));
  }

  private async processInSlot(url: string, depth: number): Promise<PageOutcome> {
    await this.deps.politeness.waitTurn(url);

    const opened = await this.openSession(url);
    if (!opened.ok) {
      return { status: 'failed', url, depth, failure: opened.error, links: [], warnings: [] };
    }

    const session = opened.value;
    const warnings: PageFailure[] = [];
    let stage: PageStage = 'navigation';

    try {
      const navigated = await this.navigate(session, url);
      if (!navigated.ok) warnings.push(navigated.error);

      if (this.deps.popups) {
        stage = 'popup';
        await this.deps.popups.dismiss(session, url);
      }

      stage = 'export';
      const saved = await this.exportArtifact(session, url);

      let recorded: Result<unknown, PageFailure> | null = null;
      if (saved.ok) {
        stage = 'persistence';
        recorded = await this.recordHistory(url, saved.value);
      }

      stage = 'extraction';
      const extracted = depth < this.deps.config.maxDepth ? await this.extractLinks(session, url) : ok<string[]>([]);
      if (!extracted.ok) warnings.push(extracted.error);
      const links = extracted.ok ? extracted.value : [];

      logger.debug({ url, depth, links: links.length }, 'Page extracted next-level links');

      if (!saved.ok) {
        return { status: 'failed', url, depth, failure: saved.error, links, warnings };
      }
      if (recorded && !recorded.ok) {
        return {
          status: 'unrecorded',
          url,
          depth,
          filename: saved.value.filename,
          links,
          warnings: [...warnings, recorded.error],
        };
      }
      return { status: 'archived', url, depth, filename: saved.value.filename, links, warnings };
    } catch (error) {
      const failure = pageFailure('unexpected', stage, url, error);
      logger.error({ url, depth, stage, error: failure.message }, 'Page processing failed');
      return { status: 'failed', url, depth, failure, links: [], warnings };
    } finally {
      await this.closeSession(session, url);
    }
  }

  private async openSession(url: string): Promise<Result<PageSession, PageFailure>> {
    try {
      return ok(await this.deps.renderer.newSession());
    } catch (error) {
      logger.error({ url, stage: 'session', error: errorMessage(error) }, 'Failed to create new page');
      return err(pageFailure('session', 'session', url, error));
    }
  }

  /**
   * Navigation failures are not fatal: the page is archived in whatever
   * state it reached.
   */
  private async navigate(session: PageSession, url: string): Promise<Result<void, PageFailure>> {
    const { timeoutMs } = this.deps.config;
    logger.info({ url, timeoutMs }, 'Opening page');
    try {
      await session.goto(url, timeoutMs);
      return ok(undefined);
    } catch (error) {
      logger.warn({ url, stage: 'navigation', error: errorMessage(error) }, 'Page loading failed; continuing');
      return err(pageFailure('navigation', 'navigation', url, error));
    }
  }

  private async exportArtifact(session: PageSession, url: string): Promise<Result<SavedArtifact, PageFailure>> {
    let title = '';
    try {
      title = await session.title();
    } catch (error) {
      logger.debug({ url, error: errorMessage(error) }, 'Could not read page title');
    }

    const { filename, fingerprint } = artifactFilename(title, url);
    const filePath = artifactPath(this.deps.config.outputDir, filename);

    try {
      await this.sleep(PRE_EXPORT_SETTLE_MS);
      await withTimeout(session.exportPdf(filePath), this.deps.config.timeoutMs, `PDF generation for ${url}`);
    } catch (error) {
      logger.warn({ url, stage: 'export', error: errorMessage(error) }, 'Failed to save PDF; skipping record');
      return err(pageFailure('export', 'export', url, error));
    }

    logger.info({ url, path: filePath }, 'Saved PDF');
    return ok({ filename, fingerprint, path: filePath });
  }

  private async recordHistory(url: string, saved: SavedArtifact): Promise<Result<unknown, PageFailure>> {
    const recorded = await this.deps.history.record(url, saved.filename, saved.fingerprint);
    return recorded.ok ? recorded : err(pageFailure('persistence', 'persistence', url, recorded.error));
  }

  private async extractLinks(session: PageSession, url: string): Promise<Result<string[], PageFailure>> {
    try {
      return ok(this.deps.links.filter(await session.links()));
    } catch (error) {
      logger.debug({ url, stage: 'extraction', error: errorMessage(error) }, 'Failed to extract links');
      return err(pageFailure('extraction', 'extraction', url, error));
    }
  }

  private async closeSession(session: PageSession, url: string): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.debug({ url, error: errorMessage(error) }, 'Failed to close page');
    }
  }
}

export function pageFailure(kind: PageFailure['kind'], stage: PageStage, url: string, error: unknown): PageFailure {
  return { kind, stage, url, message: errorMessage(error) };
}
