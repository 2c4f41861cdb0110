/**
 * Renderer backed by headless Chromium through playwright-core.
 * playwright-core never downloads a browser: point it at an installed one
 * with BROWSER_CHANNEL or BROWSER_EXECUTABLE_PATH.
 */

import { chromium, type Browser, type BrowserContext, type Frame, type Page } from 'playwright-core';
import { PDF_FORMAT, USER_AGENT } from '../config/constants';
import type { InteractOptions, PageSession, Renderer, SelectorDescriptor } from '../types/render.types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface PlaywrightRendererOptions {
  headless?: boolean;
  channel?: string;
  executablePath?: string;
  userAgent?: string;
}

export async function launchPlaywrightRenderer(options: PlaywrightRendererOptions = {}): Promise<PlaywrightRenderer> {
  const browser = await chromium.launch({
    headless: options.headless ?? true,
    channel: options.channel,
    executablePath: options.executablePath,
  });
  const context = await browser.newContext({ userAgent: options.userAgent ?? USER_AGENT });
  logger.debug({ channel: options.channel, executablePath: options.executablePath }, 'Browser launched');
  return new PlaywrightRenderer(browser, context);
}

/**
 * Options from the environment (see .env.example)
 */
export function rendererOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): PlaywrightRendererOptions {
  return {
    headless: env.HEADLESS !== 'false',
    channel: env.BROWSER_CHANNEL || undefined,
    executablePath: env.BROWSER_EXECUTABLE_PATH || undefined,
  };
}

export class PlaywrightRenderer implements Renderer {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext
  ) {}

  async newSession(): Promise<PageSession> {
    return new PlaywrightPageSession(await this.context.newPage());
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

export class PlaywrightPageSession implements PageSession {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'networkidle' });
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async links(): Promise<string[]> {
    return this.page.$$eval('a[href]', (anchors) =>
      anchors.flatMap((anchor) => (anchor instanceof HTMLAnchorElement && anchor.href ? [anchor.href] : []))
    );
  }

  async exportPdf(filePath: string): Promise<void> {
    try {
      await this.page.emulateMedia({ media: 'screen' });
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'emulateMedia failed');
    }
    await this.page.pdf({ path: filePath, format: PDF_FORMAT, printBackground: true });
  }

  async interact(descriptor: SelectorDescriptor, options: InteractOptions): Promise<boolean> {
    const frames: Frame[] = options.includeFrames ? this.page.frames() : [this.page.mainFrame()];
    const selector = descriptorToSelector(descriptor);
    let lastError: unknown = null;

    for (const frame of frames) {
      const target = frame.locator(selector).first();
      try {
        if ((await target.count()) === 0) continue;
        await target.click({ timeout: options.timeoutMs });
        return true;
      } catch (error) {
        lastError = error;
      }
    }

    if (lastError !== null) throw lastError;
    return false;
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async waitForSettle(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Network did not go idle');
    }
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWER = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Playwright selector for a descriptor.
 * Text descriptors become a case-insensitive XPath union over the tags;
 * `input` matches button-like inputs by their value.
 */
export function descriptorToSelector(descriptor: SelectorDescriptor): string {
  if (descriptor.type === 'css') return descriptor.selector;

  const needle = xpathLiteral(descriptor.text.toLowerCase());
  const lowered = (expr: string) => `translate(normalize-space(${expr}),"${UPPER}","${LOWER}")`;

  const paths = descriptor.tags.map((tag) =>
    tag === 'input'
      ? `//input[(@type="button" or @type="submit") and contains(${lowered('@value')}, ${needle})]`
      : `//${tag}[contains(${lowered('.')}, ${needle})]`
  );
  return `xpath=${paths.join(' | ')}`;
}

/**
 * Quote a string for XPath 1.0, which has no escape sequences
 */
export function xpathLiteral(value: string): string {
  if (!value.includes('"')) return `"${value}"`;
  if (!value.includes("'")) return `'${value}'`;
  const parts = value.split('"').map((part) => `"${part}"`);
  return `concat(${parts.join(`, '"', `)})`;
}
