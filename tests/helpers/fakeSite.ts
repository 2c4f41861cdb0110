/**
 * In-process stand-in for the browser: a tiny "site" of pages with links.
 */

import { promises as fs } from 'fs';
import type { InteractOptions, PageSession, Renderer, SelectorDescriptor } from '../../src/types/render.types';

export interface FakePageSpec {
  title?: string;
  links?: string[];
  /** Extra link batches, revealed one at a time */
  batches?: string[][];
  /** Text of the control that reveals the next batch; omit to reveal by scrolling */
  control?: string;
  gotoError?: string;
  exportError?: string;
  exportHangs?: boolean;
  linksError?: string;
}

export class FakeSite implements Renderer {
  readonly visits: string[] = [];
  readonly exports: string[] = [];
  readonly interactions: SelectorDescriptor[] = [];
  activeSessions = 0;
  maxActiveSessions = 0;
  sessionsOpened = 0;
  sessionsClosed = 0;
  closed = false;
  newSessionError: string | null = null;

  constructor(
    readonly pages: Record<string, FakePageSpec>,
    readonly gotoDelayMs = 0
  ) {}

  async newSession(): Promise<PageSession> {
    if (this.newSessionError) throw new Error(this.newSessionError);
    this.sessionsOpened++;
    this.activeSessions++;
    this.maxActiveSessions = Math.max(this.maxActiveSessions, this.activeSessions);
    return new FakeSession(this);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  visitCount(url: string): number {
    return this.visits.filter((visited) => visited === url).length;
  }
}

export class FakeSession implements PageSession {
  private url: string | null = null;
  private revealed = 0;
  private isClosed = false;
  linksCalls = 0;

  constructor(private readonly site: FakeSite) {}

  private get page(): FakePageSpec {
    return (this.url && this.site.pages[this.url]) || {};
  }

  async goto(url: string): Promise<void> {
    this.url = url;
    this.site.visits.push(url);
    if (this.site.gotoDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.site.gotoDelayMs));
    }
    const { gotoError } = this.page;
    if (gotoError) throw new Error(gotoError);
  }

  async title(): Promise<string> {
    return this.page.title ?? '';
  }

  async links(): Promise<string[]> {
    this.linksCalls++;
    const { links = [], batches = [], linksError } = this.page;
    if (linksError) throw new Error(linksError);
    return [...links, ...batches.slice(0, this.revealed).flat()];
  }

  async exportPdf(filePath: string): Promise<void> {
    const { exportError, exportHangs } = this.page;
    if (exportHangs) return new Promise<void>(() => undefined);
    if (exportError) throw new Error(exportError);
    await fs.writeFile(filePath, `%PDF-fake ${this.url ?? ''}`);
    this.site.exports.push(filePath);
  }

  async interact(descriptor: SelectorDescriptor, _options: InteractOptions): Promise<boolean> {
    this.site.interactions.push(descriptor);
    const { control, batches = [] } = this.page;
    const matches =
      control !== undefined &&
      ((descriptor.type === 'text' && descriptor.text === control) ||
        (descriptor.type === 'css' && descriptor.selector === control));
    if (!matches || this.revealed >= batches.length) return false;
    this.revealed++;
    return true;
  }

  async scrollToBottom(): Promise<void> {
    const { control, batches = [] } = this.page;
    if (control === undefined && this.revealed < batches.length) {
      this.revealed++;
    }
  }

  async waitForSettle(): Promise<void> {
    return undefined;
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.site.activeSessions--;
    this.site.sessionsClosed++;
  }
}

export const noSleep = async (_ms: number): Promise<void> => undefined;
