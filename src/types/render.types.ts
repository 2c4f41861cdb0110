/**
 * Rendering collaborator contract
 *
 * The crawler never touches a browser directly; it drives pages through
 * these interfaces. The Playwright implementation lives in src/render.
 */

/**
 * How to find a clickable control on a page
 *
 * - text: element whose normalized text (or button value) contains `text`, case-insensitive,
 *   restricted to the given tag names
 * - css: first element matching a CSS selector
 */
export type SelectorDescriptor =
  | { type: 'text'; text: string; tags: string[] }
  | { type: 'css'; selector: string };

export interface InteractOptions {
  timeoutMs: number;
  /** Also search child frames */
  includeFrames?: boolean;
}

/**
 * One open browser page
 */
export interface PageSession {
  /** Navigate and wait for network idle; rejects on timeout or network error */
  goto(url: string, timeoutMs: number): Promise<void>;
  title(): Promise<string>;
  /** Absolute href of every anchor currently in the DOM */
  links(): Promise<string[]>;
  /** Print the current state to a PDF at `filePath`; rejects on error */
  exportPdf(filePath: string): Promise<void>;
  /** Click the first element matching the descriptor. Resolves false when nothing matched */
  interact(descriptor: SelectorDescriptor, options: InteractOptions): Promise<boolean>;
  scrollToBottom(): Promise<void>;
  /** Wait for network idle, resolving (not rejecting) when `timeoutMs` passes */
  waitForSettle(timeoutMs: number): Promise<void>;
  close(): Promise<void>;
}

export interface Renderer {
  newSession(): Promise<PageSession>;
  close(): Promise<void>;
}
