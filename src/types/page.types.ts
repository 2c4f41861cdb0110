/**
 * Page pipeline type definitions
 */

export type PageStage = 'robots' | 'session' | 'navigation' | 'popup' | 'export' | 'persistence' | 'extraction';

/**
 * A recoverable failure at one stage of processing a page
 */
export interface PageFailure {
  kind: 'navigation' | 'export' | 'persistence' | 'session' | 'extraction' | 'unexpected';
  stage: PageStage;
  url: string;
  message: string;
}

/**
 * Result of processing one URL
 *
 * - archived: artifact saved and recorded in history
 * - unrecorded: artifact saved but the history write failed (treated as processed for this run)
 * - disallowed: robots.txt forbids the URL; no slot was consumed
 * - failed: no artifact; the URL stays eligible for a later run
 */
export type PageOutcome =
  | { status: 'archived'; url: string; depth: number; filename: string; links: string[]; warnings: PageFailure[] }
  | { status: 'unrecorded'; url: string; depth: number; filename: string; links: string[]; warnings: PageFailure[] }
  | { status: 'disallowed'; url: string; depth: number; links: [] }
  | { status: 'failed'; url: string; depth: number; failure: PageFailure; links: string[]; warnings: PageFailure[] };
