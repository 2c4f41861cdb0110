/**
 * Global constants for the archiver
 */

/**
 * Target config defaults (see config/example.yaml)
 */
export const DEFAULT_OUTPUT_DIR = 'output';
export const DEFAULT_HISTORY_PATH = 'history/history.json';
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_MAX_DEPTH = 1;
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_DELAY_SECS = 1;
export const DEFAULT_NO_NEW_LIMIT = 3;

/**
 * Lower bounds; smaller values are clamped up
 */
export const MIN_TIMEOUT_MS = 1000;
export const MIN_CONCURRENCY = 1;
export const MIN_MAX_DEPTH = 1;
export const MIN_NO_NEW_LIMIT = 1;

/**
 * Settling delays around page interactions (ms)
 */
export const PRE_EXPORT_SETTLE_MS = 300;
export const SCROLL_SETTLE_MS = 600;
export const CLICK_SETTLE_MS = 1000;
export const NETWORK_IDLE_WAIT_MS = 4000;
export const DISMISS_SETTLE_MS = 300;
export const EMPTY_CYCLE_BACKOFF_MS = 1000;

/**
 * Click timeouts (ms)
 */
export const REVEAL_CLICK_TIMEOUT_MS = 6000;
export const DISMISS_CLICK_TIMEOUT_MS = 3000;

/**
 * Page format for exported artifacts
 */
export const PDF_FORMAT = 'A4';

/**
 * User agent string
 */
export const USER_AGENT = 'Mozilla/5.0 (compatible; PortalArchiver/1.0)';
