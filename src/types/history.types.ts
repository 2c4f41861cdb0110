/**
 * History file type definitions
 *
 * On disk the history is a single JSON object keyed by normalized URL:
 *
 *   {
 *     "https://example.com/a": {
 *       "filename": "Title_2c26b46b68ffc68ff99b453c1d30413413422d70.pdf",
 *       "sha1": "2c26b46b68ffc68ff99b453c1d30413413422d70",
 *       "saved_at": "2024-05-01T10:00:00.000Z"
 *     }
 *   }
 */

export interface HistoryEntry {
  filename: string;
  /** Fingerprint of the URL, not of the artifact */
  sha1: string;
  /** ISO-8601 UTC timestamp */
  saved_at: string;
}

export type HistoryMap = Record<string, HistoryEntry>;

/**
 * In-memory view of one history entry
 */
export interface HistoryRecord {
  url: string;
  filename: string;
  fingerprint: string;
  savedAt: Date;
}
