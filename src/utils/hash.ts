/**
 * Hashing utilities
 * Used for stable artifact naming and history records
 */

import crypto from 'crypto';

/**
 * Generate SHA-1 hash of content
 *
 * @param content - Content to hash
 * @returns SHA-1 hash string (40 characters)
 */
export function sha1Hash(content: string): string {
  return crypto.createHash('sha1').update(content, 'utf8').digest('hex');
}

/**
 * Fingerprint of a canonical URL.
 * This is a naming key, not a hash of the saved artifact: the same URL
 * always maps to the same file across runs.
 *
 * @param url - Normalized URL
 * @returns SHA-1 hex digest
 */
export function urlFingerprint(url: string): string {
  return sha1Hash(url);
}

