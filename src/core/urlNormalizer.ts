/**
 * URL Normalizer - CRITICAL COMPONENT
 * All deduplication depends on consistent URL normalization
 *
 * The identity of a page = its absolute URL without the fragment.
 * History files written by earlier runs are keyed the same way, so the
 * rules here must not change between releases.
 */

/**
 * Normalize a URL for consistent comparison and deduplication
 *
 * Rules:
 * 1. Trim surrounding whitespace
 * 2. Parse with URL API (must be absolute)
 * 3. Remove fragment (#), including a bare trailing "#"
 *
 * Query string, path and trailing slashes are kept as the site wrote them.
 *
 * @param url - Raw URL string
 * @returns Normalized URL
 */
export function normalizeUrl(url: string): string {
  if (!url || typeof url !== 'string') {
    throw new Error('Invalid URL: must be a non-empty string');
  }

  try {
    const urlObj = new URL(url.trim());
    urlObj.hash = '';
    return urlObj.toString();
  } catch (error) {
    throw new Error(`Failed to normalize URL "${url}": ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Extract domain (host with port, if any) from URL
 *
 * @param url - Full URL
 * @returns Domain (e.g., "example.com" or "example.com:8080")
 */
export function extractDomain(url: string): string {
  return new URL(normalizeUrl(url)).host;
}

/**
 * Extract origin from URL
 *
 * @param url - Full URL
 * @returns Origin (e.g., "https://example.com")
 */
export function extractOrigin(url: string): string {
  return new URL(normalizeUrl(url)).origin;
}

/**
 * Validate URL format
 *
 * @param url - URL to validate
 * @returns True if the URL is absolute and uses http(s)
 */
export function isValidUrl(url: string): boolean {
  if (!url || typeof url !== 'string') return false;

  try {
    const protocol = new URL(normalizeUrl(url)).protocol;
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Check a URL against a prefix allow-list.
 * An empty list allows everything.
 *
 * @param url - Normalized URL
 * @param prefixes - Allowed URL prefixes
 */
export function matchesPrefix(url: string, prefixes: readonly string[]): boolean {
  if (prefixes.length === 0) return true;
  return prefixes.some((prefix) => url.startsWith(prefix));
}
