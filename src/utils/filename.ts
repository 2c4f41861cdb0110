import path from 'path';
import { urlFingerprint } from './hash';

export const ARTIFACT_EXTENSION = '.pdf';
export const TITLE_PREFIX_MAX_LEN = 50;

/**
 * Reduce a page title to a filesystem-safe prefix.
 * Length is counted in code points so CJK titles are not cut mid-character.
 */
export function sanitizeFilename(input: string, maxLen = TITLE_PREFIX_MAX_LEN): string {
  const replaced = input.replace(/[:/\\?%*|"<>\n\r]+/g, '_').replace(/\s+/g, '_');
  const truncated = Array.from(replaced).slice(0, maxLen).join('');
  return truncated.replace(/^_+|_+$/g, '') || 'page';
}

/**
 * `{sanitizedTitlePrefix}_{urlFingerprintHex}.pdf`
 */
export function artifactFilename(title: string, url: string): { filename: string; fingerprint: string } {
  const fingerprint = urlFingerprint(url);
  return {
    filename: `${sanitizeFilename(title)}_${fingerprint}${ARTIFACT_EXTENSION}`,
    fingerprint,
  };
}

export function artifactPath(outputDir: string, filename: string): string {
  return path.join(outputDir, filename);
}
