import { createHash } from 'crypto';

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Stable identity for a scraped record: who wrote it plus what it says,
 * whitespace and case folded.
 */
export function contentFingerprint(
  author: string | undefined,
  text: string,
): string {
  return createHash('sha1')
    .update(`${normalizeText(author ?? '')}\u0000${normalizeText(text)}`)
    .digest('hex');
}
