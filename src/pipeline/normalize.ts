/**
 * Comparison keys for publications
 */

import type { PublicationRecord } from '../types.js';

const TITLE_KEY_LENGTH = 50;

const DOI_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;

/**
 * Lowercase, keep letters and digits only, truncate to 50 characters.
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, '')
    .slice(0, TITLE_KEY_LENGTH);
}

/**
 * Returns undefined when nothing usable is left.
 */
export function normalizeDoi(doi: string | undefined | null): string | undefined {
  if (!doi) {
    return undefined;
  }
  const normalized = doi.trim().replace(DOI_PREFIX, '').trim().toLowerCase();
  return normalized || undefined;
}

/**
 * Title half of the key space. Undefined for a title made only of punctuation.
 */
export function titleKey(title: string): string | undefined {
  const normalized = normalizeTitle(title);
  return normalized ? `title:${normalized}` : undefined;
}

/**
 * DOI if present, else the normalized title. Prefixed so the two spaces never
 * collide.
 */
export function dedupKey(record: Pick<PublicationRecord, 'doi' | 'title'>): string | undefined {
  const doi = normalizeDoi(record.doi);
  return doi ? `doi:${doi}` : titleKey(record.title);
}
