import type { PublicationRecord } from '../types.js';
import { dedupKey, titleKey } from './normalize.js';
import { cloneRecord } from './records.js';

/**
 * Merge repeated observations of the same publication.
 *
 * The first occurrence keeps its position and scalar fields; later
 * occurrences only add their provenance. A record with a DOI matches an
 * earlier record with the same DOI. A record without one matches the first
 * earlier record with the same normalized title, whether that record carries
 * a DOI or not. Records carrying different DOIs are never merged, and records
 * without any usable key are passed through. The input is left untouched.
 */
export function deduplicate(records: readonly PublicationRecord[]): PublicationRecord[] {
  // doi:… keys of DOI-bearing entries and title:… keys of every entry
  const indexByKey = new Map<string, number>();
  const unique: PublicationRecord[] = [];

  for (const record of records) {
    const key = dedupKey(record);
    const index = key === undefined ? undefined : indexByKey.get(key);

    if (index === undefined) {
      const position = unique.length;
      const title = titleKey(record.title);
      if (key !== undefined && !indexByKey.has(key)) {
        indexByKey.set(key, position);
      }
      if (title !== undefined && !indexByKey.has(title)) {
        indexByKey.set(title, position);
      }
      unique.push(cloneRecord(record));
      continue;
    }

    const first = unique[index];
    for (const member of record.provenance) {
      first.provenance.add(member);
    }
  }

  return unique;
}
