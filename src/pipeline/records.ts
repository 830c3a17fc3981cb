/**
 * Ingestion of source publications into PublicationRecords
 */

import type { PublicationRecord, SourcePublication } from '../types.js';
import { normalizeDoi } from './normalize.js';

export interface IngestResult {
  records: PublicationRecord[];
  /** Source entries with neither a title nor a DOI */
  skipped: number;
}

export function toRecord(
  source: SourcePublication,
  provenance: Iterable<string>
): PublicationRecord | null {
  const title = source.title?.trim() ?? '';
  const doi = normalizeDoi(source.doi) ? source.doi?.trim() : undefined;

  if (!title && !doi) {
    return null;
  }

  const record: PublicationRecord = {
    title,
    authors: [...source.authors],
    provenance: new Set(provenance),
  };
  if (doi) record.doi = doi;
  if (source.year !== undefined) record.year = source.year;
  if (source.journal) record.journal = source.journal;
  if (source.abstract) record.abstract = source.abstract;
  if (source.pmid) record.pmid = source.pmid;
  if (source.pmcid) record.pmcid = source.pmcid;
  if (source.openAccess !== undefined) record.openAccess = source.openAccess;
  if (source.url) record.url = source.url;
  return record;
}

/**
 * Tag one member's batch with the member's provenance. Never throws.
 */
export function ingestRecords(sources: SourcePublication[], memberId: string): IngestResult {
  const records: PublicationRecord[] = [];
  let skipped = 0;

  for (const source of sources) {
    const record = toRecord(source, [memberId]);
    if (record) {
      records.push(record);
    } else {
      skipped++;
    }
  }

  return { records, skipped };
}

/**
 * Copy with its own provenance set.
 */
export function cloneRecord(record: PublicationRecord): PublicationRecord {
  return { ...record, authors: [...record.authors], provenance: new Set(record.provenance) };
}
