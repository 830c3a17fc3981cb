/**
 * Diff local records against the target library
 */

import { RemoteUnavailableError, errorMessage, type Result } from '../errors.js';
import type {
  CollectionLayout,
  PublicationRecord,
  RemoteLibraryItem,
  SyncPlanEntry,
} from '../types.js';
import { normalizeDoi, normalizeTitle } from './normalize.js';

/** Outcome of listing the target library, obtained before planning */
export type RemoteListing = Result<RemoteLibraryItem[], unknown>;

export function targetCollectionFor(year: number | undefined, layout: CollectionLayout): string {
  if (year === undefined) {
    return layout.unknownYear;
  }
  return layout.byYear[year] ?? layout.unknownYear;
}

/**
 * Skip records already in the library (DOI first, then normalized title),
 * create the rest in their year's collection.
 *
 * Without a complete remote listing no plan is produced.
 */
export function planSync(
  local: readonly PublicationRecord[],
  remote: RemoteListing,
  layout: CollectionLayout
): Result<SyncPlanEntry[], RemoteUnavailableError> {
  if (!remote.ok) {
    const error =
      remote.error instanceof RemoteUnavailableError
        ? remote.error
        : new RemoteUnavailableError(errorMessage(remote.error), { cause: remote.error });
    return { ok: false, error };
  }

  const byDoi = new Map<string, string>();
  const byTitle = new Map<string, string>();
  for (const item of remote.value) {
    const doi = normalizeDoi(item.doi);
    if (doi && !byDoi.has(doi)) {
      byDoi.set(doi, item.key);
    }
    if (item.normalizedTitle && !byTitle.has(item.normalizedTitle)) {
      byTitle.set(item.normalizedTitle, item.key);
    }
  }

  const entries = local.map((record): SyncPlanEntry => {
    const doi = normalizeDoi(record.doi);
    const doiMatch = doi ? byDoi.get(doi) : undefined;
    if (doiMatch) {
      return { action: 'skip', record, match: 'doi', remoteKey: doiMatch };
    }

    const title = normalizeTitle(record.title);
    const titleMatch = title ? byTitle.get(title) : undefined;
    if (titleMatch) {
      return { action: 'skip', record, match: 'title', remoteKey: titleMatch };
    }

    return { action: 'create', record, targetCollectionId: targetCollectionFor(record.year, layout) };
  });

  return { ok: true, value: entries };
}
