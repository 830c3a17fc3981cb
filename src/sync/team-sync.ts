/**
 * Team publication sync: research database -> Zotero
 *
 * fetch -> ingest -> deduplicate -> enrich -> deduplicate -> classify -> list library ->
 * plan -> write. Every remote read happens before planning and every write
 * after it.
 */

import type { ZoteroClient } from '../zotero-client.js';
import type { ResearchDatabaseClient } from '../sources/research-db-client.js';
import type { PubMedClient } from '../sources/pubmed-client.js';
import type { TeamConfig } from '../config.js';
import type {
  CollectionLayout,
  PublicationRecord,
  RemoteLibraryItem,
  SyncPlanEntry,
  ZoteroCollection,
  ZoteroCreator,
  ZoteroItem,
  ZoteroItemData,
} from '../types.js';
import { RemoteUnavailableError, errorMessage, type Result } from '../errors.js';
import { ingestRecords } from '../pipeline/records.js';
import { deduplicate } from '../pipeline/deduplicate.js';
import { filterRecords } from '../pipeline/affiliation-filter.js';
import { normalizeTitle } from '../pipeline/normalize.js';
import { planSync, type RemoteListing } from '../pipeline/sync-planner.js';
import { getLogger } from '../logger.js';

export const TEAM_PUBLICATION_TAG = 'team-publication';

type CreateEntry = Extract<SyncPlanEntry, { action: 'create' }>;

export interface TeamSyncDeps {
  zotero: Pick<ZoteroClient, 'getCollections' | 'createCollection' | 'listAllItems' | 'createItems'>;
  researchDb: Pick<ResearchDatabaseClient, 'fetchTeam'>;
  pubmed?: Pick<PubMedClient, 'enrich'>;
}

export interface TeamSyncOptions {
  /** Plan only: no collection or item is created */
  dryRun?: boolean;
  /** Also sync records flagged for manual review */
  includeFlagged?: boolean;
}

export interface TeamSyncReport {
  dryRun: boolean;
  membersFetched: number;
  failedMembers: string[];
  raw: number;
  skipped: number;
  unique: number;
  included: number;
  excluded: { title: string; reason: string }[];
  flagged: { title: string; reason: string }[];
  plan: { skip: number; create: number };
  createdCollections: string[];
  written: number;
  failedWrites: { title: string; message: string }[];
}

interface CollectedPublications {
  records: PublicationRecord[];
  raw: number;
  skipped: number;
  membersFetched: number;
  failedMembers: string[];
}

/**
 * Fetch the roster's publications and merge duplicates across members.
 */
export async function collectTeamPublications(
  researchDb: TeamSyncDeps['researchDb'],
  config: TeamConfig
): Promise<CollectedPublications> {
  const batches = await researchDb.fetchTeam(config.members);

  const all: PublicationRecord[] = [];
  let raw = 0;
  let skipped = 0;
  for (const batch of batches) {
    raw += batch.publications.length;
    const ingested = ingestRecords(batch.publications, batch.member.id);
    skipped += ingested.skipped;
    all.push(...ingested.records);
  }

  return {
    records: deduplicate(all),
    raw,
    skipped,
    membersFetched: batches.filter((b) => !b.error).length,
    failedMembers: batches.filter((b) => b.error).map((b) => b.member.id),
  };
}

/**
 * Titles containing the query (case-insensitive) among the team's publications.
 */
export async function searchTeamPublications(
  researchDb: TeamSyncDeps['researchDb'],
  config: TeamConfig,
  query: string,
  maxResults: number = 100
): Promise<PublicationRecord[]> {
  const { records } = await collectTeamPublications(researchDb, config);
  const needle = query.trim().toLowerCase();
  return records.filter((r) => r.title.toLowerCase().includes(needle)).slice(0, maxResults);
}

export function toRemoteItem(item: ZoteroItem): RemoteLibraryItem {
  return {
    key: item.key,
    doi: item.data.DOI || undefined,
    normalizedTitle: normalizeTitle(item.data.title ?? ''),
    collectionIds: item.data.collections ?? [],
  };
}

/**
 * "First Middle Last" -> lastName "Last", firstName "First Middle"
 */
export function toCreator(author: string): ZoteroCreator {
  const parts = author.trim().split(/\s+/);
  if (parts.length < 2) {
    return { creatorType: 'author', name: author.trim() };
  }
  const lastName = parts[parts.length - 1];
  return { creatorType: 'author', firstName: parts.slice(0, -1).join(' '), lastName };
}

export function toZoteroItem(record: PublicationRecord, collectionKey: string): ZoteroItemData {
  const extra = [
    record.pmid ? `PMID: ${record.pmid}` : '',
    record.pmcid ? `PMCID: ${record.pmcid}` : '',
    `Team authors: ${[...record.provenance].join(', ')}`,
  ].filter((line) => line.length > 0);

  const item: ZoteroItemData = {
    itemType: 'journalArticle',
    title: record.title,
    creators: record.authors.map(toCreator),
    extra: extra.join('\n'),
    tags: [{ tag: TEAM_PUBLICATION_TAG }],
    collections: [collectionKey],
  };
  if (record.year !== undefined) item.date = String(record.year);
  if (record.doi) item.DOI = record.doi;
  if (record.abstract) item.abstractNote = record.abstract;
  if (record.journal) item.publicationTitle = record.journal;
  if (record.url) item.url = record.url;
  return item;
}

/**
 * Resolve (and unless dry run, create) one collection per configured year
 * plus the unknown-year collection. Missing collections in a dry run get a
 * "new:<name>" placeholder id.
 */
export async function ensureYearCollections(
  zotero: TeamSyncDeps['zotero'],
  existing: ZoteroCollection[],
  config: TeamConfig,
  dryRun: boolean
): Promise<{ layout: CollectionLayout; created: string[] }> {
  const created: string[] = [];

  const ensure = async (name: string, parent: string | false): Promise<string> => {
    const found = existing.find((c) => c.data.name === name && c.data.parentCollection === parent);
    if (found) {
      return found.key;
    }
    created.push(name);
    if (dryRun) {
      return `new:${name}`;
    }
    return zotero.createCollection(name, parent || undefined);
  };

  const parent = config.parentCollection ? await ensure(config.parentCollection, false) : false;

  const byYear: Record<number, string> = {};
  for (let year = config.years.from; year <= config.years.to; year++) {
    byYear[year] = await ensure(String(year), parent);
  }
  const unknownYear = await ensure(config.unknownYearCollection, parent);

  return { layout: { byYear, unknownYear }, created };
}

export async function syncTeamPublications(
  deps: TeamSyncDeps,
  config: TeamConfig,
  options: TeamSyncOptions = {}
): Promise<Result<TeamSyncReport, RemoteUnavailableError>> {
  const log = getLogger('team-sync');
  const dryRun = options.dryRun ?? false;

  const collected = await collectTeamPublications(deps.researchDb, config);
  log.info(
    { raw: collected.raw, skipped: collected.skipped, unique: collected.records.length },
    'Collected team publications'
  );

  const fetched: PublicationRecord[] = [];
  for (const record of collected.records) {
    fetched.push(deps.pubmed ? await deps.pubmed.enrich(record) : record);
  }
  // enrichment can give two records the same DOI
  const enriched = deduplicate(fetched);
  if (enriched.length < fetched.length) {
    log.info({ merged: fetched.length - enriched.length }, 'Merged records after enrichment');
  }

  const filtered = filterRecords(enriched, { exclusions: config.exclusions, keywords: config.keywords });
  const toSync = [...filtered.included, ...(options.includeFlagged ? filtered.flagged : [])].map(
    (entry) => entry.record
  );

  let remote: RemoteListing;
  let collections: ZoteroCollection[] = [];
  try {
    const items = await deps.zotero.listAllItems();
    collections = await deps.zotero.getCollections();
    remote = { ok: true, value: items.map(toRemoteItem) };
  } catch (error) {
    log.error({ err: error }, 'Could not list the target library');
    remote = { ok: false, error };
  }

  if (!remote.ok) {
    const error =
      remote.error instanceof RemoteUnavailableError
        ? remote.error
        : new RemoteUnavailableError(errorMessage(remote.error), { cause: remote.error });
    return { ok: false, error };
  }

  const { layout, created } = await ensureYearCollections(deps.zotero, collections, config, dryRun);

  const plan = planSync(toSync, remote, layout);
  if (!plan.ok) {
    return plan;
  }

  const creates = plan.value.filter((entry): entry is CreateEntry => entry.action === 'create');
  const report: TeamSyncReport = {
    dryRun,
    membersFetched: collected.membersFetched,
    failedMembers: collected.failedMembers,
    raw: collected.raw,
    skipped: collected.skipped,
    unique: enriched.length,
    included: filtered.included.length,
    excluded: filtered.excluded.map(({ record, result }) => ({
      title: record.title,
      reason: result.decision === 'exclude' ? result.reason : '',
    })),
    flagged: filtered.flagged.map(({ record, result }) => ({
      title: record.title,
      reason: result.decision === 'flag' ? result.reason : '',
    })),
    plan: { skip: plan.value.length - creates.length, create: creates.length },
    createdCollections: created,
    written: 0,
    failedWrites: [],
  };

  if (dryRun || creates.length === 0) {
    return { ok: true, value: report };
  }

  const items = creates.map((entry) => toZoteroItem(entry.record, entry.targetCollectionId));
  const result = await deps.zotero.createItems(items);

  report.written = result.created.size;
  for (const [index, message] of result.failed) {
    report.failedWrites.push({ title: creates[index].record.title, message });
  }
  log.info({ written: report.written, failed: report.failedWrites.length }, 'Team sync finished');

  return { ok: true, value: report };
}
