/**
 * Zotero Comfort type definitions
 */

// ---------------------------------------------------------------------------
// Zotero Web API
// ---------------------------------------------------------------------------

// Zotero API configuration
export interface ZoteroConfig {
  apiKey: string;
  userId?: string;
  groupId?: string;
  /** Minimum delay between two requests in ms (default 1000) */
  requestInterval?: number;
}

export interface ZoteroCreator {
  creatorType: string;
  firstName?: string;
  lastName?: string;
  name?: string; // institutional authors
}

export interface ZoteroTag {
  tag: string;
  type?: number; // 0 = manual, 1 = automatic
}

export interface ZoteroItemData {
  key?: string;
  version?: number;
  itemType: string;
  title?: string;
  creators?: ZoteroCreator[];
  abstractNote?: string;
  publicationTitle?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  date?: string;
  DOI?: string;
  url?: string;
  extra?: string;
  tags?: ZoteroTag[];
  collections?: string[];
  [key: string]: unknown;
}

export interface ZoteroItem {
  key: string;
  version: number;
  library: {
    type: string;
    id: number;
    name?: string;
  };
  data: ZoteroItemData;
  meta?: {
    creatorSummary?: string;
    parsedDate?: string;
    numChildren?: number;
  };
}

export interface ZoteroCollection {
  key: string;
  version: number;
  data: {
    key: string;
    name: string;
    parentCollection: string | false;
  };
}

export interface ZoteroResponseHeaders {
  totalResults?: number;
  lastModifiedVersion?: number;
  backoff?: number;
  retryAfter?: number;
}

export interface ZoteroWriteResponse {
  success: Record<string, string>;
  unchanged: Record<string, string>;
  failed: Record<string, { code: number; message: string }>;
}

export interface SearchParams {
  query?: string;
  qmode?: 'titleCreatorYear' | 'everything';
  itemType?: string;
  tag?: string;
  collectionKey?: string;
  limit?: number;
  start?: number;
  sort?: string;
  direction?: 'asc' | 'desc';
}

export type ExportFormat = 'bibtex' | 'ris' | 'csljson';

// Result of a batch create: item keys by input index, failures by input index
export interface CreateItemsResult {
  created: Map<number, string>;
  failed: Map<number, string>;
}

// Short item form used in tool output
export interface ItemSummary {
  key: string;
  title: string;
  itemType: string;
  creators: string;
  date: string;
}

export interface CollectionSummary {
  key: string;
  name: string;
  parentCollection: string | false;
}

// ---------------------------------------------------------------------------
// Team publications
// ---------------------------------------------------------------------------

export interface TeamMember {
  /** Stable identifier used in provenance sets (the surname) */
  id: string;
  name: string;
  /** Research database person token; members without one are not fetched */
  token?: string;
  orcid?: string;
  profileUrl?: string;
}

/**
 * A publication as reported by one upstream source, before ingestion.
 */
export interface SourcePublication {
  title?: string;
  doi?: string;
  authors: string[];
  year?: number;
  journal?: string;
  abstract?: string;
  pmid?: string;
  pmcid?: string;
  openAccess?: boolean;
  url?: string;
}

export interface PublicationRecord {
  title: string;
  doi?: string;
  authors: string[];
  year?: number;
  journal?: string;
  abstract?: string;
  pmid?: string;
  pmcid?: string;
  openAccess?: boolean;
  url?: string;
  /** Team members through whom this publication was observed */
  provenance: Set<string>;
}

/** Exclusion topics per member id */
export type ExclusionRules = Record<string, string[]>;

export interface FilterRules {
  exclusions: ExclusionRules;
  keywords: string[];
}

export type ClassificationResult =
  | { decision: 'include' }
  | { decision: 'exclude'; reason: string; member?: string; topic?: string }
  | { decision: 'flag'; reason: string };

export interface RemoteLibraryItem {
  key: string;
  doi?: string;
  normalizedTitle: string;
  collectionIds: string[];
}

export type SyncPlanEntry =
  | { action: 'skip'; record: PublicationRecord; match: 'doi' | 'title'; remoteKey: string }
  | { action: 'create'; record: PublicationRecord; targetCollectionId: string };

/** Target collection ids by publication year */
export interface CollectionLayout {
  byYear: Record<number, string>;
  unknownYear: string;
}
