/**
 * Research workflows built on top of the Zotero client
 */

import type { ZoteroClient } from './zotero-client.js';
import type { TranslationClient } from './translation-client.js';
import type { PubMedArticle, PubMedClient } from './sources/pubmed-client.js';
import type { ExportFormat, ZoteroCreator, ZoteroItem, ZoteroItemData } from './types.js';
import { ZoteroApiError, errorMessage } from './errors.js';
import { normalizeDoi } from './pipeline/normalize.js';
import { getLogger } from './logger.js';

export interface WorkflowDeps {
  zotero: Pick<
    ZoteroClient,
    | 'searchItems'
    | 'listAllItems'
    | 'getItem'
    | 'getCollections'
    | 'createCollection'
    | 'exportItems'
    | 'createItem'
    | 'createItems'
  >;
  translation: Pick<TranslationClient, 'search'>;
  pubmed: Pick<PubMedClient, 'searchArticles'>;
}

// First match wins
const COLLECTION_KEYWORDS: ReadonlyArray<readonly [string, string]> = [
  ['fhir', 'FHIR'],
  ['hl7', 'FHIR'],
  ['healthcare interoperability', 'FHIR'],
  ['snomed', 'Terminology'],
  ['loinc', 'Terminology'],
  ['icd', 'Terminology'],
  ['ontology', 'Terminology'],
  ['machine learning', 'ML'],
  ['deep learning', 'ML'],
  ['neural network', 'ML'],
  ['nlp', 'NLP'],
  ['natural language', 'NLP'],
  ['clinical', 'Clinical'],
  ['patient', 'Clinical'],
  ['ehr', 'Clinical'],
  ['electronic health', 'Clinical'],
];

export const UNCATEGORIZED = 'Uncategorized';

// Too common to narrow a related-papers search
const STOPWORDS = new Set([
  'about', 'after', 'among', 'analysis', 'based', 'between', 'during', 'other',
  'results', 'study', 'their', 'there', 'these', 'those', 'through', 'under',
  'using', 'where', 'which', 'while', 'within', 'without',
]);

const RELATED_TERM_COUNT = 6;

const DOI_PATTERN = /^10\.\d{4,}\//;

export function suggestCollection(text: string): string {
  const lower = text.toLowerCase();
  const match = COLLECTION_KEYWORDS.find(([keyword]) => lower.includes(keyword));
  return match ? match[1] : UNCATEGORIZED;
}

/**
 * Strip URL and "doi:" prefixes; null unless the result looks like a DOI.
 */
export function cleanDoi(input: string): string | null {
  const doi = input
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
    .replace(/^doi:\s*/i, '')
    .trim();
  return DOI_PATTERN.test(doi) ? doi : null;
}

export function extractYear(date: string | undefined): number | undefined {
  const match = date?.match(/\d{4}/);
  return match ? parseInt(match[0], 10) : undefined;
}

/**
 * Up to three last names, then "et al."
 */
export function formatCreators(creators: ZoteroCreator[] | undefined): string {
  if (!creators || creators.length === 0) {
    return '';
  }
  const names = creators
    .slice(0, 3)
    .map((c) => c.lastName || c.name || '')
    .filter((name) => name.length > 0);
  const result = names.join(', ');
  return creators.length > 3 ? `${result} et al.` : result;
}

/**
 * Title followed by the first sentence of the abstract (or its first 200
 * characters when it has no full stop).
 */
export function relatedQuery(title: string, abstract?: string): string {
  if (!abstract) {
    return title;
  }
  const first = abstract.includes('.') ? abstract.split('.')[0] : abstract.slice(0, 200);
  return `${title}. ${first}`;
}

/**
 * Distinct significant words of a query, in order of appearance.
 */
export function queryTerms(query: string): string[] {
  const words = query.toLowerCase().match(/\p{L}[\p{L}\p{N}-]*/gu) ?? [];
  const terms = new Set(words.filter((word) => word.length >= 5 && !STOPWORDS.has(word)));
  return [...terms].slice(0, RELATED_TERM_COUNT);
}

export function pubmedItem(article: PubMedArticle, collectionKey: string): ZoteroItemData {
  const item: ZoteroItemData = {
    itemType: 'journalArticle',
    title: article.title,
    creators: article.creators,
    url: `https://pubmed.ncbi.nlm.nih.gov/${article.pmid}/`,
    extra: [`PMID: ${article.pmid}`, article.pmcid ? `PMCID: ${article.pmcid}` : '']
      .filter((line) => line.length > 0)
      .join('\n'),
    collections: [collectionKey],
  };
  if (article.abstract) item.abstractNote = article.abstract;
  if (article.journal) item.publicationTitle = article.journal;
  if (article.year !== undefined) item.date = String(article.year);
  if (article.doi) item.DOI = article.doi;
  return item;
}

export interface ReadingListPaper {
  key: string;
  title: string;
  year: string;
  creators: string;
}

export interface ReadingList {
  topic: string;
  papersFound: number;
  papersIncluded: number;
  papers: ReadingListPaper[];
  suggestedCollection: string;
}

export type SmartAddResult =
  | { status: 'error'; doi: string; message: string }
  | { status: 'duplicate'; doi: string; title: string; duplicateKey: string; message: string }
  | { status: 'ready'; doi: string; message: string; suggestedCollection?: string }
  | { status: 'created'; doi: string; itemKey: string; title: string; suggestedCollection?: string; message: string };

export interface RelatedPaper {
  key: string;
  title: string;
  creators: string;
  /** Share of query terms the paper matched */
  relevance: number;
}

export type RelatedPapersResult =
  | { status: 'success'; source: { key: string; title: string }; terms: string[]; related: RelatedPaper[] }
  | { status: 'error'; message: string };

export type PubMedImportResult =
  | { status: 'error'; message: string; papersFound: number; papersAdded: 0 }
  | {
      status: 'success';
      papersFound: number;
      papersAdded: number;
      collectionName: string;
      collectionKey: string;
      createdCollection: boolean;
      itemsAdded: string[];
      failed: { title: string; message: string }[];
    };

export type BibliographyResult =
  | { status: 'success'; format: ExportFormat; count: number; bibliography: string }
  | { status: 'error'; message: string };

export class ZoteroWorkflows {
  private log = getLogger('workflows');

  constructor(private deps: WorkflowDeps) {}

  /**
   * Search the library for a topic, optionally keep recent papers only, and
   * return the first maxPapers.
   */
  async buildReadingList(
    topic: string,
    options: { maxPapers?: number; minYear?: number } = {}
  ): Promise<ReadingList> {
    const { maxPapers = 20, minYear } = options;
    this.log.info({ topic, maxPapers, minYear }, 'Building reading list');

    const { items } = await this.deps.zotero.searchItems({ query: topic, limit: 100 });

    const filtered =
      minYear === undefined ? items : items.filter((item) => (extractYear(item.data.date) ?? 0) >= minYear);

    const papers = filtered.slice(0, maxPapers).map((item) => ({
      key: item.key,
      title: item.data.title || 'Untitled',
      year: extractYear(item.data.date)?.toString() ?? '',
      creators: formatCreators(item.data.creators),
    }));

    return {
      topic,
      papersFound: items.length,
      papersIncluded: papers.length,
      papers,
      suggestedCollection: suggestCollection(topic),
    };
  }

  /**
   * Validate a DOI, look for an existing copy and, when asked to, create the
   * item from translation-server metadata.
   */
  async smartAddPaper(
    input: string,
    options: {
      checkDuplicates?: boolean;
      suggestCollection?: boolean;
      create?: boolean;
      collectionKey?: string;
    } = {}
  ): Promise<SmartAddResult> {
    const { checkDuplicates = true, suggestCollection: suggest = true, create = false, collectionKey } = options;

    const doi = cleanDoi(input);
    if (!doi) {
      return { status: 'error', doi: input, message: 'Invalid DOI format' };
    }

    if (checkDuplicates) {
      const duplicate = await this.findByDoi(doi);
      if (duplicate) {
        return {
          status: 'duplicate',
          doi,
          title: duplicate.data.title ?? '',
          duplicateKey: duplicate.key,
          message: 'Paper already exists in library',
        };
      }
    }

    if (!create) {
      return {
        status: 'ready',
        doi,
        message: 'DOI validated, no duplicates found',
        ...(suggest && { suggestedCollection: suggestCollection(doi) }),
      };
    }

    try {
      const [itemData] = await this.deps.translation.search(doi);
      if (!itemData) {
        return { status: 'error', doi, message: `No metadata found for DOI: ${doi}` };
      }

      if (collectionKey) {
        itemData.collections = [collectionKey];
      }
      const title = itemData.title ?? '';
      const itemKey = await this.deps.zotero.createItem(itemData);
      this.log.info({ doi, itemKey }, 'Created item from DOI');

      return {
        status: 'created',
        doi,
        itemKey,
        title,
        ...(suggest && { suggestedCollection: suggestCollection(title || doi) }),
        message: `Item created successfully from ${doi}`,
      };
    } catch (error) {
      this.log.warn({ err: error, doi }, 'Smart add failed');
      return { status: 'error', doi, message: errorMessage(error) };
    }
  }

  /**
   * Export a collection (by name) or a tag as a bibliography.
   */
  async exportBibliography(options: {
    collectionName?: string;
    tag?: string;
    format?: ExportFormat;
  }): Promise<BibliographyResult> {
    const { collectionName, tag, format = 'bibtex' } = options;

    let items: ZoteroItem[];
    if (collectionName) {
      const collections = await this.deps.zotero.getCollections();
      const collection = collections.find((c) => c.data.name === collectionName);
      if (!collection) {
        return { status: 'error', message: `Collection not found: ${collectionName}` };
      }
      items = await this.deps.zotero.listAllItems({ collectionKey: collection.key });
    } else if (tag) {
      items = await this.deps.zotero.listAllItems({ tag });
    } else {
      return { status: 'error', message: 'Specify collectionName or tag' };
    }

    if (items.length === 0) {
      return { status: 'success', format, count: 0, bibliography: '% No papers found\n' };
    }

    const bibliography = await this.deps.zotero.exportItems(
      items.map((item) => item.key),
      format
    );
    return { status: 'success', format, count: items.length, bibliography };
  }

  /**
   * Papers sharing the most significant terms with a library item's title
   * and first abstract sentence. The item itself is left out.
   */
  async findRelatedPapers(itemKey: string, options: { limit?: number } = {}): Promise<RelatedPapersResult> {
    const { limit = 10 } = options;

    let source: ZoteroItem;
    try {
      source = await this.deps.zotero.getItem(itemKey);
    } catch (error) {
      if (error instanceof ZoteroApiError && error.status === 404) {
        return { status: 'error', message: `Paper not found: ${itemKey}` };
      }
      this.log.warn({ err: error, itemKey }, 'Could not load source paper');
      return { status: 'error', message: errorMessage(error) };
    }

    const title = source.data.title ?? '';
    const terms = queryTerms(relatedQuery(title, source.data.abstractNote));

    const hits = new Map<string, { item: ZoteroItem; matches: number }>();
    for (const term of terms) {
      const { items } = await this.deps.zotero.searchItems({ query: term, qmode: 'everything', limit: 25 });
      for (const item of items) {
        if (item.key === itemKey) {
          continue;
        }
        const hit = hits.get(item.key);
        if (hit) {
          hit.matches++;
        } else {
          hits.set(item.key, { item, matches: 1 });
        }
      }
    }

    const related = [...hits.values()]
      .sort((a, b) => b.matches - a.matches)
      .slice(0, limit)
      .map(({ item, matches }) => ({
        key: item.key,
        title: item.data.title || 'Untitled',
        creators: formatCreators(item.data.creators),
        relevance: Math.round((matches / terms.length) * 100) / 100,
      }));

    return { status: 'success', source: { key: itemKey, title }, terms, related };
  }

  /**
   * Search PubMed and add the results to a collection found by name,
   * creating the collection unless told not to.
   */
  async searchPubMedToCollection(
    query: string,
    collectionName: string,
    options: { maxResults?: number; createCollection?: boolean; minDate?: string; maxDate?: string } = {}
  ): Promise<PubMedImportResult> {
    const { maxResults = 50, createCollection = true, minDate, maxDate } = options;
    this.log.info({ query, collectionName }, 'Importing PubMed search');

    const papers = await this.deps.pubmed.searchArticles(query, { maxResults, minDate, maxDate });

    const collections = await this.deps.zotero.getCollections();
    let collectionKey = collections.find((c) => c.data.name === collectionName)?.key;
    let createdCollection = false;
    if (!collectionKey) {
      if (!createCollection) {
        return {
          status: 'error',
          message: `Collection not found: ${collectionName}`,
          papersFound: papers.length,
          papersAdded: 0,
        };
      }
      collectionKey = await this.deps.zotero.createCollection(collectionName);
      createdCollection = true;
    }

    const target = collectionKey;
    const result = await this.deps.zotero.createItems(papers.map((paper) => pubmedItem(paper, target)));
    const itemsAdded = [...result.created]
      .sort(([a], [b]) => a - b)
      .map(([, key]) => key);
    const failed = [...result.failed].map(([index, message]) => ({ title: papers[index].title, message }));

    return {
      status: 'success',
      papersFound: papers.length,
      papersAdded: itemsAdded.length,
      collectionName,
      collectionKey,
      createdCollection,
      itemsAdded,
      failed,
    };
  }

  private async findByDoi(doi: string): Promise<ZoteroItem | undefined> {
    const target = normalizeDoi(doi);
    const { items } = await this.deps.zotero.searchItems({ query: doi, qmode: 'everything', limit: 5 });
    return items.find((item) => normalizeDoi(item.data.DOI) === target);
  }
}
