/**
 * PubMed / NCBI client used to enrich team publications
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { PublicationRecord, ZoteroCreator } from '../types.js';
import { cloneRecord } from '../pipeline/records.js';
import { getLogger } from '../logger.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';
const IDCONV_URL = 'https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/';

// NCBI allows 3 requests per second without an API key, 10 with one
const DEFAULT_REQUEST_INTERVAL = 340;
const API_KEY_REQUEST_INTERVAL = 110;

export type IdentifierType = 'doi' | 'pmid' | 'pmcid';

export type IdentifierSet = Partial<Record<IdentifierType, string>>;

const idValue = z.union([z.string(), z.number()]).nullish();

const idconvResponseSchema = z.object({
  records: z
    .array(
      z.object({
        doi: idValue,
        pmid: idValue,
        pmcid: idValue,
        status: z.string().nullish(),
      })
    )
    .nullish(),
});

function idString(value: string | number | null | undefined): string | undefined {
  return value === null || value === undefined || value === '' ? undefined : String(value);
}

const esearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => ['PubmedArticle', 'AbstractText', 'Author', 'ArticleId'].includes(tagName),
});

/** One article of an efetch result */
export interface PubMedArticle {
  pmid: string;
  title: string;
  creators: ZoteroCreator[];
  journal?: string;
  year?: number;
  doi?: string;
  pmcid?: string;
  abstract?: string;
}

export interface PubMedSearchOptions {
  maxResults?: number;
  /** YYYY/MM/DD */
  minDate?: string;
  /** YYYY/MM/DD, defaults to today when only minDate is given */
  maxDate?: string;
  sort?: 'relevance' | 'pub_date';
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function textOf(value: unknown): string {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  const node = asRecord(value);
  return typeof node?.['#text'] === 'string' ? node['#text'] : '';
}

function listOf(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const nodes: Record<string, unknown>[] = [];
  for (const entry of value) {
    const node = asRecord(entry);
    if (node) nodes.push(node);
  }
  return nodes;
}

function sectionText(section: unknown): string {
  const body = textOf(section);
  const label = asRecord(section)?.['@_Label'];
  return typeof label === 'string' && label && body ? `${label}: ${body}` : body;
}

function articleNodes(xml: string): Record<string, unknown>[] {
  const doc = asRecord(parser.parse(xml));
  const set = asRecord(doc?.['PubmedArticleSet']);
  return listOf(set?.['PubmedArticle']);
}

function abstractOf(article: Record<string, unknown> | undefined): string {
  const sections = asRecord(article?.['Abstract'])?.['AbstractText'];
  if (!Array.isArray(sections)) {
    return '';
  }
  return sections
    .map(sectionText)
    .filter((s) => s.length > 0)
    .join('\n\n');
}

function creatorOf(author: Record<string, unknown>): ZoteroCreator | null {
  const collective = textOf(author['CollectiveName']);
  if (collective) {
    return { creatorType: 'author', name: collective };
  }
  const lastName = textOf(author['LastName']);
  if (!lastName) {
    return null;
  }
  const firstName = textOf(author['ForeName']) || textOf(author['Initials']);
  return firstName ? { creatorType: 'author', firstName, lastName } : { creatorType: 'author', lastName };
}

/**
 * Abstract of the first article in an efetch XML document, sections joined
 * by a blank line. Empty when the article has none.
 */
export function parseAbstract(xml: string): string {
  const [first] = articleNodes(xml);
  if (!first) {
    return '';
  }
  return abstractOf(asRecord(asRecord(first['MedlineCitation'])?.['Article']));
}

/**
 * Articles of an efetch XML document. Entries without PMID or title are dropped.
 */
export function parseArticles(xml: string): PubMedArticle[] {
  const articles: PubMedArticle[] = [];

  for (const node of articleNodes(xml)) {
    const citation = asRecord(node['MedlineCitation']);
    const article = asRecord(citation?.['Article']);
    const pmid = textOf(citation?.['PMID']);
    const title = textOf(article?.['ArticleTitle']).replace(/\.$/, '');
    if (!pmid || !title) {
      continue;
    }

    const creators: ZoteroCreator[] = [];
    for (const author of listOf(asRecord(article?.['AuthorList'])?.['Author'])) {
      const creator = creatorOf(author);
      if (creator) creators.push(creator);
    }

    const journal = asRecord(article?.['Journal']);
    const pubDate = asRecord(asRecord(journal?.['JournalIssue'])?.['PubDate']);
    const yearMatch = (textOf(pubDate?.['Year']) || textOf(pubDate?.['MedlineDate'])).match(/\d{4}/);

    const entry: PubMedArticle = { pmid, title, creators };
    const journalTitle = textOf(journal?.['Title']);
    if (journalTitle) entry.journal = journalTitle;
    if (yearMatch) entry.year = parseInt(yearMatch[0], 10);

    const ids = asRecord(asRecord(node['PubmedData'])?.['ArticleIdList'])?.['ArticleId'];
    for (const id of listOf(ids)) {
      const type = id['@_IdType'];
      if (type === 'doi') entry.doi = textOf(id);
      if (type === 'pmc') entry.pmcid = textOf(id);
    }

    const abstract = abstractOf(article);
    if (abstract) entry.abstract = abstract;
    articles.push(entry);
  }

  return articles;
}

function today(): string {
  return new Date().toISOString().slice(0, 10).replace(/-/g, '/');
}

export class PubMedClient {
  private email?: string;
  private apiKey?: string;
  private requestInterval: number;
  private lastRequestTime = 0;
  private log = getLogger('pubmed');

  constructor(options: { email?: string; apiKey?: string; requestInterval?: number } = {}) {
    this.email = options.email;
    this.apiKey = options.apiKey;
    this.requestInterval =
      options.requestInterval ?? (options.apiKey ? API_KEY_REQUEST_INTERVAL : DEFAULT_REQUEST_INTERVAL);
  }

  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.requestInterval) {
      await new Promise((resolve) => setTimeout(resolve, this.requestInterval - elapsed));
    }
    this.lastRequestTime = Date.now();
  }

  private async get(base: string, params: Record<string, string>): Promise<Response> {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('tool', 'zotero-comfort');
    if (this.email) url.searchParams.set('email', this.email);
    if (this.apiKey) url.searchParams.set('api_key', this.apiKey);

    await this.throttle();
    const response = await fetch(url.toString());
    if (!response.ok) {
      throw new Error(`NCBI error (${response.status}) for ${url.pathname}`);
    }
    return response;
  }

  /**
   * All identifiers the NCBI ID converter knows for one DOI, PMID or PMCID.
   * Null when there is no mapping or the lookup fails.
   */
  async lookupIdentifiers(identifier: string, from: IdentifierType): Promise<IdentifierSet | null> {
    try {
      const response = await this.get(IDCONV_URL, { ids: identifier, idtype: from, format: 'json' });
      const data = idconvResponseSchema.parse(await response.json());
      const record = data.records?.[0];
      if (!record || record.status === 'error') {
        return null;
      }
      return {
        doi: idString(record.doi),
        pmid: idString(record.pmid),
        pmcid: idString(record.pmcid),
      };
    } catch (error) {
      this.log.warn({ err: error, identifier, from }, 'Identifier lookup failed');
      return null;
    }
  }

  async convertIdentifier(
    identifier: string,
    from: IdentifierType,
    to: IdentifierType
  ): Promise<string | null> {
    if (from === to) {
      return identifier;
    }
    const ids = await this.lookupIdentifiers(identifier, from);
    return ids?.[to] ?? null;
  }

  /**
   * Search PubMed and fetch the matching articles. Request failures throw.
   */
  async searchArticles(query: string, options: PubMedSearchOptions = {}): Promise<PubMedArticle[]> {
    const { maxResults = 50, minDate, maxDate, sort = 'relevance' } = options;

    let term = query;
    if (minDate || maxDate) {
      term += ` AND ${minDate ?? '1900/01/01'}:${maxDate ?? today()}[pdat]`;
    }

    const search = await this.get(`${EUTILS_BASE}/esearch.fcgi`, {
      db: 'pubmed',
      term,
      retmax: String(maxResults),
      sort,
      retmode: 'json',
    });
    const pmids = esearchResponseSchema.parse(await search.json()).esearchresult.idlist;
    this.log.info({ query, found: pmids.length }, 'PubMed search');
    if (pmids.length === 0) {
      return [];
    }

    const details = await this.get(`${EUTILS_BASE}/efetch.fcgi`, {
      db: 'pubmed',
      id: pmids.join(','),
      retmode: 'xml',
    });
    return parseArticles(await details.text());
  }

  /**
   * Abstract text for a PMID, null when unavailable.
   */
  async fetchAbstract(pmid: string): Promise<string | null> {
    try {
      const response = await this.get(`${EUTILS_BASE}/efetch.fcgi`, {
        db: 'pubmed',
        id: pmid,
        retmode: 'xml',
      });
      const abstract = parseAbstract(await response.text());
      return abstract || null;
    } catch (error) {
      this.log.warn({ err: error, pmid }, 'Abstract fetch failed');
      return null;
    }
  }

  /**
   * Fill missing identifiers and abstract. Returns a new record; provenance
   * and every field already present are kept.
   */
  async enrich(record: PublicationRecord): Promise<PublicationRecord> {
    const enriched = cloneRecord(record);

    const known: [IdentifierType, string | undefined][] = [
      ['doi', enriched.doi],
      ['pmid', enriched.pmid],
      ['pmcid', enriched.pmcid],
    ];
    const missing = known.some(([, value]) => !value);
    const lookup = known.find(([, value]) => value);

    if (missing && lookup?.[1]) {
      const ids = await this.lookupIdentifiers(lookup[1], lookup[0]);
      if (ids) {
        enriched.doi ??= ids.doi;
        enriched.pmid ??= ids.pmid;
        enriched.pmcid ??= ids.pmcid;
      }
    }

    if (!enriched.abstract && enriched.pmid) {
      const abstract = await this.fetchAbstract(enriched.pmid);
      if (abstract) enriched.abstract = abstract;
    }

    return enriched;
  }
}
