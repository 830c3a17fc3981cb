/**
 * Charité research database (Forschungsdatenbank) client
 *
 * Reads the JSON endpoints behind the expert profile pages:
 *   /publications/pub_per_exp/{token}/FPS  publications
 *   /exp/co_per_exp/{token}/FPS            co-authors
 *   /exp/info_per_exp/{token}              profile info
 */

import { z } from 'zod';
import type { SourcePublication, TeamMember } from '../types.js';
import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';

export const DEFAULT_RESEARCH_DB_URL = 'https://forschungsdatenbank.charite.de/experts/expert';

const DEFAULT_MEMBER_DELAY = 300;

const text = z.string().nullish();

const linkSchema = z.object({
  url: text,
  en: text,
  de: text,
});

const publicationEntrySchema = z.object({
  publikation: z
    .object({
      titel: text,
      publikationJahr: z.union([z.number(), z.string()]).nullish(),
      autorenString: text,
      abriss: text,
      quelle: z.object({ langname: text, name: text }).nullish(),
    })
    .nullish(),
  links: z.array(linkSchema).nullish(),
  oaStatus: z.union([z.string(), z.boolean()]).nullish(),
});

const publicationsResponseSchema = z.object({
  publikationen: z.array(z.unknown()).nullish(),
});

const coauthorsResponseSchema = z.object({
  autoren: z
    .array(
      z.object({
        autorenPerson: z
          .object({
            name: text,
            vorname: text,
            anzahlPublikationen: z.number().nullish(),
            person: z.object({ token: text, type: text }).nullish(),
          })
          .nullish(),
      })
    )
    .nullish(),
});

const profileResponseSchema = z.object({
  mainInfo: z
    .object({
      vorname: text,
      nachname: text,
      gruppe: text,
      gruppeen: text,
      orcid: text,
    })
    .nullish(),
  publikationen: z.number().nullish(),
  interneCoAutoren: z.object({ level1: z.number().nullish() }).nullish(),
  gesamt: z.object({ level1: z.number().nullish() }).nullish(),
});

export type PublicationEntry = z.infer<typeof publicationEntrySchema>;

export interface Coauthor {
  surname: string;
  firstName: string;
  token?: string;
  type: string;
  publicationCount: number;
}

export interface ProfileInfo {
  firstName: string;
  lastName: string;
  group: string;
  groupEn: string;
  orcid: string;
  totalPublications: number;
  internalCoauthors: number;
  totalCoauthors: number;
}

export interface MemberBatch {
  member: TeamMember;
  publications: SourcePublication[];
  /** Set when the member's publications could not be fetched */
  error?: string;
}

/**
 * "Last,First;Last,First" -> ["First Last", ...]
 */
export function parseAuthorString(authors: string): string[] {
  return authors
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const comma = part.indexOf(',');
      if (comma === -1) {
        return part;
      }
      const last = part.slice(0, comma).trim();
      const first = part.slice(comma + 1).trim();
      return first ? `${first} ${last}` : last;
    });
}

function parseYear(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const year = typeof value === 'number' ? value : parseInt(value, 10);
  return Number.isInteger(year) ? year : undefined;
}

function parseOpenAccess(status: string | boolean | null | undefined): boolean | undefined {
  if (status === null || status === undefined) {
    return undefined;
  }
  if (typeof status === 'boolean') {
    return status;
  }
  const normalized = status.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  return !['closed', 'none', 'false', 'no'].includes(normalized);
}

/**
 * Convert one raw publication entry. Missing title is kept as undefined;
 * ingestion decides whether the entry is usable.
 */
export function parsePublicationEntry(entry: PublicationEntry): SourcePublication {
  const pub = entry.publikation;

  const title = pub?.titel?.trim().replace(/\.+$/, '') || undefined;

  let doi: string | undefined;
  let pmid: string | undefined;
  let pmcid: string | undefined;
  let pubmedUrl: string | undefined;

  for (const link of entry.links ?? []) {
    const url = link.url?.trim() ?? '';
    const label = (link.en ?? link.de ?? '').toLowerCase();
    if (!url) {
      continue;
    }
    // "PubMed Central" links carry a PMCID, not a PMID
    if (label.includes('doi')) {
      doi = url.replace(/^https?:\/\/(dx\.)?doi\.org\//i, '');
    } else if (label.includes('pmc') || label.includes('pubmed central')) {
      pmcid = url.match(/(PMC\d+)/i)?.[1]?.toUpperCase() ?? pmcid;
    } else if (label.includes('pubmed')) {
      pubmedUrl = url;
      pmid = url.match(/(\d+)\/?$/)?.[1];
    }
  }

  const journal = pub?.quelle?.langname || pub?.quelle?.name || undefined;

  return {
    title,
    doi,
    authors: parseAuthorString(pub?.autorenString ?? ''),
    year: parseYear(pub?.publikationJahr),
    journal,
    abstract: pub?.abriss?.trim() || undefined,
    pmid,
    pmcid,
    openAccess: parseOpenAccess(entry.oaStatus),
    url: doi ? `https://doi.org/${doi}` : pubmedUrl,
  };
}

export class ResearchDatabaseClient {
  private baseUrl: string;
  private memberDelay: number;
  private log = getLogger('research-db');

  constructor(options: { baseUrl?: string; memberDelay?: number } = {}) {
    this.baseUrl = (options.baseUrl || DEFAULT_RESEARCH_DB_URL).replace(/\/+$/, '');
    this.memberDelay = options.memberDelay ?? DEFAULT_MEMBER_DELAY;
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const response = await fetch(url, { headers: { Accept: 'application/json' } });
    if (!response.ok) {
      throw new Error(`Research database error (${response.status}) for ${path}`);
    }
    return response.json();
  }

  /**
   * All publications of one person. Entries that do not match the expected
   * shape are dropped and logged.
   */
  async fetchPublications(token: string): Promise<SourcePublication[]> {
    const raw = publicationsResponseSchema.parse(
      await this.getJson(`/publications/pub_per_exp/${encodeURIComponent(token)}/FPS`)
    );

    const publications: SourcePublication[] = [];
    for (const item of raw.publikationen ?? []) {
      const entry = publicationEntrySchema.safeParse(item);
      if (!entry.success) {
        this.log.warn({ token, issues: entry.error.issues.length }, 'Malformed publication entry');
        continue;
      }
      publications.push(parsePublicationEntry(entry.data));
    }
    return publications;
  }

  async fetchCoauthors(token: string): Promise<Coauthor[]> {
    const raw = coauthorsResponseSchema.parse(
      await this.getJson(`/exp/co_per_exp/${encodeURIComponent(token)}/FPS`)
    );

    const coauthors: Coauthor[] = [];
    for (const entry of raw.autoren ?? []) {
      const person = entry.autorenPerson;
      if (!person) {
        continue;
      }
      coauthors.push({
        surname: person.name ?? '',
        firstName: person.vorname ?? '',
        token: person.person?.token ?? undefined,
        type: person.person?.type ?? '',
        publicationCount: person.anzahlPublikationen ?? 0,
      });
    }
    return coauthors;
  }

  async fetchProfileInfo(token: string): Promise<ProfileInfo> {
    const raw = profileResponseSchema.parse(
      await this.getJson(`/exp/info_per_exp/${encodeURIComponent(token)}`)
    );
    const main = raw.mainInfo;

    return {
      firstName: main?.vorname ?? '',
      lastName: main?.nachname ?? '',
      group: main?.gruppe ?? '',
      groupEn: main?.gruppeen ?? '',
      orcid: main?.orcid ?? '',
      totalPublications: raw.publikationen ?? 0,
      internalCoauthors: raw.interneCoAutoren?.level1 ?? 0,
      totalCoauthors: raw.gesamt?.level1 ?? 0,
    };
  }

  /**
   * One batch per member with a token, in roster order. Requests are
   * sequential with a fixed delay; a failing member yields an empty batch.
   */
  async fetchTeam(members: TeamMember[]): Promise<MemberBatch[]> {
    const fetchable = members.filter((m) => m.token);
    this.log.info(
      { fetchable: fetchable.length, withoutToken: members.length - fetchable.length },
      'Fetching team publications'
    );

    const batches: MemberBatch[] = [];
    for (const [index, member] of fetchable.entries()) {
      if (index > 0 && this.memberDelay > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.memberDelay));
      }
      batches.push(await this.fetchMember(member));
    }
    return batches;
  }

  async fetchMember(member: TeamMember): Promise<MemberBatch> {
    if (!member.token) {
      this.log.debug({ member: member.id }, 'No research database token, skipping');
      return { member, publications: [] };
    }

    try {
      const publications = await this.fetchPublications(member.token);
      this.log.info({ member: member.id, count: publications.length }, 'Fetched publications');
      return { member, publications };
    } catch (error) {
      this.log.error({ member: member.id, err: error }, 'Failed to fetch publications');
      return { member, publications: [], error: errorMessage(error) };
    }
  }
}
