/**
 * Research database client tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import {
  DEFAULT_RESEARCH_DB_URL,
  ResearchDatabaseClient,
  parseAuthorString,
  parsePublicationEntry,
} from '../src/sources/research-db-client.js';
import { jsonResponse, textResponse } from './helpers.js';

let fetchMock: Mock<typeof fetch>;

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
});

describe('parseAuthorString', () => {
  it('turns "Last,First" pairs into display names', () => {
    expect(parseAuthorString('Doe,Jane; Roe,Richard A.;Consortium X;')).toEqual([
      'Jane Doe',
      'Richard A. Roe',
      'Consortium X',
    ]);
  });

  it('returns nothing for an empty string', () => {
    expect(parseAuthorString('')).toEqual([]);
  });
});

describe('parsePublicationEntry', () => {
  it('extracts identifiers from labelled links', () => {
    const publication = parsePublicationEntry({
      publikation: {
        titel: 'Terminology services for research data.',
        publikationJahr: '2023',
        autorenString: 'Doe,Jane;Roe,Richard',
        abriss: '  Background text. ',
        quelle: { langname: 'Methods of Information in Medicine', name: 'Methods Inf Med' },
      },
      links: [
        { url: 'https://doi.org/10.1055/s-0043-1', en: 'DOI', de: null },
        { url: 'https://pubmed.ncbi.nlm.nih.gov/37000001/', en: 'PubMed', de: null },
        { url: 'https://www.ncbi.nlm.nih.gov/pmc/articles/pmc9900001', en: 'PMC', de: null },
      ],
      oaStatus: 'gold',
    });

    expect(publication).toEqual({
      title: 'Terminology services for research data',
      doi: '10.1055/s-0043-1',
      authors: ['Jane Doe', 'Richard Roe'],
      year: 2023,
      journal: 'Methods of Information in Medicine',
      abstract: 'Background text.',
      pmid: '37000001',
      pmcid: 'PMC9900001',
      openAccess: true,
      url: 'https://doi.org/10.1055/s-0043-1',
    });
  });

  it('falls back to the PubMed link and the German label', () => {
    const publication = parsePublicationEntry({
      publikation: { titel: 'Registry Governance', publikationJahr: 2021, quelle: { name: 'Short Name' } },
      links: [{ url: 'https://pubmed.ncbi.nlm.nih.gov/123', de: 'PubMed-Eintrag' }],
      oaStatus: 'closed',
    });

    expect(publication.doi).toBeUndefined();
    expect(publication.pmid).toBe('123');
    expect(publication.url).toBe('https://pubmed.ncbi.nlm.nih.gov/123');
    expect(publication.journal).toBe('Short Name');
    expect(publication.openAccess).toBe(false);
  });

  it('reads a PubMed Central link as a PMCID only', () => {
    const publication = parsePublicationEntry({
      publikation: { titel: 'Open registry data' },
      links: [
        { url: 'https://www.ncbi.nlm.nih.gov/pmc/articles/PMC7654321/', en: 'PubMed Central' },
        { url: 'https://pubmed.ncbi.nlm.nih.gov/33000002/', en: 'PubMed' },
      ],
    });

    expect(publication.pmcid).toBe('PMC7654321');
    expect(publication.pmid).toBe('33000002');
  });

  it('does not take a PMID from a PubMed Central link', () => {
    const publication = parsePublicationEntry({
      publikation: { titel: 'Open registry data' },
      links: [{ url: 'https://www.ncbi.nlm.nih.gov/pmc/articles/PMC7654321/', en: 'PubMed Central' }],
    });

    expect(publication.pmid).toBeUndefined();
    expect(publication.url).toBeUndefined();
  });

  it('leaves a missing title undefined', () => {
    const publication = parsePublicationEntry({ publikation: null, links: null });

    expect(publication).toMatchObject({ title: undefined, authors: [], year: undefined, openAccess: undefined });
  });
});

describe('ResearchDatabaseClient', () => {
  const publicationsBody = {
    publikationen: [
      { publikation: { titel: 'FHIR in Practice', publikationJahr: 2023, autorenString: 'Doe,Jane' } },
      { publikation: 'not an object' },
    ],
  };

  it('fetches publications and drops malformed entries', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(publicationsBody));

    const client = new ResearchDatabaseClient({ memberDelay: 0 });
    const publications = await client.fetchPublications('tok-a');

    expect(fetchMock.mock.calls[0][0]).toBe(`${DEFAULT_RESEARCH_DB_URL}/publications/pub_per_exp/tok-a/FPS`);
    expect(publications).toHaveLength(1);
    expect(publications[0]).toMatchObject({ title: 'FHIR in Practice', year: 2023, authors: ['Jane Doe'] });
  });

  it('fetches members with a token in order and isolates failures', async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = String(input);
      if (url.includes('/tok-a/')) {
        return jsonResponse(publicationsBody);
      }
      return textResponse('unavailable', { status: 503 });
    });

    const client = new ResearchDatabaseClient({ baseUrl: 'http://research.test/', memberDelay: 0 });
    const batches = await client.fetchTeam([
      { id: 'Doe', name: 'Jane Doe', token: 'tok-a' },
      { id: 'Roe', name: 'Richard Roe' },
      { id: 'Poe', name: 'Pat Poe', token: 'tok-c' },
    ]);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe('http://research.test/publications/pub_per_exp/tok-c/FPS');
    expect(batches.map((b) => b.member.id)).toEqual(['Doe', 'Poe']);
    expect(batches[0].publications).toHaveLength(1);
    expect(batches[0].error).toBeUndefined();
    expect(batches[1]).toMatchObject({
      publications: [],
      error: 'Research database error (503) for /publications/pub_per_exp/tok-c/FPS',
    });
  });

  it('reads co-authors', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        autoren: [
          {
            autorenPerson: {
              name: 'Roe',
              vorname: 'Richard',
              anzahlPublikationen: 4,
              person: { token: 'tok-r', type: 'intern' },
            },
          },
          { autorenPerson: null },
        ],
      })
    );

    const coauthors = await new ResearchDatabaseClient().fetchCoauthors('tok-a');

    expect(coauthors).toEqual([
      { surname: 'Roe', firstName: 'Richard', token: 'tok-r', type: 'intern', publicationCount: 4 },
    ]);
  });

  it('reads profile info with defaults', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ mainInfo: { vorname: 'Jane', nachname: 'Doe', orcid: '0000-0000-0000-0001' }, publikationen: 12 })
    );

    const profile = await new ResearchDatabaseClient().fetchProfileInfo('tok-a');

    expect(fetchMock.mock.calls[0][0]).toBe(`${DEFAULT_RESEARCH_DB_URL}/exp/info_per_exp/tok-a`);
    expect(profile).toEqual({
      firstName: 'Jane',
      lastName: 'Doe',
      group: '',
      groupEn: '',
      orcid: '0000-0000-0000-0001',
      totalPublications: 12,
      internalCoauthors: 0,
      totalCoauthors: 0,
    });
  });
});
