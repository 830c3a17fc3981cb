/**
 * PubMed client tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PubMedClient, parseAbstract, parseArticles } from '../src/sources/pubmed-client.js';
import { jsonResponse, record, textResponse } from './helpers.js';

const STRUCTURED_XML = `<?xml version="1.0"?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation>
      <Article>
        <Abstract>
          <AbstractText Label="BACKGROUND">Background text.</AbstractText>
          <AbstractText Label="RESULTS">Results text.</AbstractText>
        </Abstract>
      </Article>
    </MedlineCitation>
  </PubmedArticle>
</PubmedArticleSet>`;

const PLAIN_XML = `<PubmedArticleSet><PubmedArticle><MedlineCitation><Article>
<Abstract><AbstractText>Plain abstract about FHIR.</AbstractText></Abstract>
</Article></MedlineCitation></PubmedArticle></PubmedArticleSet>`;

const ARTICLES_XML = `<?xml version="1.0"?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation>
      <PMID Version="1">36000001</PMID>
      <Article>
        <Journal>
          <JournalIssue><PubDate><Year>2022</Year><Month>Mar</Month></PubDate></JournalIssue>
          <Title>Journal of Medical Systems</Title>
        </Journal>
        <ArticleTitle>FHIR-based registries.</ArticleTitle>
        <Abstract><AbstractText>Registry abstract.</AbstractText></Abstract>
        <AuthorList>
          <Author><LastName>Doe</LastName><ForeName>Jane</ForeName></Author>
          <Author><LastName>Roe</LastName><Initials>R</Initials></Author>
          <Author><CollectiveName>Registry Study Group</CollectiveName></Author>
        </AuthorList>
      </Article>
    </MedlineCitation>
    <PubmedData>
      <ArticleIdList>
        <ArticleId IdType="pubmed">36000001</ArticleId>
        <ArticleId IdType="doi">10.1000/registry</ArticleId>
        <ArticleId IdType="pmc">PMC9000001</ArticleId>
      </ArticleIdList>
    </PubmedData>
  </PubmedArticle>
  <PubmedArticle>
    <MedlineCitation>
      <PMID Version="1">36000002</PMID>
      <Article>
        <Journal><JournalIssue><PubDate><MedlineDate>2021 Nov-Dec</MedlineDate></PubDate></JournalIssue></Journal>
        <ArticleTitle>Terminology mapping</ArticleTitle>
      </Article>
    </MedlineCitation>
  </PubmedArticle>
  <PubmedArticle>
    <MedlineCitation><PMID Version="1">36000003</PMID><Article></Article></MedlineCitation>
  </PubmedArticle>
</PubmedArticleSet>`;

let fetchMock: Mock<typeof fetch>;

function calledUrl(index: number): URL {
  return new URL(String(fetchMock.mock.calls[index][0]));
}

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
});

describe('parseAbstract', () => {
  it('joins labelled sections', () => {
    expect(parseAbstract(STRUCTURED_XML)).toBe('BACKGROUND: Background text.\n\nRESULTS: Results text.');
  });

  it('reads an unlabelled abstract', () => {
    expect(parseAbstract(PLAIN_XML)).toBe('Plain abstract about FHIR.');
  });

  it('returns an empty string without an abstract', () => {
    expect(parseAbstract('<PubmedArticleSet><PubmedArticle></PubmedArticle></PubmedArticleSet>')).toBe('');
  });
});

describe('parseArticles', () => {
  it('reads citation fields and article ids', () => {
    expect(parseArticles(ARTICLES_XML)).toEqual([
      {
        pmid: '36000001',
        title: 'FHIR-based registries',
        creators: [
          { creatorType: 'author', firstName: 'Jane', lastName: 'Doe' },
          { creatorType: 'author', firstName: 'R', lastName: 'Roe' },
          { creatorType: 'author', name: 'Registry Study Group' },
        ],
        journal: 'Journal of Medical Systems',
        year: 2022,
        doi: '10.1000/registry',
        pmcid: 'PMC9000001',
        abstract: 'Registry abstract.',
      },
      { pmid: '36000002', title: 'Terminology mapping', creators: [], year: 2021 },
    ]);
  });

  it('returns nothing for an empty result set', () => {
    expect(parseArticles('<PubmedArticleSet></PubmedArticleSet>')).toEqual([]);
  });
});

describe('PubMedClient', () => {
  const client = () => new PubMedClient({ email: 'team@example.org', requestInterval: 0 });

  it('converts identifiers through the ID converter', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ records: [{ doi: '10.1/abc', pmid: 12345, pmcid: 'PMC999' }] }));

    const pmid = await client().convertIdentifier('10.1/abc', 'doi', 'pmid');

    const url = calledUrl(0);
    expect(url.searchParams.get('ids')).toBe('10.1/abc');
    expect(url.searchParams.get('idtype')).toBe('doi');
    expect(url.searchParams.get('tool')).toBe('zotero-comfort');
    expect(url.searchParams.get('email')).toBe('team@example.org');
    expect(pmid).toBe('12345');
  });

  it('returns null for an unknown identifier', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ records: [{ pmid: '1', status: 'error' }] }));

    expect(await client().lookupIdentifiers('1', 'pmid')).toBeNull();
  });

  it('fills missing identifiers and the abstract', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ records: [{ doi: '10.1/abc', pmid: '12345', pmcid: 'PMC999' }] }))
      .mockResolvedValueOnce(textResponse(PLAIN_XML));

    const original = record({ title: 'FHIR profiles', doi: '10.1/abc', provenance: ['Doe'] });
    const enriched = await client().enrich(original);

    expect(calledUrl(1).pathname).toBe('/entrez/eutils/efetch.fcgi');
    expect(calledUrl(1).searchParams.get('id')).toBe('12345');
    expect(enriched).toMatchObject({
      doi: '10.1/abc',
      pmid: '12345',
      pmcid: 'PMC999',
      abstract: 'Plain abstract about FHIR.',
    });
    expect([...enriched.provenance]).toEqual(['Doe']);
    expect(original.pmid).toBeUndefined();
  });

  it('keeps fields that are already present', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ records: [{ doi: '10.1/other', pmid: '12345' }] }));

    const enriched = await client().enrich(
      record({ title: 'T', doi: '10.1/abc', abstract: 'Existing.', provenance: ['Doe'] })
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(enriched).toMatchObject({ doi: '10.1/abc', pmid: '12345', abstract: 'Existing.' });
  });

  it('returns the record unchanged when NCBI fails', async () => {
    fetchMock.mockImplementation(async () => textResponse('error', { status: 500 }));

    const original = record({ title: 'T', pmid: '42', provenance: ['Doe'] });
    const enriched = await client().enrich(original);

    expect(enriched).toEqual(original);
    expect(enriched).not.toBe(original);
  });

  it('makes no request when nothing can be looked up', async () => {
    const enriched = await client().enrich(record({ title: 'Only a title', provenance: ['Doe'] }));

    expect(fetchMock).not.toHaveBeenCalled();
    expect(enriched.title).toBe('Only a title');
  });

  describe('searchArticles', () => {
    it('searches with a date range and fetches the hits', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ esearchresult: { idlist: ['36000001', '36000002'] } }))
        .mockResolvedValueOnce(textResponse(ARTICLES_XML));

      const articles = await client().searchArticles('registry', {
        maxResults: 20,
        minDate: '2020/01/01',
        maxDate: '2022/12/31',
        sort: 'pub_date',
      });

      const search = calledUrl(0);
      expect(search.pathname).toBe('/entrez/eutils/esearch.fcgi');
      expect(search.searchParams.get('term')).toBe('registry AND 2020/01/01:2022/12/31[pdat]');
      expect(search.searchParams.get('retmax')).toBe('20');
      expect(search.searchParams.get('sort')).toBe('pub_date');
      expect(search.searchParams.get('retmode')).toBe('json');
      expect(calledUrl(1).searchParams.get('id')).toBe('36000001,36000002');
      expect(articles.map((a) => a.pmid)).toEqual(['36000001', '36000002']);
    });

    it('skips the fetch when nothing matches', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { idlist: [] } }));

      const articles = await client().searchArticles('nothing here');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(calledUrl(0).searchParams.get('term')).toBe('nothing here');
      expect(calledUrl(0).searchParams.get('retmax')).toBe('50');
      expect(calledUrl(0).searchParams.get('sort')).toBe('relevance');
      expect(articles).toEqual([]);
    });

    it('throws when the search fails', async () => {
      fetchMock.mockResolvedValueOnce(textResponse('busy', { status: 503 }));

      await expect(client().searchArticles('registry')).rejects.toThrow(
        'NCBI error (503) for /entrez/eutils/esearch.fcgi'
      );
    });
  });
});
