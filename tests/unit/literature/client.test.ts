/**
 * Tests for PubMed citation lookup
 *
 * Uses an in-process fetch stand-in; no network access.
 */

import { describe, it, expect } from 'vitest';
import {
  LiteratureClient,
  buildSearchTerm,
  extractDoi,
} from '../../../src/services/literature/client.js';
import { LiteratureAPIError } from '../../../src/services/api-errors.js';
import { fakeFetch, fakeSleep } from '../../fixtures/http.js';
import { jsonResponse } from '../../fixtures/trials.js';

const BASE = 'https://literature.test/eutils';

function searchBody(ids: Array<string | number>) {
  return { esearchresult: { count: String(ids.length), idlist: ids } };
}

describe('buildSearchTerm', () => {
  it('matches both identifier forms in the secondary source field', () => {
    expect(buildSearchTerm('NCT01234567')).toBe(
      '("ClinicalTrials.gov/NCT01234567"[SI] OR "NCT01234567"[SI])'
    );
  });
});

describe('extractDoi', () => {
  it('prefers the structured article id', () => {
    expect(
      extractDoi({
        articleids: [
          { idtype: 'pubmed', value: '1' },
          { idtype: 'doi', value: '10.1000/structured' },
        ],
        elocationid: 'doi: 10.1000/free-text',
      })
    ).toBe('10.1000/structured');
  });

  it('falls back to the electronic location', () => {
    expect(extractDoi({ elocationid: 'doi: 10.1000/free-text' })).toBe('10.1000/free-text');
  });

  it('strips every doi: prefix from the electronic location', () => {
    expect(extractDoi({ elocationid: 'doi:10.1000/x doi:' })).toBe('10.1000/x');
  });

  it('returns null when no DOI is present', () => {
    expect(extractDoi({ elocationid: 'pii: S0000-0000(24)00001-1' })).toBeNull();
    expect(extractDoi({})).toBeNull();
  });
});

describe('LiteratureClient.citationsForTrial', () => {
  it('returns citations in search order', async () => {
    const http = fakeFetch([
      jsonResponse(searchBody(['111', 222])),
      jsonResponse({
        result: {
          uids: ['111', '222'],
          '222': { title: 'Second', source: 'J Two', pubdate: '2023', elocationid: 'doi: 10.1000/two' },
          '111': {
            title: 'First',
            fulljournalname: 'Journal One',
            source: 'J One',
            pubdate: '2024 Mar',
            articleids: [{ idtype: 'doi', value: '10.1000/one' }],
          },
        },
      }),
    ]);
    const client = new LiteratureClient({ tool: 'trial-watch-test', baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    expect(await client.citationsForTrial('NCT01234567')).toEqual([
      { pmid: '111', title: 'First', source: 'Journal One', pub_date: '2024 Mar', doi: '10.1000/one' },
      { pmid: '222', title: 'Second', source: 'J Two', pub_date: '2023', doi: '10.1000/two' },
    ]);

    const [search, summary] = http.urls;
    expect(search.pathname).toBe('/eutils/esearch.fcgi');
    expect(search.searchParams.get('db')).toBe('pubmed');
    expect(search.searchParams.get('term')).toBe(buildSearchTerm('NCT01234567'));
    expect(search.searchParams.get('retmax')).toBe('200');
    expect(search.searchParams.get('retmode')).toBe('json');
    expect(search.searchParams.get('tool')).toBe('trial-watch-test');
    expect(search.searchParams.has('email')).toBe(false);
    expect(summary.pathname).toBe('/eutils/esummary.fcgi');
    expect(summary.searchParams.get('id')).toBe('111,222');
  });

  it('skips the summary request when the search is empty', async () => {
    const http = fakeFetch([jsonResponse(searchBody([]))]);
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch });

    expect(await client.citationsForTrial('NCT00000001')).toEqual([]);
    expect(http.urls).toHaveLength(1);
  });

  it('drops ids with no summary record', async () => {
    const http = fakeFetch([
      jsonResponse(searchBody(['1', '2'])),
      jsonResponse({ result: { '1': { title: 'Only one' } } }),
    ]);
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    expect(await client.citationsForTrial('NCT00000001')).toEqual([
      { pmid: '1', title: 'Only one', source: null, pub_date: null, doi: null },
    ]);
  });

  it('keeps a citation whose fields have unexpected types', async () => {
    const http = fakeFetch([
      jsonResponse(searchBody(['5'])),
      jsonResponse({
        result: { '5': { title: ['not', 'text'], source: null, pubdate: 2024, articleids: 'none' } },
      }),
    ]);
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    expect(await client.citationsForTrial('NCT00000001')).toEqual([
      { pmid: '5', title: null, source: null, pub_date: '2024', doi: null },
    ]);
  });

  it('sends contact details when configured', async () => {
    const http = fakeFetch([jsonResponse(searchBody([]))]);
    const client = new LiteratureClient({
      tool: 't',
      email: 'curator@example.org',
      apiKey: 'test-secret',
      baseUrl: BASE,
      fetch: http.fetch,
    });

    await client.citationsForTrial('NCT00000001', 25);

    expect(http.urls[0].searchParams.get('email')).toBe('curator@example.org');
    expect(http.urls[0].searchParams.get('api_key')).toBe('test-secret');
    expect(http.urls[0].searchParams.get('retmax')).toBe('25');
  });

  it('sleeps between requests but not before the first', async () => {
    const http = fakeFetch((url) =>
      url.pathname.endsWith('esearch.fcgi')
        ? jsonResponse(searchBody(['9']))
        : jsonResponse({ result: { '9': { title: 'x' } } })
    );
    const pause = fakeSleep();
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch, sleep: pause.sleep });

    await client.citationsForTrial('NCT00000001');
    await client.citationsForTrial('NCT00000002');

    expect(http.urls).toHaveLength(4);
    expect(pause.calls).toEqual([400, 400, 400]);
  });

  it('raises on a server error', async () => {
    const http = fakeFetch([new Response('oops', { status: 500 })]);
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch });

    const error = await client.citationsForTrial('NCT00000001').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LiteratureAPIError);
    if (!(error instanceof LiteratureAPIError)) return;
    expect(error.category).toBe('LITERATURE_SERVER_ERROR');
    expect(error.message).toBe('PubMed esearch.fcgi error 500: oops');
  });

  it('reports a malformed search body', async () => {
    const http = fakeFetch([jsonResponse({ esearchresult: { idlist: 'not-a-list' } })]);
    const client = new LiteratureClient({ tool: 't', baseUrl: BASE, fetch: http.fetch });

    await expect(client.searchPmids('NCT00000001')).rejects.toMatchObject({
      category: 'LITERATURE_MALFORMED_RESPONSE',
    });
  });
});
