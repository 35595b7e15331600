/**
 * Tests for registry pagination
 *
 * Uses an in-process fetch stand-in; no network access.
 */

import { describe, it, expect } from 'vitest';
import { RegistryClient } from '../../../src/services/registry/client.js';
import { RegistryAPIError } from '../../../src/services/api-errors.js';
import type { RawStudyDocument } from '../../../src/models/study.js';
import { fakeFetch, fakeSleep } from '../../fixtures/http.js';
import { jsonResponse, makeStudy } from '../../fixtures/trials.js';

const BASE = 'https://registry.test/api/v2';

async function collect(source: AsyncIterable<RawStudyDocument>): Promise<RawStudyDocument[]> {
  const out: RawStudyDocument[] = [];
  for await (const study of source) out.push(study);
  return out;
}

describe('RegistryClient.iterStudies', () => {
  it('follows body tokens until they run out', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [makeStudy({ nctId: 'NCT1' }), makeStudy({ nctId: 'NCT2' })], nextPageToken: 'tok2' }),
      jsonResponse({ studies: [makeStudy({ nctId: 'NCT3' })] }),
    ]);
    const pause = fakeSleep();
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleep: pause.sleep });

    const studies = await collect(client.iterStudies({ 'query.cond': 'asthma' }));

    expect(studies).toHaveLength(3);
    expect(http.urls).toHaveLength(2);
    expect(http.urls[0].pathname).toBe('/api/v2/studies');
    expect(http.urls[0].searchParams.get('query.cond')).toBe('asthma');
    expect(http.urls[0].searchParams.get('format')).toBe('json');
    expect(http.urls[0].searchParams.get('pageSize')).toBe('200');
    expect(http.urls[0].searchParams.has('pageToken')).toBe(false);
    expect(http.urls[1].searchParams.get('pageToken')).toBe('tok2');
    expect(pause.calls).toEqual([250]);
  });

  it('stops at the page cap even when a token is present', async () => {
    const http = fakeFetch(() => jsonResponse({ studies: [makeStudy()], nextPageToken: 'more' }));
    const pause = fakeSleep();
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleep: pause.sleep });

    const studies = await collect(client.iterStudies({}, { maxPages: 2 }));

    expect(studies).toHaveLength(2);
    expect(http.urls).toHaveLength(2);
    expect(pause.calls).toHaveLength(1);
  });

  it('reads the continuation token from the response header', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [] }, 200, { 'x-next-page-token': 'hdr2' }),
      jsonResponse({ studies: [] }),
    ]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    await collect(client.iterStudies({}));

    expect(http.urls).toHaveLength(2);
    expect(http.urls[1].searchParams.get('pageToken')).toBe('hdr2');
  });

  it('prefers the body token over the header token', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [], nextPageToken: 'body2' }, 200, { 'x-next-page-token': 'hdr2' }),
      jsonResponse({ studies: [] }),
    ]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    await collect(client.iterStudies({}));

    expect(http.urls).toHaveLength(2);
    expect(http.urls[1].searchParams.get('pageToken')).toBe('body2');
  });

  it('falls back to the header token when the body token is empty', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [], nextPageToken: '' }, 200, { 'x-next-page-token': 'hdr2' }),
      jsonResponse({ studies: [] }),
    ]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });

    await collect(client.iterStudies({}));

    expect(http.urls).toHaveLength(2);
    expect(http.urls[1].searchParams.get('pageToken')).toBe('hdr2');
  });

  it('keeps caller-supplied format and page size and drops a stray page token', async () => {
    const http = fakeFetch([jsonResponse({ studies: [] })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    await collect(client.iterStudies({ pageSize: 50, format: 'json', pageToken: 'stale' }, { pageSize: 500 }));

    expect(http.urls[0].searchParams.get('pageSize')).toBe('50');
    expect(http.urls[0].searchParams.has('pageToken')).toBe(false);
  });

  it('skips non-object entries in a page', async () => {
    const http = fakeFetch([jsonResponse({ studies: [makeStudy(), 'junk', null, 7] })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    expect(await collect(client.iterStudies({}))).toHaveLength(1);
  });

  it('never sleeps when the delay is zero', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [], nextPageToken: 'b' }),
      jsonResponse({ studies: [] }),
    ]);
    const pause = fakeSleep();
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleep: pause.sleep, sleepSeconds: 0 });

    await collect(client.iterStudies({}));
    expect(pause.calls).toEqual([]);
  });

  it('fails the sequence on a server error', async () => {
    const http = fakeFetch([new Response('maintenance', { status: 503 })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    const error = await collect(client.iterStudies({})).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryAPIError);
    if (!(error instanceof RegistryAPIError)) return;
    expect(error.statusCode).toBe(503);
    expect(error.category).toBe('REGISTRY_SERVER_ERROR');
    expect(error.message).toBe('Registry API error 503 (studies page 1): maintenance');
  });

  it('yields earlier pages before a later page fails', async () => {
    const http = fakeFetch([
      jsonResponse({ studies: [makeStudy()], nextPageToken: 'b' }),
      new Response('bad request', { status: 400 }),
    ]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch, sleepSeconds: 0 });
    const seen: RawStudyDocument[] = [];

    await expect(
      (async () => {
        for await (const study of client.iterStudies({})) seen.push(study);
      })()
    ).rejects.toMatchObject({ category: 'REGISTRY_API_ERROR', statusCode: 400 });
    expect(seen).toHaveLength(1);
  });

  it('reports a malformed body', async () => {
    const http = fakeFetch([new Response('<html>', { status: 200 })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    await expect(collect(client.iterStudies({}))).rejects.toMatchObject({
      category: 'REGISTRY_MALFORMED_RESPONSE',
    });
  });
});

describe('RegistryClient.getStudy', () => {
  it('requests a single study by identifier', async () => {
    const http = fakeFetch([jsonResponse(makeStudy({ nctId: 'NCT12345678' }))]);
    const client = new RegistryClient({ baseUrl: `${BASE}/`, fetch: http.fetch });

    const study = await client.getStudy('NCT12345678');

    expect(http.urls[0].href).toBe(`${BASE}/studies/NCT12345678`);
    expect(study.protocolSection).toBeDefined();
  });

  it('rejects a 404', async () => {
    const http = fakeFetch([new Response('not found', { status: 404 })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    await expect(client.getStudy('NCT00000000')).rejects.toBeInstanceOf(RegistryAPIError);
  });
});

describe('RegistryClient.version', () => {
  it('returns the version document', async () => {
    const http = fakeFetch([jsonResponse({ apiVersion: '2.0.3' })]);
    const client = new RegistryClient({ baseUrl: BASE, fetch: http.fetch });

    expect(await client.version()).toEqual({ apiVersion: '2.0.3' });
    expect(http.urls[0].pathname).toBe('/api/v2/version');
  });
});
