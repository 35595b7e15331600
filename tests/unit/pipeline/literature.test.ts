/**
 * Literature linking pass tests
 *
 * Real SQLite store, in-process E-utilities stand-in.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { latestPublicationDate, linkLiterature } from '../../../src/services/pipeline/literature.js';
import { LiteratureClient } from '../../../src/services/literature/client.js';
import { DatabaseService } from '../../../src/services/storage/index.js';
import { parseConfig, type TrialWatchConfig } from '../../../src/config/index.js';
import { createTestDir, cleanupTestDir, createTestDbPath } from '../../helpers.js';
import { fakeFetch, type Responder } from '../../fixtures/http.js';
import { jsonResponse, makeRecord, makeScores } from '../../fixtures/trials.js';

function testConfig(literature: Record<string, unknown> = {}): TrialWatchConfig {
  return parseConfig({ literature: { sleepSeconds: 0, ...literature }, topics: [{ name: 'asthma' }] }, {});
}

/** NCT_A has two papers, NCT_B fails, everything else has none */
const eutils: Responder = (url) => {
  if (url.pathname.endsWith('/esearch.fcgi')) {
    const term = url.searchParams.get('term') ?? '';
    if (term.includes('NCT_B')) return new Response('rate limited', { status: 429 });
    return jsonResponse({ esearchresult: { idlist: term.includes('NCT_A') ? ['11', '12'] : [] } });
  }
  return jsonResponse({
    result: {
      '11': { title: 'Early readout', source: 'J Resp', pubdate: '2023 Jan' },
      '12': { title: 'Final analysis', source: 'J Resp', pubdate: '2024 May' },
    },
  });
};

function seed(dbPath: string): void {
  const db = DatabaseService.open(dbPath);
  try {
    const put = (id: string, days: number, total: number) =>
      db.upsertTrial(makeRecord({ nct_id: id }), 'asthma', makeScores({ days_to_primary_completion: days, total }));
    put('NCT_A', 10, 90);
    put('NCT_B', 20, 80);
    put('NCT_C', 500, 99);
  } finally {
    db.close();
  }
}

function clientFor(responder: Responder) {
  const http = fakeFetch(responder);
  return {
    http,
    literature: new LiteratureClient({ tool: 'trial-watch-test', baseUrl: 'https://lit.test/eutils', fetch: http.fetch, sleepSeconds: 0 }),
  };
}

describe('linkLiterature', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('pipeline-literature');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  it('links actionable trials and isolates per-trial failures', async () => {
    const dbPath = createTestDbPath(testDir);
    seed(dbPath);
    const { literature } = clientFor(eutils);

    const result = await linkLiterature(testConfig(), dbPath, {}, { literature });

    expect(result).toEqual({ checked: 2, linked: 1, failed: ['NCT_B'] });

    const db = DatabaseService.openExisting(dbPath);
    try {
      const a = db.getTrial('NCT_A');
      expect(a?.pubmed_count).toBe(2);
      expect(a?.pubmed_latest_date).toBe('2024 May');
      expect(a?.last_pubmed_check_utc).not.toBeNull();
      expect(db.getCitations('NCT_A').map((c) => [c.pmid, c.title])).toEqual([
        ['11', 'Early readout'],
        ['12', 'Final analysis'],
      ]);

      const b = db.getTrial('NCT_B');
      expect(b?.pubmed_count).toBe(0);
      expect(b?.last_pubmed_check_utc).toBeNull();
      expect(db.getTrial('NCT_C')?.last_pubmed_check_utc).toBeNull();
    } finally {
      db.close();
    }
  });

  it('checks top-scored trials when not restricted to actionable ones', async () => {
    const dbPath = createTestDbPath(testDir);
    seed(dbPath);
    const { http, literature } = clientFor(eutils);

    const result = await linkLiterature(testConfig({ actionableOnly: false }), dbPath, { maxTrials: 1 }, { literature });

    expect(result).toEqual({ checked: 1, linked: 0, failed: [] });
    expect(http.urls[0].searchParams.get('term')).toContain('NCT_C');

    const db = DatabaseService.openExisting(dbPath);
    try {
      expect(db.getTrial('NCT_C')?.pubmed_count).toBe(0);
      expect(db.getTrial('NCT_C')?.last_pubmed_check_utc).not.toBeNull();
    } finally {
      db.close();
    }
  });

  it('does nothing when disabled', async () => {
    const dbPath = createTestDbPath(testDir);
    const { http, literature } = clientFor(eutils);

    expect(await linkLiterature(testConfig({ enabled: false }), dbPath, {}, { literature })).toEqual({
      checked: 0,
      linked: 0,
      failed: [],
    });
    expect(http.urls).toHaveLength(0);
    expect(DatabaseService.exists(dbPath)).toBe(false);
  });
});

describe('latestPublicationDate', () => {
  it('takes the greatest non-empty date string', () => {
    expect(
      latestPublicationDate([
        { pmid: '1', title: null, source: null, pub_date: '2023 Jan', doi: null },
        { pmid: '2', title: null, source: null, pub_date: '', doi: null },
        { pmid: '3', title: null, source: null, pub_date: '2024 May', doi: null },
        { pmid: '4', title: null, source: null, pub_date: null, doi: null },
      ])
    ).toBe('2024 May');
  });

  it('returns null without dates', () => {
    expect(latestPublicationDate([])).toBeNull();
  });
});
